import { CancellationError } from '@runtime/core/errors';
import type { PageFetcher } from '@runtime/core/interfaces';

export interface FetchAllOptions {
  signal?: AbortSignal;
}

/**
 * Walk a cursor-paginated list to the end, flattening the pages.
 *
 * No page-count bound is imposed: a peer that keeps returning cursors is
 * followed until the caller's signal aborts.
 */
export async function fetchAll<T>(
  fetchPage: PageFetcher<T>,
  options: FetchAllOptions = {}
): Promise<T[]> {
  const { signal } = options;
  const items: T[] = [];
  let cursor: string | undefined;

  do {
    if (signal?.aborted) {
      throw new CancellationError(undefined, 'aborted');
    }
    const page = await fetchPage(cursor, signal);
    items.push(...page.items);
    cursor = page.nextCursor;
  } while (cursor !== undefined);

  return items;
}
