/**
 * Output formatting for command results.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import {
  CallError,
  CancellationError,
  type Content,
  type Resource,
  type ResourceContents,
  type Tool,
} from '@mcpipe/runtime';

export type OutputFormat = 'pretty' | 'json';

export function formatOutput(data: unknown, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(data, null, 2);
  }
  return typeof data === 'string' ? data : JSON.stringify(data, null, 2);
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 1) + '…' : text;
}

/**
 * One printable block per content item of a tool result.
 */
export function renderContent(content: Content[]): string[] {
  return content.map((item) => {
    if (item.type === 'text') {
      return item.text ?? '';
    }
    if (item.type === 'image' || item.type === 'audio') {
      return chalk.gray(`[${item.type === 'image' ? 'Image' : 'Audio'}: ${item.mimeType ?? 'unknown type'}]`);
    }
    if (item.type === 'resource') {
      return chalk.cyan('[Resource]') + ' ' + JSON.stringify(item.resource ?? null);
    }
    return chalk.gray(JSON.stringify(item, null, 2));
  });
}

export function renderResourceContents(contents: ResourceContents[]): string[] {
  return contents.map((item) => {
    if (item.text !== undefined) {
      return item.text;
    }
    const size = item.blob === undefined ? 0 : Buffer.from(item.blob, 'base64').length;
    return chalk.gray(`[Binary: ${item.mimeType ?? 'unknown type'}, ${size} bytes]`);
  });
}

export function toolsTable(tools: Tool[]): string {
  const table = new Table({
    head: [chalk.cyan('Name'), chalk.cyan('Description')],
    style: { head: [], border: [] },
  });

  for (const tool of tools) {
    table.push([tool.name, truncate(tool.description ?? '', 60)]);
  }
  return table.toString();
}

export function resourcesTable(resources: Resource[]): string {
  const table = new Table({
    head: [chalk.cyan('URI'), chalk.cyan('Name'), chalk.cyan('MIME Type')],
    style: { head: [], border: [] },
  });

  for (const resource of resources) {
    table.push([resource.uri, resource.name, resource.mimeType ?? '-']);
  }
  return table.toString();
}

/**
 * Human-readable one-liner for a failure.
 */
export function describeError(error: unknown): string {
  if (error instanceof CallError) {
    return `${error.method ?? 'Request'} failed (code ${error.code}): ${error.message}`;
  }
  if (error instanceof CancellationError && error.reason === 'aborted') {
    return 'Interrupted';
  }
  if (error instanceof Error) {
    return error.message;
  }
  return 'Unknown error';
}
