import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['apps/runtime', 'apps/cli']);
