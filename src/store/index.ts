import { loadConfig } from '../config.js';
import type { ProgressionStore } from './types.js';
import { MemoryStore } from './memory.js';
import { PostgresStore } from './postgres.js';

export * from './types.js';
export { MemoryStore } from './memory.js';
export { PostgresStore } from './postgres.js';

let store: ProgressionStore | null = null;

export const getStore = (): ProgressionStore => {
  if (!store) {
    store = loadConfig().databaseUrl ? new PostgresStore() : new MemoryStore();
  }
  return store;
};
