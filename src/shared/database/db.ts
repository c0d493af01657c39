/**
 * =============================================================================
 * DATABASE - Store selection
 * =============================================================================
 *
 * Single access point for the DataStore. The driver comes from DB_DRIVER:
 *   postgres - PostgresStore over DATABASE_URL (default)
 *   memory   - MemoryStore, nothing survives a restart
 *
 * Services call getStore() lazily on each operation so tests can swap the
 * store with setStore() between cases.
 * =============================================================================
 */

import { config } from '../../config/environment';
import { logger } from '../services/logger.service';
import { MemoryStore } from './memory.store';
import { PostgresStore } from './postgres.store';
import type { DataStore } from './repository.interface';

let store: DataStore | null = null;

export function createStore(): DataStore {
  if (config.database.driver === 'memory') {
    logger.warn('Using in-memory store; data is lost on restart');
    return new MemoryStore();
  }
  return PostgresStore.fromConfig();
}

export function getStore(): DataStore {
  if (!store) {
    store = createStore();
    logger.info('Data store ready', { driver: store.driver });
  }
  return store;
}

/**
 * Replace the active store (tests, scripts)
 */
export function setStore(next: DataStore): void {
  store = next;
}

export async function closeStore(): Promise<void> {
  if (!store) return;
  const current = store;
  store = null;
  await current.close();
  logger.info('Data store closed', { driver: current.driver });
}
