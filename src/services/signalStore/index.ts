/**
 * Signal store registry
 *
 * One store per process. Postgres when DATABASE_URL is set, in-memory
 * otherwise (with a warning; production config refuses to start without a
 * database).
 */

import { getConfig } from '../../config';
import { logger } from '../observabilityService';
import { InMemorySignalStore } from './inMemorySignalStore';
import { PostgresSignalStore } from './postgresSignalStore';
import { SignalStore } from './types';

export * from './types';
export { InMemorySignalStore } from './inMemorySignalStore';
export { PostgresSignalStore } from './postgresSignalStore';

let store: SignalStore | null = null;

export function initSignalStore(): SignalStore {
    const { env } = getConfig();

    if (env.DATABASE_URL) {
        store = PostgresSignalStore.fromConnectionString(env.DATABASE_URL, env.DATABASE_POOL_MAX, {
            maxRetries: env.STORE_MAX_RETRIES
        });
        logger.info('[STORE] Using PostgreSQL signal store', { poolMax: env.DATABASE_POOL_MAX });
    } else {
        store = new InMemorySignalStore({ maxRetries: env.STORE_MAX_RETRIES });
        logger.warn('[STORE] DATABASE_URL not set, using in-memory signal store (data is lost on restart)');
    }
    return store;
}

export function getSignalStore(): SignalStore {
    if (!store) {
        return initSignalStore();
    }
    return store;
}

/**
 * Swap the process store. Tests install an InMemorySignalStore per case.
 */
export function setSignalStore(next: SignalStore): void {
    store = next;
}

export async function closeSignalStore(): Promise<void> {
    if (store) {
        await store.close();
        store = null;
    }
}
