import { Logger, Provider } from '@nestjs/common';
import { getConnectionToken } from '@nestjs/mongoose';
import { Connection } from 'mongoose';
import {
  VELOCITY_COUNTER_CONFIG,
  VELOCITY_COUNTER_STORE,
} from './constants';
import { VelocityCounterConfig } from '../interfaces/config.interface';
import { IAtomicCounterStore } from '../interfaces/counter-store.interface';
import { MongoCounterStoreAdapter } from '../adapters/mongo-counter-store.adapter';
import { RedisCounterStoreAdapter } from '../adapters/redis-counter-store.adapter';
import { MemoryCounterStoreAdapter } from '../adapters/memory-counter-store.adapter';
import {
  CUSTOM_COUNTER_STORE,
  MEMORY_COUNTER_STORE,
  MONGO_COUNTER_STORE,
  REDIS_COUNTER_STORE,
} from '../adapters/types';
import { parseServerList } from './server-list.util';
import { describeError } from '../errors/store.errors';

const logger = new Logger('CounterStoreFactory');

/**
 * Build the store selected by the configuration, without connecting it
 */
export function createCounterStore(
  config: VelocityCounterConfig,
  connection?: Connection,
): IAtomicCounterStore {
  const { store, storeOptions = {} } = config;

  switch (store) {
    case MONGO_COUNTER_STORE:
      return new MongoCounterStoreAdapter(
        connection,
        storeOptions.collectionName,
        {
          operationTimeoutMs: config.operationTimeoutMs,
          clock: config.clock,
        },
      );
    case REDIS_COUNTER_STORE:
      return new RedisCounterStoreAdapter({
        servers: parseServerList(config.servers ?? []),
        password: storeOptions.redis?.password,
        keyPrefix: storeOptions.redis?.keyPrefix,
        operationTimeoutMs: config.operationTimeoutMs,
      });
    case MEMORY_COUNTER_STORE:
      return new MemoryCounterStoreAdapter({
        ...storeOptions.memory,
        clock: config.clock,
      });
    case CUSTOM_COUNTER_STORE:
      if (!config.customStoreInstance) {
        throw new Error(
          'Counter store type is "custom" but no customStoreInstance was provided in VelocityCounterConfig.',
        );
      }
      return config.customStoreInstance;
    default:
      throw new Error(`Unsupported counter store: ${String(store)}`);
  }
}

/**
 * Initialize a store. A store that cannot be reached at boot stays
 * uninitialized for the lifetime of the process and every counter call
 * against it fails open.
 */
export async function initializeCounterStore(
  store: IAtomicCounterStore,
): Promise<IAtomicCounterStore> {
  try {
    await store.initialize();
  } catch (error) {
    logger.error(
      `Counter store unavailable, counters will fail open: ${describeError(error)}`,
    );
  }
  return store;
}

/**
 * Creates the counter store provider based on the configuration
 *
 * @returns Provider for the counter store
 */
export function createCounterStoreProvider(): Provider {
  return {
    provide: VELOCITY_COUNTER_STORE,
    useFactory: (
      config: VelocityCounterConfig,
      connection?: Connection,
    ): Promise<IAtomicCounterStore> =>
      initializeCounterStore(createCounterStore(config, connection)),
    inject: [
      VELOCITY_COUNTER_CONFIG,
      { token: getConnectionToken(), optional: true },
    ],
  };
}
