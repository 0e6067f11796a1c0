export const MONGO_COUNTER_STORE = 'mongo';
export const REDIS_COUNTER_STORE = 'redis';
export const MEMORY_COUNTER_STORE = 'memory';
export const CUSTOM_COUNTER_STORE = 'custom';

export type CounterStoreType =
  | typeof MONGO_COUNTER_STORE
  | typeof REDIS_COUNTER_STORE
  | typeof MEMORY_COUNTER_STORE
  | typeof CUSTOM_COUNTER_STORE;
