import 'reflect-metadata';

// Module
export {
  VelocityCounterModule,
  validateConfig,
} from './velocity-counter.module';

// Services
export { SlidingWindowCounterService } from './services/sliding-window-counter.service';
export { TypedKvService } from './services/typed-kv.service';
export { PrometheusMetricsSink } from './services/prometheus-metrics.sink';

// Controllers
export { CounterMetricsController } from './controllers/metrics.controller';

// Interfaces
export {
  Clock,
  MemoryStoreOptions,
  VelocityCounterAsyncConfig,
  VelocityCounterConfig,
  VelocityCounterConfigFactory,
} from './interfaces/config.interface';
export {
  IAtomicCounterStore,
  StoreValue,
  TouchResult,
} from './interfaces/counter-store.interface';
export {
  CounterOperationStatus,
  ICounterMetricsSink,
  KvOperation,
} from './interfaces/metrics-sink.interface';

// Errors
export {
  classifyStoreError,
  DecodeError,
  FAILURE_POLICY,
  FailureAction,
  StoreError,
  StoreErrorKind,
  StoreUninitializedError,
  TransientStoreError,
} from './errors/store.errors';

// Utilities
export {
  BucketRange,
  bucketId,
  bucketKey,
  bucketKeysForRange,
  bucketRange,
  bucketSize,
  bucketTtl,
} from './utils/bucket-key.util';
export { createConfigFromEnv } from './utils/env-config.util';
export { parseServerList, ServerAddress } from './utils/server-list.util';
export {
  createCounterStore,
  initializeCounterStore,
} from './utils/counter-store.factory';
export {
  DAY,
  FIVE_MINUTES,
  HOUR,
  MINUTE,
  SECOND,
  TEN_MINUTES,
  THIRTY_MINUTES,
  VELOCITY_COUNTER_CLOCK,
  VELOCITY_COUNTER_CONFIG,
  VELOCITY_COUNTER_METRICS,
  VELOCITY_COUNTER_STORE,
  WEEK,
} from './utils/constants';

// Counter stores (for extending)
export { MemoryCounterStoreAdapter } from './adapters/memory-counter-store.adapter';
export { MongoCounterStoreAdapter } from './adapters/mongo-counter-store.adapter';
export {
  RedisCounterStoreAdapter,
  RedisCounterStoreOptions,
} from './adapters/redis-counter-store.adapter';
export { CounterStoreType } from './adapters/types';
export {
  CounterRecordSchema,
  ICounterRecord,
} from './models/counter-record.model';
