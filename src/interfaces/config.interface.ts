import {
  InjectionToken,
  ModuleMetadata,
  OptionalFactoryDependency,
  Type,
} from '@nestjs/common';
import { CounterStoreType } from '../adapters/types';
import { IAtomicCounterStore } from './counter-store.interface';
import { ICounterMetricsSink } from './metrics-sink.interface';

/**
 * Returns the current wall-clock time in epoch milliseconds
 */
export type Clock = () => number;

/**
 * Options for the in-memory store, mostly useful to reproduce the behaviour of
 * other stores in tests
 */
export interface MemoryStoreOptions {
  /**
   * Create missing keys at 1 on increment (Redis behaviour). When false,
   * incrementing a missing key resolves to null (memcached behaviour).
   * @default true
   */
  incrementCreatesMissingKeys?: boolean;

  /**
   * Whether touch() can refresh a TTL. When false it reports 'unsupported'.
   * @default true
   */
  supportsTouch?: boolean;
}

/**
 * Configuration for the VelocityCounter module
 */
export interface VelocityCounterConfig {
  /**
   * Which store backs the counters ('redis', 'mongo', 'memory', or 'custom')
   */
  store: CounterStoreType;

  /**
   * `host:port` entries of the store nodes (redis). A single entry connects to
   * one node, several entries connect in cluster mode.
   */
  servers?: string[];

  /**
   * Store specific options
   */
  storeOptions?: {
    /**
     * Redis options (for the redis store)
     */
    redis?: {
      password?: string;
      keyPrefix?: string;
    };

    /**
     * MongoDB connection string (for the mongo store with forRoot;
     * forRootAsync uses the application's MongooseModule connection)
     */
    mongoUri?: string;

    /**
     * MongoDB collection for bucket records, defaults to 'velocity_counters'
     */
    collectionName?: string;

    memory?: MemoryStoreOptions;
  };

  /**
   * An IAtomicCounterStore to use when store is 'custom'. The module still
   * calls initialize() on it.
   */
  customStoreInstance?: IAtomicCounterStore;

  /**
   * Per-call timeout applied at the store client boundary
   * @default 250
   */
  operationTimeoutMs?: number;

  /**
   * Metrics sink, defaults to a prom-client backed sink with its own registry
   */
  metrics?: ICounterMetricsSink;

  /**
   * Register a controller serving the prom-client registry at
   * GET /velocity-counter/metrics. Only valid with the default metrics sink.
   * @default false
   */
  exposeMetricsEndpoint?: boolean;

  /**
   * Wall clock used for bucket ids and in-memory expiry
   * @default Date.now
   */
  clock?: Clock;
}

/**
 * Interface for async config factory
 */
export interface VelocityCounterConfigFactory {
  createVelocityCounterConfig():
    | Promise<VelocityCounterConfig>
    | VelocityCounterConfig;
}

/**
 * Options for async module configuration
 */
export interface VelocityCounterAsyncConfig
  extends Pick<ModuleMetadata, 'imports'> {
  useExisting?: Type<VelocityCounterConfigFactory>;

  useClass?: Type<VelocityCounterConfigFactory>;

  useFactory?: (
    ...args: any[]
  ) => Promise<VelocityCounterConfig> | VelocityCounterConfig;

  inject?: Array<InjectionToken | OptionalFactoryDependency>;

  /**
   * Same as VelocityCounterConfig.exposeMetricsEndpoint. Controllers are
   * registered before the async config resolves, so it is set here.
   */
  exposeMetricsEndpoint?: boolean;
}
