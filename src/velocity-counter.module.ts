import {
  DynamicModule,
  Global,
  Inject,
  Module,
  OnModuleDestroy,
  Provider,
  Type,
} from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import {
  Clock,
  VelocityCounterAsyncConfig,
  VelocityCounterConfig,
  VelocityCounterConfigFactory,
} from './interfaces/config.interface';
import { IAtomicCounterStore } from './interfaces/counter-store.interface';
import { ICounterMetricsSink } from './interfaces/metrics-sink.interface';
import {
  DEFAULT_OPERATION_TIMEOUT_MS,
  VELOCITY_COUNTER_CLOCK,
  VELOCITY_COUNTER_CONFIG,
  VELOCITY_COUNTER_METRICS,
  VELOCITY_COUNTER_STORE,
} from './utils/constants';
import { createCounterStoreProvider } from './utils/counter-store.factory';
import { parseServerList } from './utils/server-list.util';
import { SlidingWindowCounterService } from './services/sliding-window-counter.service';
import { TypedKvService } from './services/typed-kv.service';
import { PrometheusMetricsSink } from './services/prometheus-metrics.sink';
import { CounterMetricsController } from './controllers/metrics.controller';
import {
  CUSTOM_COUNTER_STORE,
  MONGO_COUNTER_STORE,
  REDIS_COUNTER_STORE,
} from './adapters/types';

/**
 * @param options.requireMongoUri Set to false where the application supplies
 * the mongoose connection itself (forRootAsync)
 */
export function validateConfig(
  config: VelocityCounterConfig,
  options: { requireMongoUri?: boolean } = {},
): void {
  const { requireMongoUri = true } = options;

  if (!config.store) {
    throw new Error('VelocityCounter config must include a store');
  }

  if (
    config.store === REDIS_COUNTER_STORE &&
    parseServerList(config.servers ?? []).length === 0
  ) {
    throw new Error(
      'Redis counter store requires at least one valid host:port entry in servers',
    );
  }

  if (
    requireMongoUri &&
    config.store === MONGO_COUNTER_STORE &&
    !config.storeOptions?.mongoUri
  ) {
    throw new Error('Mongo counter store requires storeOptions.mongoUri');
  }

  if (config.store === CUSTOM_COUNTER_STORE && !config.customStoreInstance) {
    throw new Error(
      'Custom counter store requires a customStoreInstance in VelocityCounterConfig',
    );
  }

  if (
    config.operationTimeoutMs !== undefined &&
    !(config.operationTimeoutMs > 0)
  ) {
    throw new Error('operationTimeoutMs must be a positive number');
  }

  if (config.exposeMetricsEndpoint && config.metrics) {
    throw new Error(
      'exposeMetricsEndpoint is only available with the default metrics sink',
    );
  }
}

const sharedProviders: Provider[] = [
  PrometheusMetricsSink,
  {
    provide: VELOCITY_COUNTER_METRICS,
    useFactory: (
      config: VelocityCounterConfig,
      prometheusSink: PrometheusMetricsSink,
    ): ICounterMetricsSink => config.metrics ?? prometheusSink,
    inject: [VELOCITY_COUNTER_CONFIG, PrometheusMetricsSink],
  },
  {
    provide: VELOCITY_COUNTER_CLOCK,
    useFactory: (config: VelocityCounterConfig): Clock =>
      config.clock ?? Date.now,
    inject: [VELOCITY_COUNTER_CONFIG],
  },
  createCounterStoreProvider(),
  SlidingWindowCounterService,
  TypedKvService,
];

const exportedProviders = [
  SlidingWindowCounterService,
  TypedKvService,
  PrometheusMetricsSink,
  VELOCITY_COUNTER_STORE,
];

/**
 * Main module for VelocityCounter. Use forRoot or forRootAsync to configure and register.
 */
@Global()
@Module({})
export class VelocityCounterModule implements OnModuleDestroy {
  constructor(
    @Inject(VELOCITY_COUNTER_STORE)
    private readonly store: IAtomicCounterStore,
  ) {}

  async onModuleDestroy(): Promise<void> {
    await this.store.close();
  }

  /**
   * Register the VelocityCounter module with static configuration
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     VelocityCounterModule.forRoot({
   *       store: 'redis',
   *       servers: ['counters-0.internal:6379', 'counters-1.internal:6379'],
   *       operationTimeoutMs: 100,
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRoot(config: VelocityCounterConfig): DynamicModule {
    validateConfig(config);

    const imports: DynamicModule[] = [];

    // Only add MongoDB if the store is 'mongo'
    if (config.store === MONGO_COUNTER_STORE && config.storeOptions?.mongoUri) {
      const timeout = config.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
      imports.push(
        MongooseModule.forRoot(config.storeOptions.mongoUri, {
          socketTimeoutMS: timeout,
          serverSelectionTimeoutMS: Math.max(timeout, 1000),
        }),
      );
    }

    return {
      module: VelocityCounterModule,
      global: true,
      imports,
      controllers: config.exposeMetricsEndpoint
        ? [CounterMetricsController]
        : [],
      providers: [
        { provide: VELOCITY_COUNTER_CONFIG, useValue: config },
        ...sharedProviders,
      ],
      exports: exportedProviders,
    };
  }

  /**
   * Register the VelocityCounter module with async configuration.
   *
   * The mongo store picks up the default mongoose connection, so the
   * application has to import MongooseModule itself in this mode;
   * storeOptions.mongoUri is not required and not used.
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     ConfigModule.forRoot(),
   *     VelocityCounterModule.forRootAsync({
   *       imports: [ConfigModule],
   *       inject: [ConfigService],
   *       useFactory: (configService: ConfigService) =>
   *         createConfigFromEnv(configService),
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRootAsync(asyncConfig: VelocityCounterAsyncConfig): DynamicModule {
    return {
      module: VelocityCounterModule,
      global: true,
      imports: asyncConfig.imports ?? [],
      controllers: asyncConfig.exposeMetricsEndpoint
        ? [CounterMetricsController]
        : [],
      providers: [
        VelocityCounterModule.createAsyncConfigProvider(asyncConfig),
        ...VelocityCounterModule.createFactoryClassProviders(asyncConfig),
        ...sharedProviders,
      ],
      exports: exportedProviders,
    };
  }

  /**
   * Create async config provider
   * @internal
   */
  private static createAsyncConfigProvider(
    options: VelocityCounterAsyncConfig,
  ): Provider {
    const { useFactory } = options;
    if (useFactory) {
      return {
        provide: VELOCITY_COUNTER_CONFIG,
        useFactory: async (...args: unknown[]) => {
          const config = await useFactory(...args);
          return VelocityCounterModule.validateAsyncConfig(config, options);
        },
        inject: options.inject ?? [],
      };
    }

    const factoryClass = options.useClass ?? options.useExisting;
    if (factoryClass) {
      return {
        provide: VELOCITY_COUNTER_CONFIG,
        useFactory: async (configFactory: VelocityCounterConfigFactory) => {
          const config = await configFactory.createVelocityCounterConfig();
          return VelocityCounterModule.validateAsyncConfig(config, options);
        },
        inject: [factoryClass],
      };
    }

    throw new Error(
      'Invalid VelocityCounterAsyncConfig. Must provide useFactory, useClass, or useExisting.',
    );
  }

  /**
   * The endpoint flag of the async options decides whether the controller is
   * registered, so it is checked together with the resolved config
   * @internal
   */
  private static validateAsyncConfig(
    config: VelocityCounterConfig,
    options: VelocityCounterAsyncConfig,
  ): VelocityCounterConfig {
    validateConfig(
      {
        ...config,
        exposeMetricsEndpoint:
          config.exposeMetricsEndpoint || options.exposeMetricsEndpoint,
      },
      { requireMongoUri: false },
    );
    return config;
  }

  /**
   * useClass factories are instantiated by this module, useExisting ones
   * must come from an imported module
   * @internal
   */
  private static createFactoryClassProviders(
    options: VelocityCounterAsyncConfig,
  ): Type<VelocityCounterConfigFactory>[] {
    return !options.useFactory && options.useClass ? [options.useClass] : [];
  }
}
