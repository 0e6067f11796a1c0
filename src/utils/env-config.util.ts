import { ConfigService } from '@nestjs/config';
import { VelocityCounterConfig } from '../interfaces/config.interface';
import {
  CounterStoreType,
  CUSTOM_COUNTER_STORE,
  MEMORY_COUNTER_STORE,
  MONGO_COUNTER_STORE,
  REDIS_COUNTER_STORE,
} from '../adapters/types';
import { splitServerString } from './server-list.util';

const STORE_TYPES: readonly CounterStoreType[] = [
  REDIS_COUNTER_STORE,
  MONGO_COUNTER_STORE,
  MEMORY_COUNTER_STORE,
  CUSTOM_COUNTER_STORE,
];

function isStoreType(value: string): value is CounterStoreType {
  return STORE_TYPES.some((type) => type === value);
}

/**
 * Build a VelocityCounterConfig from environment variables:
 *
 * - VELOCITY_COUNTER_STORE: redis | mongo | memory (default redis)
 * - VELOCITY_COUNTER_SERVERS: comma separated host:port list
 * - VELOCITY_COUNTER_MONGO_URI
 * - VELOCITY_COUNTER_KEY_PREFIX
 * - VELOCITY_COUNTER_TIMEOUT_MS
 *
 * @example
 * ```typescript
 * VelocityCounterModule.forRootAsync({
 *   imports: [ConfigModule],
 *   inject: [ConfigService],
 *   useFactory: (configService: ConfigService) =>
 *     createConfigFromEnv(configService),
 * })
 * ```
 */
export function createConfigFromEnv(
  configService: ConfigService,
): VelocityCounterConfig {
  const store = configService.get<string>(
    'VELOCITY_COUNTER_STORE',
    REDIS_COUNTER_STORE,
  );
  if (!isStoreType(store)) {
    throw new Error(`Unsupported VELOCITY_COUNTER_STORE: ${store}`);
  }

  const timeout = configService.get<string>('VELOCITY_COUNTER_TIMEOUT_MS');
  const keyPrefix = configService.get<string>('VELOCITY_COUNTER_KEY_PREFIX');

  return {
    store,
    servers: splitServerString(
      configService.get<string>('VELOCITY_COUNTER_SERVERS'),
    ),
    storeOptions: {
      mongoUri: configService.get<string>('VELOCITY_COUNTER_MONGO_URI'),
      redis: keyPrefix === undefined ? undefined : { keyPrefix },
    },
    operationTimeoutMs: timeout ? parseInt(timeout, 10) : undefined,
  };
}
