import { ConfigService } from '@nestjs/config';
import { createConfigFromEnv } from '../env-config.util';

describe('createConfigFromEnv', () => {
  it('should default to the redis store', () => {
    const config = createConfigFromEnv(new ConfigService({}));

    expect(config).toEqual({
      store: 'redis',
      servers: [],
      storeOptions: { mongoUri: undefined, redis: undefined },
      operationTimeoutMs: undefined,
    });
  });

  it('should read every supported variable', () => {
    const config = createConfigFromEnv(
      new ConfigService({
        VELOCITY_COUNTER_STORE: 'redis',
        VELOCITY_COUNTER_SERVERS: 'counters-0:6379, counters-1:6379,',
        VELOCITY_COUNTER_KEY_PREFIX: 'fraud:',
        VELOCITY_COUNTER_TIMEOUT_MS: '80',
      }),
    );

    expect(config.servers).toEqual(['counters-0:6379', 'counters-1:6379']);
    expect(config.storeOptions?.redis).toEqual({ keyPrefix: 'fraud:' });
    expect(config.operationTimeoutMs).toBe(80);
  });

  it('should pick up the mongo connection string', () => {
    const config = createConfigFromEnv(
      new ConfigService({
        VELOCITY_COUNTER_STORE: 'mongo',
        VELOCITY_COUNTER_MONGO_URI: 'mongodb://localhost:27017/counters',
      }),
    );

    expect(config.store).toBe('mongo');
    expect(config.storeOptions?.mongoUri).toBe(
      'mongodb://localhost:27017/counters',
    );
  });

  it('should reject unknown stores', () => {
    expect(() =>
      createConfigFromEnv(
        new ConfigService({ VELOCITY_COUNTER_STORE: 'memcached' }),
      ),
    ).toThrow('Unsupported VELOCITY_COUNTER_STORE: memcached');
  });
});
