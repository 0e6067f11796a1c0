import { Injectable, Logger } from '@nestjs/common';
import { Cluster, Redis } from 'ioredis';
import {
  IAtomicCounterStore,
  StoreValue,
  TouchResult,
} from '../interfaces/counter-store.interface';
import { ServerAddress } from '../utils/server-list.util';
import {
  describeError,
  StoreUninitializedError,
  TransientStoreError,
  wrapStoreCall,
} from '../errors/store.errors';
import { DEFAULT_OPERATION_TIMEOUT_MS } from '../utils/constants';

export interface RedisCounterStoreOptions {
  servers?: ServerAddress[];
  password?: string;
  keyPrefix?: string;
  operationTimeoutMs?: number;
  client?: Redis | Cluster;
}

/**
 * Redis counter store.
 *
 * One server connects a single node client, several servers connect in
 * cluster mode. INCR creates missing keys at 1 without a TTL, so callers are
 * expected to touch() a freshly created bucket.
 */
@Injectable()
export class RedisCounterStoreAdapter implements IAtomicCounterStore {
  private readonly logger = new Logger(RedisCounterStoreAdapter.name);
  private readonly keyPrefix: string;
  private readonly client: Redis | Cluster;
  private initialized = false;

  constructor(options: RedisCounterStoreOptions) {
    this.keyPrefix = options.keyPrefix ?? 'velocity:';
    const commandTimeout =
      options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
    const servers = options.servers ?? [];

    if (options.client) {
      this.client = options.client;
    } else if (servers.length > 1) {
      this.client = new Cluster(servers, {
        lazyConnect: true,
        enableAutoPipelining: true,
        redisOptions: { password: options.password, commandTimeout },
      });
    } else {
      this.client = new Redis({
        host: servers[0]?.host ?? 'localhost',
        port: servers[0]?.port ?? 6379,
        password: options.password,
        commandTimeout,
        lazyConnect: true,
      });
    }

    this.client.on('error', (error: unknown) => {
      this.logger.error(`Redis client error: ${describeError(error)}`);
    });
  }

  private prefixed(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  /**
   * Connect and test the connection
   */
  async initialize(): Promise<void> {
    try {
      if (this.client.status === 'wait') {
        await this.client.connect();
      }
      await this.client.ping();
    } catch (error) {
      // Stop the reconnect loop, the store stays uninitialized
      this.client.disconnect();
      throw error;
    }
    this.initialized = true;
    this.logger.log(
      `Initialized RedisCounterStoreAdapter with prefix: ${this.keyPrefix}`,
    );
  }

  async close(): Promise<void> {
    if (!this.initialized) {
      this.client.disconnect();
      return;
    }
    this.initialized = false;
    await this.client.quit();
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  async increment(key: string): Promise<number | null> {
    this.assertInitialized();
    return wrapStoreCall('INCR', () => this.client.incr(this.prefixed(key)));
  }

  async addIfAbsent(
    key: string,
    initialValue: number,
    ttlSeconds: number,
  ): Promise<boolean> {
    this.assertInitialized();
    const result = await wrapStoreCall('SET NX', () =>
      this.client.set(
        this.prefixed(key),
        initialValue,
        'PX',
        toMilliseconds(ttlSeconds),
        'NX',
      ),
    );
    return result === 'OK';
  }

  async touch(key: string, ttlSeconds: number): Promise<TouchResult> {
    this.assertInitialized();
    const updated = await wrapStoreCall('PEXPIRE', () =>
      this.client.pexpire(this.prefixed(key), toMilliseconds(ttlSeconds)),
    );
    return updated === 1 ? TouchResult.TOUCHED : TouchResult.NOT_FOUND;
  }

  async set(
    key: string,
    value: string | number,
    ttlSeconds: number,
  ): Promise<void> {
    this.assertInitialized();
    const redisKey = this.prefixed(key);

    if (ttlSeconds > 0) {
      await wrapStoreCall('SET', () =>
        this.client.set(redisKey, value, 'PX', toMilliseconds(ttlSeconds)),
      );
      return;
    }
    await wrapStoreCall('SET', () => this.client.set(redisKey, value));
  }

  async get(key: string): Promise<StoreValue | null> {
    this.assertInitialized();
    return wrapStoreCall('GET', () => this.client.get(this.prefixed(key)));
  }

  async getMulti(keys: string[]): Promise<Map<string, StoreValue>> {
    this.assertInitialized();
    const found = new Map<string, StoreValue>();

    if (keys.length === 0) {
      return found;
    }

    if (this.client instanceof Cluster) {
      // Bucket keys hash to different slots, so MGET is not an option.
      // Auto-pipelining batches these per node; a failing node only loses its keys.
      const client = this.client;
      const results = await Promise.allSettled(
        keys.map((key) => client.get(this.prefixed(key))),
      );
      let failures = 0;

      results.forEach((result, index) => {
        if (result.status === 'rejected') {
          failures++;
        } else if (result.value !== null) {
          found.set(keys[index], result.value);
        }
      });

      if (failures === keys.length) {
        throw new TransientStoreError(
          `GET failed on every cluster node for ${keys.length} keys`,
        );
      }
      if (failures > 0) {
        this.logger.warn(
          `${failures} of ${keys.length} cluster reads failed, treating them as missing`,
        );
      }
      return found;
    }

    const client = this.client;
    const values = await wrapStoreCall('MGET', () =>
      client.mget(keys.map((key) => this.prefixed(key))),
    );
    values.forEach((value, index) => {
      if (value !== null) {
        found.set(keys[index], value);
      }
    });
    return found;
  }

  private assertInitialized(): void {
    if (!this.initialized) {
      throw new StoreUninitializedError(RedisCounterStoreAdapter.name);
    }
  }
}

function toMilliseconds(ttlSeconds: number): number {
  return Math.max(1, Math.ceil(ttlSeconds * 1000));
}
