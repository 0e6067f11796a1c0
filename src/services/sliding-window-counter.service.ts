import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  IAtomicCounterStore,
  StoreValue,
  TouchResult,
} from '../interfaces/counter-store.interface';
import { ICounterMetricsSink } from '../interfaces/metrics-sink.interface';
import { Clock } from '../interfaces/config.interface';
import {
  describeError,
  FailureAction,
  failureActionFor,
} from '../errors/store.errors';
import {
  VELOCITY_COUNTER_CLOCK,
  VELOCITY_COUNTER_METRICS,
  VELOCITY_COUNTER_STORE,
} from '../utils/constants';
import {
  bucketId,
  bucketKey,
  bucketKeysForRange,
  bucketRange,
  bucketSize,
  bucketTtl,
} from '../utils/bucket-key.util';
import { decodeInteger } from '../utils/value-codec.util';

interface WindowRead {
  total: number;
  /** Whether at least one read reached the store */
  reachedStore: boolean;
}

/**
 * Approximate sliding-window counter over an atomic counter store.
 *
 * Nothing here ever rejects: a store failure resolves to 0 (or the best total
 * that could be read), plus a log line and a metric. Callers cannot tell "no
 * events" from "store down".
 */
@Injectable()
export class SlidingWindowCounterService {
  private readonly logger = new Logger(SlidingWindowCounterService.name);

  constructor(
    @Inject(VELOCITY_COUNTER_STORE)
    private readonly store: IAtomicCounterStore,
    @Inject(VELOCITY_COUNTER_METRICS)
    private readonly metrics: ICounterMetricsSink,
    @Inject(VELOCITY_COUNTER_CLOCK)
    private readonly clock: Clock,
  ) {}

  /**
   * Record one occurrence of `key` now and return the window total including it.
   *
   * The total is eventually consistent: concurrent increments from other
   * callers may not be visible yet.
   *
   * @param key Logical counter key, e.g. `acct:123:login_attempts`
   * @param windowSeconds Trailing window length
   * @param maxTtlSeconds Requested bucket TTL, clamped to [window + bucket, 2 * window]
   */
  async increment(
    key: string,
    windowSeconds: number,
    maxTtlSeconds?: number | null,
  ): Promise<number> {
    if (!this.canServe('increment', key, windowSeconds)) {
      this.metrics.recordIncrement('skip');
      return 0;
    }

    const now = this.nowSeconds();
    const size = bucketSize(windowSeconds);
    const currentKey = bucketKey(key, windowSeconds, bucketId(now, size));
    const ttl = bucketTtl(windowSeconds, maxTtlSeconds);

    const written = await this.incrementBucket(currentKey, ttl);
    if (written === null) {
      this.metrics.recordIncrement('error');
      return 0;
    }

    const read = await this.readWindow(key, windowSeconds, now);
    this.metrics.recordIncrement('ok');

    // Nothing could be read back, report the bucket we just wrote
    return read.reachedStore ? read.total : written;
  }

  /**
   * Current window total for `key`, without recording anything. Resolves to 0
   * when the store cannot be read.
   */
  async query(key: string, windowSeconds: number): Promise<number> {
    if (!this.canServe('query', key, windowSeconds)) {
      this.metrics.recordQuery('skip');
      return 0;
    }

    const read = await this.readWindow(key, windowSeconds, this.nowSeconds());
    this.metrics.recordQuery(read.reachedStore ? 'ok' : 'error');
    return read.total;
  }

  /**
   * Increment the current bucket, creating it with a TTL when needed.
   * @returns the bucket count after the increment, or null when the write failed
   */
  private async incrementBucket(
    currentKey: string,
    ttl: number,
  ): Promise<number | null> {
    let count: number | null;
    try {
      count = await this.store.increment(currentKey);
    } catch (error) {
      if (failureActionFor(error) !== FailureAction.RETRY_ONCE) {
        this.logger.error(
          `Increment failed for ${currentKey}: ${describeError(error)}`,
        );
        return null;
      }
      count = null;
    }

    if (count === null) {
      return this.createBucket(currentKey, ttl);
    }

    if (count === 1) {
      await this.assignTtl(currentKey, ttl);
    }
    return count;
  }

  /**
   * First write to a bucket the store would not (or could not) increment.
   * Losing the add race means someone else created it, so increment once more.
   */
  private async createBucket(
    currentKey: string,
    ttl: number,
  ): Promise<number | null> {
    try {
      if (await this.store.addIfAbsent(currentKey, 1, ttl)) {
        return 1;
      }

      const count = await this.store.increment(currentKey);
      if (count === null) {
        this.logger.error(
          `Increment failed for ${currentKey}: bucket vanished after losing the create race`,
        );
      }
      return count;
    } catch (error) {
      this.logger.error(
        `Increment failed for ${currentKey}: ${describeError(error)}`,
      );
      return null;
    }
  }

  /**
   * Put a TTL on a bucket that the store just created without one.
   *
   * Stores without touch get the value rewritten with a TTL. A concurrent
   * increment landing between our increment and this write is lost; this
   * undercount happens at most once per bucket and is accepted.
   */
  private async assignTtl(currentKey: string, ttl: number): Promise<void> {
    try {
      const touched = await this.store.touch(currentKey, ttl);
      if (touched === TouchResult.UNSUPPORTED) {
        await this.store.set(currentKey, 1, ttl);
      } else if (touched === TouchResult.NOT_FOUND) {
        this.logger.warn(`Bucket ${currentKey} expired before its TTL was set`);
      }
    } catch (error) {
      this.logger.warn(
        `TTL refresh failed for ${currentKey}: ${describeError(error)}`,
      );
    }
  }

  private async readWindow(
    key: string,
    windowSeconds: number,
    now: number,
  ): Promise<WindowRead> {
    const keys = bucketKeysForRange(
      key,
      windowSeconds,
      bucketRange(now, windowSeconds),
    );
    this.metrics.recordBucketReads(keys.length);

    try {
      const values = await this.store.getMulti(keys);
      let total = 0;
      for (const [bucket, value] of values) {
        total += this.decodeBucket(bucket, value);
      }
      return { total, reachedStore: true };
    } catch (error) {
      this.logger.error(`Multi-get failed for ${key}: ${describeError(error)}`);
      if (failureActionFor(error) !== FailureAction.RETRY_ONCE) {
        return { total: 0, reachedStore: false };
      }
    }

    return this.readBucketsOneByOne(keys);
  }

  /**
   * Degraded read path when the batched read is unavailable
   */
  private async readBucketsOneByOne(keys: string[]): Promise<WindowRead> {
    let total = 0;
    let reachedStore = false;

    for (const bucket of keys) {
      try {
        const value = await this.store.get(bucket);
        reachedStore = true;
        if (value !== null) {
          total += this.decodeBucket(bucket, value);
        }
      } catch (error) {
        this.logger.debug(`Skipping bucket ${bucket}: ${describeError(error)}`);
      }
    }

    return { total, reachedStore };
  }

  private decodeBucket(bucket: string, value: StoreValue): number {
    try {
      return decodeInteger(bucket, value);
    } catch (error) {
      if (failureActionFor(error) !== FailureAction.SKIP) {
        throw error;
      }
      this.logger.debug(`Skipping bucket ${bucket}: ${describeError(error)}`);
      return 0;
    }
  }

  private canServe(
    operation: 'increment' | 'query',
    key: string,
    windowSeconds: number,
  ): boolean {
    if (!this.store.isInitialized()) {
      this.logger.debug(`Counter store not initialized, ${operation} skipped`);
      return false;
    }
    if (!Number.isFinite(windowSeconds) || windowSeconds <= 0) {
      this.logger.warn(
        `Invalid window ${windowSeconds}s for ${key}, ${operation} skipped`,
      );
      return false;
    }
    return true;
  }

  private nowSeconds(): number {
    return this.clock() / 1000;
  }
}
