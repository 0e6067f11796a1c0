import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  IAtomicCounterStore,
  StoreValue,
} from '../interfaces/counter-store.interface';
import {
  ICounterMetricsSink,
  KvOperation,
} from '../interfaces/metrics-sink.interface';
import { describeError } from '../errors/store.errors';
import {
  DAY,
  VELOCITY_COUNTER_METRICS,
  VELOCITY_COUNTER_STORE,
} from '../utils/constants';
import {
  decodeFloat,
  decodeInteger,
  decodeString,
} from '../utils/value-codec.util';

/**
 * Typed get/set on the counter store. Same fail-open policy as the counter:
 * any failure yields the caller's default, and writes become no-ops.
 */
@Injectable()
export class TypedKvService {
  private readonly logger = new Logger(TypedKvService.name);

  constructor(
    @Inject(VELOCITY_COUNTER_STORE)
    private readonly store: IAtomicCounterStore,
    @Inject(VELOCITY_COUNTER_METRICS)
    private readonly metrics: ICounterMetricsSink,
  ) {}

  /**
   * Returns the string value, or `defaultValue` if it is not found
   */
  getStr(key: string, defaultValue = ''): Promise<string> {
    return this.read('get_str', key, defaultValue, (value) =>
      decodeString(value),
    );
  }

  /**
   * Returns the integer value, or `defaultValue` if it is not found or not an integer
   */
  getInt(key: string, defaultValue = 0): Promise<number> {
    return this.read('get_int', key, defaultValue, (value) =>
      decodeInteger(key, value),
    );
  }

  /**
   * Returns the numeric value, or `defaultValue` if it is not found or not a number
   */
  getFloat(key: string, defaultValue = 0): Promise<number> {
    return this.read('get_float', key, defaultValue, (value) =>
      decodeFloat(key, value),
    );
  }

  /**
   * Store a value. Defaults to a one day TTL; pass 0 to keep it indefinitely.
   */
  async set(
    key: string,
    value: string | number,
    ttlSeconds: number = DAY,
  ): Promise<void> {
    if (!this.store.isInitialized()) {
      this.metrics.recordKvOperation('set', 'skip');
      return;
    }

    try {
      await this.store.set(key, value, ttlSeconds);
      this.metrics.recordKvOperation('set', 'ok');
    } catch (error) {
      this.logger.error(`Error setting ${key}: ${describeError(error)}`);
      this.metrics.recordKvOperation('set', 'error');
    }
  }

  private async read<T>(
    operation: KvOperation,
    key: string,
    defaultValue: T,
    decode: (value: StoreValue) => T,
  ): Promise<T> {
    if (!this.store.isInitialized()) {
      this.metrics.recordKvOperation(operation, 'skip');
      return defaultValue;
    }

    try {
      const value = await this.store.get(key);
      const result = value === null ? defaultValue : decode(value);
      this.metrics.recordKvOperation(operation, 'ok');
      return result;
    } catch (error) {
      this.logger.error(
        `Error in ${operation} for ${key}: ${describeError(error)}`,
      );
      this.metrics.recordKvOperation(operation, 'error');
      return defaultValue;
    }
  }
}
