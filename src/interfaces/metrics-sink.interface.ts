export type CounterOperationStatus = 'ok' | 'error' | 'skip';

export type KvOperation = 'get_str' | 'get_int' | 'get_float' | 'set';

/**
 * Receives observability signals from the counter and KV services.
 * Implementations must not throw.
 */
export interface ICounterMetricsSink {
  recordIncrement(status: CounterOperationStatus): void;

  recordQuery(status: CounterOperationStatus): void;

  /**
   * Number of bucket keys covered by one window read
   */
  recordBucketReads(count: number): void;

  recordKvOperation(operation: KvOperation, status: CounterOperationStatus): void;
}
