import { Injectable } from '@nestjs/common';
import { Counter, Registry } from 'prom-client';
import {
  CounterOperationStatus,
  ICounterMetricsSink,
  KvOperation,
} from '../interfaces/metrics-sink.interface';

/**
 * prom-client backed metrics sink.
 *
 * Metrics live in a dedicated registry, which can be merged into the
 * application registry:
 * ```typescript
 * import { register } from 'prom-client';
 * const merged = Registry.merge([register, sink.registry]);
 * ```
 */
@Injectable()
export class PrometheusMetricsSink implements ICounterMetricsSink {
  readonly registry = new Registry();

  private readonly increments = new Counter({
    name: 'velocity_counter_increments_total',
    help: 'Number of sliding-window increments by outcome',
    labelNames: ['status'] as const,
    registers: [this.registry],
  });

  private readonly queries = new Counter({
    name: 'velocity_counter_queries_total',
    help: 'Number of sliding-window queries by outcome',
    labelNames: ['status'] as const,
    registers: [this.registry],
  });

  private readonly bucketReads = new Counter({
    name: 'velocity_counter_bucket_reads_total',
    help: 'Number of bucket keys read from the store (total keys, not requests)',
    registers: [this.registry],
  });

  private readonly kvOperations = new Counter({
    name: 'velocity_counter_kv_operations_total',
    help: 'Number of typed KV operations by outcome',
    labelNames: ['operation', 'status'] as const,
    registers: [this.registry],
  });

  recordIncrement(status: CounterOperationStatus): void {
    this.increments.inc({ status });
  }

  recordQuery(status: CounterOperationStatus): void {
    this.queries.inc({ status });
  }

  recordBucketReads(count: number): void {
    if (count > 0) {
      this.bucketReads.inc(count);
    }
  }

  recordKvOperation(
    operation: KvOperation,
    status: CounterOperationStatus,
  ): void {
    this.kvOperations.inc({ operation, status });
  }

  /**
   * Prometheus exposition text for this sink's registry
   */
  metrics(): Promise<string> {
    return this.registry.metrics();
  }
}
