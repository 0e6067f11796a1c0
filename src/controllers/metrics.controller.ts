import { Controller, Get, Header } from '@nestjs/common';
import { Registry } from 'prom-client';
import { PrometheusMetricsSink } from '../services/prometheus-metrics.sink';

/**
 * Serves the counter metrics in Prometheus exposition format.
 * Registered only when exposeMetricsEndpoint is enabled.
 */
@Controller('velocity-counter')
export class CounterMetricsController {
  constructor(private readonly metricsSink: PrometheusMetricsSink) {}

  @Get('metrics')
  @Header('Content-Type', Registry.PROMETHEUS_CONTENT_TYPE)
  metrics(): Promise<string> {
    return this.metricsSink.metrics();
  }
}
