/**
 * Controller metrics backed by OpenTelemetry, exposed in Prometheus format
 * @module @herald/server/metrics/registry
 */

import type { Counter, Gauge } from '@opentelemetry/api';
import { PrometheusExporter, PrometheusSerializer } from '@opentelemetry/exporter-prometheus';
import { MeterProvider } from '@opentelemetry/sdk-metrics';
import type { ControllerMetrics, ReloadOutcome, ResourceEventType, ResourceKind } from '@herald/shared';
import { createServiceLogger } from '@herald/shared';

const logger = createServiceLogger({ component: 'metrics' });

/**
 * Content type of the Prometheus text exposition format
 */
export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

/**
 * Anything that can render the current metrics as exposition text
 */
export interface MetricsRenderer {
  render(): Promise<string>;
}

/**
 * Controller metrics. The Prometheus exporter is a pull reader whose own
 * HTTP server is never started; the metrics server renders it on request.
 */
export class ControllerMetricsRegistry implements ControllerMetrics, MetricsRenderer {
  private readonly exporter: PrometheusExporter;
  private readonly provider: MeterProvider;
  private readonly serializer = new PrometheusSerializer();
  private readonly reloads: Counter;
  private readonly restarts: Counter;
  private readonly resourceEvents: Counter;
  private readonly generation: Gauge;

  constructor() {
    this.exporter = new PrometheusExporter({ preventServerStart: true });
    this.provider = new MeterProvider({ readers: [this.exporter] });

    const meter = this.provider.getMeter('herald');
    this.reloads = meter.createCounter('herald_config_reloads', {
      description: 'Merge attempts that reached validation, by outcome',
    });
    this.restarts = meter.createCounter('herald_worker_restarts', {
      description: 'Workers stopped to make room for a newer configuration',
    });
    this.resourceEvents = meter.createCounter('herald_resource_events', {
      description: 'Add and update events received for the watched resources',
    });
    this.generation = meter.createGauge('herald_config_generation', {
      description: 'Generation of the configuration the running worker was built from',
    });
  }

  recordResourceEvent(kind: ResourceKind, event: ResourceEventType): void {
    this.resourceEvents.add(1, { resource: kind, event });
  }

  recordReload(outcome: ReloadOutcome): void {
    this.reloads.add(1, { outcome });
  }

  recordWorkerRestart(): void {
    this.restarts.add(1);
  }

  setGeneration(generation: number): void {
    this.generation.record(generation);
  }

  async render(): Promise<string> {
    const { resourceMetrics, errors } = await this.exporter.collect();
    for (const error of errors) {
      logger.warn('Metric collection error', { error: String(error) });
    }
    return this.serializer.serialize(resourceMetrics);
  }

  shutdown(): Promise<void> {
    return this.provider.shutdown();
  }
}
