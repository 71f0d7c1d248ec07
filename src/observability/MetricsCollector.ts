// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    } else {
      this.logger?.debug('Metrics disabled');
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['account', 'method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['account', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_errors',
      new Counter({
        name: 'http_errors_total',
        help: 'HTTP errors',
        labelNames: ['account', 'status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_retries',
      new Counter({
        name: 'http_retries_total',
        help: 'Retried requests and item mutations',
        labelNames: ['account'],
        registers: [this.registry],
      })
    );

    // Rate limiting metrics
    this.gauges.set(
      'rate_limit_queue_size',
      new Gauge({
        name: 'rate_limit_queue_size',
        help: 'Current rate limit queue size',
        labelNames: ['account'],
        registers: [this.registry],
      })
    );

    // Sync metrics
    this.counters.set(
      'sync_items_total',
      new Counter({
        name: 'sync_items_total',
        help: 'Reconciled items by category and outcome',
        labelNames: ['category', 'outcome'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'sync_phase_duration',
      new Histogram({
        name: 'sync_phase_duration_seconds',
        help: 'Duration of each sync phase',
        labelNames: ['phase'],
        buckets: [0.5, 1, 5, 15, 60, 300, 1800],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'snapshot_items',
      new Gauge({
        name: 'snapshot_items',
        help: 'Items captured in the latest account snapshot',
        labelNames: ['account', 'category'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'sync_runs_total',
      new Counter({
        name: 'sync_runs_total',
        help: 'Completed runs by operation and outcome',
        labelNames: ['operation', 'outcome'],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number>, value: number = 1): void {
    const counter = this.counters.get(name);
    counter?.inc(labels, value);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Record<string, string | number>): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
