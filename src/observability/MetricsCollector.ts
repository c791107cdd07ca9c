// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import * as http from 'http';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
  port?: number;
  path?: string;
}

type Labels = Record<string, string | number>;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();
  private server?: http.Server;
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();

      if (config.port) {
        this.exposeMetrics(config.port, config.path ?? '/metrics');
      }
    }
  }

  private counter(key: string, name: string, help: string, labelNames: string[] = []): void {
    this.counters.set(key, new Counter({ name, help, labelNames, registers: [this.registry] }));
  }

  private histogram(
    key: string,
    name: string,
    help: string,
    labelNames: string[],
    buckets: number[]
  ): void {
    this.histograms.set(
      key,
      new Histogram({ name, help, labelNames, buckets, registers: [this.registry] })
    );
  }

  private gauge(key: string, name: string, help: string, labelNames: string[] = []): void {
    this.gauges.set(key, new Gauge({ name, help, labelNames, registers: [this.registry] }));
  }

  private initializeMetrics(): void {
    // Receipt
    this.counter(
      'notifications_received',
      'notifications_received_total',
      'Notification items received on the webhook',
      ['result']
    );
    this.gauge('queue_depth', 'notification_queue_depth', 'Notification rows by status', [
      'status',
    ]);

    // Worker
    this.counter(
      'notifications_processed',
      'notifications_processed_total',
      'Notification rows processed by the worker',
      ['outcome']
    );
    this.counter(
      'notifications_poisoned',
      'notifications_poisoned_total',
      'Notification rows that will not be retried again'
    );
    this.histogram(
      'notification_processing_duration',
      'notification_processing_duration_seconds',
      'Time spent processing one notification row',
      ['outcome'],
      [0.05, 0.1, 0.5, 1, 2, 5, 10]
    );
    this.counter('messages_stored', 'messages_stored_total', 'Normalized message inserts', [
      'result',
    ]);

    // HTTP
    this.counter('http_requests_total', 'http_requests_total', 'Total upstream HTTP requests', [
      'method',
      'status',
    ]);
    this.histogram(
      'http_request_duration',
      'http_request_duration_seconds',
      'Upstream HTTP request duration',
      ['method', 'status'],
      [0.1, 0.5, 1, 2, 5]
    );
    this.counter('http_errors', 'http_errors_total', 'Upstream HTTP errors', ['status']);
    this.counter('http_retries', 'http_retries_total', 'Upstream HTTP retries', ['reason']);
    this.counter('rate_limit_hits', 'rate_limit_hits_total', 'Upstream 429 responses');
    this.gauge('rate_limit_queue_size', 'rate_limit_queue_size', 'Requests waiting for pacing');

    // Auth and tokens
    this.counter('auth_callbacks', 'auth_callbacks_total', 'Authorization callbacks handled', [
      'result',
    ]);
    this.counter('token_refresh_total', 'token_refresh_total', 'Token refresh attempts', [
      'status',
    ]);
    this.counter(
      'token_refresh_dedup_local',
      'token_refresh_dedup_local_total',
      'Token refresh joined an in-flight refresh in this process'
    );
    this.counter(
      'token_refresh_dedup_distributed',
      'token_refresh_dedup_distributed_total',
      'Token refresh deduplicated via Redis'
    );
    this.histogram(
      'token_refresh_duration',
      'token_refresh_duration_seconds',
      'Token refresh duration',
      ['status'],
      [0.1, 0.3, 0.5, 1, 2]
    );
    this.counter(
      'token_refresh_failures',
      'token_refresh_failures_total',
      'Token refresh failures',
      ['errorType']
    );
  }

  incrementCounter(name: string, labels: Labels = {}, value = 1): void {
    const counter = this.counters.get(name);
    counter?.inc(labels, value);
  }

  recordLatency(name: string, durationMs: number, labels: Labels = {}): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Labels = {}): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getCounterValue(name: string, labels: Labels = {}): Promise<number> {
    const counter = this.counters.get(name);
    if (!counter) return 0;
    const { values } = await counter.get();
    const match = values.find((entry) =>
      Object.entries(labels).every(([key, value]) => entry.labels[key] === value)
    );
    return match?.value ?? 0;
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  private exposeMetrics(port: number, path: string): void {
    this.server = http.createServer((req, res) => {
      if (req.url !== path) {
        res.statusCode = 404;
        res.end('Not Found');
        return;
      }
      this.getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch((error: unknown) => {
          res.statusCode = 500;
          res.end(error instanceof Error ? error.message : 'metrics unavailable');
        });
    });

    this.server.on('error', (error: Error) => {
      this.logger?.error('Metrics server error', { error: error.message, port });
    });

    this.server.listen(port, () => {
      this.logger?.info(`Metrics exposed on http://localhost:${port}${path}`);
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  }
}
