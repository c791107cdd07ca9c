// src/service.ts

import type { Server } from 'http';
import type { Express } from 'express';
import type { AppConfig } from './config/ConfigValidator';
import { validateConfig } from './config/ConfigValidator';
import { AuthCore } from './core/auth/AuthCore';
import { StateSigner } from './core/auth/StateSigner';
import { HttpCore } from './core/http/HttpCore';
import { ResourceClient } from './core/http/ResourceClient';
import { Normalizer } from './core/normalizer/Normalizer';
import { DistributedRefreshLock } from './core/token/DistributedRefreshLock';
import { SessionStore } from './core/token/SessionStore';
import { TokenManager } from './core/token/TokenManager';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { NotificationIngestor } from './pipeline/NotificationIngestor';
import { NotificationWorker } from './pipeline/NotificationWorker';
import { SubscriptionRegistry } from './pipeline/SubscriptionRegistry';
import { createApp } from './server/app';
import type { HealthReport } from './server/types';
import { openDatabase } from './storage/Database';
import type { SqliteDatabase } from './storage/Database';
import { MessageRepository } from './storage/MessageRepository';
import { NotificationRepository } from './storage/NotificationRepository';
import { errorMessage } from './utils/errors';

/**
 * Composition root: builds every component from one validated configuration
 * and owns their lifecycle.
 */
export class IngestionService {
  readonly logger: Logger;
  readonly metrics: MetricsCollector;
  readonly db: SqliteDatabase;
  readonly notifications: NotificationRepository;
  readonly messages: MessageRepository;
  readonly sessions: SessionStore;
  readonly subscriptions: SubscriptionRegistry;
  readonly refreshLock: DistributedRefreshLock;
  readonly tokens: TokenManager;
  readonly resources: ResourceClient;
  readonly ingestor: NotificationIngestor;
  readonly worker: NotificationWorker;
  readonly app: Express;

  private server?: Server;

  private constructor(private config: AppConfig) {
    // Build dependencies bottom-up so nothing sees a half-built graph
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics, logger);
    const db = openDatabase(config.database.path);

    const http = new HttpCore(
      {
        timeoutMs: config.graph.timeoutMs,
        retry: config.graph.retry,
        rateLimit: config.graph.rateLimit,
      },
      metrics,
      logger
    );
    const auth = new AuthCore(config.oauth, config.graph.baseUrl, http, logger);
    const refreshLock = new DistributedRefreshLock(config.redisUrl, logger);
    const sessions = new SessionStore(config.sessionStore, logger);
    const tokens = new TokenManager(
      auth,
      new StateSigner(config.oauth.stateSecret),
      sessions,
      logger,
      metrics,
      { refreshMarginSeconds: config.oauth.refreshMarginSeconds, lock: refreshLock }
    );
    const resources = new ResourceClient(http, tokens, { baseUrl: config.graph.baseUrl }, logger);

    const notifications = new NotificationRepository(db, config.worker.maxAttempts);
    const messages = new MessageRepository(db);
    const subscriptions = new SubscriptionRegistry(
      config.sessionStore,
      logger,
      config.notifications.defaultOwnerUserId
    );

    const ingestor = new NotificationIngestor(
      notifications,
      config.notifications.clientState,
      logger,
      metrics
    );
    const worker = new NotificationWorker(
      {
        notifications,
        messages,
        owners: subscriptions,
        tokens,
        resources,
        normalizer: new Normalizer(),
        logger,
        metrics,
      },
      config.worker
    );
    ingestor.on('enqueued', () => worker.wake());

    this.logger = logger;
    this.metrics = metrics;
    this.db = db;
    this.notifications = notifications;
    this.messages = messages;
    this.sessions = sessions;
    this.subscriptions = subscriptions;
    this.refreshLock = refreshLock;
    this.tokens = tokens;
    this.resources = resources;
    this.ingestor = ingestor;
    this.worker = worker;
    this.app = createApp({
      webhookPath: config.server.webhookPath,
      ingestor,
      tokens,
      messages,
      health: () => this.getHealth(),
      logger,
      metrics,
    });
  }

  /**
   * Validate the configuration, build the service and wait for the refresh lock
   * to settle. Nothing listens or polls until `start()`.
   *
   * @throws {z.ZodError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const service = await IngestionService.init(loadConfigFromEnv());
   * await service.start();
   * ```
   */
  static async init(config: unknown): Promise<IngestionService> {
    const service = new IngestionService(validateConfig(config));
    await service.refreshLock.initialize();

    service.logger.info('Ingestion service initialized', {
      webhookPath: service.config.server.webhookPath,
      sessionBackend: service.config.sessionStore.backend,
      refreshLock: service.refreshLock.getConnectionStatus().mode,
    });
    return service;
  }

  /**
   * Start the worker and listen for HTTP. Port 0 picks a free port.
   */
  async start(port: number = this.config.server.port): Promise<Server> {
    this.worker.start();

    const server = await new Promise<Server>((resolve, reject) => {
      const listening = this.app.listen(port, () => resolve(listening));
      listening.once('error', reject);
    });
    this.server = server;

    const address = server.address();
    this.logger.info('Listening', {
      port: typeof address === 'object' && address ? address.port : port,
      webhookPath: this.config.server.webhookPath,
    });
    return server;
  }

  /**
   * Stop accepting requests, drain the worker, then release connections.
   */
  async stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }

    await this.worker.stop();

    const closers: Array<[string, () => Promise<void>]> = [
      ['refresh lock', () => this.refreshLock.disconnect()],
      ['session store', () => this.sessions.disconnect()],
      ['subscription registry', () => this.subscriptions.disconnect()],
      ['metrics', () => this.metrics.close()],
    ];
    for (const [name, close] of closers) {
      try {
        await close();
      } catch (error: unknown) {
        this.logger.warn(`Failed to close ${name}`, { error: errorMessage(error) });
      }
    }

    this.db.close();
    this.logger.info('Ingestion service stopped');
  }

  getHealth(): HealthReport {
    const worker = this.worker.getStatus();
    const distributedLocks = this.refreshLock.getConnectionStatus();

    return {
      status: worker.running && distributedLocks.healthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      worker,
      queue: this.notifications.counts(),
      messages: this.messages.count(),
      distributedLocks,
    };
  }
}
