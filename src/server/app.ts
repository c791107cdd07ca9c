// src/server/app.ts

import express from 'express';
import type { CookieOptions, NextFunction, Request, Response } from 'express';
import cookieParser from 'cookie-parser';
import type { NotificationIngestor } from '../pipeline/NotificationIngestor';
import type { TokenManager } from '../core/token/TokenManager';
import type { MessageRepository } from '../storage/MessageRepository';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import { IngestorError, errorMessage } from '../utils/errors';
import type { HealthReport } from './types';

export const STATE_COOKIE = 'oauth_state';
export const SIGNATURE_COOKIE = 'oauth_state_sig';

const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 500;

const stateCookieOptions: CookieOptions = {
  httpOnly: true,
  secure: true,
  sameSite: 'lax',
  maxAge: 10 * 60 * 1000,
  path: '/auth',
};

export interface ServerDependencies {
  webhookPath: string;
  ingestor: NotificationIngestor;
  tokens: TokenManager;
  messages: MessageRepository;
  health: () => HealthReport;
  logger: Logger;
  metrics: MetricsCollector;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function cookieValue(req: Request, name: string): string | undefined {
  const cookies: Record<string, unknown> = req.cookies ?? {};
  return queryString(cookies[name]);
}

/**
 * Errors raised by express.json(): unparseable, oversized or badly encoded bodies.
 */
function isBodyParserError(error: unknown): error is Error & { type: string; status: number } {
  return (
    error instanceof Error &&
    'type' in error &&
    typeof error.type === 'string' &&
    'status' in error &&
    typeof error.status === 'number'
  );
}

export function parseLimit(value: unknown): number {
  const parsed = Number.parseInt(queryString(value) ?? '', 10);
  if (!Number.isFinite(parsed) || parsed < 1) return DEFAULT_PAGE_SIZE;
  return Math.min(parsed, MAX_PAGE_SIZE);
}

export function createApp(deps: ServerDependencies): express.Express {
  const { logger, metrics } = deps;
  const app = express();

  app.disable('x-powered-by');
  app.use(cookieParser());

  // Validation handshake: echo the token before any body parsing or storage work
  app.all(deps.webhookPath, (req, res, next) => {
    const validationToken = queryString(req.query.validationToken);
    if (validationToken === undefined) {
      next();
      return;
    }
    logger.info('Webhook validation handshake answered');
    res.status(200).type('text/plain').send(validationToken);
  });

  app.post(deps.webhookPath, express.json({ limit: '1mb' }), (req, res) => {
    try {
      const result = deps.ingestor.receive(req.body);
      res.status(202).json({ accepted: result.accepted });
    } catch (error: unknown) {
      logger.error('Failed to persist notifications', { error: errorMessage(error) });
      res.status(500).json({ error: 'storage_unavailable' });
    }
  });

  app.get('/auth/login', (_req, res) => {
    const { authorizationUrl, state, signature } = deps.tokens.beginAuthorization();
    res.cookie(STATE_COOKIE, state, stateCookieOptions);
    res.cookie(SIGNATURE_COOKIE, signature, stateCookieOptions);
    res.redirect(authorizationUrl);
  });

  app.get('/auth/callback', async (req, res) => {
    res.clearCookie(STATE_COOKIE, { path: stateCookieOptions.path });
    res.clearCookie(SIGNATURE_COOKIE, { path: stateCookieOptions.path });

    try {
      const session = await deps.tokens.completeAuthorization({
        code: queryString(req.query.code),
        state: queryString(req.query.state),
        cookieState: cookieValue(req, STATE_COOKIE),
        signature: cookieValue(req, SIGNATURE_COOKIE),
      });
      metrics.incrementCounter('auth_callbacks', { result: 'success' });
      res.status(200).json({ userId: session.userId, email: session.email ?? null });
    } catch (error: unknown) {
      // One generic reply whichever check failed
      metrics.incrementCounter('auth_callbacks', { result: 'failure' });
      logger.warn('Authorization callback rejected', {
        reason: error instanceof IngestorError ? error.code : 'UNKNOWN',
        error: errorMessage(error),
      });
      res.status(401).json({ error: 'authentication_failed' });
    }
  });

  app.get('/messages', (req, res) => {
    const limit = parseLimit(req.query.limit);
    const messages = deps.messages.listRecent(limit);
    res.json({ count: messages.length, messages });
  });

  app.get('/messages/:messageId', (req, res) => {
    const message = deps.messages.getById(req.params.messageId);
    if (!message) {
      res.status(404).json({ error: 'not_found' });
      return;
    }
    res.json(message);
  });

  app.get('/health', (_req, res) => {
    const report = deps.health();
    res.status(report.status === 'healthy' ? 200 : 503).json(report);
  });

  app.get('/metrics', async (_req, res) => {
    try {
      res.type(metrics.contentType).send(await metrics.getMetrics());
    } catch (error: unknown) {
      logger.error('Metrics rendering failed', { error: errorMessage(error) });
      res.status(500).json({ error: 'metrics_unavailable' });
    }
  });

  // A body the JSON parser rejects is still acknowledged on the webhook path
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (req.path === deps.webhookPath && isBodyParserError(error)) {
      logger.warn('Unreadable notification body dropped', {
        type: error.type,
        status: error.status,
      });
      metrics.incrementCounter('notifications_received', { result: 'invalid' });
      res.status(202).json({ accepted: 0 });
      return;
    }
    if (res.headersSent) {
      next(error);
      return;
    }
    logger.error('Unhandled request error', { path: req.path, error: errorMessage(error) });
    res.status(500).json({ error: 'internal_error' });
  });

  return app;
}
