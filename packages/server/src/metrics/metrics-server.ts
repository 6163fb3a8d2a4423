/**
 * HTTP endpoint for metrics and health
 * @module @herald/server/metrics/metrics-server
 */

import http from 'node:http';
import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import type { ReconcilerStore } from '@herald/core';
import { createServiceLogger } from '@herald/shared';
import { PROMETHEUS_CONTENT_TYPE, type MetricsRenderer } from './registry.js';

const logger = createServiceLogger({ component: 'metrics-server' });

// ============================================================================
// Handlers
// ============================================================================

/**
 * GET /metrics
 */
export function createMetricsHandler(metrics: MetricsRenderer) {
  return (_req: Request, res: Response, next: NextFunction): void => {
    metrics.render().then(
      (text) => {
        res.setHeader('Content-Type', PROMETHEUS_CONTENT_TYPE);
        res.status(200).send(text);
      },
      (error: unknown) => next(error),
    );
  };
}

/**
 * GET /healthz: 200 while a worker is running, 503 otherwise
 */
export function createHealthHandler(store: ReconcilerStore) {
  return (_req: Request, res: Response): void => {
    res.status(store.isReady.value ? 200 : 503).json(store.toStatus());
  };
}

export interface MetricsAppOptions {
  metrics: MetricsRenderer;
  store: ReconcilerStore;
}

export function createMetricsApp(options: MetricsAppOptions): Express {
  const app = express();
  app.disable('x-powered-by');
  app.get('/metrics', createMetricsHandler(options.metrics));
  app.get('/healthz', createHealthHandler(options.store));
  return app;
}

// ============================================================================
// Server
// ============================================================================

export interface MetricsServerOptions extends MetricsAppOptions {
  port: number;
  host: string;
}

export interface MetricsServer {
  app: Express;
  /** Bound port once listening */
  readonly port: number | undefined;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createMetricsServer(options: MetricsServerOptions): MetricsServer {
  const app = createMetricsApp(options);
  const httpServer = http.createServer(app);

  return {
    app,
    get port() {
      const address = httpServer.address();
      return address && typeof address === 'object' ? address.port : undefined;
    },

    start: () =>
      new Promise<void>((resolve, reject) => {
        const onError = (error: Error): void => reject(error);
        httpServer.once('error', onError);
        httpServer.listen(options.port, options.host, () => {
          httpServer.off('error', onError);
          logger.info('Metrics server listening', { host: options.host, port: options.port });
          resolve();
        });
      }),

    stop: () =>
      new Promise<void>((resolve, reject) => {
        if (!httpServer.listening) {
          resolve();
          return;
        }
        httpServer.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
