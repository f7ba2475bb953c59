/**
 * Escrow Ledger HTTP application
 *
 * HTTP framing only: every route maps one (method, path) to one service call,
 * and service results become responses through a single translation point.
 * Domain rules live in services/.
 */

import { Hono, type Context } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { config } from './config';
import { createHonoErrorHandler, respondWithError } from './lib/errors/error-handler';
import { NotFoundError, ValidationError } from './lib/errors';
import { httpLogger } from './logger';
import { requestIdMiddleware, type RequestIdVariables } from './middleware/request-id';
import { httpMetricsMiddleware } from './monitoring/http-metrics';
import { createMetricsEndpoint } from './monitoring/metrics';
import type { EscrowService } from './services/EscrowService';
import type { PaystackWebhookService } from './services/PaystackWebhookService';
import type { LedgerStore } from './store/LedgerStore';
import type { ServiceResult } from './types';

export type AppEnv = { Variables: RequestIdVariables };

export interface AppDependencies {
  store: LedgerStore;
  escrowService: EscrowService;
  webhookService: PaystackWebhookService;
}

type RouteHandler = (c: Context<AppEnv>, deps: AppDependencies) => Promise<Response>;

interface RouteDefinition {
  method: 'GET' | 'POST';
  path: string;
  handler: RouteHandler;
}

// ============================================================================
// HELPERS
// ============================================================================

function send<T extends object>(c: Context<AppEnv>, result: ServiceResult<T>, status: ContentfulStatusCode = 200): Response {
  if (!result.success) {
    return respondWithError(c, result.error);
  }
  return c.json(result.data, status);
}

function escrowIdParam(c: Context<AppEnv>): string {
  return c.req.param('id') ?? '';
}

/**
 * Decode an optional JSON request body. An empty body reads as `{}`.
 */
async function readJson(c: Context<AppEnv>): Promise<ServiceResult<unknown>> {
  const text = await c.req.text();
  if (text.trim() === '') {
    return { success: true, data: {} };
  }
  try {
    return { success: true, data: JSON.parse(text) };
  } catch {
    return { success: false, error: new ValidationError('Request body is not valid JSON', 'INVALID_JSON') };
  }
}

// ============================================================================
// ROUTE TABLE
// ============================================================================

export const ROUTES: readonly RouteDefinition[] = [
  {
    method: 'GET',
    path: '/',
    handler: async (c) => c.json({ name: config.app.name, health: 'ok' }),
  },
  {
    method: 'GET',
    path: '/health',
    handler: async (c, { store }) => {
      const storage = await store.healthCheck();
      return c.json(
        { status: storage.connected ? 'healthy' : 'degraded', storage },
        storage.connected ? 200 : 503
      );
    },
  },
  {
    method: 'POST',
    path: '/api/escrows',
    handler: async (c, { escrowService }) => {
      const body = await readJson(c);
      if (!body.success) return respondWithError(c, body.error);
      return send(c, await escrowService.createEscrow(body.data), 201);
    },
  },
  {
    method: 'GET',
    path: '/api/escrows/:id',
    handler: async (c, { escrowService }) => send(c, await escrowService.getEscrow(escrowIdParam(c))),
  },
  {
    method: 'GET',
    path: '/api/escrows/:id/transactions',
    handler: async (c, { escrowService }) => {
      const result = await escrowService.listTransactions(escrowIdParam(c));
      if (!result.success) return respondWithError(c, result.error);
      return c.json({ transactions: result.data });
    },
  },
  {
    method: 'POST',
    path: '/api/escrows/:id/fund',
    handler: async (c, { escrowService }) => send(c, await escrowService.fund(escrowIdParam(c))),
  },
  {
    method: 'POST',
    path: '/api/escrows/:id/release',
    handler: async (c, { escrowService }) => {
      const result = await escrowService.release(escrowIdParam(c));
      if (!result.success) return respondWithError(c, result.error);
      return c.json({ status: result.data.escrow.status });
    },
  },
  {
    method: 'POST',
    path: '/api/escrows/:id/refund',
    handler: async (c, { escrowService }) => {
      const result = await escrowService.refund(escrowIdParam(c));
      if (!result.success) return respondWithError(c, result.error);
      return c.json({ status: result.data.escrow.status });
    },
  },
  {
    method: 'POST',
    path: '/api/escrows/:id/dispute',
    handler: async (c, { escrowService }) => {
      const result = await escrowService.dispute(escrowIdParam(c));
      if (!result.success) return respondWithError(c, result.error);
      return c.json({ status: result.data.escrow.status });
    },
  },
  {
    method: 'POST',
    path: '/webhooks/paystack',
    handler: async (c, { webhookService }) => {
      const rawBody = Buffer.from(await c.req.arrayBuffer());
      const result = await webhookService.handle(rawBody, c.req.header('x-paystack-signature'));
      if (!result.success) return respondWithError(c, result.error);
      return c.json(result.data, 200);
    },
  },
];

// ============================================================================
// APP
// ============================================================================

export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.use('*', bodyLimit({
    maxSize: 1024 * 1024, // 1MB
    onError: (c) => c.json({ error: { code: 'PAYLOAD_TOO_LARGE', message: 'Request body too large', statusCode: 413 } }, 413),
  }));

  app.use('*', requestIdMiddleware);

  // Structured request logging (Pino), tagged with requestId
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    const status = c.res.status;
    const level = status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info';
    httpLogger[level]({
      requestId: c.get('requestId'),
      method: c.req.method,
      path: c.req.path,
      status,
      duration,
    }, `${c.req.method} ${c.req.path} → ${status} (${duration}ms)`);
  });

  app.use('*', httpMetricsMiddleware());

  createMetricsEndpoint(app);

  for (const route of ROUTES) {
    app.on(route.method, route.path, (c) => route.handler(c, deps));
  }

  app.notFound((c) => respondWithError(c, new NotFoundError(`No route for ${c.req.method} ${c.req.path}`)));
  app.onError(createHonoErrorHandler());

  return app;
}
