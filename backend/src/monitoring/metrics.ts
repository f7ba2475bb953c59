import type { Hono, Env } from 'hono';
import { Registry, Histogram, Counter, collectDefaultMetrics } from 'prom-client';

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [registry],
});

const escrowTransitionsTotal = new Counter({
  name: 'escrow_transitions_total',
  help: 'Escrow state machine decisions by action and outcome',
  labelNames: ['action', 'outcome'],
  registers: [registry],
});

const webhookEventsTotal = new Counter({
  name: 'webhook_events_total',
  help: 'Inbound provider webhook events by outcome',
  labelNames: ['provider', 'outcome'],
  registers: [registry],
});

function createMetricsEndpoint<E extends Env>(app: Hono<E>): void {
  app.get('/metrics', async (c) => {
    const metrics = await registry.metrics();
    return c.text(metrics, 200, {
      'Content-Type': registry.contentType,
    });
  });
}

export {
  registry,
  httpRequestDuration,
  httpRequestsTotal,
  escrowTransitionsTotal,
  webhookEventsTotal,
  createMetricsEndpoint,
};
