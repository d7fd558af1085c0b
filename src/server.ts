/**
 * Express server configuration.
 *
 * Serves a read-only view of the flows registered in the application
 * context: their steps, dependency edges, Mermaid renderings and validation
 * state. Flows are executed by the host application, never over HTTP.
 */

import express from 'express';
import { FlowCatalog, IntrospectableFlow, createFlowRoutes } from './api/flows';
import { errorHandler, requestLogger } from './api/middleware';
import { FlowValidationError, createTypedError } from './domain/errors';
import { logger } from './logger';

export const VERSION = '0.1.0';

const startTime = Date.now();

/** Application context shared by all routes. */
export interface AppContext {
  flows: FlowCatalog;
}

/** Create the application context, optionally pre-populated. */
export function createAppContext(flows: Iterable<IntrospectableFlow> = []): AppContext {
  const ctx: AppContext = { flows: new Map() };
  for (const flow of flows) registerFlow(ctx, flow);
  return ctx;
}

/** Expose a flow through the API. Names must be unique within a context. */
export function registerFlow(ctx: AppContext, flow: IntrospectableFlow): void {
  if (ctx.flows.has(flow.name)) {
    throw new FlowValidationError([
      createTypedError({
        code: 'VALIDATION.DUPLICATE_FLOW',
        message: `Flow "${flow.name}" is already registered`,
        retryable: false,
      }),
    ]);
  }
  ctx.flows.set(flow.name, flow);
  logger.debug('Flow registered', { flow: flow.name, steps: flow.size });
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(requestLogger());

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      flows: ctx.flows.size,
    });
  });

  app.use('/flows', createFlowRoutes(ctx.flows));

  app.use(errorHandler);

  return app;
}
