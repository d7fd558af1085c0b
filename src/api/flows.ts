/**
 * Flow introspection routes. Read-only: nothing here executes or edits a flow.
 *
 * GET /flows - List registered flows
 * GET /flows/:name - Exported step graph
 * GET /flows/:name/mermaid - Mermaid source for the graph
 * GET /flows/:name/validation - Graph validation errors, if any
 */

import { Router } from 'express';
import { TypedError, apiError, notFoundError } from '../domain/errors';
import { ExportableStep, exportFlowGraph, toMermaid } from '../export/graph-export';

/** What the API reads from a flow. FlowManager satisfies it for any agent type. */
export interface IntrospectableFlow {
  readonly name: string;
  readonly size: number;
  steps(): readonly ExportableStep[];
  validate(): { success: boolean; errors: TypedError[] };
}

/** Named flows exposed by the API. */
export type FlowCatalog = Map<string, IntrospectableFlow>;

export function createFlowRoutes(catalog: FlowCatalog): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      flows: [...catalog.values()].map((flow) => ({ name: flow.name, stepCount: flow.size })),
    });
  });

  router.get('/:name', (req, res) => {
    const flow = catalog.get(req.params.name);
    if (!flow) {
      res.status(404).json(apiError(notFoundError('Flow', req.params.name)));
      return;
    }
    res.json(exportFlowGraph(flow.name, flow.steps()));
  });

  router.get('/:name/mermaid', (req, res) => {
    const flow = catalog.get(req.params.name);
    if (!flow) {
      res.status(404).json(apiError(notFoundError('Flow', req.params.name)));
      return;
    }
    res.type('text/plain').send(toMermaid(exportFlowGraph(flow.name, flow.steps())));
  });

  router.get('/:name/validation', (req, res) => {
    const flow = catalog.get(req.params.name);
    if (!flow) {
      res.status(404).json(apiError(notFoundError('Flow', req.params.name)));
      return;
    }
    const build = flow.validate();
    res.json({ valid: build.success, errors: build.errors });
  });

  return router;
}
