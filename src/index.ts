/**
 * Flowline: dependency-ordered, concurrent multi-step flow execution.
 *
 * Steps declare the steps they require; independent steps run concurrently,
 * each step's result is written once into a shared context its dependents
 * can read, and a failing step only affects the steps downstream of it.
 */

export { createApp, createAppContext, registerFlow } from './server';
export type { AppContext } from './server';
export { createFlowRoutes } from './api/flows';
export type { FlowCatalog, IntrospectableFlow } from './api/flows';
export * from './config';
export * from './domain';
export * from './engine';
export * from './export/graph-export';
export * from './logger';
