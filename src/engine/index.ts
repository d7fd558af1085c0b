/**
 * Engine exports.
 */

export * from './context-store';
export * from './dependency-graph';
export * from './flow-manager';
export * from './observers';
export * from './scheduler';
export * from './state-machine';
export * from './step-registry';
export * from './step-runner';
