/**
 * Domain model exports.
 */

export * from './errors';
export * from './events';
export * from './flow-result';
export * from './step';
