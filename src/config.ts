/**
 * Executor configuration.
 *
 * Usage:
 *   const options = createExecutorOptions({ concurrency: 4, deadlineMs: 30_000 });
 *   const result = validateExecutorOptions(options);
 *   if (!result.valid) throw new FlowValidationError([invalidConfigError(result.errors)]);
 *
 * Or from the environment:
 *   const options = loadExecutorOptionsFromEnv(process.env);
 */

import { FlowObserver } from './domain/events';
import { Logger, logger as rootLogger, parseLogLevel, setLogLevel } from './logger';

/**
 * Which completed results a running step can read.
 *
 * - `dependencies`: only the steps it declared in `requires`
 * - `all`: every result written before the step started
 */
export type ContextViewMode = 'dependencies' | 'all';

/** Options accepted by the scheduler and FlowManager. */
export interface ExecutorOptions {
  /** Maximum concurrently running steps. Infinity means unbounded. */
  concurrency: number;
  /** Flow-level deadline. No deadline when omitted. */
  deadlineMs?: number;
  contextView: ContextViewMode;
  /** Observers notified in addition to the default logging observer. */
  observers: FlowObserver[];
  /** Install the logging observer. Default true. */
  logEvents: boolean;
  logger: Logger;
  /** External cancellation; behaves like the deadline firing. */
  signal?: AbortSignal;
}

export const DEFAULT_EXECUTOR_OPTIONS: Readonly<ExecutorOptions> = {
  concurrency: Number.POSITIVE_INFINITY,
  contextView: 'dependencies',
  observers: [],
  logEvents: true,
  logger: rootLogger,
};

/** Validation result for executor options. */
export interface OptionsValidationResult {
  valid: boolean;
  errors: string[];
}

/** Merge overrides over the defaults. */
export function createExecutorOptions(overrides?: Partial<ExecutorOptions>): ExecutorOptions {
  return {
    concurrency: overrides?.concurrency ?? DEFAULT_EXECUTOR_OPTIONS.concurrency,
    deadlineMs: overrides?.deadlineMs ?? DEFAULT_EXECUTOR_OPTIONS.deadlineMs,
    contextView: overrides?.contextView ?? DEFAULT_EXECUTOR_OPTIONS.contextView,
    observers: [...(overrides?.observers ?? DEFAULT_EXECUTOR_OPTIONS.observers)],
    logEvents: overrides?.logEvents ?? DEFAULT_EXECUTOR_OPTIONS.logEvents,
    logger: overrides?.logger ?? DEFAULT_EXECUTOR_OPTIONS.logger,
    signal: overrides?.signal,
  };
}

/** Validate executor options for consistency. */
export function validateExecutorOptions(options: ExecutorOptions): OptionsValidationResult {
  const errors: string[] = [];

  if (options.concurrency !== Number.POSITIVE_INFINITY) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      errors.push('concurrency must be a positive integer or Infinity');
    }
  }

  if (options.deadlineMs !== undefined) {
    if (!Number.isFinite(options.deadlineMs) || options.deadlineMs <= 0) {
      errors.push('deadlineMs must be a positive finite number');
    }
  }

  if (options.contextView !== 'dependencies' && options.contextView !== 'all') {
    errors.push(`contextView must be "dependencies" or "all", got "${String(options.contextView)}"`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Read executor options from environment variables.
 *
 * FLOWLINE_CONCURRENCY, FLOWLINE_DEADLINE_MS and FLOWLINE_CONTEXT_VIEW map to
 * the matching options. FLOWLINE_LOG_LEVEL adjusts the global log level as a
 * side effect. Unparseable numbers are passed through as NaN so that
 * validation reports them.
 */
export function loadExecutorOptionsFromEnv(
  env: Record<string, string | undefined>,
): ExecutorOptions {
  const overrides: Partial<ExecutorOptions> = {};

  const concurrency = env.FLOWLINE_CONCURRENCY?.trim();
  if (concurrency) {
    overrides.concurrency = concurrency.toLowerCase() === 'unbounded'
      ? Number.POSITIVE_INFINITY
      : Number(concurrency);
  }

  const deadline = env.FLOWLINE_DEADLINE_MS?.trim();
  if (deadline) {
    overrides.deadlineMs = Number(deadline);
  }

  const view = env.FLOWLINE_CONTEXT_VIEW?.trim();
  if (view === 'dependencies' || view === 'all') {
    overrides.contextView = view;
  } else if (view) {
    rootLogger.warn('Ignoring unknown FLOWLINE_CONTEXT_VIEW', { value: view });
  }

  const level = parseLogLevel(env.FLOWLINE_LOG_LEVEL);
  if (level) setLogLevel(level);

  return createExecutorOptions(overrides);
}
