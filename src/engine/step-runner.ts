/**
 * Step runner: executes a single step's unit of work and, on failure, its
 * recovery handler.
 *
 * Execution is policy-driven: retries, per-attempt timeouts, and backoff are
 * applied according to the step's policy. Whatever the unit of work does
 * (returns an outcome, throws, rejects, returns garbage) is normalized into
 * a StepRunOutcome so the scheduler only ever pattern-matches.
 */

import { Logger } from '../logger';
import {
  ContextView,
  StepDefinition,
  StepOutcome,
  StepPolicy,
  StepResult,
} from '../domain/step';
import {
  TypedError,
  handlerFailedError,
  invalidResultError,
  nonRetryableStepError,
  stepExecutionError,
  stepTimeoutError,
  uncopyableResultError,
} from '../domain/errors';
import { deepCopy } from './context-store';

/** Normalized result of running a step or its handler. */
export type StepRunOutcome =
  | { ok: true; result: StepResult; attempts: number }
  | { ok: false; error: TypedError; cause: unknown; attempts: number };

/** What the scheduler supplies for one step run. */
export interface StepRunContext<TAgent = unknown> {
  input: Readonly<Record<string, unknown>>;
  context: ContextView;
  signal: AbortSignal;
  logger: Logger;
  agent?: TAgent;
}

/** Policy with defaults applied. */
export interface ResolvedStepPolicy {
  maxAttempts: number;
  timeoutMs?: number;
  backoffStrategy: 'fixed' | 'exponential';
  backoffBaseMs: number;
}

export function resolveStepPolicy(policy?: StepPolicy): ResolvedStepPolicy {
  return {
    maxAttempts: Math.max(1, Math.floor(policy?.maxAttempts ?? 1)),
    timeoutMs: policy?.timeoutMs,
    backoffStrategy: policy?.backoffStrategy ?? 'exponential',
    backoffBaseMs: policy?.backoffBaseMs ?? 100,
  };
}

/** Problems with a policy, one message per field. Empty when it is usable. */
export function validateStepPolicy(policy: StepPolicy): string[] {
  const errors: string[] = [];
  const { maxAttempts, timeoutMs, backoffStrategy, backoffBaseMs } = policy;

  if (maxAttempts !== undefined && (!Number.isInteger(maxAttempts) || maxAttempts < 1)) {
    errors.push(`"policy.maxAttempts" must be a positive integer, got ${String(maxAttempts)}`);
  }
  if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs < 0)) {
    errors.push(`"policy.timeoutMs" must be a finite number >= 0, got ${String(timeoutMs)}`);
  }
  if (backoffBaseMs !== undefined && (!Number.isFinite(backoffBaseMs) || backoffBaseMs < 0)) {
    errors.push(`"policy.backoffBaseMs" must be a finite number >= 0, got ${String(backoffBaseMs)}`);
  }
  if (backoffStrategy !== undefined && backoffStrategy !== 'fixed' && backoffStrategy !== 'exponential') {
    errors.push(`"policy.backoffStrategy" must be "fixed" or "exponential", got "${String(backoffStrategy)}"`);
  }
  return errors;
}

/** Run a step's unit of work under its retry and timeout policy. */
export async function runStep<TAgent>(
  step: StepDefinition<TAgent>,
  ctx: StepRunContext<TAgent>,
): Promise<StepRunOutcome> {
  const policy = resolveStepPolicy(step.policy);
  let lastError: TypedError | undefined;
  let lastCause: unknown;
  let attemptsMade = 0;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (attempt > 1 && ctx.signal.aborted) {
      break;
    }
    attemptsMade = attempt;

    const attemptController = new AbortController();
    const unlink = linkSignal(ctx.signal, attemptController);

    let outcome: StepOutcome | undefined;
    let thrown: unknown;
    let threw = false;

    try {
      outcome = await executeWithTimeout(
        async () => step.run({
          stepName: step.name,
          input: ctx.input,
          context: ctx.context,
          agent: ctx.agent,
          signal: attemptController.signal,
          attempt,
          logger: ctx.logger,
        }),
        policy.timeoutMs,
        () => attemptController.abort(),
      );
    } catch (err) {
      threw = true;
      thrown = err;
    } finally {
      unlink();
    }

    if (!threw) {
      if (!isStepOutcome(outcome)) {
        return {
          ok: false,
          error: invalidResultError(step.name, describeValue(outcome)),
          cause: outcome,
          attempts: attempt,
        };
      }
      if (outcome.ok) {
        if (!isResultMapping(outcome.result)) {
          return {
            ok: false,
            error: invalidResultError(step.name, describeValue(outcome.result)),
            cause: outcome.result,
            attempts: attempt,
          };
        }
        const copied = copyResult(step.name, outcome.result);
        if (!copied.ok) return { ...copied, attempts: attempt };
        return { ok: true, result: copied.result, attempts: attempt };
      }
      thrown = outcome.error;
    }

    // Non-retryable errors fail immediately without exhausting attempts.
    if (thrown instanceof NonRetryableStepError) {
      return {
        ok: false,
        error: nonRetryableStepError(step.name, thrown.message, attempt, thrown.statusCode),
        cause: thrown,
        attempts: attempt,
      };
    }

    lastCause = thrown;
    lastError = thrown instanceof StepTimeoutError
      ? stepTimeoutError(step.name, thrown.timeoutMs, attempt)
      : stepExecutionError(step.name, thrown, attempt, policy.maxAttempts);

    if (attempt < policy.maxAttempts) {
      ctx.logger.debug('Retrying step', { step: step.name, attempt, maxAttempts: policy.maxAttempts });
      await sleep(computeBackoff(policy.backoffStrategy, policy.backoffBaseMs, attempt), ctx.signal);
    } else {
      return { ok: false, error: lastError, cause: lastCause, attempts: attempt };
    }
  }

  // Only reachable when the flow was aborted between attempts.
  return {
    ok: false,
    error: lastError ?? stepExecutionError(step.name, 'aborted before first attempt', 0, policy.maxAttempts),
    cause: lastCause,
    attempts: attemptsMade,
  };
}

/**
 * Run a step's recovery handler. Returns undefined when the step has none.
 * A handler that fails (by outcome or by throwing) yields STEP.HANDLER_FAILED.
 */
export async function runRecovery<TAgent>(
  step: StepDefinition<TAgent>,
  failure: { error: TypedError; cause: unknown },
  ctx: StepRunContext<TAgent>,
): Promise<StepRunOutcome | undefined> {
  const handler = step.onError;
  if (!handler) return undefined;

  let outcome: StepOutcome;
  try {
    outcome = await handler({
      stepName: step.name,
      error: failure.error,
      cause: failure.cause,
      input: ctx.input,
      context: ctx.context,
      agent: ctx.agent,
      signal: ctx.signal,
      logger: ctx.logger,
    });
  } catch (err) {
    return { ok: false, error: handlerFailedError(step.name, err), cause: err, attempts: 1 };
  }

  if (!isStepOutcome(outcome)) {
    const cause = invalidResultError(step.name, describeValue(outcome));
    return { ok: false, error: handlerFailedError(step.name, cause.message), cause: outcome, attempts: 1 };
  }
  if (!outcome.ok) {
    return { ok: false, error: handlerFailedError(step.name, outcome.error), cause: outcome.error, attempts: 1 };
  }
  if (!isResultMapping(outcome.result)) {
    const cause = invalidResultError(step.name, describeValue(outcome.result));
    return { ok: false, error: handlerFailedError(step.name, cause.message), cause: outcome.result, attempts: 1 };
  }
  const copied = copyResult(step.name, outcome.result);
  if (!copied.ok) {
    return { ok: false, error: handlerFailedError(step.name, copied.error.message), cause: copied.cause, attempts: 1 };
  }
  return { ok: true, result: copied.result, attempts: 1 };
}

/**
 * Error that units of work throw (or fail with) to indicate the failure is
 * non-retryable. The runner fails the step without using remaining attempts.
 */
export class NonRetryableStepError extends Error {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'NonRetryableStepError';
    this.statusCode = statusCode;
  }
}

class StepTimeoutError extends Error {
  constructor(public timeoutMs: number) {
    super(`Step execution timed out after ${timeoutMs}ms`);
    this.name = 'StepTimeoutError';
  }
}

/** Execute a function with an optional timeout. */
async function executeWithTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number | undefined,
  onTimeout: () => void,
): Promise<T> {
  if (timeoutMs === undefined) return fn();
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout();
      reject(new StepTimeoutError(timeoutMs));
    }, timeoutMs);
    fn()
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

/** Abort `target` when `source` aborts. Returns the unlink function. */
function linkSignal(source: AbortSignal, target: AbortController): () => void {
  if (source.aborted) {
    target.abort(source.reason);
    return () => undefined;
  }
  const onAbort = () => target.abort(source.reason);
  source.addEventListener('abort', onAbort, { once: true });
  return () => source.removeEventListener('abort', onAbort);
}

/** Compute backoff delay based on strategy. */
export function computeBackoff(
  strategy: 'fixed' | 'exponential',
  baseMs: number,
  attempt: number,
): number {
  if (strategy === 'fixed') return baseMs;
  return baseMs * Math.pow(2, attempt - 1);
}

/** Sleep that ends early when the signal aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

function isStepOutcome(value: unknown): value is StepOutcome {
  if (typeof value !== 'object' || value === null || !('ok' in value)) return false;
  if (value.ok === true) return 'result' in value;
  return value.ok === false;
}

function isResultMapping(value: unknown): value is StepResult {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The step keeps its own object; everything downstream works on a copy. */
function copyResult(
  stepName: string,
  result: StepResult,
): { ok: true; result: StepResult } | { ok: false; error: TypedError; cause: unknown } {
  try {
    return { ok: true, result: deepCopy(result) };
  } catch (err) {
    return { ok: false, error: uncopyableResultError(stepName, err), cause: err };
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  if (typeof value === 'object') return 'an object that is not a step outcome';
  return typeof value;
}
