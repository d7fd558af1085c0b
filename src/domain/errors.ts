/**
 * Typed error model for machine-actionable error handling.
 *
 * Step-level failures are recorded as typed values on the flow result rather
 * than thrown. Only validation problems (detected before any step runs) and
 * scheduler invariant violations surface as exceptions, and those carry the
 * same typed payload.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain = 'STEP' | 'VALIDATION' | 'SYSTEM';

/** Typed suggested fix a caller can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure recorded on results and returned by the API. */
export interface TypedError {
  /** Namespaced error code (e.g., "STEP.TIMEOUT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated step if applicable. */
  stepName?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  stepName?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    stepName: params.stepName,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Extract a message from an arbitrary thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  if (isTypedError(err)) return err.message;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

/** Structural check for a TypedError value. */
export function isTypedError(value: unknown): value is TypedError {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'code' in value &&
    typeof value.code === 'string' &&
    'message' in value &&
    typeof value.message === 'string' &&
    'retryable' in value &&
    typeof value.retryable === 'boolean'
  );
}

// --- VALIDATION error factories ---

export function duplicateStepError(stepName: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.DUPLICATE_STEP',
    message: `Step "${stepName}" is already registered in this flow`,
    stepName,
    retryable: false,
    suggestedFixes: [
      { type: 'RENAME_STEP', params: { stepName }, description: 'Give each step a unique name' },
    ],
  });
}

export function unknownDependencyError(stepName: string, dependency: string, known: string[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.UNKNOWN_DEPENDENCY',
    message: `Step "${stepName}": requires unknown step "${dependency}"`,
    stepName,
    retryable: false,
    details: { dependency },
    suggestedFixes: [
      {
        type: 'FIX_DEPENDENCY',
        params: { availableSteps: known },
        description: `Add a step named "${dependency}" or remove it from "requires"`,
      },
    ],
  });
}

export function dependencyCycleError(cycle: string[]): TypedError {
  const path = [...cycle, cycle[0]].join(' -> ');
  return createTypedError({
    code: 'VALIDATION.DEPENDENCY_CYCLE',
    message: `Dependency cycle detected: ${path}`,
    stepName: cycle[0],
    retryable: false,
    details: { cycle },
    suggestedFixes: [
      { type: 'BREAK_CYCLE', params: { cycle }, description: 'Remove one of the "requires" edges in the cycle' },
    ],
  });
}

export function invalidStepError(stepName: string, message: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.INVALID_STEP',
    message: `Step "${stepName}": ${message}`,
    stepName,
    retryable: false,
  });
}

export function invalidConfigError(errors: string[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.INVALID_CONFIG',
    message: `Invalid executor options: ${errors.join('; ')}`,
    retryable: false,
    details: { errors },
  });
}

export function invalidInputError(reason: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.INVALID_INPUT',
    message: `Flow input cannot be copied: ${reason}`,
    retryable: false,
    details: { reason },
    suggestedFixes: [
      { type: 'FIX_INPUT', params: {}, description: 'Pass data only: no functions, symbols or handles' },
    ],
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

// --- STEP error factories ---

export function stepExecutionError(stepName: string, cause: unknown, attempt: number, maxAttempts: number): TypedError {
  return createTypedError({
    code: 'STEP.EXECUTION_ERROR',
    message: describeError(cause),
    stepName,
    retryable: attempt < maxAttempts,
    details: { attempt, maxAttempts },
  });
}

export function stepTimeoutError(stepName: string, timeoutMs: number, attempt: number): TypedError {
  return createTypedError({
    code: 'STEP.TIMEOUT',
    message: `Step "${stepName}" timed out after ${timeoutMs}ms`,
    stepName,
    retryable: true,
    details: { timeoutMs, attempt },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 1.5 } },
    ],
  });
}

export function nonRetryableStepError(stepName: string, message: string, attempt: number, statusCode?: number): TypedError {
  return createTypedError({
    code: 'STEP.NON_RETRYABLE',
    message,
    stepName,
    retryable: false,
    details: { attempt, statusCode },
  });
}

export function invalidResultError(stepName: string, received: string): TypedError {
  return createTypedError({
    code: 'STEP.INVALID_RESULT',
    message: `Step "${stepName}" returned ${received}; expected a result mapping`,
    stepName,
    retryable: false,
    details: { received },
  });
}

export function uncopyableResultError(stepName: string, cause: unknown): TypedError {
  return createTypedError({
    code: 'STEP.INVALID_RESULT',
    message: `Step "${stepName}" returned a result that cannot be copied: ${describeError(cause)}`,
    stepName,
    retryable: false,
  });
}

export function handlerFailedError(stepName: string, cause: unknown): TypedError {
  return createTypedError({
    code: 'STEP.HANDLER_FAILED',
    message: `Recovery handler for step "${stepName}" failed: ${describeError(cause)}`,
    stepName,
    retryable: false,
  });
}

export function dependencySkippedError(stepName: string, causes: string[]): TypedError {
  return createTypedError({
    code: 'STEP.SKIPPED_DEPENDENCY',
    message: `Step "${stepName}" skipped: upstream failure in ${causes.map((c) => `"${c}"`).join(', ')}`,
    stepName,
    retryable: false,
    details: { causes },
  });
}

export function timeoutSkippedError(stepName: string, deadlineMs?: number): TypedError {
  return createTypedError({
    code: 'STEP.TIMEOUT_SKIPPED',
    message: deadlineMs !== undefined
      ? `Step "${stepName}" not started before the ${deadlineMs}ms flow deadline`
      : `Step "${stepName}" not started before the flow was canceled`,
    stepName,
    retryable: true,
    details: deadlineMs !== undefined ? { deadlineMs } : undefined,
  });
}

// --- SYSTEM error factories ---

export function contextOverwriteError(stepName: string): TypedError {
  return createTypedError({
    code: 'SYSTEM.CONTEXT_OVERWRITE',
    message: `Context entry for step "${stepName}" was already written`,
    stepName,
    retryable: false,
  });
}

/** Thrown by FlowManager when a flow definition is invalid. Nothing has run. */
export class FlowValidationError extends Error {
  readonly typedError: TypedError;

  constructor(public readonly errors: TypedError[]) {
    super(
      errors.length === 1
        ? errors[0].message
        : `Flow validation failed with ${errors.length} errors: ${errors.map((e) => e.message).join('; ')}`,
    );
    this.name = 'FlowValidationError';
    this.typedError = errors[0] ?? createTypedError({ code: 'VALIDATION.UNKNOWN', message: 'Flow validation failed' });
  }
}

/** Thrown when a context key is written twice. Indicates a scheduler bug. */
export class ContextStoreError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'ContextStoreError';
  }
}

/** Thrown when the scheduler attempts an illegal status transition. */
export class SchedulerError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'SchedulerError';
  }
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
