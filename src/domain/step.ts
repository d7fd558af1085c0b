/**
 * Step domain model.
 *
 * A step is a named unit of work with declared dependencies. Its logic is
 * opaque to the engine: the engine hands it the flow input and a read-only
 * context view, and pattern-matches on the outcome it returns.
 */

import { Logger } from '../logger';
import { TypedError } from './errors';

/** A step's result mapping, written to the context on success. */
export type StepResult = Record<string, unknown>;

/** Read-only view of completed step results, keyed by step name. */
export type ContextView = Readonly<Record<string, Readonly<StepResult>>>;

/** Explicit result-or-failure returned by a unit of work or recovery handler. */
export type StepOutcome<R extends StepResult = StepResult> =
  | { ok: true; result: R }
  | { ok: false; error: unknown };

/** Build a successful outcome. */
export function succeed<R extends StepResult>(result: R): StepOutcome<R> {
  return { ok: true, result };
}

/** Build a failed outcome. */
export function fail(error: unknown): StepOutcome<never> {
  return { ok: false, error };
}

/** Arguments passed to a step's unit of work. */
export interface StepInvocation<TAgent = unknown> {
  stepName: string;
  /** The flow input; identical for every step of one execution. */
  input: Readonly<Record<string, unknown>>;
  context: ContextView;
  /** Capability handle registered with the step, forwarded untouched. */
  agent: TAgent | undefined;
  /** Aborted when the flow deadline fires or the caller cancels. */
  signal: AbortSignal;
  /** 1-based attempt number under the step's retry policy. */
  attempt: number;
  logger: Logger;
}

/** Arguments passed to a step's recovery handler. */
export interface RecoveryInvocation<TAgent = unknown> {
  stepName: string;
  /** Typed view of the failure. */
  error: TypedError;
  /** The raw value the unit of work failed with. */
  cause: unknown;
  input: Readonly<Record<string, unknown>>;
  context: ContextView;
  agent: TAgent | undefined;
  signal: AbortSignal;
  logger: Logger;
}

export type UnitOfWork<TAgent = unknown> = (
  invocation: StepInvocation<TAgent>,
) => StepOutcome | Promise<StepOutcome>;

export type RecoveryHandler<TAgent = unknown> = (
  invocation: RecoveryInvocation<TAgent>,
) => StepOutcome | Promise<StepOutcome>;

/** Retry and timeout policy for a single step. */
export interface StepPolicy {
  /** Total attempts including the first. Default 1. */
  maxAttempts?: number;
  /** Per-attempt timeout. No timeout when omitted. */
  timeoutMs?: number;
  backoffStrategy?: 'fixed' | 'exponential';
  /** Default 100. */
  backoffBaseMs?: number;
}

/** A step as registered with a flow. */
export interface StepDefinition<TAgent = unknown> {
  name: string;
  run: UnitOfWork<TAgent>;
  /** Names of steps that must complete (or recover) first. */
  requires?: readonly string[];
  agent?: TAgent;
  onError?: RecoveryHandler<TAgent>;
  policy?: StepPolicy;
  /** Display text for exports. */
  description?: string;
}

/** Name and dependencies of a registered step, for diagnostics. */
export interface StepSummary {
  name: string;
  requires: readonly string[];
}
