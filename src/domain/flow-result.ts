/**
 * Flow execution domain model.
 *
 * Per-step status, the legal transitions between statuses, and the
 * read-only result an execution produces.
 */

import { TypedError } from './errors';
import { StepResult } from './step';

/** Step-level execution states. */
export enum StepStatus {
  Pending = 'pending',
  Ready = 'ready',
  Running = 'running',
  Completed = 'completed',
  Failed = 'failed',
  Recovered = 'recovered',
  Skipped = 'skipped',
}

/** Valid state transitions for steps. */
export const VALID_STEP_TRANSITIONS: Record<StepStatus, StepStatus[]> = {
  [StepStatus.Pending]: [StepStatus.Ready, StepStatus.Skipped],
  // Ready -> Skipped only when the flow deadline fires before dispatch.
  [StepStatus.Ready]: [StepStatus.Running, StepStatus.Skipped],
  [StepStatus.Running]: [StepStatus.Completed, StepStatus.Failed, StepStatus.Recovered],
  [StepStatus.Completed]: [],
  [StepStatus.Failed]: [],
  [StepStatus.Recovered]: [],
  [StepStatus.Skipped]: [],
};

/** Why a step was skipped without running. */
export type SkipReason =
  | { kind: 'dependency-failure'; causes: string[] }
  | { kind: 'timeout'; deadlineMs?: number };

/** Execution record for a single step. */
export interface StepRecord {
  name: string;
  status: StepStatus;
  /** Attempts made under the step's retry policy. */
  attempts: number;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  /** The failure that ended the step (or that the handler recovered from). */
  error?: TypedError;
  skipReason?: SkipReason;
  /** Typed view of the skip, for uniform reporting. */
  skipError?: TypedError;
}

/** One observed failure, in the order failures happened. */
export interface FailureRecord {
  stepName: string;
  /** Whether the unit of work or its recovery handler failed. */
  phase: 'step' | 'handler';
  error: TypedError;
  /** The raw failure value. */
  cause: unknown;
  /** True when a recovery handler turned this failure into a result. */
  recovered: boolean;
  /** Attempts made before giving up; always 1 for a handler. */
  attempts: number;
}

/** Overall outcome, derived from step statuses. */
export type FlowOutcome = 'succeeded' | 'partial' | 'failed';

/** Read-only snapshot of one flow execution. */
export interface FlowResult {
  executionId: string;
  flowName: string;
  outcome: FlowOutcome;
  /** True when the deadline fired or the caller canceled. */
  timedOut: boolean;
  context: Readonly<Record<string, Readonly<StepResult>>>;
  statuses: Readonly<Record<string, StepStatus>>;
  steps: Readonly<Record<string, StepRecord>>;
  failures: readonly FailureRecord[];
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

/** Count of steps per status. */
export type FlowSummary = Record<StepStatus, number>;

/**
 * Derive the flow outcome from terminal step statuses.
 *
 * - succeeded: every step completed (recovered counts as a success path)
 * - failed: no step completed or recovered
 * - partial: anything in between
 */
export function deriveOutcome(statuses: Iterable<StepStatus>): FlowOutcome {
  let successes = 0;
  let total = 0;
  for (const status of statuses) {
    total++;
    if (status === StepStatus.Completed || status === StepStatus.Recovered) successes++;
  }
  if (successes === total) return 'succeeded';
  if (successes === 0) return 'failed';
  return 'partial';
}

/** Count steps per status. */
export function summarizeFlowResult(result: FlowResult): FlowSummary {
  const summary: FlowSummary = {
    [StepStatus.Pending]: 0,
    [StepStatus.Ready]: 0,
    [StepStatus.Running]: 0,
    [StepStatus.Completed]: 0,
    [StepStatus.Failed]: 0,
    [StepStatus.Recovered]: 0,
    [StepStatus.Skipped]: 0,
  };
  for (const status of Object.values(result.statuses)) {
    summary[status]++;
  }
  return summary;
}
