/**
 * Flow lifecycle observation.
 *
 * Observers are injected into the scheduler and notified as steps move
 * through their lifecycle. Every callback is optional.
 */

import { TypedError } from './errors';
import { FlowResult, SkipReason } from './flow-result';
import { StepResult } from './step';

/** Fields shared by every lifecycle event. */
export interface FlowEventBase {
  executionId: string;
  flowName: string;
  timestamp: string;
}

export interface FlowStartEvent extends FlowEventBase {
  stepNames: string[];
}

export interface StepStartEvent extends FlowEventBase {
  stepName: string;
}

export interface StepCompleteEvent extends FlowEventBase {
  stepName: string;
  result: Readonly<StepResult>;
  attempts: number;
  durationMs: number;
}

export interface StepFailedEvent extends FlowEventBase {
  stepName: string;
  error: TypedError;
  phase: 'step' | 'handler';
  /** Whether a recovery handler will be consulted next. */
  willRecover: boolean;
}

export interface StepRecoveredEvent extends FlowEventBase {
  stepName: string;
  result: Readonly<StepResult>;
  error: TypedError;
}

export interface StepSkippedEvent extends FlowEventBase {
  stepName: string;
  reason: SkipReason;
}

export interface FlowCompleteEvent extends FlowEventBase {
  result: FlowResult;
}

/** Lifecycle observer. */
export interface FlowObserver {
  onFlowStart?(event: FlowStartEvent): void;
  onStepStart?(event: StepStartEvent): void;
  onStepComplete?(event: StepCompleteEvent): void;
  onStepFailed?(event: StepFailedEvent): void;
  onStepRecovered?(event: StepRecoveredEvent): void;
  onStepSkipped?(event: StepSkippedEvent): void;
  onFlowComplete?(event: FlowCompleteEvent): void;
}
