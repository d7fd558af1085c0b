/**
 * Step state machine.
 *
 * Enforces valid step status transitions, producing typed errors on
 * invalid ones.
 */

import { StepStatus, VALID_STEP_TRANSITIONS } from '../domain/flow-result';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a step state transition. */
export function transitionStepStatus(
  current: StepStatus,
  target: StepStatus,
  stepName?: string,
): TransitionResult<StepStatus> {
  const validTargets = VALID_STEP_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'SYSTEM.INVALID_TRANSITION',
        message: stepName
          ? `Invalid state transition for step "${stepName}": ${current} -> ${target}`
          : `Invalid step state transition: ${current} -> ${target}`,
        stepName,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a step status is terminal. */
export function isTerminalStepStatus(status: StepStatus): boolean {
  return (
    status === StepStatus.Completed ||
    status === StepStatus.Failed ||
    status === StepStatus.Recovered ||
    status === StepStatus.Skipped
  );
}

/** Check if a step finished with a result its dependents can consume. */
export function isSuccessfulStepStatus(status: StepStatus): boolean {
  return status === StepStatus.Completed || status === StepStatus.Recovered;
}
