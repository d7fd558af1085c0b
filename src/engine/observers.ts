/**
 * Observer dispatch.
 *
 * Observation must not affect the outcome of a flow: an observer that throws
 * is logged and otherwise ignored.
 */

import { FlowObserver } from '../domain/events';
import { describeError } from '../domain/errors';
import { Logger } from '../logger';

/** Fans one event out to several observers. */
export class ObserverHub {
  constructor(
    private readonly observers: readonly FlowObserver[],
    private readonly logger: Logger,
  ) {}

  /** Call `dispatch` once per observer; `hook` names the callback for logging. */
  emit(hook: keyof FlowObserver, dispatch: (observer: FlowObserver) => void): void {
    for (const observer of this.observers) {
      try {
        dispatch(observer);
      } catch (err) {
        this.logger.warn('Flow observer threw', { hook, error: describeError(err) });
      }
    }
  }
}

/** Observer that writes lifecycle events to a logger. */
export function createLoggingObserver(log: Logger): FlowObserver {
  return {
    onFlowStart(event) {
      log.info('flow.started', {
        executionId: event.executionId,
        flow: event.flowName,
        steps: event.stepNames.length,
      });
    },
    onStepStart(event) {
      log.debug('step.started', { executionId: event.executionId, flow: event.flowName, step: event.stepName });
    },
    onStepComplete(event) {
      log.info('step.completed', {
        executionId: event.executionId,
        flow: event.flowName,
        step: event.stepName,
        attempts: event.attempts,
        durationMs: event.durationMs,
      });
    },
    onStepFailed(event) {
      const fields = {
        executionId: event.executionId,
        flow: event.flowName,
        step: event.stepName,
        phase: event.phase,
        code: event.error.code,
        error: event.error.message,
      };
      if (event.willRecover) {
        log.warn('step.failed', fields);
      } else {
        log.error('step.failed', fields);
      }
    },
    onStepRecovered(event) {
      log.warn('step.recovered', {
        executionId: event.executionId,
        flow: event.flowName,
        step: event.stepName,
        code: event.error.code,
      });
    },
    onStepSkipped(event) {
      log.warn('step.skipped', {
        executionId: event.executionId,
        flow: event.flowName,
        step: event.stepName,
        reason: event.reason.kind,
        causes: event.reason.kind === 'dependency-failure' ? event.reason.causes : undefined,
      });
    },
    onFlowComplete(event) {
      log.info('flow.completed', {
        executionId: event.executionId,
        flow: event.flowName,
        outcome: event.result.outcome,
        timedOut: event.result.timedOut,
        failures: event.result.failures.length,
        durationMs: event.result.durationMs,
      });
    },
  };
}
