import {
  transitionStepStatus,
  isTerminalStepStatus,
  isSuccessfulStepStatus,
} from '../../src/engine/state-machine';
import { StepStatus } from '../../src/domain/flow-result';

describe('Step State Machine', () => {
  test('valid transition: pending -> ready', () => {
    const result = transitionStepStatus(StepStatus.Pending, StepStatus.Ready);
    expect(result.success).toBe(true);
    expect(result.newStatus).toBe(StepStatus.Ready);
  });

  test('valid transition: pending -> skipped', () => {
    expect(transitionStepStatus(StepStatus.Pending, StepStatus.Skipped).success).toBe(true);
  });

  test('valid transition: ready -> running', () => {
    expect(transitionStepStatus(StepStatus.Ready, StepStatus.Running).success).toBe(true);
  });

  test('valid transition: ready -> skipped', () => {
    expect(transitionStepStatus(StepStatus.Ready, StepStatus.Skipped).success).toBe(true);
  });

  test.each([StepStatus.Completed, StepStatus.Failed, StepStatus.Recovered])(
    'valid transition: running -> %s',
    (target) => {
      expect(transitionStepStatus(StepStatus.Running, target).success).toBe(true);
    },
  );

  test('invalid transition: pending -> running', () => {
    const result = transitionStepStatus(StepStatus.Pending, StepStatus.Running, 'fetch');
    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('SYSTEM.INVALID_TRANSITION');
    expect(result.error?.message).toBe('Invalid state transition for step "fetch": pending -> running');
    expect(result.error?.stepName).toBe('fetch');
  });

  test('invalid transition without a step name', () => {
    const result = transitionStepStatus(StepStatus.Running, StepStatus.Skipped);
    expect(result.error?.message).toBe('Invalid step state transition: running -> skipped');
  });

  test('terminal states have no outgoing transitions', () => {
    for (const terminal of [StepStatus.Completed, StepStatus.Failed, StepStatus.Recovered, StepStatus.Skipped]) {
      expect(transitionStepStatus(terminal, StepStatus.Ready).success).toBe(false);
      expect(transitionStepStatus(terminal, StepStatus.Running).success).toBe(false);
    }
  });

  test('terminal status detection', () => {
    expect(isTerminalStepStatus(StepStatus.Completed)).toBe(true);
    expect(isTerminalStepStatus(StepStatus.Failed)).toBe(true);
    expect(isTerminalStepStatus(StepStatus.Recovered)).toBe(true);
    expect(isTerminalStepStatus(StepStatus.Skipped)).toBe(true);
    expect(isTerminalStepStatus(StepStatus.Pending)).toBe(false);
    expect(isTerminalStepStatus(StepStatus.Ready)).toBe(false);
    expect(isTerminalStepStatus(StepStatus.Running)).toBe(false);
  });

  test('only completed and recovered steps feed their dependents', () => {
    expect(isSuccessfulStepStatus(StepStatus.Completed)).toBe(true);
    expect(isSuccessfulStepStatus(StepStatus.Recovered)).toBe(true);
    expect(isSuccessfulStepStatus(StepStatus.Failed)).toBe(false);
    expect(isSuccessfulStepStatus(StepStatus.Skipped)).toBe(false);
  });
});
