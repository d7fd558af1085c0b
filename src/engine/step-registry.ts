/**
 * Step registry: the ordered collection of steps added to a flow.
 */

import { StepDefinition, StepSummary } from '../domain/step';
import { FlowValidationError, duplicateStepError, invalidStepError } from '../domain/errors';
import { validateStepPolicy } from './step-runner';

export class StepRegistry<TAgent = unknown> {
  private steps = new Map<string, StepDefinition<TAgent>>();

  /**
   * Register a step. Insertion order is kept for display and tie-breaking.
   * Throws FlowValidationError on a duplicate or malformed step.
   */
  add(step: StepDefinition<TAgent>): void {
    if (typeof step.name !== 'string' || step.name.trim().length === 0) {
      throw new FlowValidationError([invalidStepError(String(step.name), 'name must be a non-empty string')]);
    }
    if (typeof step.run !== 'function') {
      throw new FlowValidationError([invalidStepError(step.name, '"run" must be a function')]);
    }
    if (step.requires !== undefined && !Array.isArray(step.requires)) {
      throw new FlowValidationError([invalidStepError(step.name, '"requires" must be an array of step names')]);
    }
    if (step.policy !== undefined) {
      const problems = typeof step.policy === 'object' && step.policy !== null
        ? validateStepPolicy(step.policy)
        : ['"policy" must be an object'];
      if (problems.length > 0) {
        throw new FlowValidationError(problems.map((problem) => invalidStepError(step.name, problem)));
      }
    }
    if (this.steps.has(step.name)) {
      throw new FlowValidationError([duplicateStepError(step.name)]);
    }
    this.steps.set(step.name, { ...step, requires: [...(step.requires ?? [])] });
  }

  get(name: string): StepDefinition<TAgent> | undefined {
    return this.steps.get(name);
  }

  has(name: string): boolean {
    return this.steps.has(name);
  }

  get size(): number {
    return this.steps.size;
  }

  /** Registered steps in insertion order. */
  list(): StepDefinition<TAgent>[] {
    return [...this.steps.values()];
  }

  summaries(): StepSummary[] {
    return this.list().map((s) => ({ name: s.name, requires: [...(s.requires ?? [])] }));
  }
}
