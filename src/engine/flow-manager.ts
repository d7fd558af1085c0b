/**
 * FlowManager: the public surface of the engine.
 *
 * ```ts
 * const flow = new FlowManager('blog');
 * flow
 *   .addStep({ name: 'research', run: async ({ input }) => succeed({ notes: await search(input.topic) }) })
 *   .addStep({ name: 'write', requires: ['research'], run: async ({ context }) => succeed({ draft: '...' }) });
 *
 * const result = await flow.execute({ topic: 'compilers' });
 * result.statuses.write; // 'completed' | 'failed' | 'recovered' | 'skipped'
 * ```
 *
 * `execute` throws only FlowValidationError, and only before any step runs.
 * Every step-level failure is reported on the returned FlowResult.
 */

import {
  ExecutorOptions,
  createExecutorOptions,
  validateExecutorOptions,
} from '../config';
import { FlowResult } from '../domain/flow-result';
import { StepDefinition, StepSummary } from '../domain/step';
import { FlowValidationError, invalidConfigError } from '../domain/errors';
import { GraphBuildResult, buildDependencyGraph } from './dependency-graph';
import { Scheduler } from './scheduler';
import { StepRegistry } from './step-registry';

export class FlowManager<TAgent = unknown> {
  private readonly registry = new StepRegistry<TAgent>();
  private readonly options: ExecutorOptions;

  constructor(
    readonly name: string = 'flow',
    options?: Partial<ExecutorOptions>,
  ) {
    this.options = resolveOptions(options);
  }

  /** Register a step. Throws FlowValidationError if the name is taken. */
  addStep(step: StepDefinition<TAgent>): this {
    this.registry.add(step);
    return this;
  }

  /** Check the graph without running anything. */
  validate(): GraphBuildResult<TAgent> {
    return buildDependencyGraph(this.registry.list());
  }

  /**
   * Run every step. `overrides` replace this flow's options for one call.
   * Throws FlowValidationError for an unknown dependency, a cycle, or
   * invalid options; otherwise always resolves with a FlowResult.
   */
  async execute(
    input: Record<string, unknown> = {},
    overrides?: Partial<ExecutorOptions>,
  ): Promise<FlowResult> {
    const options = overrides ? resolveOptions({ ...this.options, ...overrides }) : this.options;

    const build = this.validate();
    if (!build.success || !build.graph) {
      options.logger.warn('Flow validation failed', {
        flow: this.name,
        codes: build.errors.map((e) => e.code),
      });
      throw new FlowValidationError(build.errors);
    }

    return new Scheduler(options).execute(this.name, build.graph, input);
  }

  /** Registered steps in insertion order, with their dependencies. */
  listSteps(): StepSummary[] {
    return this.registry.summaries();
  }

  getStep(name: string): StepDefinition<TAgent> | undefined {
    return this.registry.get(name);
  }

  /** Registered step definitions in insertion order. */
  steps(): StepDefinition<TAgent>[] {
    return this.registry.list();
  }

  get size(): number {
    return this.registry.size;
  }
}

function resolveOptions(overrides?: Partial<ExecutorOptions>): ExecutorOptions {
  const options = createExecutorOptions(overrides);
  const validation = validateExecutorOptions(options);
  if (!validation.valid) {
    throw new FlowValidationError([invalidConfigError(validation.errors)]);
  }
  return options;
}
