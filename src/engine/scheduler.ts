/**
 * Scheduler: drives one flow execution over a validated dependency graph.
 *
 * Ready steps are launched as independent promises, up to the configured
 * concurrency. Each launched step settles into exactly one completion event
 * on a queue, and the scheduler drains that queue one event at a time.
 * Handling an event (write the context entry, update statuses, count down
 * dependents, enqueue the newly ready) is synchronous, which makes it the
 * single critical section of the engine: no step can observe a half-written
 * entry or a dependent marked ready before its dependency's result exists.
 *
 * Step failures never escape this class. Only ContextStoreError and
 * SchedulerError do, and both mean the scheduler broke its own invariants.
 */

import { v4 as uuid } from 'uuid';
import { ExecutorOptions } from '../config';
import { FlowEventBase, FlowObserver } from '../domain/events';
import {
  FailureRecord,
  FlowResult,
  SkipReason,
  StepRecord,
  StepStatus,
  deriveOutcome,
} from '../domain/flow-result';
import { ContextView } from '../domain/step';
import {
  FlowValidationError,
  SchedulerError,
  TypedError,
  createTypedError,
  dependencySkippedError,
  describeError,
  invalidInputError,
  stepExecutionError,
  timeoutSkippedError,
} from '../domain/errors';
import { Logger } from '../logger';
import { ContextStore, deepCopy, deepFreeze } from './context-store';
import { DependencyGraph, GraphNode, collectTransitiveDependents } from './dependency-graph';
import { ObserverHub, createLoggingObserver } from './observers';
import { transitionStepStatus } from './state-machine';
import { StepRunContext, StepRunOutcome, runRecovery, runStep } from './step-runner';

type Failure = Extract<StepRunOutcome, { ok: false }>;

/** What a launched step reports back when it settles. */
interface StepSettledEvent {
  kind: 'settled';
  name: string;
  /** Outcome of the unit of work. */
  primary: StepRunOutcome;
  /** Outcome of the recovery handler, when one ran. */
  recovery?: StepRunOutcome;
  finishedAt: number;
}

/** The deadline fired or the caller's signal aborted. */
interface AbortEvent {
  kind: 'abort';
  cause: 'deadline' | 'canceled';
}

type SchedulerEvent = StepSettledEvent | AbortEvent;

export class Scheduler {
  constructor(private readonly options: ExecutorOptions) {}

  /** Run every step in the graph. Resolves once nothing is running or ready. */
  async execute<TAgent>(
    flowName: string,
    graph: DependencyGraph<TAgent>,
    input: Readonly<Record<string, unknown>>,
  ): Promise<FlowResult> {
    const execution = new FlowExecution(flowName, graph, copyInput(input), this.options);
    return execution.run();
  }
}

/** Mutable state of a single execution. Never shared between executions. */
class FlowExecution<TAgent> {
  readonly executionId = `exec_${uuid()}`;
  private readonly log: Logger;
  private readonly observers: ObserverHub;
  private readonly store = new ContextStore();
  private readonly controller = new AbortController();

  private readonly records = new Map<string, StepRecord>();
  private readonly unmet = new Map<string, number>();
  private readonly startTimes = new Map<string, number>();
  private readonly failures: FailureRecord[] = [];
  private readonly readyQueue: string[] = [];
  private running = 0;
  private stopped = false;
  private timedOut = false;

  private readonly events: SchedulerEvent[] = [];
  private waiter: ((event: SchedulerEvent) => void) | undefined;

  constructor(
    private readonly flowName: string,
    private readonly graph: DependencyGraph<TAgent>,
    private readonly input: Readonly<Record<string, unknown>>,
    private readonly options: ExecutorOptions,
  ) {
    this.log = options.logger.child({ executionId: this.executionId, flow: flowName });
    const observers: FlowObserver[] = options.logEvents ? [createLoggingObserver(options.logger)] : [];
    this.observers = new ObserverHub([...observers, ...options.observers], this.log);

    for (const node of graph.nodes.values()) {
      this.records.set(node.name, { name: node.name, status: StepStatus.Pending, attempts: 0 });
      this.unmet.set(node.name, node.dependencyCount);
    }
  }

  async run(): Promise<FlowResult> {
    const startedAtMs = Date.now();
    const startedAt = new Date(startedAtMs).toISOString();

    this.observers.emit('onFlowStart', (o) => o.onFlowStart?.({
      ...this.eventBase(),
      stepNames: [...this.graph.nodes.keys()],
    }));

    const detach = this.attachAbortSources();
    try {
      for (const root of this.graph.roots) {
        this.markReady(root);
      }

      for (;;) {
        this.dispatch();
        if (this.running === 0 && this.readyQueue.length === 0) break;
        const event = await this.nextEvent();
        if (event.kind === 'abort') {
          this.handleAbort(event.cause);
        } else {
          this.running--;
          this.handleSettled(event);
        }
      }
    } finally {
      detach();
    }

    const completedAtMs = Date.now();
    const result = this.buildResult(startedAt, startedAtMs, completedAtMs);
    this.observers.emit('onFlowComplete', (o) => o.onFlowComplete?.({ ...this.eventBase(), result }));
    return result;
  }

  // --- event queue ---

  private push(event: SchedulerEvent): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(event);
    } else {
      this.events.push(event);
    }
  }

  private nextEvent(): Promise<SchedulerEvent> {
    const queued = this.events.shift();
    if (queued) return Promise.resolve(queued);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Wire the deadline timer and the caller's signal. Returns the cleanup. */
  private attachAbortSources(): () => void {
    const { deadlineMs, signal } = this.options;

    if (signal?.aborted) {
      this.handleAbort('canceled');
    }

    const timer = deadlineMs !== undefined
      ? setTimeout(() => this.push({ kind: 'abort', cause: 'deadline' }), deadlineMs)
      : undefined;
    const onAbort = () => this.push({ kind: 'abort', cause: 'canceled' });
    signal?.addEventListener('abort', onAbort, { once: true });

    return () => {
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
  }

  // --- dispatch ---

  private dispatch(): void {
    while (!this.stopped && this.running < this.options.concurrency && this.readyQueue.length > 0) {
      const name = this.readyQueue.shift();
      if (name === undefined) break;
      this.launch(this.node(name));
    }
  }

  private launch(node: GraphNode<TAgent>): void {
    const record = this.record(node.name);
    this.transition(record, StepStatus.Running);
    const startMs = Date.now();
    this.startTimes.set(node.name, startMs);
    record.startedAt = new Date(startMs).toISOString();
    this.running++;

    this.observers.emit('onStepStart', (o) => o.onStepStart?.({ ...this.eventBase(), stepName: node.name }));

    const ctx: StepRunContext<TAgent> = {
      input: this.input,
      context: this.contextFor(node),
      signal: this.controller.signal,
      logger: this.log.child({ step: node.name }),
      agent: node.step.agent,
    };

    void this.execute(node, ctx)
      .catch((err: unknown): StepSettledEvent => ({
        kind: 'settled',
        name: node.name,
        primary: { ok: false, error: stepExecutionError(node.name, err, 1, 1), cause: err, attempts: 1 },
        finishedAt: Date.now(),
      }))
      .then((event) => this.push(event));
  }

  /** Run the unit of work and, if it fails, its recovery handler. */
  private async execute(node: GraphNode<TAgent>, ctx: StepRunContext<TAgent>): Promise<StepSettledEvent> {
    const primary = await runStep(node.step, ctx);
    if (primary.ok) {
      return { kind: 'settled', name: node.name, primary, finishedAt: Date.now() };
    }

    const willRecover = node.step.onError !== undefined;
    this.observers.emit('onStepFailed', (o) => o.onStepFailed?.({
      ...this.eventBase(),
      stepName: node.name,
      error: primary.error,
      phase: 'step',
      willRecover,
    }));
    if (!willRecover) {
      return { kind: 'settled', name: node.name, primary, finishedAt: Date.now() };
    }

    // The handler sees the context as it is now, through the step's own view.
    const recovery = await runRecovery(node.step, primary, { ...ctx, context: this.contextFor(node) });
    return { kind: 'settled', name: node.name, primary, recovery, finishedAt: Date.now() };
  }

  // --- completion handling (the critical section) ---

  private handleSettled(event: StepSettledEvent): void {
    const node = this.node(event.name);
    const record = this.record(event.name);
    const startMs = this.startTimes.get(event.name) ?? event.finishedAt;
    record.completedAt = new Date(event.finishedAt).toISOString();
    record.durationMs = event.finishedAt - startMs;
    record.attempts = event.primary.attempts;

    const { primary, recovery } = event;

    if (primary.ok) {
      const stored = this.store.set(node.name, primary.result);
      this.transition(record, StepStatus.Completed);
      this.observers.emit('onStepComplete', (o) => o.onStepComplete?.({
        ...this.eventBase(),
        stepName: node.name,
        result: stored,
        attempts: record.attempts,
        durationMs: record.durationMs ?? 0,
      }));
      this.release(node);
      return;
    }

    record.error = primary.error;

    if (recovery?.ok) {
      this.failures.push(this.failureRecord(node.name, 'step', primary, true));
      const stored = this.store.set(node.name, recovery.result);
      this.transition(record, StepStatus.Recovered);
      this.observers.emit('onStepRecovered', (o) => o.onStepRecovered?.({
        ...this.eventBase(),
        stepName: node.name,
        result: stored,
        error: primary.error,
      }));
      this.release(node);
      return;
    }

    this.failures.push(this.failureRecord(node.name, 'step', primary, false));
    if (recovery && !recovery.ok) {
      this.failures.push(this.failureRecord(node.name, 'handler', recovery, false));
      this.observers.emit('onStepFailed', (o) => o.onStepFailed?.({
        ...this.eventBase(),
        stepName: node.name,
        error: recovery.error,
        phase: 'handler',
        willRecover: false,
      }));
    }
    this.transition(record, StepStatus.Failed);
    this.cascadeSkip(node.name);
  }

  /** Count down each dependent; enqueue those with nothing left to wait for. */
  private release(node: GraphNode<TAgent>): void {
    for (const dependent of node.dependents) {
      const remaining = (this.unmet.get(dependent) ?? 0) - 1;
      this.unmet.set(dependent, remaining);
      if (remaining === 0 && this.record(dependent).status === StepStatus.Pending) {
        this.markReady(dependent);
      }
    }
  }

  private markReady(name: string): void {
    if (this.stopped) return;
    this.transition(this.record(name), StepStatus.Ready);
    this.readyQueue.push(name);
  }

  /** Skip every transitive dependent of a failed step without running it. */
  private cascadeSkip(failed: string): void {
    for (const name of collectTransitiveDependents(this.graph, failed)) {
      const record = this.record(name);
      const reason = record.skipReason;

      if (reason?.kind === 'dependency-failure') {
        // Already skipped by another failure: attribute this one too.
        if (!reason.causes.includes(failed)) {
          const causes = [...reason.causes, failed];
          record.skipReason = { kind: 'dependency-failure', causes };
          record.skipError = dependencySkippedError(name, causes);
        }
        continue;
      }
      if (record.status !== StepStatus.Pending) continue;

      this.skip(record, { kind: 'dependency-failure', causes: [failed] });
    }
  }

  /** Stop launching; skip everything not yet started. Running steps finish. */
  private handleAbort(cause: 'deadline' | 'canceled'): void {
    if (this.stopped) return;
    this.stopped = true;
    this.timedOut = true;
    this.controller.abort(cause);
    this.log.warn('Flow stopped before completion', { cause, running: this.running });

    const deadlineMs = cause === 'deadline' ? this.options.deadlineMs : undefined;
    this.readyQueue.length = 0;
    for (const record of this.records.values()) {
      if (record.status === StepStatus.Pending || record.status === StepStatus.Ready) {
        this.skip(record, { kind: 'timeout', deadlineMs });
      }
    }
  }

  private skip(record: StepRecord, reason: SkipReason): void {
    this.transition(record, StepStatus.Skipped);
    record.skipReason = reason;
    record.skipError = reason.kind === 'dependency-failure'
      ? dependencySkippedError(record.name, reason.causes)
      : timeoutSkippedError(record.name, reason.deadlineMs);
    this.observers.emit('onStepSkipped', (o) => o.onStepSkipped?.({
      ...this.eventBase(),
      stepName: record.name,
      reason,
    }));
  }

  // --- helpers ---

  private transition(record: StepRecord, target: StepStatus): void {
    const result = transitionStepStatus(record.status, target, record.name);
    if (!result.success) {
      throw new SchedulerError(result.error ?? createTypedError({
        code: 'SYSTEM.INVALID_TRANSITION',
        message: `Invalid state transition for step "${record.name}": ${record.status} -> ${target}`,
        stepName: record.name,
      }));
    }
    record.status = target;
  }

  private contextFor(node: GraphNode<TAgent>): ContextView {
    return this.options.contextView === 'all'
      ? this.store.snapshot()
      : this.store.snapshot(node.dependencies);
  }

  private failureRecord(
    stepName: string,
    phase: 'step' | 'handler',
    failure: Failure,
    recovered: boolean,
  ): FailureRecord {
    return { stepName, phase, error: failure.error, cause: failure.cause, recovered, attempts: failure.attempts };
  }

  private node(name: string): GraphNode<TAgent> {
    const node = this.graph.nodes.get(name);
    if (!node) throw new SchedulerError(unknownStep(name));
    return node;
  }

  private record(name: string): StepRecord {
    const record = this.records.get(name);
    if (!record) throw new SchedulerError(unknownStep(name));
    return record;
  }

  private eventBase(): FlowEventBase {
    return { executionId: this.executionId, flowName: this.flowName, timestamp: new Date().toISOString() };
  }

  /**
   * Assemble the frozen result. Engine-built values are frozen throughout;
   * the raw `cause` of each failure is the caller's value and is left as is.
   */
  private buildResult(startedAt: string, startedAtMs: number, completedAtMs: number): FlowResult {
    const statuses: Record<string, StepStatus> = {};
    const steps: Record<string, StepRecord> = {};
    for (const [name, record] of this.records) {
      statuses[name] = record.status;
      steps[name] = deepFreeze({ ...record });
    }

    return Object.freeze({
      executionId: this.executionId,
      flowName: this.flowName,
      outcome: deriveOutcome(Object.values(statuses)),
      timedOut: this.timedOut,
      context: this.store.toObject(),
      statuses: Object.freeze(statuses),
      steps: Object.freeze(steps),
      failures: Object.freeze(this.failures.map((f) => Object.freeze({ ...f, error: deepFreeze(f.error) }))),
      startedAt,
      completedAt: new Date(completedAtMs).toISOString(),
      durationMs: completedAtMs - startedAtMs,
    });
  }
}

/** Copy and freeze the flow input once per execution. */
function copyInput(input: Readonly<Record<string, unknown>>): Readonly<Record<string, unknown>> {
  try {
    return deepFreeze(deepCopy(input));
  } catch (err) {
    throw new FlowValidationError([invalidInputError(describeError(err))]);
  }
}

function unknownStep(name: string): TypedError {
  return createTypedError({
    code: 'SYSTEM.UNKNOWN_STEP',
    message: `Scheduler referenced unknown step "${name}"`,
    stepName: name,
  });
}
