import { FlowManager } from '../../src/engine/flow-manager';
import { FlowValidationError } from '../../src/domain/errors';
import { StepDefinition, succeed } from '../../src/domain/step';
import { captureLogs } from '../helpers';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('FlowManager', () => {
  const logs = captureLogs();

  test('registers steps in insertion order', () => {
    const flow = new FlowManager('ordered')
      .addStep({ name: 'fetch', run: () => succeed({}) })
      .addStep({ name: 'parse', requires: ['fetch'], run: () => succeed({}), description: 'Parse rows' });

    expect(flow.name).toBe('ordered');
    expect(flow.size).toBe(2);
    expect(flow.listSteps()).toEqual([
      { name: 'fetch', requires: [] },
      { name: 'parse', requires: ['fetch'] },
    ]);
    expect(flow.getStep('parse')?.description).toBe('Parse rows');
    expect(flow.getStep('missing')).toBeUndefined();
    expect(flow.steps().map((s) => s.name)).toEqual(['fetch', 'parse']);
  });

  test('defaults the flow name', () => {
    expect(new FlowManager().name).toBe('flow');
  });

  test('rejects a duplicate step name at registration', () => {
    const flow = new FlowManager().addStep({ name: 'a', run: () => succeed({}) });
    const err = thrownBy(() => flow.addStep({ name: 'a', run: () => succeed({}) }));

    expect(err).toBeInstanceOf(FlowValidationError);
    if (err instanceof FlowValidationError) {
      expect(err.typedError.code).toBe('VALIDATION.DUPLICATE_STEP');
      expect(err.message).toBe('Step "a" is already registered in this flow');
    }
    expect(flow.size).toBe(1);
  });

  test('rejects an empty step name', () => {
    const err = thrownBy(() => new FlowManager().addStep({ name: '  ', run: () => succeed({}) }));
    expect(err).toBeInstanceOf(FlowValidationError);
    if (err instanceof FlowValidationError) {
      expect(err.typedError.code).toBe('VALIDATION.INVALID_STEP');
      expect(err.message).toBe('Step "  ": name must be a non-empty string');
    }
  });

  test('rejects a step whose maxAttempts is not a positive integer', () => {
    let calls = 0;
    const flow = new FlowManager();
    for (const maxAttempts of [NaN, Infinity, 0, 1.5]) {
      const err = thrownBy(() =>
        flow.addStep({ name: 'retry', policy: { maxAttempts }, run: () => { calls++; return succeed({}); } }),
      );
      expect(err).toBeInstanceOf(FlowValidationError);
      if (err instanceof FlowValidationError) {
        expect(err.typedError.code).toBe('VALIDATION.INVALID_STEP');
        expect(err.message).toBe(
          `Step "retry": "policy.maxAttempts" must be a positive integer, got ${String(maxAttempts)}`,
        );
      }
    }
    expect(flow.size).toBe(0);
    expect(calls).toBe(0);
  });

  test('rejects negative or non-finite timing in a step policy', () => {
    const err = thrownBy(() =>
      new FlowManager().addStep({
        name: 'slow',
        policy: { timeoutMs: -1, backoffBaseMs: NaN },
        run: () => succeed({}),
      }),
    );
    expect(err).toBeInstanceOf(FlowValidationError);
    if (err instanceof FlowValidationError) {
      expect(err.errors.map((e) => e.message)).toEqual([
        'Step "slow": "policy.timeoutMs" must be a finite number >= 0, got -1',
        'Step "slow": "policy.backoffBaseMs" must be a finite number >= 0, got NaN',
      ]);
    }
  });

  test('accepts a zero timeout and backoff', () => {
    const flow = new FlowManager().addStep({
      name: 'quick',
      policy: { maxAttempts: 2, timeoutMs: 0, backoffBaseMs: 0 },
      run: () => succeed({}),
    });
    expect(flow.size).toBe(1);
  });

  test('copies the requires list so later edits do not change the flow', () => {
    const requires = ['a'];
    const step: StepDefinition = { name: 'b', requires, run: () => succeed({}) };
    const flow = new FlowManager()
      .addStep({ name: 'a', run: () => succeed({}) })
      .addStep(step);

    requires.push('ghost');
    expect(flow.listSteps()[1].requires).toEqual(['a']);
    expect(flow.validate().success).toBe(true);
  });

  test('validate reports graph errors without running anything', () => {
    let calls = 0;
    const flow = new FlowManager()
      .addStep({ name: 'a', requires: ['b'], run: () => { calls++; return succeed({}); } })
      .addStep({ name: 'b', requires: ['a'], run: () => { calls++; return succeed({}); } });

    const first = flow.validate();
    const second = flow.validate();

    expect(first.success).toBe(false);
    expect(first.errors.map((e) => e.code)).toEqual(['VALIDATION.DEPENDENCY_CYCLE']);
    expect(second.errors).toEqual(first.errors);
    expect(calls).toBe(0);
  });

  test('rejects invalid options at construction', () => {
    const err = thrownBy(() => new FlowManager('bad', { concurrency: 0 }));
    expect(err).toBeInstanceOf(FlowValidationError);
    if (err instanceof FlowValidationError) {
      expect(err.typedError.code).toBe('VALIDATION.INVALID_CONFIG');
      expect(err.message).toBe('Invalid executor options: concurrency must be a positive integer or Infinity');
    }
  });

  test('rejects invalid per-call overrides', async () => {
    const flow = new FlowManager().addStep({ name: 'a', run: () => succeed({}) });
    await expect(flow.execute({}, { deadlineMs: -5 })).rejects.toThrow(
      'Invalid executor options: deadlineMs must be a positive finite number',
    );
  });

  test('logs a warning when validation fails at execute', async () => {
    const flow = new FlowManager('broken').addStep({ name: 'a', requires: ['nope'], run: () => succeed({}) });
    await expect(flow.execute()).rejects.toThrow(FlowValidationError);

    const warning = logs.find((entry) => entry.message === 'Flow validation failed');
    expect(warning?.level).toBe('warn');
    expect(warning?.context).toEqual({
      component: 'flowline',
      flow: 'broken',
      codes: ['VALIDATION.UNKNOWN_DEPENDENCY'],
    });
  });

  test('execute defaults the input to an empty object', async () => {
    let seen: unknown;
    const flow = new FlowManager().addStep({ name: 'a', run: ({ input }) => { seen = input; return succeed({}); } });
    await flow.execute();
    expect(seen).toEqual({});
  });
});
