import {
  DEFAULT_EXECUTOR_OPTIONS,
  createExecutorOptions,
  loadExecutorOptionsFromEnv,
  validateExecutorOptions,
} from '../src/config';
import { logger } from '../src/logger';
import { captureLogs } from './helpers';

describe('Executor options', () => {
  const logs = captureLogs();

  test('defaults to unbounded concurrency and the dependencies view', () => {
    const options = createExecutorOptions();
    expect(options.concurrency).toBe(Infinity);
    expect(options.contextView).toBe('dependencies');
    expect(options.deadlineMs).toBeUndefined();
    expect(options.logEvents).toBe(true);
    expect(options.observers).toEqual([]);
    expect(options.logger).toBe(logger);
    expect(validateExecutorOptions(options)).toEqual({ valid: true, errors: [] });
  });

  test('overrides replace individual defaults', () => {
    const options = createExecutorOptions({ concurrency: 3, deadlineMs: 1000 });
    expect(options.concurrency).toBe(3);
    expect(options.deadlineMs).toBe(1000);
    expect(options.contextView).toBe('dependencies');
  });

  test('does not share the observer list with the defaults', () => {
    const options = createExecutorOptions();
    options.observers.push({});
    expect(DEFAULT_EXECUTOR_OPTIONS.observers).toEqual([]);
  });

  test.each([0, -1, 1.5, NaN])('rejects concurrency %p', (concurrency) => {
    const result = validateExecutorOptions(createExecutorOptions({ concurrency }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['concurrency must be a positive integer or Infinity']);
  });

  test.each([0, -10, Infinity])('rejects deadlineMs %p', (deadlineMs) => {
    const result = validateExecutorOptions(createExecutorOptions({ deadlineMs }));
    expect(result.errors).toEqual(['deadlineMs must be a positive finite number']);
  });

  test('reads options from the environment', () => {
    const options = loadExecutorOptionsFromEnv({
      FLOWLINE_CONCURRENCY: '4',
      FLOWLINE_DEADLINE_MS: '2500',
      FLOWLINE_CONTEXT_VIEW: 'all',
    });
    expect(options.concurrency).toBe(4);
    expect(options.deadlineMs).toBe(2500);
    expect(options.contextView).toBe('all');
  });

  test('accepts "unbounded" for concurrency', () => {
    expect(loadExecutorOptionsFromEnv({ FLOWLINE_CONCURRENCY: 'Unbounded' }).concurrency).toBe(Infinity);
  });

  test('passes unparseable numbers through for validation to report', () => {
    const options = loadExecutorOptionsFromEnv({ FLOWLINE_CONCURRENCY: 'lots' });
    expect(Number.isNaN(options.concurrency)).toBe(true);
    expect(validateExecutorOptions(options).valid).toBe(false);
  });

  test('warns about an unknown context view and keeps the default', () => {
    const options = loadExecutorOptionsFromEnv({ FLOWLINE_CONTEXT_VIEW: 'everything' });
    expect(options.contextView).toBe('dependencies');
    expect(logs).toHaveLength(1);
    expect(logs[0].message).toBe('Ignoring unknown FLOWLINE_CONTEXT_VIEW');
    expect(logs[0].context).toEqual({ component: 'flowline', value: 'everything' });
  });

  test('FLOWLINE_LOG_LEVEL adjusts the global log level', () => {
    loadExecutorOptionsFromEnv({ FLOWLINE_LOG_LEVEL: 'DEBUG' });
    logger.debug('visible now');
    expect(logs.map((entry) => entry.message)).toEqual(['visible now']);
  });
});
