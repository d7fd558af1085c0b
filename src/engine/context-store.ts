/**
 * Context store: a write-once mapping from step name to step result.
 *
 * Each entry is a deep copy of the result, frozen on write. The step that
 * produced the result keeps its own object; the stored copy can never change
 * once its key is written. Writing an existing key throws ContextStoreError:
 * it means the scheduler broke its own invariant.
 */

import { ContextView, StepResult } from '../domain/step';
import { ContextStoreError, contextOverwriteError } from '../domain/errors';

export class ContextStore {
  private entries = new Map<string, Readonly<StepResult>>();

  set(name: string, result: StepResult): Readonly<StepResult> {
    if (this.entries.has(name)) {
      throw new ContextStoreError(contextOverwriteError(name));
    }
    const frozen = deepFreeze(deepCopy(result));
    this.entries.set(name, frozen);
    return frozen;
  }

  get(name: string): Readonly<StepResult> | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Frozen view of the store. With `names`, only those entries that are
   * present are included, in the order given.
   */
  snapshot(names?: Iterable<string>): ContextView {
    const view: Record<string, Readonly<StepResult>> = {};
    const keys = names ?? this.entries.keys();
    for (const key of keys) {
      const value = this.entries.get(key);
      if (value !== undefined) view[key] = value;
    }
    return Object.freeze(view);
  }

  /** Every entry, in write order. */
  toObject(): ContextView {
    return this.snapshot();
  }
}

/**
 * Structured clone of a value. Class instances come back as plain objects;
 * functions and other uncloneable values throw a DataCloneError.
 */
export function deepCopy<T>(value: T): T {
  return structuredClone(value);
}

/** Own methods that would still mutate a frozen instance of these types. */
const MUTATORS: ReadonlyArray<[object, string, readonly string[]]> = [
  [Map.prototype, 'Map', ['set', 'delete', 'clear']],
  [Set.prototype, 'Set', ['add', 'delete', 'clear']],
  [Date.prototype, 'Date', Object.getOwnPropertyNames(Date.prototype).filter((name) => name.startsWith('set'))],
];

/**
 * Recursively freeze a value. Maps, Sets and Dates also have their mutating
 * methods replaced by ones that throw a TypeError. Binary buffers and typed
 * arrays cannot be frozen and are left as they are.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  if (value instanceof ArrayBuffer || ArrayBuffer.isView(value)) {
    return value;
  }

  if (value instanceof Map) {
    for (const [key, entry] of value) {
      deepFreeze(key);
      deepFreeze(entry);
    }
  } else if (value instanceof Set) {
    for (const member of value) deepFreeze(member);
  }
  for (const [proto, typeName, methods] of MUTATORS) {
    if (Object.getPrototypeOf(value) !== proto) continue;
    for (const method of methods) {
      Object.defineProperty(value, method, {
        value: () => {
          throw new TypeError(`Cannot modify a frozen ${typeName}`);
        },
      });
    }
  }

  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  return value;
}
