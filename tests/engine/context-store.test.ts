import { ContextStore, deepFreeze } from '../../src/engine/context-store';
import { ContextStoreError } from '../../src/domain/errors';

describe('ContextStore', () => {
  test('stores and returns entries', () => {
    const store = new ContextStore();
    store.set('fetch', { rows: 3 });
    expect(store.get('fetch')).toEqual({ rows: 3 });
    expect(store.has('fetch')).toBe(true);
    expect(store.has('other')).toBe(false);
    expect(store.size).toBe(1);
  });

  test('rejects a second write to the same key', () => {
    const store = new ContextStore();
    store.set('fetch', { rows: 3 });

    let caught: unknown;
    try {
      store.set('fetch', { rows: 4 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ContextStoreError);
    if (caught instanceof ContextStoreError) {
      expect(caught.typedError.code).toBe('SYSTEM.CONTEXT_OVERWRITE');
      expect(caught.message).toBe('Context entry for step "fetch" was already written');
    }
    expect(store.get('fetch')).toEqual({ rows: 3 });
  });

  test('freezes entries deeply on write', () => {
    const store = new ContextStore();
    const stored = store.set('fetch', { page: { items: [1, 2] } });
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored.page)).toBe(true);
    const page = stored.page;
    const items = typeof page === 'object' && page !== null && 'items' in page ? page.items : undefined;
    expect(Array.isArray(items)).toBe(true);
    expect(() => {
      if (Array.isArray(items)) items.push(3);
    }).toThrow(TypeError);
  });

  test('stores a copy and leaves the written object untouched', () => {
    const store = new ContextStore();
    const result = { page: { items: [1, 2] } };
    const stored = store.set('fetch', result);

    expect(stored).not.toBe(result);
    expect(stored).toEqual({ page: { items: [1, 2] } });
    expect(Object.isFrozen(result)).toBe(false);
    expect(Object.isFrozen(result.page)).toBe(false);

    result.page.items.push(3);
    expect(store.get('fetch')).toEqual({ page: { items: [1, 2] } });
  });

  test('a Map in an entry cannot be changed after the write', () => {
    const store = new ContextStore();
    const tags = new Map([['k', 1]]);
    const stored = store.set('tag', { tags });

    const storedTags = stored.tags;
    expect(storedTags).toBeInstanceOf(Map);
    expect(storedTags).not.toBe(tags);
    if (storedTags instanceof Map) {
      expect(() => storedTags.set('k', 999)).toThrow(TypeError);
      expect(storedTags.get('k')).toBe(1);
    }
    tags.set('k', 2);
    expect(tags.get('k')).toBe(2);
  });

  test('snapshot with names includes only present entries, in the given order', () => {
    const store = new ContextStore();
    store.set('a', { v: 1 });
    store.set('b', { v: 2 });

    const view = store.snapshot(['b', 'missing', 'a']);
    expect(Object.keys(view)).toEqual(['b', 'a']);
    expect(Object.isFrozen(view)).toBe(true);
  });

  test('snapshot without names includes every entry in write order', () => {
    const store = new ContextStore();
    store.set('b', { v: 2 });
    store.set('a', { v: 1 });
    expect(store.toObject()).toEqual({ b: { v: 2 }, a: { v: 1 } });
    expect(Object.keys(store.snapshot())).toEqual(['b', 'a']);
  });

  test('a snapshot does not change when later entries are written', () => {
    const store = new ContextStore();
    store.set('a', { v: 1 });
    const before = store.snapshot();
    store.set('b', { v: 2 });
    expect(before).toEqual({ a: { v: 1 } });
  });
});

describe('deepFreeze', () => {
  test('freezes nested plain objects and arrays', () => {
    const value = deepFreeze({ list: [{ x: 1 }], nested: { y: 2 } });
    expect(Object.isFrozen(value.list)).toBe(true);
    expect(Object.isFrozen(value.list[0])).toBe(true);
    expect(Object.isFrozen(value.nested)).toBe(true);
  });

  test('locks Maps, Sets and Dates', () => {
    const value = deepFreeze({
      tags: new Map([['k', 1]]),
      seen: new Set(['a']),
      when: new Date(0),
    });

    expect(() => value.tags.set('k', 999)).toThrow('Cannot modify a frozen Map');
    expect(() => value.tags.clear()).toThrow(TypeError);
    expect(() => value.seen.add('b')).toThrow('Cannot modify a frozen Set');
    expect(() => value.when.setFullYear(2000)).toThrow('Cannot modify a frozen Date');
    expect(value.tags.get('k')).toBe(1);
    expect(value.seen.has('b')).toBe(false);
    expect(value.when.getTime()).toBe(0);
  });

  test('freezes values held inside a Map', () => {
    const inner = { n: 1 };
    deepFreeze(new Map([['k', inner]]));
    expect(Object.isFrozen(inner)).toBe(true);
  });

  test('leaves typed arrays writable', () => {
    const bytes = new Uint8Array([1, 2]);
    const value = deepFreeze({ bytes });
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(bytes)).toBe(false);
  });

  test('returns primitives unchanged', () => {
    expect(deepFreeze(5)).toBe(5);
    expect(deepFreeze(null)).toBeNull();
  });
});
