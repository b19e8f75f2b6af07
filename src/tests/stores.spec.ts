import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { CacheStore } from '../store/cache.js';
import { PersistenceStore } from '../store/persistence.js';
import { PersistenceError } from '../errors.js';
import { tempDir } from './helpers.js';

describe('cache store', () => {
  it('keeps records per run until cleared', () => {
    const cache = new CacheStore();
    cache.put('r1', 'a', { x: 1 });
    cache.put('r1', 'a', { x: 2 });
    cache.put('r1', 'b', { y: 1 });
    cache.put('r2', 'a', { x: 3 });

    expect(cache.get('r1', 'a')).toEqual({ x: 2 });
    expect(cache.get('r2', 'a')).toEqual({ x: 3 });
    expect(cache.has('r1', 'b')).toBe(true);
    expect(cache.get('r3', 'a')).toBeUndefined();
    expect(cache.runs()).toEqual(['r1', 'r2']);

    cache.clear('r1', 'a');
    expect(cache.has('r1', 'a')).toBe(false);
    expect(cache.keys('r1')).toEqual(['b']);

    cache.clear('r1');
    expect(cache.runs()).toEqual(['r2']);
  });

  it('hands out copies so callers cannot change a stored record', () => {
    const cache = new CacheStore();
    const value = { X: [3, 1, 2] };
    cache.put('r', 'a', value);
    value.X.push(9);

    const first = cache.get('r', 'a');
    expect(first).toEqual({ X: [3, 1, 2] });
    if (first) first.X = [];
    expect(cache.get('r', 'a')).toEqual({ X: [3, 1, 2] });
  });

  it('numbers successive records of a step', () => {
    const cache = new CacheStore();
    expect(cache.put('r', 'a', {}).v).toBe(1);
    expect(cache.put('r', 'a', {}).v).toBe(2);
  });
});

describe('persistence store', () => {
  let dir: string;
  const store = new PersistenceStore();

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('lays records out by kind and step name', () => {
    const scope = { experimentDir: dir, step: 'tfidf' };
    expect(store.path(scope, 'model')).toBe(join(dir, 'models', 'tfidf'));
    expect(store.path(scope, 'output')).toBe(join(dir, 'outputs', 'tfidf'));
  });

  it('puts, gets and clears output records', () => {
    const scope = { experimentDir: dir, step: 'clf' };
    expect(store.exists(scope, 'output')).toBe(false);
    expect(store.get(scope, 'output')).toBeUndefined();

    store.put(scope, 'output', { y_pred: ['a', 'b'], score: 0.5 });

    expect(store.exists(scope, 'output')).toBe(true);
    expect(store.get(scope, 'output')).toEqual({ y_pred: ['a', 'b'], score: 0.5 });

    store.clear(scope, 'output');
    expect(store.exists(scope, 'output')).toBe(false);
  });

  it('creates the slot directory for transformer-written models', () => {
    const scope = { experimentDir: join(dir, 'nested'), step: 'vec' };
    const path = store.prepare(scope, 'model');
    expect(existsSync(join(dir, 'nested', 'models'))).toBe(true);
    expect(path).toBe(join(dir, 'nested', 'models', 'vec'));
  });

  it('surfaces malformed records as persistence errors', () => {
    const scope = { experimentDir: dir, step: 'bad' };
    mkdirSync(join(dir, 'outputs'), { recursive: true });

    writeFileSync(join(dir, 'outputs', 'bad'), '{not json');
    expect(() => store.get(scope, 'output')).toThrow(PersistenceError);

    writeFileSync(join(dir, 'outputs', 'bad'), JSON.stringify({ step: 'bad', payload: 3 }));
    expect(() => store.get(scope, 'output')).toThrow(`malformed record in ${join(dir, 'outputs', 'bad')}`);
  });

  it('refuses outputs that would not read back as written', () => {
    const scope = { experimentDir: dir, step: 'lossy' };
    const target = join(dir, 'outputs', 'lossy');

    expect(() => store.put(scope, 'output', { X: new Float64Array([1, 2]) }))
      .toThrow(`cannot write ${target}: key 'X' is not a JSON value`);
    expect(() => store.put(scope, 'output', { ok: [1], score: NaN }))
      .toThrow(`cannot write ${target}: key 'score' is not a JSON value`);
    expect(() => store.put(scope, 'output', { note: undefined }))
      .toThrow(PersistenceError);
    expect(store.exists(scope, 'output')).toBe(false);
  });

  it('removes a whole experiment directory', () => {
    store.put({ experimentDir: dir, step: 'a' }, 'output', { x: 1 });
    store.clearAll(dir);
    expect(existsSync(dir)).toBe(false);
  });
});
