import { describe, it, expect } from 'vitest';
import { E, resolve } from '../adapter/index.js';
import { ResolutionError } from '../errors.js';

describe('adapter', () => {
  const v1 = [[0.5, 0.5]];
  const v2 = [1, 0];

  it('resolves upstream keys and input bundle fields by name', () => {
    const args = resolve(
      { X: ['TF-IDF', 'X'], y: ['input', 'label'] },
      { 'TF-IDF': { X: v1 } },
      { input: { label: v2 } }
    );
    expect(args).toEqual({ X: v1, y: v2 });
    expect(args.X).toBe(v1);
  });

  it('rejects a source found in neither map', () => {
    expect(() => resolve({ X: ['TF-IDF', 'X'], y: ['input', 'label'] }, { 'TF-IDF': { X: v1 } }, {}))
      .toThrow(ResolutionError);
    expect(() => resolve({ y: E('input', 'label') }, {}, {}))
      .toThrow("argument 'y': source 'input' is neither an upstream step nor an input bundle");
  });

  it('rejects a key missing from the found bundle', () => {
    expect(() => resolve({ X: ['TF-IDF', 'Z'] }, { 'TF-IDF': { X: v1 } }, {}))
      .toThrow("argument 'X': 'TF-IDF' has no key 'Z' (available: X)");
  });

  it('prefers an upstream output over an input bundle of the same name', () => {
    const args = resolve({ X: ['data', 'X'] }, { data: { X: 'from-step' } }, { data: { X: 'from-input' } });
    expect(args.X).toBe('from-step');
  });

  it('collects a list of extractions into an array', () => {
    const args = resolve(
      { preds: [['a', 'p'], ['b', 'p']] },
      { a: { p: 1 }, b: { p: 2 } },
      {}
    );
    expect(args.preds).toEqual([1, 2]);
  });

  it('combines extractions through a function', () => {
    const args = resolve(
      { total: { inputs: [E('a', 'n'), E('input', 'n')], combine: values => values.reduce((s: number, v) => s + Number(v), 0) } },
      { a: { n: 2 } },
      { input: { n: 3 } }
    );
    expect(args.total).toBe(5);
  });

  it('passes a single upstream bundle through verbatim without a mapping', () => {
    const bundle = { X: v1, features: ['a', 'b'] };
    expect(resolve(undefined, { up: bundle }, {})).toEqual(bundle);
  });

  it('merges all sources without a mapping and rejects clashing keys', () => {
    expect(resolve(undefined, { up: { X: 1 } }, { input: { y: 2 } })).toEqual({ X: 1, y: 2 });
    expect(() => resolve(undefined, { up: { X: 1 } }, { input: { X: 2 } }))
      .toThrow("argument 'X' is provided by both 'up' and 'input'; supply an adapter");
  });
});
