import { describe, it, expect, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { CountVectorizer, tokenize } from '../transformers/text/vectorizer.js';
import { TfidfTransformer } from '../transformers/text/tfidf.js';
import { Normalizer } from '../transformers/numeric/normalizer.js';
import { CentroidClassifier } from '../transformers/models/centroid.js';
import { AveragingEnsembler } from '../transformers/models/averaging.js';
import { IdentityOperation, makeTransformer } from '../transformers/function.js';
import { buildTransformerRegistry } from '../transformers/registry.js';
import { tempDir } from './helpers.js';

describe('transformers', () => {
  const dirs: string[] = [];
  const scratch = () => {
    const d = tempDir();
    dirs.push(d);
    return d;
  };

  afterEach(() => {
    for (const d of dirs.splice(0)) rmSync(d, { recursive: true, force: true });
  });

  it('tokenizes on non-alphanumerics', () => {
    expect(tokenize('Great coffee, friendly service!')).toEqual(['great', 'coffee', 'friendly', 'service']);
    expect(tokenize('Great coffee', false)).toEqual(['Great', 'coffee']);
  });

  it('counts tokens over a sorted fitted vocabulary', () => {
    const vec = new CountVectorizer().fit({ X: ['b a a', 'c b'] });
    expect(vec.transform({ X: ['a b a', 'c c d'] })).toEqual({
      X: [[2, 1, 0], [0, 0, 2]],
      features: ['a', 'b', 'c']
    });
  });

  it('drops tokens below the document frequency floor', () => {
    const vec = new CountVectorizer({ minDf: 2 }).fit({ X: ['b a a', 'c b'] });
    expect(vec.transform({ X: ['a b c'] })).toEqual({ X: [[1]], features: ['b'] });
  });

  it('rejects arguments of the wrong shape', () => {
    expect(() => new CountVectorizer().fit({ X: 'not a list' })).toThrow('CountVectorizer.fit: X:');
  });

  it('weights counts by smoothed idf and normalizes rows', () => {
    const tfidf = new TfidfTransformer().fit({ X: [[1, 0], [1, 1]] });
    const { X } = tfidf.transform({ X: [[1, 0], [0, 2], [1, 1]] });
    expect(X).toEqual([[1, 0], [0, 1], [expect.closeTo(0.5797386715376657, 12), expect.closeTo(0.8148024746671689, 12)]]);
    expect(() => tfidf.transform({ X: [[1, 2, 3]] })).toThrow('expected 2 columns, got 3');
  });

  it('normalizes rows to unit length and leaves zero rows alone', () => {
    expect(new Normalizer().transform({ X: [[3, 4], [0, 0]] })).toEqual({ X: [[0.6, 0.8], [0, 0]] });
  });

  it('predicts the nearest centroid by cosine similarity', () => {
    const clf = new CentroidClassifier().fit({ X: [[1, 0], [0, 1]], y: ['pos', 'neg'] });
    const out = clf.transform({ X: [[2, 0], [0, 3], [0, 0]] });
    expect(out.classes).toEqual(['pos', 'neg']);
    expect(out.y_pred).toEqual(['pos', 'neg', 'pos']);
    expect(out.y_proba).toEqual([[1, 0], [0, 1], [0.5, 0.5]]);
    expect(() => clf.fit({ X: [[1]], y: ['a', 'b'] })).toThrow('1 samples but 2 labels');
  });

  it('averages probabilities across models', () => {
    const out = new AveragingEnsembler().transform({
      y_proba: [[[0.8, 0.2]], [[0.4, 0.6]]],
      classes: ['a', 'b']
    });
    expect(out.y_pred).toEqual(['a']);
    expect(out.y_proba).toEqual([[expect.closeTo(0.6, 12), expect.closeTo(0.4, 12)]]);
    expect(() => new AveragingEnsembler().transform({ y_proba: [[[1, 0]], []] })).toThrow('differ in length (1 vs 0)');
  });

  it('round-trips fitted state through persist and load', () => {
    const dir = scratch();
    const docs = ['warm bread', 'cold soup', 'warm soup'];
    const vec = new CountVectorizer().fit({ X: docs });
    const counts = vec.transform({ X: docs });
    const tfidf = new TfidfTransformer().fit(counts);
    const clf = new CentroidClassifier().fit({ X: tfidf.transform(counts).X, y: ['pos', 'neg', 'pos'] });

    vec.persist(join(dir, 'vec'));
    tfidf.persist(join(dir, 'tfidf'));
    clf.persist(join(dir, 'clf'));

    const vec2 = new CountVectorizer().load(join(dir, 'vec'));
    const tfidf2 = new TfidfTransformer().load(join(dir, 'tfidf'));
    const clf2 = new CentroidClassifier().load(join(dir, 'clf'));

    const probe = ['warm soup and bread', 'cold'];
    const expected = clf.transform({ X: tfidf.transform(vec.transform({ X: probe })).X });
    const actual = clf2.transform({ X: tfidf2.transform(vec2.transform({ X: probe })).X });
    expect(actual).toEqual(expected);
  });

  it('wraps plain functions and passes arguments through', async () => {
    const double = makeTransformer(args => ({ n: Number(args.n) * 2 }));
    expect(await double.transform({ n: 4 })).toEqual({ n: 8 });
    expect(new IdentityOperation().transform({ a: 1 })).toEqual({ a: 1 });
  });

  it('registers the built-in transformers with their trainability', () => {
    const reg = buildTransformerRegistry();
    expect(Object.keys(reg)).toEqual([
      'identity',
      'count_vectorizer',
      'tfidf',
      'normalizer',
      'centroid_classifier',
      'averaging_ensembler'
    ]);
    expect(reg.normalizer.trainable).toBe(false);
    expect(reg.centroid_classifier.trainable).toBe(true);
    expect(() => reg.count_vectorizer.create({ min_df: 0 })).toThrow('count_vectorizer params: min_df:');
    expect(() => reg.tfidf.create({ smooth: true })).toThrow('tfidf params');
  });
});
