import { z } from "zod";
import type { Args, OutputBundle } from "../../types/contracts.js";
import { BaseTransformer } from "../base.js";
import { parseWith } from "../args.js";

const label = z.union([z.string(), z.number()]);
export type Label = z.infer<typeof label>;

const fitSchema = z.object({ X: z.array(z.array(z.number())), y: z.array(label) });
const transformSchema = z.object({ X: z.array(z.array(z.number())) });
const stateSchema = z.object({ classes: z.array(label), centroids: z.array(z.array(z.number())) });

function cosine(a: number[], b: number[]): number {
  let dot = 0, na = 0, nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * (b[i] ?? 0);
    na += a[i] * a[i];
    nb += (b[i] ?? 0) * (b[i] ?? 0);
  }
  return na === 0 || nb === 0 ? 0 : dot / Math.sqrt(na * nb);
}

/** Scores clamped at zero and scaled to sum to one; uniform when all are zero. */
export function toProbabilities(scores: number[]): number[] {
  const pos = scores.map(s => Math.max(0, s));
  const total = pos.reduce((s, v) => s + v, 0);
  return total === 0 ? pos.map(() => 1 / pos.length) : pos.map(v => v / total);
}

export function argmax(values: number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) if (values[i] > values[best]) best = i;
  return best;
}

/**
 * Nearest-centroid classifier under cosine similarity. Classes are ordered by
 * first appearance in the training labels.
 */
export class CentroidClassifier extends BaseTransformer {
  private classes: Label[] = [];
  private centroids: number[][] = [];

  fit(args: Args): this {
    const { X, y } = parseWith(fitSchema, args, "CentroidClassifier.fit");
    if (X.length !== y.length) {
      throw new Error(`CentroidClassifier.fit: ${X.length} samples but ${y.length} labels`);
    }
    const width = X[0]?.length ?? 0;
    const classes: Label[] = [];
    const sums: number[][] = [];
    const counts: number[] = [];
    X.forEach((row, i) => {
      let k = classes.indexOf(y[i]);
      if (k === -1) {
        k = classes.push(y[i]) - 1;
        sums.push(new Array<number>(width).fill(0));
        counts.push(0);
      }
      row.forEach((v, j) => { sums[k][j] += v; });
      counts[k] += 1;
    });
    this.classes = classes;
    this.centroids = sums.map((s, k) => s.map(v => v / counts[k]));
    return this;
  }

  transform(args: Args): OutputBundle {
    const { X } = parseWith(transformSchema, args, "CentroidClassifier.transform");
    const y_proba = X.map(row => toProbabilities(this.centroids.map(c => cosine(row, c))));
    const y_pred = y_proba.map(p => this.classes[argmax(p)]);
    return { y_pred, y_proba, classes: [...this.classes] };
  }

  protected state(): unknown {
    return { classes: this.classes, centroids: this.centroids };
  }

  protected restore(state: unknown): void {
    const s = parseWith(stateSchema, state, "CentroidClassifier state");
    this.classes = s.classes;
    this.centroids = s.centroids;
  }
}
