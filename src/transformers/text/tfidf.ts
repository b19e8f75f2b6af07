import { z } from "zod";
import type { Args, OutputBundle } from "../../types/contracts.js";
import { BaseTransformer } from "../base.js";
import { parseWith } from "../args.js";
import { l2Normalize } from "../numeric/normalizer.js";

const argsSchema = z.object({ X: z.array(z.array(z.number())) });
const stateSchema = z.object({ idf: z.array(z.number()) });

/**
 * Reweights a count matrix by smoothed inverse document frequency,
 * idf = ln((1 + n) / (1 + df)) + 1, then L2-normalizes each row.
 */
export class TfidfTransformer extends BaseTransformer {
  private idf: number[] = [];

  fit(args: Args): this {
    const { X } = parseWith(argsSchema, args, "TfidfTransformer.fit");
    const n = X.length;
    const width = X[0]?.length ?? 0;
    const df = new Array<number>(width).fill(0);
    for (const row of X) {
      row.forEach((v, j) => {
        if (v > 0) df[j] += 1;
      });
    }
    this.idf = df.map(d => Math.log((1 + n) / (1 + d)) + 1);
    return this;
  }

  transform(args: Args): OutputBundle {
    const { X } = parseWith(argsSchema, args, "TfidfTransformer.transform");
    for (const row of X) {
      if (row.length !== this.idf.length) {
        throw new Error(`TfidfTransformer.transform: expected ${this.idf.length} columns, got ${row.length}`);
      }
    }
    return { X: X.map(row => l2Normalize(row.map((v, j) => v * this.idf[j]))) };
  }

  protected state(): unknown {
    return { idf: this.idf };
  }

  protected restore(state: unknown): void {
    this.idf = parseWith(stateSchema, state, "TfidfTransformer state").idf;
  }
}
