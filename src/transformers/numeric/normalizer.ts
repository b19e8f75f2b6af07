import { z } from "zod";
import type { Args, OutputBundle } from "../../types/contracts.js";
import { BaseTransformer } from "../base.js";
import { parseWith } from "../args.js";

const argsSchema = z.object({ X: z.array(z.array(z.number())) });

export function l2Normalize(row: number[]): number[] {
  const norm = Math.sqrt(row.reduce((s, v) => s + v * v, 0));
  return norm === 0 ? [...row] : row.map(v => v / norm);
}

/** Scales every row to unit L2 norm. Stateless. */
export class Normalizer extends BaseTransformer {
  transform(args: Args): OutputBundle {
    const { X } = parseWith(argsSchema, args, "Normalizer.transform");
    return { X: X.map(l2Normalize) };
  }
}
