import { z } from "zod";
import type { Args, OutputBundle } from "../../types/contracts.js";
import { BaseTransformer } from "../base.js";
import { parseWith } from "../args.js";
import { argmax } from "./centroid.js";

const argsSchema = z.object({
  y_proba: z.array(z.array(z.array(z.number()))).min(1),
  classes: z.array(z.union([z.string(), z.number()])).optional()
});

/** Mean of several models' class probabilities. Stateless. */
export class AveragingEnsembler extends BaseTransformer {
  transform(args: Args): OutputBundle {
    const { y_proba, classes } = parseWith(argsSchema, args, "AveragingEnsembler.transform");
    const [first, ...rest] = y_proba;
    for (const p of rest) {
      if (p.length !== first.length) {
        throw new Error(`AveragingEnsembler.transform: prediction sets differ in length (${first.length} vs ${p.length})`);
      }
    }
    const mean = first.map((row, i) =>
      row.map((_, j) => y_proba.reduce((s, p) => s + (p[i]?.[j] ?? 0), 0) / y_proba.length)
    );
    const out: OutputBundle = { y_proba: mean };
    if (classes) out.y_pred = mean.map(p => classes[argmax(p)]);
    return out;
  }
}
