import { z } from "zod";
import type { Args, OutputBundle } from "../../types/contracts.js";
import { BaseTransformer } from "../base.js";
import { parseWith } from "../args.js";

const argsSchema = z.object({ X: z.array(z.string()) });
const stateSchema = z.object({ vocabulary: z.array(z.string()) });

export interface CountVectorizerOptions {
  lowercase?: boolean;
  /** Keep tokens appearing in at least this many documents. */
  minDf?: number;
}

export function tokenize(text: string, lowercase = true): string[] {
  const t = lowercase ? text.toLowerCase() : text;
  return t.split(/[^\p{L}\p{N}]+/u).filter(s => s.length > 0);
}

/** Bag-of-words counts over a vocabulary learned at fit time, sorted. */
export class CountVectorizer extends BaseTransformer {
  private vocabulary: string[] = [];
  private readonly lowercase: boolean;
  private readonly minDf: number;

  constructor(opts: CountVectorizerOptions = {}) {
    super();
    this.lowercase = opts.lowercase ?? true;
    this.minDf = opts.minDf ?? 1;
  }

  fit(args: Args): this {
    const { X } = parseWith(argsSchema, args, "CountVectorizer.fit");
    const df = new Map<string, number>();
    for (const doc of X) {
      for (const tok of new Set(tokenize(doc, this.lowercase))) df.set(tok, (df.get(tok) ?? 0) + 1);
    }
    this.vocabulary = Array.from(df.entries())
      .filter(([, n]) => n >= this.minDf)
      .map(([tok]) => tok)
      .sort();
    return this;
  }

  transform(args: Args): OutputBundle {
    const { X } = parseWith(argsSchema, args, "CountVectorizer.transform");
    const index = new Map(this.vocabulary.map((tok, i) => [tok, i]));
    const rows = X.map(doc => {
      const row: number[] = new Array<number>(this.vocabulary.length).fill(0);
      for (const tok of tokenize(doc, this.lowercase)) {
        const i = index.get(tok);
        if (i !== undefined) row[i] += 1;
      }
      return row;
    });
    return { X: rows, features: [...this.vocabulary] };
  }

  protected state(): unknown {
    return { vocabulary: this.vocabulary };
  }

  protected restore(state: unknown): void {
    this.vocabulary = parseWith(stateSchema, state, "CountVectorizer state").vocabulary;
  }
}
