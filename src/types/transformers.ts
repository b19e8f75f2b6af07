import type { Transformer } from "./contracts.js";

export interface TransformerFactory {
  name: string;
  /** Default for the step's `isTrainable` policy. */
  trainable: boolean;
  params_schema: Record<string, string>;
  create(params: Record<string, unknown>): Transformer;
}

export type TransformerRegistry = Record<string, TransformerFactory>;
