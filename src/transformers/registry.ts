import { z } from "zod";
import type { TransformerFactory, TransformerRegistry } from "../types/transformers.js";
import { parseWith } from "./args.js";
import { IdentityOperation } from "./function.js";
import { CountVectorizer } from "./text/vectorizer.js";
import { TfidfTransformer } from "./text/tfidf.js";
import { Normalizer } from "./numeric/normalizer.js";
import { CentroidClassifier } from "./models/centroid.js";
import { AveragingEnsembler } from "./models/averaging.js";

const noParams = z.object({}).strict();

export const identity: TransformerFactory = {
  name: "identity",
  trainable: false,
  params_schema: {},
  create(params) {
    parseWith(noParams, params, "identity params");
    return new IdentityOperation();
  }
};

const vectorizerParams = z.object({
  lowercase: z.boolean().optional(),
  min_df: z.number().int().min(1).optional()
}).strict();

export const countVectorizer: TransformerFactory = {
  name: "count_vectorizer",
  trainable: true,
  params_schema: {
    lowercase: "boolean (optional, default true)",
    min_df: "integer >= 1 (optional, default 1)"
  },
  create(params) {
    const p = parseWith(vectorizerParams, params, "count_vectorizer params");
    return new CountVectorizer({ lowercase: p.lowercase, minDf: p.min_df });
  }
};

export const tfidf: TransformerFactory = {
  name: "tfidf",
  trainable: true,
  params_schema: {},
  create(params) {
    parseWith(noParams, params, "tfidf params");
    return new TfidfTransformer();
  }
};

export const normalizer: TransformerFactory = {
  name: "normalizer",
  trainable: false,
  params_schema: {},
  create(params) {
    parseWith(noParams, params, "normalizer params");
    return new Normalizer();
  }
};

export const centroidClassifier: TransformerFactory = {
  name: "centroid_classifier",
  trainable: true,
  params_schema: {},
  create(params) {
    parseWith(noParams, params, "centroid_classifier params");
    return new CentroidClassifier();
  }
};

export const averagingEnsembler: TransformerFactory = {
  name: "averaging_ensembler",
  trainable: false,
  params_schema: {},
  create(params) {
    parseWith(noParams, params, "averaging_ensembler params");
    return new AveragingEnsembler();
  }
};

export function buildTransformerRegistry(): TransformerRegistry {
  return {
    [identity.name]: identity,
    [countVectorizer.name]: countVectorizer,
    [tfidf.name]: tfidf,
    [normalizer.name]: normalizer,
    [centroidClassifier.name]: centroidClassifier,
    [averagingEnsembler.name]: averagingEnsembler
  };
}
