export type {
  AdapterEntry,
  AdapterMapping,
  Args,
  Awaitable,
  BundleName,
  CombinedExtraction,
  ExternalInputs,
  Extraction,
  InputBundle,
  OutputBundle,
  RunMode,
  StepDefinition,
  StepGraph,
  StepName,
  StepPolicy,
  StepSpec,
  Transformer
} from './types/contracts.js';
export type { TransformerFactory, TransformerRegistry } from './types/transformers.js';

export { E, resolve } from './adapter/index.js';
export { Pipeline, newRunId, type PipelineOptions } from './pipeline/pipeline.js';
export { Step, DEFAULT_POLICY } from './pipeline/step.js';
export { execute, evaluate, type RunContext } from './orchestrator/run.js';
export { compileGraph, parseGraph, type CompiledGraph } from './orchestrator/compiler.js';
export { closure, topoSort } from './orchestrator/topo.js';
export { CacheStore, type CacheRecord } from './store/cache.js';
export { PersistenceStore, type RecordKind, type Scope } from './store/persistence.js';
export {
  GraphError,
  NotFittedError,
  PersistenceError,
  ResolutionError,
  StepGraphError,
  TransformerError
} from './errors.js';
export { createLogger, silentLogger, type Logger, type StepEvent } from './logging.js';
export { loadConfig, type Config } from './config.js';

export { BaseTransformer } from './transformers/base.js';
export { IdentityOperation, makeTransformer } from './transformers/function.js';
export { CountVectorizer, tokenize } from './transformers/text/vectorizer.js';
export { TfidfTransformer } from './transformers/text/tfidf.js';
export { Normalizer } from './transformers/numeric/normalizer.js';
export { CentroidClassifier } from './transformers/models/centroid.js';
export { AveragingEnsembler } from './transformers/models/averaging.js';
export { buildTransformerRegistry } from './transformers/registry.js';
