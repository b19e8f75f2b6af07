export type StepName = string;
export type BundleName = string;

export type Args = Record<string, unknown>;
export type OutputBundle = Record<string, unknown>;
export type InputBundle = Record<string, unknown>;

/** Caller-supplied raw data, keyed by bundle name. Not produced by any step. */
export type ExternalInputs = Record<BundleName, InputBundle>;

export type Awaitable<T> = T | Promise<T>;

/**
 * The only operations the engine ever calls on an estimator.
 * `persist` writes fitted state to `destination`; `load` restores it.
 */
export interface Transformer {
  fit(args: Args): Awaitable<Transformer>;
  transform(args: Args): Awaitable<OutputBundle>;
  persist(destination: string): Awaitable<void>;
  load(source: string): Awaitable<Transformer>;
}

/** `[source, key]`: source is an upstream step or an external bundle. */
export type Extraction = readonly [source: string, key: string];

export interface CombinedExtraction {
  inputs: readonly Extraction[];
  combine(values: unknown[]): unknown;
}

export type AdapterEntry = Extraction | readonly Extraction[] | CombinedExtraction;

/** Transformer argument name -> where to find its value. */
export type AdapterMapping = Record<string, AdapterEntry>;

export interface StepPolicy {
  persistOutput: boolean;
  loadPersistedOutput: boolean;
  cacheOutput: boolean;
  /** Serialize transformer state after fitting. */
  persistModel: boolean;
  /** Fit even when a persisted model record exists. */
  forceFitting: boolean;
  /** Stateless transformers are never fitted or persisted. */
  isTrainable: boolean;
}

export interface StepDefinition extends Partial<StepPolicy> {
  name: StepName;
  transformer: Transformer;
  inputSteps?: StepName[];
  inputData?: BundleName[];
  adapter?: AdapterMapping;
}

export type RunMode = "fit" | "transform";

// Declarative graph, as loaded by the compiler from JSON.

export interface StepSpec {
  transformer: string;
  params?: Record<string, unknown>;
  input_steps?: StepName[];
  input_data?: BundleName[];
  adapter?: Record<string, [string, string] | Array<[string, string]>>;
  persist_output?: boolean;
  load_persisted_output?: boolean;
  cache_output?: boolean;
  persist_model?: boolean;
  force_fitting?: boolean;
}

export interface StepGraph {
  steps: Record<StepName, StepSpec>;
  output: StepName;
}
