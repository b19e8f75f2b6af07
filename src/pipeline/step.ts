import type {
  AdapterMapping,
  BundleName,
  ExternalInputs,
  OutputBundle,
  StepDefinition,
  StepName,
  StepPolicy,
  Transformer
} from "../types/contracts.js";
import type { Pipeline } from "./pipeline.js";
import type { RecordKind } from "../store/persistence.js";
import { execute } from "../orchestrator/run.js";

export const DEFAULT_POLICY: Readonly<StepPolicy> = {
  persistOutput: false,
  loadPersistedOutput: false,
  cacheOutput: false,
  persistModel: true,
  forceFitting: false,
  isTrainable: true
};

/**
 * A named node wrapping one transformer. Upstream steps are held by name and
 * looked up in the owning pipeline, so a step shared by several consumers
 * exists once.
 */
export class Step {
  readonly name: StepName;
  readonly transformer: Transformer;
  readonly inputSteps: readonly StepName[];
  readonly inputData: readonly BundleName[];
  readonly adapter: AdapterMapping | undefined;
  readonly policy: Readonly<StepPolicy>;
  readonly pipeline: Pipeline;

  private fitted = false;

  constructor(pipeline: Pipeline, def: StepDefinition) {
    this.pipeline = pipeline;
    this.name = def.name;
    this.transformer = def.transformer;
    this.inputSteps = Object.freeze([...(def.inputSteps ?? [])]);
    this.inputData = Object.freeze([...(def.inputData ?? [])]);
    this.adapter = def.adapter;
    this.policy = Object.freeze({
      persistOutput: def.persistOutput ?? DEFAULT_POLICY.persistOutput,
      loadPersistedOutput: def.loadPersistedOutput ?? DEFAULT_POLICY.loadPersistedOutput,
      cacheOutput: def.cacheOutput ?? DEFAULT_POLICY.cacheOutput,
      persistModel: def.persistModel ?? DEFAULT_POLICY.persistModel,
      forceFitting: def.forceFitting ?? DEFAULT_POLICY.forceFitting,
      isTrainable: def.isTrainable ?? DEFAULT_POLICY.isTrainable
    });
  }

  get experimentDir(): string {
    return this.pipeline.experimentDir;
  }

  /** True once the transformer was fitted or loaded in this process. */
  get isFitted(): boolean {
    return this.fitted;
  }

  markFitted(): void {
    this.fitted = true;
  }

  /** Fit unfitted steps on the way and return this step's output. */
  fitTransform(inputs: ExternalInputs): Promise<OutputBundle> {
    return execute(this, "fit", inputs);
  }

  /** Never fits; trainable steps need in-memory or persisted model state. */
  transform(inputs: ExternalInputs): Promise<OutputBundle> {
    return execute(this, "transform", inputs);
  }

  /** Every transitive upstream step, upstream-first. */
  upstreamSteps(): StepName[] {
    return this.pipeline.validate(this.name).filter(n => n !== this.name);
  }

  clearCache(): void {
    this.pipeline.cache.clear(this.pipeline.runId, this.name);
  }

  clearCacheUpstream(): void {
    for (const name of this.upstreamSteps()) this.pipeline.cache.clear(this.pipeline.runId, name);
    this.clearCache();
  }

  clearPersisted(kind?: RecordKind): void {
    this.pipeline.clearPersisted(this.name, kind);
  }
}
