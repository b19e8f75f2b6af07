// src/orchestrator/run.ts
// Depth-first evaluation of a step and its upstream graph.
// Order per step: run cache -> persisted output -> upstream steps -> adapter
// -> fit/load -> transform -> persist output -> cache output.

import type { ExternalInputs, OutputBundle, RunMode, StepName, Transformer } from "../types/contracts.js";
import type { Step } from "../pipeline/step.js";
import type { Scope } from "../store/persistence.js";
import { resolve, type UpstreamOutputs } from "../adapter/index.js";
import {
  NotFittedError,
  ResolutionError,
  StepGraphError,
  TransformerError,
  type TransformerOperation
} from "../errors.js";

export interface RunContext {
  mode: RunMode;
  external: ExternalInputs;
  runId: string;
  /** Steps fitted or loaded during this top-level call. */
  fitted: Set<StepName>;
}

async function call<T>(step: Step, operation: TransformerOperation, fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof StepGraphError) throw e;
    throw new TransformerError(step.name, operation, e);
  }
}

function collectInputData(step: Step, external: ExternalInputs): ExternalInputs {
  const out: ExternalInputs = {};
  for (const name of step.inputData) {
    const bundle = external[name];
    if (bundle === undefined) {
      throw new ResolutionError(`input bundle '${name}' was not supplied`);
    }
    out[name] = bundle;
  }
  return out;
}

async function loadModel(step: Step, transformer: Transformer, path: string): Promise<void> {
  await call(step, "load", () => transformer.load(path));
  step.markFitted();
  step.pipeline.logger.step({ kind: "model_loaded", step: step.name, path });
}

async function ensureFitted(step: Step, scope: Scope, args: Record<string, unknown>, ctx: RunContext): Promise<void> {
  const { persistence, logger } = step.pipeline;
  const { transformer, policy } = step;
  if (!policy.isTrainable || ctx.fitted.has(step.name)) return;

  if (ctx.mode === "transform") {
    if (step.isFitted) return;
    if (!persistence.exists(scope, "model")) throw new NotFittedError(step.name);
    await loadModel(step, transformer, persistence.path(scope, "model"));
    ctx.fitted.add(step.name);
    return;
  }

  if (!policy.forceFitting && persistence.exists(scope, "model")) {
    await loadModel(step, transformer, persistence.path(scope, "model"));
    ctx.fitted.add(step.name);
    return;
  }

  const t0 = Date.now();
  await call(step, "fit", () => transformer.fit(args));
  step.markFitted();
  ctx.fitted.add(step.name);
  logger.step({ kind: "fit", step: step.name, ms: Date.now() - t0 });

  if (policy.persistModel) {
    const path = persistence.prepare(scope, "model");
    await call(step, "persist", () => transformer.persist(path));
    logger.step({ kind: "model_persisted", step: step.name, path });
  }
}

export async function evaluate(step: Step, ctx: RunContext): Promise<OutputBundle> {
  const { pipeline, policy } = step;
  const { cache, persistence, logger } = pipeline;
  const scope: Scope = { experimentDir: pipeline.experimentDir, step: step.name };

  if (policy.cacheOutput) {
    const cached = cache.get(ctx.runId, step.name);
    if (cached !== undefined) {
      logger.step({ kind: "cache_hit", step: step.name, runId: ctx.runId });
      return cached;
    }
  }

  if (policy.loadPersistedOutput) {
    const persisted = persistence.get(scope, "output");
    if (persisted !== undefined) {
      logger.step({ kind: "output_loaded", step: step.name, path: persistence.path(scope, "output") });
      return persisted;
    }
  }

  const upstream: UpstreamOutputs = {};
  for (const name of step.inputSteps) {
    upstream[name] = await evaluate(pipeline.getStep(name), ctx);
  }

  const stepStart = Date.now();
  logger.step({ kind: "start", step: step.name, mode: ctx.mode });

  let args: Record<string, unknown>;
  try {
    args = resolve(step.adapter, upstream, collectInputData(step, ctx.external));
  } catch (e) {
    if (e instanceof ResolutionError && e.step === undefined) {
      throw new ResolutionError(e.message, step.name);
    }
    throw e;
  }

  await ensureFitted(step, scope, args, ctx);
  const output = await call(step, "transform", () => step.transformer.transform(args));

  if (policy.persistOutput) {
    const path = persistence.put(scope, "output", output);
    logger.step({ kind: "output_persisted", step: step.name, path });
  }
  if (policy.cacheOutput) {
    cache.put(ctx.runId, step.name, output);
  }

  logger.step({ kind: "done", step: step.name, ms: Date.now() - stepStart });
  return output;
}

/** Top-level entry: validate the graph below `step`, then evaluate it. */
export async function execute(step: Step, mode: RunMode, external: ExternalInputs): Promise<OutputBundle> {
  step.pipeline.validate(step.name);
  return evaluate(step, {
    mode,
    external,
    runId: step.pipeline.runId,
    fitted: new Set<StepName>()
  });
}
