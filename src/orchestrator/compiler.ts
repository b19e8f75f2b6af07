import { z } from "zod";
import type { AdapterMapping, StepGraph, Transformer } from "../types/contracts.js";
import type { TransformerRegistry } from "../types/transformers.js";
import { Pipeline, type PipelineOptions } from "../pipeline/pipeline.js";
import type { Step } from "../pipeline/step.js";
import { GraphError, describe } from "../errors.js";

const extraction = z.tuple([z.string(), z.string()]);

const stepSpecSchema = z.object({
  transformer: z.string().min(1),
  params: z.record(z.unknown()).optional(),
  input_steps: z.array(z.string()).optional(),
  input_data: z.array(z.string()).optional(),
  adapter: z.record(z.union([extraction, z.array(extraction).min(1)])).optional(),
  persist_output: z.boolean().optional(),
  load_persisted_output: z.boolean().optional(),
  cache_output: z.boolean().optional(),
  persist_model: z.boolean().optional(),
  force_fitting: z.boolean().optional()
}).strict();

const stepGraphSchema = z.object({
  steps: z.record(stepSpecSchema),
  output: z.string().min(1)
});

export function parseGraph(draft: unknown): StepGraph {
  const parsed = stepGraphSchema.safeParse(draft);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new GraphError(`invalid step graph: ${issues}`);
  }
  return parsed.data;
}

export interface CompiledGraph {
  pipeline: Pipeline;
  output: Step;
}

/**
 * Instantiate every step of a declarative graph. Steps are added in
 * declaration order, which is also the evaluation order of siblings.
 */
export function compileGraph(draft: unknown, registry: TransformerRegistry, opts: PipelineOptions): CompiledGraph {
  const graph = parseGraph(draft);
  const pipeline = new Pipeline(opts);

  for (const [name, spec] of Object.entries(graph.steps)) {
    const factory = registry[spec.transformer];
    if (!factory) {
      throw new GraphError(`step '${name}': unknown transformer '${spec.transformer}'`);
    }
    let transformer: Transformer;
    try {
      transformer = factory.create(spec.params ?? {});
    } catch (e) {
      throw new GraphError(`step '${name}': ${describe(e)}`);
    }
    const adapter: AdapterMapping | undefined = spec.adapter;
    pipeline.addStep({
      name,
      transformer,
      inputSteps: spec.input_steps,
      inputData: spec.input_data,
      adapter,
      persistOutput: spec.persist_output,
      loadPersistedOutput: spec.load_persisted_output,
      cacheOutput: spec.cache_output,
      persistModel: spec.persist_model,
      forceFitting: spec.force_fitting,
      isTrainable: factory.trainable
    });
  }

  if (!pipeline.has(graph.output)) {
    throw new GraphError(`output step '${graph.output}' is not defined`);
  }
  pipeline.validate();
  return { pipeline, output: pipeline.getStep(graph.output) };
}
