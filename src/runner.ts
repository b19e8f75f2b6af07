#!/usr/bin/env node
// src/runner.ts
// Generic runner:
// - compiles a step graph JSON against the built-in transformer registry
// - input bundles via --input name=path.json (each file holds one JSON object)
// - --mode fit (default) fits unfitted steps, --mode transform never fits
// - experiment directory / run id from flags, falling back to EXPERIMENT_DIR / RUN_ID
import 'dotenv/config';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { compileGraph } from './orchestrator/compiler.js';
import { buildTransformerRegistry } from './transformers/registry.js';
import { loadConfig } from './config.js';
import { createLogger } from './logging.js';
import type { ExternalInputs, OutputBundle, RunMode } from './types/contracts.js';

type InputSpec = { name: string; path: string };

export interface RunnerArgs {
  graphPath?: string;
  inputs: InputSpec[];
  mode: RunMode;
  experimentDir?: string;
  runId?: string;
  clearExperiment: boolean;
}

export function parseArgs(argv: string[]): RunnerArgs {
  const out: RunnerArgs = { inputs: [], mode: 'fit', clearExperiment: false };
  const pushInput = (spec: string) => {
    const eq = spec.indexOf('=');
    if (eq <= 0) throw new Error(`--input expects name=path, got '${spec}'`);
    out.inputs.push({ name: spec.slice(0, eq), path: spec.slice(eq + 1) });
  };
  const setMode = (m: string) => {
    if (m !== 'fit' && m !== 'transform') throw new Error(`--mode must be fit or transform, got '${m}'`);
    out.mode = m;
  };
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    const next = () => argv[i + 1];
    if (a.startsWith('--graph=')) out.graphPath = a.slice('--graph='.length);
    else if (a === '--graph' && next()) out.graphPath = argv[++i];
    else if (a.startsWith('--input=')) pushInput(a.slice('--input='.length));
    else if (a === '--input' && next()) pushInput(argv[++i]);
    else if (a.startsWith('--mode=')) setMode(a.slice('--mode='.length));
    else if (a === '--mode' && next()) setMode(argv[++i]);
    else if (a.startsWith('--experiment=')) out.experimentDir = a.slice('--experiment='.length);
    else if (a === '--experiment' && next()) out.experimentDir = argv[++i];
    else if (a.startsWith('--run-id=')) out.runId = a.slice('--run-id='.length);
    else if (a === '--run-id' && next()) out.runId = argv[++i];
    else if (a === '--clear-experiment') out.clearExperiment = true;
    else throw new Error(`unrecognized argument '${a}'`);
  }
  return out;
}

const bundleSchema = z.record(z.unknown());

export function readInputBundle(spec: InputSpec, limitMB: number): Record<string, unknown> {
  const st = fs.statSync(spec.path);
  const sizeMB = st.size / (1024 * 1024);
  if (sizeMB > limitMB) throw new Error(`Input file too large: ${spec.path} (${sizeMB.toFixed(2)}MB > ${limitMB}MB). Set MAX_INPUT_FILE_MB to override.`);
  let parsed: unknown;
  try { parsed = JSON.parse(fs.readFileSync(spec.path, 'utf8')); }
  catch (e) { throw new Error(`Failed to parse JSON file '${spec.path}': ${e instanceof Error ? e.message : String(e)}`); }
  const bundle = bundleSchema.safeParse(parsed);
  if (!bundle.success) throw new Error(`Input bundle '${spec.name}' must be a JSON object: ${spec.path}`);
  return bundle.data;
}

export async function runGraphFile(args: RunnerArgs & { graphPath: string }): Promise<OutputBundle> {
  const config = loadConfig();
  const logger = createLogger({ quiet: config.quiet, logSteps: config.logSteps, logCache: config.logCache });
  const raw: unknown = JSON.parse(fs.readFileSync(args.graphPath, 'utf8'));

  const { pipeline, output } = compileGraph(raw, buildTransformerRegistry(), {
    experimentDir: args.experimentDir ?? config.experimentDir,
    runId: args.runId ?? config.runId,
    logger
  });

  if (args.clearExperiment) {
    logger.info(`[Runner] clearing experiment directory ${pipeline.experimentDir}`);
    pipeline.clearPersisted();
  }

  const limitMB = Number(process.env.MAX_INPUT_FILE_MB || 16);
  const inputs: ExternalInputs = {};
  for (const spec of args.inputs) inputs[spec.name] = readInputBundle(spec, limitMB);

  logger.info(`[Runner] ${args.mode} '${output.name}' (run ${pipeline.runId}, experiment ${pipeline.experimentDir})`);
  return args.mode === 'fit' ? output.fitTransform(inputs) : output.transform(inputs);
}

if (process.argv[1] && fs.existsSync(process.argv[1]) && fs.realpathSync(process.argv[1]) === fileURLToPath(import.meta.url)) {
  (async () => {
    const args = parseArgs(process.argv);
    const { graphPath } = args;
    if (!graphPath) {
      console.error('Usage: stepgraph --graph path/to/graph.json [--input name=path.json]... [--mode fit|transform] [--experiment dir] [--run-id id] [--clear-experiment]');
      process.exit(2);
    }
    const result = await runGraphFile({ ...args, graphPath });
    console.log(JSON.stringify(result, null, 2));
  })().catch(e => { console.error('[fatal]', e instanceof Error ? e.message : e); process.exit(1); });
}
