import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { compileGraph } from '../../orchestrator/compiler.js';
import { buildTransformerRegistry } from '../../transformers/registry.js';
import { loadConfig } from '../../config.js';
import { createLogger } from '../../logging.js';
import type { InputBundle } from '../../types/contracts.js';

function getArg(name: string, fallback: string): string {
  const ix = process.argv.findIndex(a => a === name || a.startsWith(name + '='));
  if (ix === -1) return fallback;
  const val = process.argv[ix];
  if (val.includes('=')) return val.split('=')[1];
  return process.argv[ix+1] ?? fallback;
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(resolve(process.cwd(), path), 'utf-8'));
}

function bundle(path: string): InputBundle {
  const data = readJson(path);
  if (!data || typeof data !== 'object' || Array.isArray(data)) throw new Error(`${path}: expected a JSON object`);
  return { ...data };
}

function accuracy(pred: unknown, truth: unknown): number {
  if (!Array.isArray(pred) || !Array.isArray(truth) || truth.length === 0) return 0;
  return truth.filter((t, i) => pred[i] === t).length / truth.length;
}

async function main() {
  const dir = getArg('--dir', 'src/examples/text_classify');
  const config = loadConfig();
  const logger = createLogger({ quiet: config.quiet, logSteps: config.logSteps, logCache: true });

  const { pipeline, output } = compileGraph(readJson(`${dir}/graph.json`), buildTransformerRegistry(), {
    experimentDir: getArg('--experiment', config.experimentDir),
    logger
  });
  // Start clean: persisted records carry no fingerprint of the data they came from.
  pipeline.clearPersisted();

  const train = bundle(`${dir}/train.json`);
  const test = bundle(`${dir}/test.json`);

  pipeline.startRun('train');
  const fitted = await output.fitTransform({ input: train });
  console.log(`\n[train] accuracy ${accuracy(fitted.y_pred, train.label).toFixed(2)}`);

  // New run id: count_vec caches its output per run, and the training
  // matrix must not be served for the test texts.
  pipeline.startRun('test');
  const scored = await output.transform({ input: test });
  console.log(`[test] accuracy ${accuracy(scored.y_pred, test.label).toFixed(2)}`);
  console.log('[test] predictions', JSON.stringify(scored.y_pred));
}

main().catch(e => { console.error(e); process.exit(1); });
