import type { StepDefinition, StepName } from "../types/contracts.js";
import { CacheStore } from "../store/cache.js";
import { PersistenceStore, type RecordKind } from "../store/persistence.js";
import { closure, topoSort, type Dependencies } from "../orchestrator/topo.js";
import { createLogger, type Logger } from "../logging.js";
import { GraphError } from "../errors.js";
import { Step } from "./step.js";

export interface PipelineOptions {
  /** Root of every persisted model and output record of this pipeline. */
  experimentDir: string;
  runId?: string;
  logger?: Logger;
  cache?: CacheStore;
  persistence?: PersistenceStore;
}

const STEP_NAME = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

export function newRunId(): string {
  return new Date().toISOString().replace(/[:.]/g, "-");
}

/** Registry of steps by name. Steps refer to each other only through it. */
export class Pipeline {
  readonly experimentDir: string;
  readonly cache: CacheStore;
  readonly persistence: PersistenceStore;
  readonly logger: Logger;

  private readonly registry = new Map<StepName, Step>();
  private currentRun: string;

  constructor(opts: PipelineOptions) {
    this.experimentDir = opts.experimentDir;
    this.cache = opts.cache ?? new CacheStore();
    this.persistence = opts.persistence ?? new PersistenceStore();
    this.logger = opts.logger ?? createLogger();
    this.currentRun = opts.runId ?? newRunId();
  }

  get runId(): string {
    return this.currentRun;
  }

  addStep(def: StepDefinition): Step {
    if (!STEP_NAME.test(def.name)) {
      throw new GraphError(`invalid step name '${def.name}'`);
    }
    if (this.registry.has(def.name)) {
      throw new GraphError(`duplicate step name '${def.name}'`);
    }
    const ups = def.inputSteps ?? [];
    const dup = ups.find((n, i) => ups.indexOf(n) !== i);
    if (dup !== undefined) {
      throw new GraphError(`step '${def.name}' lists upstream '${dup}' more than once`);
    }
    const step = new Step(this, def);
    this.registry.set(def.name, step);
    return step;
  }

  has(name: StepName): boolean {
    return this.registry.has(name);
  }

  getStep(name: StepName): Step {
    const step = this.registry.get(name);
    if (!step) throw new GraphError(`unknown step '${name}'`);
    return step;
  }

  steps(): Step[] {
    return Array.from(this.registry.values());
  }

  dependencies(): Dependencies {
    return new Map(this.steps().map((s): [StepName, readonly StepName[]] => [s.name, s.inputSteps]));
  }

  /**
   * Check that `target` (default: every step) and its upstream graph reference
   * only known steps and contain no cycle. Returns the upstream-first order.
   */
  validate(target?: StepName): StepName[] {
    const deps = this.dependencies();
    return topoSort(deps, target === undefined ? undefined : closure(deps, target));
  }

  /** Switch the cache scope to a new run. Records of earlier runs are kept. */
  startRun(runId: string = newRunId()): string {
    this.currentRun = runId;
    return runId;
  }

  /** Drop cached outputs of the current run, or of one step in it. */
  clearCache(step?: StepName): void {
    this.cache.clear(this.currentRun, step);
  }

  clearPersisted(step?: StepName, kind?: RecordKind): void {
    if (step === undefined && kind === undefined) {
      this.persistence.clearAll(this.experimentDir);
      return;
    }
    const names = step === undefined ? Array.from(this.registry.keys()) : [this.getStep(step).name];
    for (const name of names) {
      const kinds: RecordKind[] = kind ? [kind] : ["model", "output"];
      for (const k of kinds) this.persistence.clear({ experimentDir: this.experimentDir, step: name }, k);
    }
  }
}
