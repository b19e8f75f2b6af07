import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { z } from "zod";
import type { OutputBundle, StepName } from "../types/contracts.js";
import { PersistenceError } from "../errors.js";

export type RecordKind = "model" | "output";

export interface Scope {
  experimentDir: string;
  step: StepName;
}

const SUBDIR: Record<RecordKind, string> = {
  model: "models",
  output: "outputs"
};

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

const isPlainObject = (v: object) => {
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
};

// Only values that survive JSON.stringify/parse unchanged: no NaN or Infinity,
// no undefined, no typed arrays or class instances.
const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValue),
    z.record(jsonValue).refine(isPlainObject, "not a plain object")
  ])
);

const payloadSchema = z.record(jsonValue);

const recordSchema = z.object({
  step: z.string(),
  kind: z.enum(["model", "output"]),
  savedAt: z.string(),
  payload: payloadSchema
});

export type PersistedRecord = z.infer<typeof recordSchema>;

/**
 * Durable per-step slots under an experiment directory:
 *
 *   <experimentDir>/models/<step>    fitted transformer state (written by the transformer)
 *   <experimentDir>/outputs/<step>   JSON envelope around an output bundle
 *
 * A record stays valid until cleared. Nothing here knows which data produced it.
 */
export class PersistenceStore {
  path(scope: Scope, kind: RecordKind): string {
    return join(scope.experimentDir, SUBDIR[kind], scope.step);
  }

  /** Create the parent directory of a slot so a transformer can write into it. */
  prepare(scope: Scope, kind: RecordKind): string {
    const path = this.path(scope, kind);
    try {
      mkdirSync(dirname(path), { recursive: true });
    } catch (e) {
      throw new PersistenceError(path, "cannot create directory for", e);
    }
    return path;
  }

  exists(scope: Scope, kind: RecordKind): boolean {
    return existsSync(this.path(scope, kind));
  }

  /** Write an output bundle. Throws before touching disk if it would not read back as written. */
  put(scope: Scope, kind: RecordKind, value: OutputBundle): string {
    const checked = payloadSchema.safeParse(value);
    if (!checked.success) {
      const key = checked.error.issues[0]?.path.join(".") ?? "";
      throw new PersistenceError(this.path(scope, kind), "cannot write", new Error(`key '${key}' is not a JSON value`));
    }
    const path = this.prepare(scope, kind);
    const rec: PersistedRecord = { step: scope.step, kind, savedAt: new Date().toISOString(), payload: checked.data };
    try {
      writeFileSync(path, JSON.stringify(rec), "utf-8");
    } catch (e) {
      throw new PersistenceError(path, "cannot write", e);
    }
    return path;
  }

  get(scope: Scope, kind: RecordKind): OutputBundle | undefined {
    const path = this.path(scope, kind);
    if (!existsSync(path)) return undefined;
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (e) {
      throw new PersistenceError(path, "cannot read", e);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new PersistenceError(path, "malformed record in", e);
    }
    const result = recordSchema.safeParse(parsed);
    if (!result.success) {
      throw new PersistenceError(path, "malformed record in", result.error);
    }
    return result.data.payload;
  }

  clear(scope: Scope, kind: RecordKind): void {
    const path = this.path(scope, kind);
    try {
      rmSync(path, { recursive: true, force: true });
    } catch (e) {
      throw new PersistenceError(path, "cannot remove", e);
    }
  }

  /** Remove every record of an experiment. */
  clearAll(experimentDir: string): void {
    try {
      rmSync(experimentDir, { recursive: true, force: true });
    } catch (e) {
      throw new PersistenceError(experimentDir, "cannot remove", e);
    }
  }
}
