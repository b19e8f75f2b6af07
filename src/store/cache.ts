import type { OutputBundle, StepName } from "../types/contracts.js";

export interface CacheRecord<T = OutputBundle> {
  v: number;
  value: T;
  at: string; // ISO timestamp
}

/**
 * In-memory step outputs scoped by run id. Records live until cleared;
 * nothing expires at the end of a run.
 *
 * Values are copied with `structuredClone` going in and coming out, so a
 * consumer mutating its arguments never changes what the next consumer reads.
 */
export class CacheStore {
  private readonly runsById = new Map<string, Map<StepName, CacheRecord[]>>();

  put(runId: string, step: StepName, value: OutputBundle): CacheRecord {
    const run = this.runsById.get(runId) ?? new Map<StepName, CacheRecord[]>();
    const arr = run.get(step) ?? [];
    const rec: CacheRecord = { v: (arr[arr.length - 1]?.v ?? 0) + 1, value: structuredClone(value), at: new Date().toISOString() };
    arr.push(rec);
    run.set(step, arr);
    this.runsById.set(runId, run);
    return rec;
  }

  get(runId: string, step: StepName): OutputBundle | undefined {
    const arr = this.runsById.get(runId)?.get(step);
    if (!arr || arr.length === 0) return undefined;
    return structuredClone(arr[arr.length - 1].value);
  }

  has(runId: string, step: StepName): boolean {
    const arr = this.runsById.get(runId)?.get(step);
    return !!(arr && arr.length > 0);
  }

  clear(runId: string, step?: StepName): void {
    if (step === undefined) {
      this.runsById.delete(runId);
      return;
    }
    this.runsById.get(runId)?.delete(step);
  }

  runs(): string[] {
    return Array.from(this.runsById.keys());
  }

  keys(runId: string): StepName[] {
    return Array.from(this.runsById.get(runId)?.keys() ?? []);
  }
}
