import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Args, OutputBundle, Transformer } from '../types/contracts.js';

export function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'stepgraph-'));
}

/**
 * Records every engine call as "<label>.<op>" into a shared log. The output is
 * `fn(args)` plus the number of fits seen, so tests can tell fitted state apart.
 */
export class SpyTransformer implements Transformer {
  fits = 0;

  constructor(
    readonly label: string,
    readonly log: string[],
    private readonly fn: (args: Args) => OutputBundle = args => ({ ...args })
  ) {}

  fit(_args: Args): this {
    this.log.push(`${this.label}.fit`);
    this.fits += 1;
    return this;
  }

  transform(args: Args): OutputBundle {
    this.log.push(`${this.label}.transform`);
    return this.fn(args);
  }

  persist(destination: string): void {
    this.log.push(`${this.label}.persist`);
    writeFileSync(destination, JSON.stringify({ fits: this.fits }), 'utf-8');
  }

  load(source: string): this {
    this.log.push(`${this.label}.load`);
    const state: unknown = JSON.parse(readFileSync(source, 'utf-8'));
    if (state && typeof state === 'object' && 'fits' in state && typeof state.fits === 'number') {
      this.fits = state.fits;
    }
    return this;
  }
}

export class FailingTransformer extends SpyTransformer {
  constructor(label: string, log: string[], readonly error: Error) {
    super(label, log);
  }

  transform(args: Args): OutputBundle {
    super.transform(args);
    throw this.error;
  }
}

export const count = (log: string[], entry: string) => log.filter(l => l === entry).length;
