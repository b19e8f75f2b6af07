import { readFileSync, writeFileSync } from "node:fs";
import type { Args, Awaitable, OutputBundle, Transformer } from "../types/contracts.js";

/**
 * Convenience base: fitting is a no-op and fitted state round-trips through a
 * JSON file. Subclasses with state override `state()` and `restore()`.
 */
export abstract class BaseTransformer implements Transformer {
  fit(_args: Args): Awaitable<this> {
    return this;
  }

  abstract transform(args: Args): Awaitable<OutputBundle>;

  protected state(): unknown {
    return {};
  }

  protected restore(_state: unknown): void {}

  persist(destination: string): void {
    writeFileSync(destination, JSON.stringify(this.state()), "utf-8");
  }

  load(source: string): this {
    this.restore(JSON.parse(readFileSync(source, "utf-8")));
    return this;
  }
}
