import type { Args, Awaitable, OutputBundle } from "../types/contracts.js";
import { BaseTransformer } from "./base.js";

/** Passes its arguments through as the output bundle. */
export class IdentityOperation extends BaseTransformer {
  transform(args: Args): OutputBundle {
    return { ...args };
  }
}

class FunctionTransformer extends BaseTransformer {
  constructor(private readonly fn: (args: Args) => Awaitable<OutputBundle>) {
    super();
  }

  transform(args: Args): Awaitable<OutputBundle> {
    return this.fn(args);
  }
}

/** Wrap a stateless function; use with `isTrainable: false`. */
export function makeTransformer(fn: (args: Args) => Awaitable<OutputBundle>): BaseTransformer {
  return new FunctionTransformer(fn);
}
