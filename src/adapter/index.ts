import type {
  AdapterEntry,
  AdapterMapping,
  Args,
  ExternalInputs,
  Extraction,
  OutputBundle,
  StepName
} from "../types/contracts.js";
import { ResolutionError } from "../errors.js";

export type UpstreamOutputs = Record<StepName, OutputBundle>;

/** Shorthand for an `[source, key]` extraction. */
export function E(source: string, key: string): Extraction {
  return [source, key];
}

function isExtraction(entry: Extraction | readonly Extraction[]): entry is Extraction {
  return typeof entry[0] === "string";
}

function has(bundle: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(bundle, key);
}

function extract(arg: string, [source, key]: Extraction, upstream: UpstreamOutputs, external: ExternalInputs): unknown {
  const bundle = has(upstream, source) ? upstream[source] : has(external, source) ? external[source] : undefined;
  if (bundle === undefined) {
    throw new ResolutionError(`argument '${arg}': source '${source}' is neither an upstream step nor an input bundle`);
  }
  if (!has(bundle, key)) {
    const available = Object.keys(bundle).join(", ") || "(empty)";
    throw new ResolutionError(`argument '${arg}': '${source}' has no key '${key}' (available: ${available})`);
  }
  return bundle[key];
}

function resolveEntry(arg: string, entry: AdapterEntry, upstream: UpstreamOutputs, external: ExternalInputs): unknown {
  if ("inputs" in entry) {
    const values = entry.inputs.map(e => extract(arg, e, upstream, external));
    return entry.combine(values);
  }
  if (isExtraction(entry)) return extract(arg, entry, upstream, external);
  return entry.map(e => extract(arg, e, upstream, external));
}

/**
 * Build transformer keyword arguments. Upstream outputs shadow external
 * bundles of the same name. Without a mapping every key of every source is
 * passed through verbatim and a key offered by two sources is an error.
 */
export function resolve(
  mapping: AdapterMapping | undefined,
  upstream: UpstreamOutputs,
  external: ExternalInputs
): Args {
  if (mapping) {
    const args: Args = {};
    for (const [arg, entry] of Object.entries(mapping)) {
      args[arg] = resolveEntry(arg, entry, upstream, external);
    }
    return args;
  }

  const args: Args = {};
  const origin: Record<string, string> = {};
  const sources: Array<[string, Record<string, unknown>]> = [
    ...Object.entries(upstream),
    ...Object.entries(external)
  ];
  for (const [source, bundle] of sources) {
    for (const [key, value] of Object.entries(bundle)) {
      if (has(origin, key)) {
        throw new ResolutionError(
          `argument '${key}' is provided by both '${origin[key]}' and '${source}'; supply an adapter`
        );
      }
      origin[key] = source;
      args[key] = value;
    }
  }
  return args;
}
