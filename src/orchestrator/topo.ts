import type { StepName } from "../types/contracts.js";
import { GraphError } from "../errors.js";

/** Step name -> declared upstream names, in declaration order. */
export type Dependencies = ReadonlyMap<StepName, readonly StepName[]>;

/** `target` and everything it transitively depends on. */
export function closure(deps: Dependencies, target: StepName): StepName[] {
  const seen = new Set<StepName>();
  const stack: StepName[] = [target];
  while (stack.length) {
    const u = stack.pop();
    if (u === undefined || seen.has(u)) continue;
    const ups = deps.get(u);
    if (!ups) throw new GraphError(`unknown step '${u}'`);
    seen.add(u);
    for (const v of ups) {
      if (!deps.has(v)) throw new GraphError(`step '${u}' depends on unknown step '${v}'`);
      stack.push(v);
    }
  }
  return Array.from(deps.keys()).filter(k => seen.has(k));
}

/**
 * Upstream-first ordering of `names` (default: every step). Ties keep
 * declaration order. Throws GraphError when the steps contain a cycle.
 */
export function topoSort(deps: Dependencies, names: readonly StepName[] = Array.from(deps.keys())): StepName[] {
  const members = new Set(names);
  const indeg: Record<string, number> = {};
  const adj: Record<string, string[]> = {};
  for (const id of names) {
    indeg[id] = 0; adj[id] = [];
  }
  for (const id of names) {
    for (const up of deps.get(id) ?? []) {
      if (!members.has(up)) continue;
      indeg[id] += 1;
      adj[up].push(id);
    }
  }
  const q: string[] = names.filter(k => indeg[k] === 0);
  const out: string[] = [];
  while (q.length) {
    const u = q.shift();
    if (u === undefined) break;
    out.push(u);
    for (const v of adj[u]) {
      indeg[v] -= 1;
      if (indeg[v] === 0) q.push(v);
    }
  }
  if (out.length !== names.length) {
    const stuck = names.filter(k => indeg[k] > 0);
    throw new GraphError(`step graph has a cycle through: ${stuck.join(", ")}`);
  }
  return out;
}
