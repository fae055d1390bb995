import type { DependencyGraph } from "../types/contracts.js";
import { CyclicDependencyError } from "../errors.js";

export function topoSort(graph: DependencyGraph): number[] {
  const indeg = graph.targets.map(t => t.upstream.length);
  const q: number[] = [];
  indeg.forEach((d, i) => { if (d === 0) q.push(i); });
  const out: number[] = [];
  while (q.length) {
    const u = q.shift();
    if (u === undefined) break;
    out.push(u);
    for (const v of graph.targets[u].downstream) {
      indeg[v] -= 1;
      if (indeg[v] === 0) q.push(v);
    }
  }
  if (out.length !== graph.targets.length) {
    throw new CyclicDependencyError(findCycle(graph, new Set(out)));
  }
  return out;
}

// Every node left over by Kahn's algorithm has a left-over upstream, so
// walking upstream from any of them must revisit a node.
function findCycle(graph: DependencyGraph, sorted: Set<number>): string[] {
  const start = graph.targets.findIndex((_, i) => !sorted.has(i));
  const path: number[] = [];
  let cur = start;
  while (!path.includes(cur)) {
    path.push(cur);
    const next = graph.targets[cur].upstream.find(u => !sorted.has(u));
    if (next === undefined) break;
    cur = next;
  }
  const cycle = path.slice(path.indexOf(cur)).reverse();
  cycle.push(cycle[0]);
  return cycle.map(i => graph.targets[i].step.outputs[0]);
}
