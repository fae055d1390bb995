import type { DependencyGraph, FilePath, StepTarget } from "../types/contracts.js";
import type { Workflow } from "../workflow/index.js";
import { topoSort } from "./topo.js";

/**
 * Derives the dependency graph from the declared steps. An output of step A
 * listed as an input (or order-only input) of step B orders A before B.
 * Throws CyclicDependencyError when the edges do not form a DAG.
 */
export function compileGraph(workflow: Workflow): DependencyGraph {
  const producers = new Map<FilePath, number>();
  for (const step of workflow.steps) {
    for (const out of step.outputs) producers.set(out, step.index);
  }

  const targets: StepTarget[] = workflow.steps.map(step => ({ step, upstream: [], downstream: [] }));
  for (const target of targets) {
    for (const input of [...target.step.inputs, ...target.step.orderOnlyInputs]) {
      const producer = producers.get(input);
      if (producer === undefined || target.upstream.includes(producer)) continue;
      target.upstream.push(producer);
      targets[producer].downstream.push(target.step.index);
    }
  }

  const graph: DependencyGraph = {
    targets,
    producers,
    root: workflow.rootTargets(),
    secondary: new Set(workflow.secondaryOutputs),
  };
  topoSort(graph);
  return graph;
}
