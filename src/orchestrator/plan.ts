import { stat } from "node:fs/promises";
import path from "node:path";
import type { DependencyGraph, FilePath, StepContract } from "../types/contracts.js";
import { EngineInvocationError } from "../errors.js";
import { normPath } from "../workflow/paths.js";
import { ROOT_TARGET, TITLE_TARGET } from "../makefile/renderer.js";
import { topoSort } from "./topo.js";

/** Modification time in ms, or undefined when the file does not exist. */
export type StatFn = (file: string) => Promise<number | undefined>;

export type StaleReason = "forced" | "missing" | "outdated" | "upstream" | "needed";

export interface PlannedStep {
  step: StepContract;
  reason: StaleReason;
}

export interface PlanOptions {
  cwd: string;
  force?: boolean;
  target?: string;
  /** Steps older than this file are stale too. */
  descriptionPath?: string;
  stat?: StatFn;
}

export const statMtime: StatFn = file =>
  stat(file).then(
    s => s.mtimeMs,
    (e: NodeJS.ErrnoException) => {
      if (e.code === "ENOENT" || e.code === "ENOTDIR") return undefined;
      throw e;
    }
  );

/**
 * Decides which steps must run, in dependency order. A step is stale when a
 * non-secondary output is missing, its oldest output is older than its newest
 * input (or the description), or a step producing one of its inputs runs.
 * Missing secondary outputs are only rebuilt when a stale step needs them.
 */
export async function planWorkflow(graph: DependencyGraph, opts: PlanOptions): Promise<PlannedStep[]> {
  const statFn = opts.stat ?? statMtime;
  const resolve = (file: FilePath) => path.resolve(opts.cwd, file);

  const requested = requestedFiles(graph, opts.target);
  const needed = new Set<number>();
  const visit = (file: FilePath) => {
    const p = graph.producers.get(file);
    if (p === undefined || needed.has(p)) return;
    needed.add(p);
    const step = graph.targets[p].step;
    for (const input of [...step.inputs, ...step.orderOnlyInputs]) visit(input);
  };
  requested.forEach(visit);

  const order = topoSort(graph).filter(i => needed.has(i));

  const mtimes = new Map<FilePath, number | undefined>();
  const files = new Set<FilePath>(requested);
  for (const i of order) {
    const s = graph.targets[i].step;
    [...s.inputs, ...s.orderOnlyInputs, ...s.outputs].forEach(f => files.add(f));
  }
  await Promise.all([...files].map(async f => { mtimes.set(f, await statFn(resolve(f))); }));
  const exists = (f: FilePath) => mtimes.get(f) !== undefined;

  for (const f of requested) {
    if (!graph.producers.has(f) && !exists(f)) {
      throw new EngineInvocationError(`No rule to make target '${f}'`);
    }
  }
  for (const i of order) {
    const s = graph.targets[i].step;
    for (const input of [...s.inputs, ...s.orderOnlyInputs]) {
      if (!graph.producers.has(input) && !exists(input)) {
        throw new EngineInvocationError(`No rule to make target '${input}', needed by '${s.outputs[0]}'`);
      }
    }
  }

  const descTime = opts.descriptionPath ? await statFn(resolve(opts.descriptionPath)) : undefined;
  const stale = new Map<number, StaleReason>();
  // Stand-in times for missing secondary outputs that nothing has asked for yet.
  const virtual = new Map<FilePath, number>();
  const timeOf = (f: FilePath) => mtimes.get(f) ?? virtual.get(f) ?? -Infinity;
  const producerStale = (f: FilePath) => {
    const p = graph.producers.get(f);
    return p !== undefined && stale.has(p);
  };

  for (const i of order) {
    const s = graph.targets[i].step;
    if (opts.force) { stale.set(i, "forced"); continue; }
    if (s.outputs.some(o => !exists(o) && !graph.secondary.has(o))) { stale.set(i, "missing"); continue; }
    if (s.inputs.some(producerStale)) { stale.set(i, "upstream"); continue; }

    const newestInput = Math.max(-Infinity, descTime ?? -Infinity, ...s.inputs.map(timeOf));
    const present = s.outputs.map(o => mtimes.get(o)).filter((t): t is number => t !== undefined);
    const oldestOutput = present.length ? Math.min(...present) : undefined;
    if (oldestOutput !== undefined && oldestOutput < newestInput) { stale.set(i, "outdated"); continue; }
    for (const o of s.outputs) {
      if (!exists(o)) virtual.set(o, oldestOutput ?? newestInput);
    }
  }

  // A stale step pulls in the producers of its missing inputs; those in turn
  // make their other dependents stale.
  let changed = true;
  while (changed) {
    changed = false;
    for (const i of [...order].reverse()) {
      if (!stale.has(i)) continue;
      const s = graph.targets[i].step;
      for (const input of [...s.inputs, ...s.orderOnlyInputs]) {
        const p = graph.producers.get(input);
        if (p !== undefined && !stale.has(p) && !exists(input)) {
          stale.set(p, "needed");
          changed = true;
        }
      }
    }
    for (const i of order) {
      if (!stale.has(i) && graph.targets[i].step.inputs.some(producerStale)) {
        stale.set(i, "upstream");
        changed = true;
      }
    }
  }

  return order.flatMap(i => {
    const reason = stale.get(i);
    return reason ? [{ step: graph.targets[i].step, reason }] : [];
  });
}

function requestedFiles(graph: DependencyGraph, target: string | undefined): FilePath[] {
  if (target === undefined || target === ROOT_TARGET) return graph.root;
  if (target === TITLE_TARGET) return [];
  return [normPath(target)];
}
