import type { DependencyGraph } from "../types/contracts.js";
import type { EngineRequest, RunResult } from "../types/engine.js";
import type { Workflow } from "../workflow/index.js";

export interface Engine {
  readonly name: string;
  execute(workflow: Workflow, graph: DependencyGraph, request: EngineRequest): Promise<RunResult>;
}
