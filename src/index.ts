export { Workflow, stepLabel } from './workflow/index.js';
export { WorkflowDefinitionSchema, StepDefinitionSchema } from './workflow/schema.js';
export type { WorkflowDefinition, StepDefinition } from './workflow/schema.js';
export { compileGraph } from './orchestrator/compiler.js';
export { topoSort } from './orchestrator/topo.js';
export { planWorkflow, statMtime } from './orchestrator/plan.js';
export type { PlannedStep, PlanOptions, StaleReason, StatFn } from './orchestrator/plan.js';
export { runWorkflow, planRun, describePlan, createEngine } from './orchestrator/run.js';
export type { RunOptions } from './orchestrator/run.js';
export { renderMakefile, ROOT_TARGET, TITLE_TARGET } from './makefile/renderer.js';
export type { RenderOptions } from './makefile/renderer.js';
export { escapeTarget, escapePrereq, escapeRecipe, commandLine, echoLine, printLine } from './makefile/escape.js';
export { MakeEngine, detectMakeVersion, parseMakeVersion, supportsGroupedTargets } from './engine/make.js';
export { LocalEngine } from './engine/local.js';
export type { Engine } from './engine/provider.js';
export { shellRunner, spawnProcess } from './tools/cli/exec.js';
export type { ShellRunner, ProcessSpawner, ProcessResult } from './tools/cli/exec.js';
export { loadConfig } from './config.js';
export type { StepmakeConfig, EngineName } from './config.js';
export { createLogger, silentLogger } from './log.js';
export type { Logger } from './log.js';
export * from './errors.js';
export type * from './types/contracts.js';
export type * from './types/engine.js';
