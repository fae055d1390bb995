// src/orchestrator/run.ts
// Compiles the workflow at run time and hands it to an engine. Errors are
// classified here: declaration problems never reach an engine, command
// failures become WorkflowFailedError, engine problems pass through.

import path from "node:path";
import type { EngineRequest, RunResult } from "../types/engine.js";
import type { Engine } from "../engine/provider.js";
import type { Workflow } from "../workflow/index.js";
import { stepLabel } from "../workflow/index.js";
import { loadConfig, type EngineName, type StepmakeConfig } from "../config.js";
import { createLogger, fmtMs, COLOR, type Logger } from "../log.js";
import { DeclarationError, WorkflowFailedError } from "../errors.js";
import { MakeEngine } from "../engine/make.js";
import { LocalEngine } from "../engine/local.js";
import { shellRunner } from "../tools/cli/exec.js";
import { compileGraph } from "./compiler.js";
import { planWorkflow, type PlannedStep } from "./plan.js";
import { writeJson } from "./materialize.js";

export interface RunOptions {
  jobs?: number;
  dryRun?: boolean;
  force?: boolean;
  keepGoing?: boolean;
  ignoreErrors?: boolean;
  debug?: boolean;
  target?: string;
  extraArgs?: string[];
  makefile?: string;
  cwd?: string;
  engine?: EngineName | Engine;
  logger?: Logger;
  config?: StepmakeConfig;
}

export function createEngine(name: EngineName, config: StepmakeConfig, logger: Logger): Engine {
  return name === "local"
    ? new LocalEngine({ shell: shellRunner(config.shellBin), logger })
    : new MakeEngine({ makeBin: config.makeBin, logger });
}

/**
 * Runs every stale step the aggregate root (or `target`) needs.
 * `runWorkflow(wf, 4)` is shorthand for `{ jobs: 4 }`.
 */
export async function runWorkflow(workflow: Workflow, options: RunOptions | number = {}): Promise<RunResult> {
  const opts = typeof options === "number" ? { jobs: options } : options;
  const config = opts.config ?? loadConfig();
  const logger = opts.logger ?? createLogger(config.log);
  const jobs = opts.jobs ?? config.jobs;
  if (!Number.isInteger(jobs) || jobs < 1) {
    throw new DeclarationError(`jobs must be a positive integer, got ${jobs}`);
  }

  const graph = compileGraph(workflow);
  workflow.freeze();
  const engine = typeof opts.engine === "object" ? opts.engine : createEngine(opts.engine ?? config.engine, config, logger);
  const request: EngineRequest = {
    jobs,
    dryRun: opts.dryRun ?? false,
    force: opts.force ?? false,
    keepGoing: opts.keepGoing ?? false,
    ignoreErrors: opts.ignoreErrors ?? false,
    debug: opts.debug ?? false,
    target: opts.target,
    extraArgs: opts.extraArgs ?? [],
    makefile: opts.makefile,
    cwd: opts.cwd ?? process.cwd(),
  };

  const result = await engine.execute(workflow, graph, request);
  if (config.runId) {
    writeJson(config.runId, "run.json", { ...result, steps: workflow.steps.length, jobs }, path.join(request.cwd, "runs"));
  }

  if (!result.ok) {
    logger.error(`✗ workflow failed (status ${result.exitCode})${result.failed.length ? `: ${result.failed.join(", ")}` : ""}`);
    throw new WorkflowFailedError(result.exitCode, result.failed);
  }
  logger.info(`${COLOR.green("✓ workflow up to date")} ${COLOR.gray("(" + fmtMs(result.durationMs) + ")")}`);
  return result;
}

/**
 * Steps a run would execute right now, judged by the in-process staleness
 * rules. Nothing is run.
 */
export async function planRun(workflow: Workflow, options: Pick<RunOptions, "cwd" | "force" | "target" | "makefile"> = {}): Promise<PlannedStep[]> {
  const graph = compileGraph(workflow);
  return planWorkflow(graph, {
    cwd: options.cwd ?? process.cwd(),
    force: options.force,
    target: options.target,
    descriptionPath: options.makefile,
  });
}

export function describePlan(planned: PlannedStep[]): string[] {
  return planned.map(p => `${stepLabel(p.step)} (${p.reason})`);
}
