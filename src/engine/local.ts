import path from "node:path";
import type { DependencyGraph } from "../types/contracts.js";
import type { EngineRequest, RunResult } from "../types/engine.js";
import type { Engine } from "./provider.js";
import type { Logger } from "../log.js";
import { createLogger } from "../log.js";
import { EngineInvocationError } from "../errors.js";
import { stepLabel, type Workflow } from "../workflow/index.js";
import { planWorkflow, type PlannedStep, type StatFn } from "../orchestrator/plan.js";
import { LIST_HEADING, LIST_TARGET, renderMakefile } from "../makefile/renderer.js";
import { writeIfChanged } from "../makefile/description.js";
import { shellRunner, type ShellRunner } from "../tools/cli/exec.js";

export interface LocalEngineOptions {
  shell?: ShellRunner;
  logger?: Logger;
  stat?: StatFn;
}

type StepStatus = "pending" | "running" | "done" | "failed";

/**
 * Runs the workflow in-process: the same staleness rules as make, with
 * independent stale steps on a pool of at most `jobs` workers.
 */
export class LocalEngine implements Engine {
  readonly name = "local";
  private readonly shell: ShellRunner;
  private readonly logger: Logger;

  constructor(private readonly options: LocalEngineOptions = {}) {
    this.shell = options.shell ?? shellRunner();
    this.logger = options.logger ?? createLogger();
  }

  async execute(workflow: Workflow, graph: DependencyGraph, request: EngineRequest): Promise<RunResult> {
    const started = Date.now();
    const result = (partial: Pick<RunResult, "executed" | "failed" | "skipped">): RunResult => ({
      ...partial,
      ok: partial.failed.length === 0,
      exitCode: partial.failed.length === 0 ? 0 : 2,
      engine: this.name,
      dryRun: request.dryRun,
      durationMs: Date.now() - started,
    });

    if (request.extraArgs.length > 0) {
      throw new EngineInvocationError(`the local engine takes no extra arguments, got '${request.extraArgs.join(" ")}'`);
    }

    if (request.target === "clean") {
      if (workflow.cleanCommands.length === 0) throw new EngineInvocationError("No rule to make target 'clean'");
      const ok = request.dryRun ? true : await this.runCommands(workflow.cleanCommands, false, request);
      return result({ executed: ["clean"], failed: ok ? [] : ["clean"], skipped: [] });
    }

    if (request.makefile !== undefined) {
      await writeIfChanged(path.resolve(request.cwd, request.makefile), renderMakefile(workflow, { trackDescription: true }));
    }
    const listing = request.target === LIST_TARGET;
    const planned = await planWorkflow(graph, {
      cwd: request.cwd,
      force: request.force,
      target: listing ? undefined : request.target,
      descriptionPath: request.makefile,
      stat: this.options.stat,
    });

    if (listing) {
      this.logger.info(LIST_HEADING);
      planned.forEach(p => this.logger.info(stepLabel(p.step)));
      return result({ executed: [], failed: [], skipped: [] });
    }
    if (request.debug) {
      planned.forEach(p => this.logger.info(`[plan] ${stepLabel(p.step)} (${p.reason})`));
    }

    if (workflow.title !== undefined) this.logger.title(workflow.title);

    if (request.dryRun) {
      for (const { step } of planned) {
        if (step.title !== undefined) this.logger.title(step.title);
        step.commands.forEach(cmd => this.logger.command(cmd));
      }
      return result({ executed: planned.map(p => stepLabel(p.step)), failed: [], skipped: [] });
    }

    return result(await this.schedule(graph, planned, request));
  }

  private async schedule(graph: DependencyGraph, planned: PlannedStep[], request: EngineRequest) {
    const status = new Map<number, StepStatus>(planned.map(p => [p.step.index, "pending"]));
    const running = new Map<number, Promise<void>>();
    const executed: string[] = [];
    const failed: string[] = [];
    let halted = false;
    const fatal: unknown[] = [];
    let started = 0;

    // Only stale producers gate a step; up-to-date ones have nothing left to do.
    const ready = (p: PlannedStep) =>
      status.get(p.step.index) === "pending" &&
      graph.targets[p.step.index].upstream.every(u => !status.has(u) || status.get(u) === "done");

    while (true) {
      if (!halted) {
        for (const p of planned) {
          if (running.size >= request.jobs) break;
          if (!ready(p)) continue;
          const idx = p.step.index;
          const label = stepLabel(p.step);
          status.set(idx, "running");
          const n = ++started;
          const t0 = Date.now();
          const job = (async () => {
            this.logger.step(n, planned.length, label);
            if (p.step.title !== undefined) this.logger.title(p.step.title);
            executed.push(label);
            const ok = await this.runCommands(p.step.commands, p.step.quiet, request);
            status.set(idx, ok ? "done" : "failed");
            if (ok) {
              this.logger.done(label, Date.now() - t0);
            } else {
              failed.push(label);
              if (!request.keepGoing) halted = true;
            }
          })()
            .catch((e: unknown) => {
              fatal.push(e);
              halted = true;
              status.set(idx, "failed");
            })
            .finally(() => running.delete(idx));
          running.set(idx, job);
        }
      }
      if (running.size === 0) break;
      await Promise.race(running.values());
    }
    if (fatal.length) throw fatal[0];

    const skipped = planned.filter(p => status.get(p.step.index) === "pending").map(p => stepLabel(p.step));
    return { executed, failed, skipped };
  }

  /** Runs commands in order, stopping at the first failure unless errors are ignored. */
  private async runCommands(commands: readonly string[], quiet: boolean, request: EngineRequest): Promise<boolean> {
    for (const cmd of commands) {
      this.logger.command(cmd);
      const res = await this.shell.run(cmd, { cwd: request.cwd, quiet });
      if (res.exitCode !== 0) {
        if (request.ignoreErrors) {
          this.logger.warn(`[ignored] '${cmd}' exited with status ${res.exitCode}`);
          continue;
        }
        this.logger.error(`✗ '${cmd}' exited with status ${res.exitCode}`);
        return false;
      }
    }
    return true;
  }
}
