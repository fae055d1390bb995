import path from "node:path";
import type { DependencyGraph } from "../types/contracts.js";
import type { EngineRequest, RunResult } from "../types/engine.js";
import type { Engine } from "./provider.js";
import { createLogger, type Logger } from "../log.js";
import { EngineInvocationError } from "../errors.js";
import type { Workflow } from "../workflow/index.js";
import { renderMakefile } from "../makefile/renderer.js";
import { withTempDescription, writeIfChanged } from "../makefile/description.js";
import { spawnProcess, type ProcessSpawner } from "../tools/cli/exec.js";

export interface MakeVersion {
  raw: string;
  gnu: boolean;
  major: number;
  minor: number;
}

export interface MakeEngineOptions {
  makeBin?: string;
  spawner?: ProcessSpawner;
  logger?: Logger;
}

/**
 * `make: *** [Makefile:12: out.txt] Error 1` (make 4) or `make: *** [out.txt] Error 1` (make 3).
 * A command killed by a signal reports the signal instead: `*** [out.txt] Terminated`.
 */
const COMMAND_FAILURE = /\*\*\* \[([^\]]+)\] (?:Error \d+|[A-Z][a-z]+)/g;

/**
 * Expects the first line of `make -v`, e.g. "GNU Make 4.3".
 */
export function parseMakeVersion(text: string): MakeVersion | undefined {
  const first = (text.split("\n")[0] ?? "").trim();
  const m = /^(\d+)\.(\d+)/.exec(first.split(" ").pop() ?? "");
  if (!m) return undefined;
  return { raw: first, gnu: first.startsWith("GNU Make"), major: Number(m[1]), minor: Number(m[2]) };
}

export function supportsGroupedTargets(v: MakeVersion | undefined): boolean {
  if (!v || !v.gnu) return false;
  return v.major > 4 || (v.major === 4 && v.minor >= 3);
}

export async function detectMakeVersion(makeBin = "make", spawner: ProcessSpawner = spawnProcess): Promise<MakeVersion | undefined> {
  const res = await spawner(makeBin, ["-v"], { cwd: process.cwd(), stdout: "capture" });
  return res.exitCode === 0 ? parseMakeVersion(res.stdout) : undefined;
}

export function makeArgs(file: string, request: EngineRequest): string[] {
  const args = ["-f", file];
  if (request.jobs > 1) args.push("-j", String(request.jobs));
  if (request.dryRun) args.push("-n", "--no-print-directory");
  if (request.debug) args.push("-d");
  if (request.ignoreErrors) args.push("-i");
  if (request.keepGoing) args.push("-k");
  if (request.force) args.push("-B");
  args.push(...request.extraArgs);
  if (request.target !== undefined) args.push(request.target);
  return args;
}

/** Targets named in make's failure lines, without the `file:line:` prefix make 4 adds. */
export function failedTargets(stderr: string): string[] {
  return [...stderr.matchAll(COMMAND_FAILURE)].map(m => {
    const parts = m[1].split(": ");
    return parts[parts.length - 1];
  });
}

/**
 * Writes the Makefile and hands it to GNU make, which owns staleness checks
 * and `-j` scheduling.
 */
export class MakeEngine implements Engine {
  readonly name = "make";
  private readonly makeBin: string;
  private readonly spawner: ProcessSpawner;
  private readonly logger: Logger;

  constructor(options: MakeEngineOptions = {}) {
    this.makeBin = options.makeBin ?? "make";
    this.spawner = options.spawner ?? spawnProcess;
    this.logger = options.logger ?? createLogger();
  }

  async execute(workflow: Workflow, _graph: DependencyGraph, request: EngineRequest): Promise<RunResult> {
    const version = await detectMakeVersion(this.makeBin, this.spawner);
    if (!version?.gnu) {
      this.logger.warn(`[make] ${this.makeBin} does not look like GNU make; using one rule per output`);
    }
    const text = renderMakefile(workflow, {
      groupedTargets: supportsGroupedTargets(version),
      trackDescription: request.makefile !== undefined,
    });

    if (request.makefile !== undefined) {
      const file = path.resolve(request.cwd, request.makefile);
      await writeIfChanged(file, text);
      return this.invoke(file, request);
    }
    return withTempDescription(text, file => this.invoke(file, request));
  }

  private async invoke(file: string, request: EngineRequest): Promise<RunResult> {
    const started = Date.now();
    const res = await this.spawner(this.makeBin, makeArgs(file, request), {
      cwd: request.cwd,
      stdout: "inherit",
      captureStderr: true,
    });
    const base = {
      engine: this.name,
      exitCode: res.exitCode,
      executed: [],
      skipped: [],
      dryRun: request.dryRun,
      durationMs: Date.now() - started,
    };
    if (res.exitCode === 0) return { ...base, ok: true, failed: [] };

    const failed = failedTargets(res.stderr);
    if (failed.length === 0) {
      const lines = res.stderr.trim().split("\n");
      throw new EngineInvocationError(`${this.makeBin} exited with status ${res.exitCode}: ${lines[lines.length - 1]}`);
    }
    return { ...base, ok: false, failed };
  }
}
