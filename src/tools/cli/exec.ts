// src/tools/cli/exec.ts
import { spawn } from "node:child_process";
import { EngineInvocationError } from "../../errors.js";

export interface ProcessResult {
  exitCode: number;
  /** Only filled when captured. */
  stdout: string;
  stderr: string;
  signal?: string;
}

export interface SpawnOptions {
  cwd: string;
  stdout: "inherit" | "ignore" | "capture";
  /** Keep a copy of stderr while still forwarding it to ours. */
  captureStderr?: boolean;
}

export type ProcessSpawner = (bin: string, args: string[], opts: SpawnOptions) => Promise<ProcessResult>;

export interface ShellRunner {
  run(cmd: string, opts: { cwd: string; quiet?: boolean }): Promise<ProcessResult>;
}

export const spawnProcess: ProcessSpawner = (bin, args, opts) =>
  new Promise((resolve, reject) => {
    const child = spawn(bin, args, {
      cwd: opts.cwd,
      stdio: [
        "ignore",
        opts.stdout === "capture" ? "pipe" : opts.stdout,
        opts.captureStderr ? "pipe" : "inherit",
      ],
    });
    let stdout = "";
    let stderr = "";
    child.stdout?.on("data", (c: Buffer) => { stdout += c.toString("utf8"); });
    child.stderr?.on("data", (c: Buffer) => {
      stderr += c.toString("utf8");
      process.stderr.write(c);
    });
    child.on("error", (e: NodeJS.ErrnoException) => {
      const why = e.code === "ENOENT" ? `${bin}: command not found` : String(e.message || e);
      reject(new EngineInvocationError(why, e));
    });
    child.on("close", (code, signal) => {
      resolve({ exitCode: code ?? 128, stdout, stderr, signal: signal ?? undefined });
    });
  });

/** Runs each command through `<shell> -c`, streaming its output to ours. */
export function shellRunner(shellBin = "/bin/sh", spawner: ProcessSpawner = spawnProcess): ShellRunner {
  return {
    run(cmd, opts) {
      return spawner(shellBin, ["-c", cmd], { cwd: opts.cwd, stdout: opts.quiet ? "ignore" : "inherit" });
    },
  };
}
