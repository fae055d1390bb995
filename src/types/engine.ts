export interface EngineRequest {
  /** Maximum concurrently running independent steps. */
  jobs: number;
  dryRun: boolean;
  force: boolean;
  keepGoing: boolean;
  ignoreErrors: boolean;
  debug: boolean;
  /** Target to build; the aggregate root when absent. */
  target?: string;
  extraArgs: string[];
  /** Persistent description path; a temporary file is used when absent. */
  makefile?: string;
  cwd: string;
}

export interface RunResult {
  ok: boolean;
  exitCode: number;
  engine: string;
  /** Steps whose commands ran (or would run, on a dry run). Empty for make. */
  executed: string[];
  /** Steps or targets whose commands failed. */
  failed: string[];
  /** Stale steps never attempted because something upstream failed. */
  skipped: string[];
  dryRun: boolean;
  durationMs: number;
}
