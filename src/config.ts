import { z } from "zod";
import { settingsFromEnv, type LogSettings } from "./log.js";

export const ENGINE_NAMES = ["make", "local"] as const;
export type EngineName = (typeof ENGINE_NAMES)[number];

const EnvSchema = z.object({
  STEPMAKE_ENGINE: z.enum(ENGINE_NAMES).default("make"),
  STEPMAKE_JOBS: z.coerce.number().int().positive().default(1),
  MAKE_BIN: z.string().min(1).default("make"),
  SHELL_BIN: z.string().min(1).default("/bin/sh"),
  RUN_ID: z.string().optional(),
});

export interface StepmakeConfig {
  engine: EngineName;
  jobs: number;
  makeBin: string;
  shellBin: string;
  runId?: string;
  log: LogSettings;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): StepmakeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  const e = parsed.data;
  return {
    engine: e.STEPMAKE_ENGINE,
    jobs: e.STEPMAKE_JOBS,
    makeBin: e.MAKE_BIN,
    shellBin: e.SHELL_BIN,
    runId: e.RUN_ID || undefined,
    log: settingsFromEnv(env),
  };
}
