export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
};

export interface LogSettings {
  quiet: boolean;
  steps: boolean;
  commands: boolean;
}

export interface Logger {
  title(text: string): void;
  step(index: number, total: number, label: string): void;
  done(label: string, ms: number): void;
  command(cmd: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): LogSettings {
  const quiet = env.QUIET === "1";
  return {
    quiet,
    steps: !quiet && (env.LOG_STEPS ?? "1") !== "0",
    commands: !quiet && (env.LOG_COMMANDS ?? "1") !== "0",
  };
}

export function createLogger(settings: LogSettings = settingsFromEnv()): Logger {
  return {
    title(text) {
      if (!settings.quiet) console.log(text);
    },
    step(index, total, label) {
      if (settings.steps) console.log(`\n${COLOR.cyan("▶ step")} ${index}/${total} ${label}`);
    },
    done(label, ms) {
      if (settings.steps) console.log(`${COLOR.green("✓ done")} ${label} ${COLOR.gray("(" + fmtMs(ms) + ")")}`);
    },
    command(cmd) {
      if (settings.commands) console.log(COLOR.green(`+${cmd}`));
    },
    info(msg) {
      if (!settings.quiet) console.log(msg);
    },
    warn(msg) {
      if (!settings.quiet) console.warn(COLOR.yellow(msg));
    },
    error(msg) {
      console.error(COLOR.red(msg));
    },
  };
}

const noop = () => {};

export const silentLogger: Logger = {
  title: noop, step: noop, done: noop, command: noop, info: noop, warn: noop, error: noop,
};
