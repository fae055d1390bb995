#!/usr/bin/env node
// src/runner.ts
// CLI over a JSON workflow definition:
// - run it with make or the in-process engine (--engine, -j/--jobs)
// - --print writes the generated Makefile to stdout instead of running
// - --list prints the steps a run would execute, with the reason
import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { Workflow } from './workflow/index.js';
import { renderMakefile } from './makefile/renderer.js';
import { runWorkflow, planRun, describePlan } from './orchestrator/run.js';
import { loadConfig, ENGINE_NAMES, type EngineName } from './config.js';
import { createLogger } from './log.js';
import { CyclicDependencyError, DeclarationError } from './errors.js';

export interface CliArgs {
  workflowPath?: string;
  jobs?: number;
  engine?: EngineName;
  makefile?: string;
  target?: string;
  dryRun: boolean;
  force: boolean;
  keepGoing: boolean;
  ignoreErrors: boolean;
  debug: boolean;
  print: boolean;
  list: boolean;
  help: boolean;
  extraArgs: string[];
}

export const USAGE = 'Usage: stepmake --workflow path/to/workflow.json [-j N] [--engine make|local] [--makefile path] [--target name] [--dry-run] [--force] [--keep-going] [--ignore-errors] [--debug] [--print] [--list] [--clean] [-- extra make args]';

function isEngineName(v: string): v is EngineName {
  return ENGINE_NAMES.some(n => n === v);
}

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = {
    dryRun: false, force: false, keepGoing: false, ignoreErrors: false,
    debug: false, print: false, list: false, help: false, extraArgs: [],
  };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    const eq = a.startsWith('--') ? a.indexOf('=') : -1;
    const flag = eq > 0 ? a.slice(0, eq) : a;
    const inline = eq > 0 ? a.slice(eq + 1) : undefined;
    const value = (): string => {
      const v = inline ?? argv[++i];
      if (v === undefined) throw new DeclarationError(`${flag} needs a value`);
      return v;
    };
    switch (flag) {
      case '--workflow': case '-w': out.workflowPath = value(); break;
      case '--jobs': case '-j': {
        const raw = value();
        const n = Number(raw);
        if (!Number.isInteger(n) || n < 1) throw new DeclarationError(`--jobs must be a positive integer, got '${raw}'`);
        out.jobs = n;
        break;
      }
      case '--engine': {
        const e = value();
        if (!isEngineName(e)) throw new DeclarationError(`--engine must be one of ${ENGINE_NAMES.join(', ')}`);
        out.engine = e;
        break;
      }
      case '--makefile': out.makefile = value(); break;
      case '--target': out.target = value(); break;
      case '--clean': out.target = 'clean'; break;
      case '--dry-run': case '-n': out.dryRun = true; break;
      case '--force': case '-B': out.force = true; break;
      case '--keep-going': case '-k': out.keepGoing = true; break;
      case '--ignore-errors': case '-i': out.ignoreErrors = true; break;
      case '--debug': case '-d': out.debug = true; break;
      case '--print': out.print = true; break;
      case '--list': out.list = true; break;
      case '--help': case '-h': out.help = true; break;
      case '--': out.extraArgs = argv.slice(i + 1); i = argv.length; break;
      default: throw new DeclarationError(`unknown argument '${a}'`);
    }
  }
  return out;
}

export function loadWorkflowFile(file: string): Workflow {
  const raw = fs.readFileSync(file, 'utf8');
  let parsed: unknown;
  try { parsed = JSON.parse(raw); }
  catch (e: unknown) { throw new DeclarationError(`${file} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`); }
  return Workflow.fromDefinition(parsed);
}

/** Returns the process exit code. */
export async function main(argv: string[]): Promise<number> {
  const config = loadConfig();
  const logger = createLogger(config.log);
  try {
    const args = parseArgs(argv);
    if (args.help || !args.workflowPath) {
      console.error(USAGE);
      return args.help ? 0 : 2;
    }
    const workflowDir = path.dirname(path.resolve(args.workflowPath));
    const wf = loadWorkflowFile(args.workflowPath);

    if (args.print) {
      process.stdout.write(renderMakefile(wf, { trackDescription: args.makefile !== undefined }));
      return 0;
    }
    if (args.list) {
      const planned = await planRun(wf, { cwd: workflowDir, force: args.force, target: args.target, makefile: args.makefile });
      console.log(planned.length ? describePlan(planned).join('\n') : 'Nothing to be done.');
      return 0;
    }

    await runWorkflow(wf, {
      jobs: args.jobs,
      engine: args.engine,
      makefile: args.makefile,
      target: args.target,
      dryRun: args.dryRun,
      force: args.force,
      keepGoing: args.keepGoing,
      ignoreErrors: args.ignoreErrors,
      debug: args.debug,
      extraArgs: args.extraArgs,
      cwd: workflowDir,
      config,
      logger,
    });
    return 0;
  } catch (e: unknown) {
    logger.error(e instanceof Error ? e.message : String(e));
    return e instanceof DeclarationError || e instanceof CyclicDependencyError ? 2 : 1;
  }
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  main(process.argv.slice(2)).then(
    code => { process.exitCode = code; },
    e => { console.error(e); process.exitCode = 1; }
  );
}
