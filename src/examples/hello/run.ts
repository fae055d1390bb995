import 'dotenv/config';
import { mkdirSync } from 'node:fs';
import { resolve } from 'node:path';
import { Workflow } from '../../workflow/index.js';
import { runWorkflow } from '../../orchestrator/run.js';
import type { EngineName } from '../../config.js';
import definition from './workflow.json' with { type: 'json' };

function getArg(name: string, fallback?: string): string | undefined {
  const ix = process.argv.findIndex(a => a === name || a.startsWith(name + '='));
  if (ix === -1) return fallback;
  const val = process.argv[ix];
  if (val.includes('=')) return val.split('=')[1];
  return process.argv[ix+1] ?? fallback;
}

async function main() {
  const dir = resolve(getArg('--dir') || process.env.HELLO_DIR || 'runs/hello');
  mkdirSync(dir, { recursive: true });
  const engine: EngineName = getArg('--engine') === 'local' ? 'local' : 'make';

  // hello2 is derived from hello1; hello3 is independent of both
  const wf = Workflow.fromDefinition(definition);

  await runWorkflow(wf, { jobs: Number(getArg('--jobs', '1')), engine, cwd: dir });
}

main().catch(e => { console.error(e); process.exit(1); });
