import path from 'node:path';
import type { ShellRunner, ProcessResult } from '../tools/cli/exec.js';
import type { StatFn } from '../orchestrator/plan.js';
import type { EngineRequest } from '../types/engine.js';
import { Workflow } from '../workflow/index.js';
import { loadConfig } from '../config.js';

/** In-memory files with a clock that advances one second per write. */
export class FakeFs {
  readonly files = new Map<string, { mtime: number; content: string }>();
  private clock = 1_000_000;

  constructor(readonly cwd = '/work') {}

  private key(file: string) { return path.resolve(this.cwd, file); }

  write(file: string, content: string) {
    this.clock += 1000;
    this.files.set(this.key(file), { mtime: this.clock, content });
  }

  read(file: string): string {
    const f = this.files.get(this.key(file));
    if (!f) throw new Error(`no such file: ${file}`);
    return f.content;
  }

  touch(file: string) { this.write(file, this.files.get(this.key(file))?.content ?? ''); }
  remove(file: string) { this.files.delete(this.key(file)); }
  exists(file: string) { return this.files.has(this.key(file)); }

  stat: StatFn = async file => this.files.get(file)?.mtime;
}

type Effect = () => number | void | Promise<number | void>;

export class FakeShell implements ShellRunner {
  readonly calls: string[] = [];
  constructor(private readonly effects: Record<string, Effect>) {}

  async run(cmd: string): Promise<ProcessResult> {
    this.calls.push(cmd);
    const effect = this.effects[cmd];
    const exitCode = effect ? (await effect()) ?? 0 : 127;
    return { exitCode, stdout: '', stderr: '' };
  }
}

export const HELLO_CMDS = {
  hello1: 'echo foo > hello1',
  hello2: "sed 's/foo/faa/' hello1 > hello2",
  hello3: 'echo bar > hello3',
};

export function helloWorkflow(): Workflow {
  const wf = new Workflow({ title: '*** Test flow ***', finalOutputs: ['hello2', 'hello3'] });
  wf.append({ title: '** Hello1 **', outputs: 'hello1', commands: HELLO_CMDS.hello1 });
  wf.append({ title: '** Hello2 **', outputs: 'hello2', inputs: 'hello1', commands: HELLO_CMDS.hello2 });
  wf.append({ title: '** Hello3 **', outputs: 'hello3', commands: HELLO_CMDS.hello3 });
  return wf;
}

export function helloShell(fs: FakeFs): FakeShell {
  return new FakeShell({
    [HELLO_CMDS.hello1]: () => { fs.write('hello1', 'foo\n'); },
    [HELLO_CMDS.hello2]: () => { fs.write('hello2', fs.read('hello1').replace('foo', 'faa')); },
    [HELLO_CMDS.hello3]: () => { fs.write('hello3', 'bar\n'); },
  });
}

export const testConfig = loadConfig({});

export function request(overrides: Partial<EngineRequest> = {}): EngineRequest {
  return {
    jobs: 1, dryRun: false, force: false, keepGoing: false, ignoreErrors: false,
    debug: false, extraArgs: [], cwd: '/work', ...overrides,
  };
}
