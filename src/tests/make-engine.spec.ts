import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import {
  MakeEngine, parseMakeVersion, supportsGroupedTargets, makeArgs, failedTargets,
} from '../engine/make.js';
import { writeIfChanged } from '../makefile/description.js';
import { shellRunner, type ProcessResult, type ProcessSpawner, type SpawnOptions } from '../tools/cli/exec.js';
import { runWorkflow } from '../orchestrator/run.js';
import { compileGraph } from '../orchestrator/compiler.js';
import { silentLogger, type Logger } from '../log.js';
import { EngineInvocationError, WorkflowFailedError } from '../errors.js';
import { helloWorkflow, request, testConfig } from './helpers.js';

interface SpawnCall {
  bin: string;
  args: string[];
  opts: SpawnOptions;
  /** Makefile contents at the time make was called. */
  description?: string;
}

function fakeMake(version: ProcessResult, result: ProcessResult) {
  const calls: SpawnCall[] = [];
  const spawner: ProcessSpawner = async (bin, args, opts) => {
    const call: SpawnCall = { bin, args, opts };
    calls.push(call);
    if (args[0] === '-v') return version;
    call.description = await readFile(args[1], 'utf-8');
    return result;
  };
  return { calls, spawner };
}

const ok = (stdout = ''): ProcessResult => ({ exitCode: 0, stdout, stderr: '' });

describe('make version', () => {
  it('parses the first line of make -v', () => {
    expect(parseMakeVersion('GNU Make 4.3\nBuilt for x86_64-pc-linux-gnu\n')).toEqual({ raw: 'GNU Make 4.3', gnu: true, major: 4, minor: 3 });
    expect(parseMakeVersion('GNU Make 3.81')).toMatchObject({ major: 3, minor: 81 });
    expect(parseMakeVersion('make: unknown option')).toBeUndefined();
  });

  it('uses grouped targets from GNU make 4.3 on', () => {
    expect(supportsGroupedTargets(parseMakeVersion('GNU Make 4.3'))).toBe(true);
    expect(supportsGroupedTargets(parseMakeVersion('GNU Make 4.4.1'))).toBe(true);
    expect(supportsGroupedTargets(parseMakeVersion('GNU Make 4.2.1'))).toBe(false);
    expect(supportsGroupedTargets(undefined)).toBe(false);
  });
});

describe('make arguments', () => {
  it('passes only the flags that were asked for', () => {
    expect(makeArgs('M', request())).toEqual(['-f', 'M']);
  });

  it('maps run options onto make flags in a fixed order', () => {
    const args = makeArgs('M', request({
      jobs: 4, dryRun: true, debug: true, ignoreErrors: true, keepGoing: true, force: true,
      extraArgs: ['V=1'], target: 'hello2',
    }));
    expect(args).toEqual(['-f', 'M', '-j', '4', '-n', '--no-print-directory', '-d', '-i', '-k', '-B', 'V=1', 'hello2']);
  });

  it('finds failed targets in make 3 and make 4 messages', () => {
    const stderr = [
      'make: *** [/tmp/stepmake-x/Makefile:12: hello2] Error 1',
      'make: *** [out.txt] Error 2',
      'make: *** Waiting for unfinished jobs....',
    ].join('\n');
    expect(failedTargets(stderr)).toEqual(['hello2', 'out.txt']);
  });

  it('counts a command killed by a signal as a failed target', () => {
    const stderr = [
      'make: *** [Makefile:30: slow.txt] Terminated',
      'make: *** [Makefile:34: crash.txt] Segmentation fault (core dumped)',
    ].join('\n');
    expect(failedTargets(stderr)).toEqual(['slow.txt', 'crash.txt']);
  });
});

describe('make engine', () => {
  it('renders grouped rules to a temporary file and removes it afterwards', async () => {
    const { calls, spawner } = fakeMake(ok('GNU Make 4.3\n'), ok());
    const engine = new MakeEngine({ spawner, logger: silentLogger });
    const wf = helloWorkflow();
    const result = await engine.execute(wf, compileGraph(wf), request({ jobs: 2 }));

    expect(result).toMatchObject({ ok: true, exitCode: 0, engine: 'make', failed: [] });
    expect(calls.map(c => c.args[0])).toEqual(['-v', '-f']);
    const run = calls[1];
    expect(run.bin).toBe('make');
    expect(run.args.slice(2)).toEqual(['-j', '2']);
    expect(run.opts).toEqual({ cwd: '/work', stdout: 'inherit', captureStderr: true });
    expect(run.description).toContain('\nhello2 &: hello1 | pre-build\n');
    expect(run.description).not.toContain('$(DESCRIPTION) |');
    expect(existsSync(run.args[1])).toBe(false);
  });

  it('falls back to one rule per output without GNU make', async () => {
    const warnings: string[] = [];
    const logger: Logger = { ...silentLogger, warn: msg => { warnings.push(msg); } };
    const { calls, spawner } = fakeMake({ exitCode: 1, stdout: '', stderr: '' }, ok());
    const wf = helloWorkflow();
    wf.append({ outputs: ['x', 'y'], commands: 'split' });
    await new MakeEngine({ makeBin: 'bsdmake', spawner, logger }).execute(wf, compileGraph(wf), request());

    expect(warnings).toEqual(['[make] bsdmake does not look like GNU make; using one rule per output']);
    expect(calls[1].bin).toBe('bsdmake');
    expect(calls[1].description).toContain('\nx : | pre-build\n');
    expect(calls[1].description).toContain('\ny : x\n');
  });

  it('reports the targets whose commands failed', async () => {
    const stderr = 'make: *** [/tmp/stepmake-x/Makefile:20: hello2] Error 1\n';
    const { spawner } = fakeMake(ok('GNU Make 4.3'), { exitCode: 2, stdout: '', stderr });
    let caught: unknown;
    try {
      await runWorkflow(helloWorkflow(), {
        engine: new MakeEngine({ spawner, logger: silentLogger }),
        cwd: '/work', logger: silentLogger, config: testConfig,
      });
    } catch (e) { caught = e; }
    expect(caught).toBeInstanceOf(WorkflowFailedError);
    if (caught instanceof WorkflowFailedError) {
      expect(caught.exitCode).toBe(2);
      expect(caught.failed).toEqual(['hello2']);
    }
  });

  it('treats any other failure as an engine problem', async () => {
    const stderr = 'Makefile:3: *** missing separator.  Stop.\n';
    const { spawner } = fakeMake(ok('GNU Make 4.3'), { exitCode: 2, stdout: '', stderr });
    const wf = helloWorkflow();
    const run = new MakeEngine({ spawner, logger: silentLogger }).execute(wf, compileGraph(wf), request());
    await expect(run).rejects.toThrow(EngineInvocationError);
    await expect(run).rejects.toThrow('make exited with status 2: Makefile:3: *** missing separator.  Stop.');
  });

  describe('with a persistent makefile', () => {
    let dir: string;
    beforeEach(async () => { dir = await mkdtemp(path.join(tmpdir(), 'stepmake-test-')); });
    afterEach(async () => { await rm(dir, { recursive: true, force: true }); });

    it('writes the description beside the workflow and depends on it', async () => {
      const { calls, spawner } = fakeMake(ok('GNU Make 4.3'), ok());
      const wf = helloWorkflow();
      await new MakeEngine({ spawner, logger: silentLogger })
        .execute(wf, compileGraph(wf), request({ cwd: dir, makefile: 'build/Makefile', target: 'hello1' }));

      const file = path.join(dir, 'build', 'Makefile');
      expect(calls[1].args).toEqual(['-f', file, 'hello1']);
      expect(await readFile(file, 'utf-8')).toBe(calls[1].description);
      expect(calls[1].description).toContain('\nhello1 &: $(DESCRIPTION) | pre-build\n');
    });

    it('rewrites the description only when it changes', async () => {
      const file = path.join(dir, 'nested', 'Makefile');
      expect(await writeIfChanged(file, 'a:\n')).toBe(true);
      expect(await writeIfChanged(file, 'a:\n')).toBe(false);
      expect(await writeIfChanged(file, 'b:\n')).toBe(true);
      expect(await readFile(file, 'utf-8')).toBe('b:\n');
    });
  });
});

describe('shell runner', () => {
  it('runs each command through the configured shell', async () => {
    const calls: Array<[string, string[], SpawnOptions]> = [];
    const spawner: ProcessSpawner = async (bin, args, opts) => {
      calls.push([bin, args, opts]);
      return ok();
    };
    const shell = shellRunner('/bin/bash', spawner);
    await shell.run('echo hi', { cwd: '/w' });
    await shell.run('echo quiet', { cwd: '/w', quiet: true });
    expect(calls).toEqual([
      ['/bin/bash', ['-c', 'echo hi'], { cwd: '/w', stdout: 'inherit' }],
      ['/bin/bash', ['-c', 'echo quiet'], { cwd: '/w', stdout: 'ignore' }],
    ]);
  });
});
