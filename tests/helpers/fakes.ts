import { promises as fs } from 'fs';
import { delimiter, join } from 'path';
import { tmpdir } from 'os';

import type { BuildEnvironment } from '../../src/core/environment.js';
import type { TargetProbe } from '../../src/core/probe.js';
import type { CaptureResult, CommandExecutor, ExecOptions } from '../../src/utils/process.js';
import type { ExecutionFlags } from '../../src/core/build-options.js';

export interface RecordedCall {
  argv: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export type RunHandler = (call: RecordedCall) => number | Promise<number>;
export type CaptureHandler = (call: RecordedCall) => CaptureResult | Promise<CaptureResult>;

/**
 * Records every command instead of starting a process. Handlers decide the
 * exit status and may touch the filesystem to mimic a build.
 */
export class FakeExecutor implements CommandExecutor {
  readonly runs: RecordedCall[] = [];
  readonly captures: RecordedCall[] = [];

  constructor(
    private readonly onRun: RunHandler = () => 0,
    private readonly onCapture: CaptureHandler = () => ({ code: 1, stdout: '', stderr: 'not found' })
  ) {}

  async run(argv: string[], options: ExecOptions = {}): Promise<number> {
    const call = record(argv, options);
    this.runs.push(call);
    return this.onRun(call);
  }

  async capture(argv: string[], options: ExecOptions = {}): Promise<CaptureResult> {
    const call = record(argv, options);
    this.captures.push(call);
    return this.onCapture(call);
  }

  /** Commands run so far, each joined with spaces. */
  commands(): string[] {
    return this.runs.map(call => call.argv.join(' '));
  }
}

function record(argv: string[], options: ExecOptions): RecordedCall {
  return { argv: [...argv], cwd: options.cwd, env: options.env ? { ...options.env } : undefined };
}

export interface SystemContents {
  progs?: string[];
  headers?: string[];
  libs?: string[];
  functions?: string[];
}

/**
 * Probe that answers from a fixed set of "system" targets, and otherwise looks
 * for real files under the directories the environment points at:
 * `<CPPPATH>/<header>`, `<LIBPATH>/lib<name>.so` and `<PATH>/<prog>`.
 */
export class FakeProbe implements TargetProbe {
  readonly calls: string[] = [];

  constructor(readonly system: SystemContents = {}) {}

  async checkProg(env: BuildEnvironment, prog: string): Promise<boolean> {
    this.calls.push(`prog:${prog}`);
    if (this.system.progs?.includes(prog)) {
      return true;
    }
    const dirs = (env.ENV.PATH ?? '').split(delimiter).filter(dir => dir.length > 0);
    return anyExists(dirs.map(dir => join(dir, prog)));
  }

  async checkHeader(env: BuildEnvironment, header: string): Promise<boolean> {
    this.calls.push(`header:${header}`);
    if (this.system.headers?.includes(header)) {
      return true;
    }
    return anyExists(env.getList('CPPPATH').map(dir => join(dir, header)));
  }

  async checkLib(env: BuildEnvironment, lib: string): Promise<boolean> {
    this.calls.push(`lib:${lib}`);
    if (this.system.libs?.includes(lib)) {
      return true;
    }
    return anyExists(env.getList('LIBPATH').map(dir => join(dir, `lib${lib}.so`)));
  }

  async checkFunc(_env: BuildEnvironment, func: string): Promise<boolean> {
    this.calls.push(`func:${func}`);
    return this.system.functions?.includes(func) ?? false;
  }
}

async function anyExists(paths: string[]): Promise<boolean> {
  for (const path of paths) {
    try {
      await fs.access(path);
      return true;
    } catch {
      continue;
    }
  }
  return false;
}

export function testFlags(overrides: Partial<ExecutionFlags> = {}): ExecutionFlags {
  return { jobs: 4, dryRun: false, checkOnly: false, clean: false, help: false, ...overrides };
}

export async function makeTempDir(label: string): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), `prereq-${label}-`));
}

export async function writeFileAt(path: string, content = ''): Promise<void> {
  await fs.mkdir(join(path, '..'), { recursive: true });
  await fs.writeFile(path, content, 'utf8');
}
