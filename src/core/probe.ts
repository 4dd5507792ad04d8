import { mkdtemp, writeFile } from 'fs/promises';
import { join, isAbsolute, delimiter } from 'path';
import { tmpdir } from 'os';

import type { BuildEnvironment } from './environment.js';
import type { CommandExecutor } from '../utils/process.js';
import { exists, isExecutableFile, remove } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Primitive checks used to decide whether a component's targets exist.
 * Each check reads include paths, library paths and the compiler from the
 * environment it is given.
 */
export interface TargetProbe {
  checkProg(env: BuildEnvironment, prog: string): Promise<boolean>;
  checkHeader(env: BuildEnvironment, header: string): Promise<boolean>;
  checkLib(env: BuildEnvironment, lib: string): Promise<boolean>;
  checkFunc(env: BuildEnvironment, func: string): Promise<boolean>;
}

/**
 * Search the `PATH` of the environment's process variables for an executable.
 */
export async function findProgram(env: BuildEnvironment, prog: string): Promise<string | undefined> {
  if (isAbsolute(prog)) {
    return (await isExecutableFile(prog)) ? prog : undefined;
  }
  const searchPath = env.ENV.PATH ?? process.env.PATH ?? '';
  for (const dir of searchPath.split(delimiter)) {
    if (!dir) {
      continue;
    }
    const candidate = join(dir, prog);
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

function report(label: string, found: boolean): boolean {
  console.log(`Checking for ${label}... ${found ? 'yes' : 'no'}`);
  return found;
}

/**
 * Probe that compiles and links tiny C programs with `$CC`, the way a
 * configure script would.
 */
export class CompilerProbe implements TargetProbe {
  constructor(private readonly executor: CommandExecutor) {}

  async checkProg(env: BuildEnvironment, prog: string): Promise<boolean> {
    return report(`program ${prog}`, (await findProgram(env, prog)) !== undefined);
  }

  async checkHeader(env: BuildEnvironment, header: string): Promise<boolean> {
    const source = `#include <${header}>\n\nint main(void) { return 0; }\n`;
    return report(`C header file ${header}`, await this.tryBuild(env, source, false));
  }

  async checkLib(env: BuildEnvironment, lib: string): Promise<boolean> {
    const source = 'int main(void) { return 0; }\n';
    return report(`C library ${lib}`, await this.tryBuild(env, source, true, [lib]));
  }

  async checkFunc(env: BuildEnvironment, func: string): Promise<boolean> {
    const source = [
      `char ${func}(void);`,
      '',
      'int main(void) {',
      `  return ${func}() != 0;`,
      '}',
      ''
    ].join('\n');
    return report(`function ${func}()`, await this.tryBuild(env, source, true));
  }

  /** Assemble the compiler argv for a probe source file. */
  compileArgs(env: BuildEnvironment, sourceFile: string, outputFile: string, link: boolean, extraLibs: string[] = []): string[] {
    const compiler = env.getString('CC') ?? 'cc';
    const args = [compiler, ...env.getList('CCFLAGS')];
    args.push(...env.getList('CPPPATH').map(dir => `-I${dir}`));
    args.push(...env.getList('CPPDEFINES').map(define => `-D${define}`));
    if (!link) {
      args.push('-c', sourceFile, '-o', outputFile);
      return args;
    }
    args.push(sourceFile, '-o', outputFile);
    args.push(...env.getList('LIBPATH').map(dir => `-L${dir}`));
    args.push(...env.getList('LINKFLAGS'));
    const libs = [...env.getList('LIBS')];
    for (const lib of extraLibs) {
      if (!libs.includes(lib)) {
        libs.push(lib);
      }
    }
    args.push(...libs.map(lib => `-l${lib}`));
    return args;
  }

  private async tryBuild(env: BuildEnvironment, source: string, link: boolean, extraLibs: string[] = []): Promise<boolean> {
    const workDir = await mkdtemp(join(tmpdir(), 'prereq-probe-'));
    try {
      const sourceFile = join(workDir, 'conftest.c');
      await writeFile(sourceFile, source, 'utf8');
      const argv = this.compileArgs(env, sourceFile, join(workDir, link ? 'conftest' : 'conftest.o'), link, extraLibs);
      const result = await this.executor.capture(argv, { cwd: workDir, env: env.ENV });
      if (result.code !== 0) {
        logger.debug(`Probe failed: ${argv.join(' ')}`, { stderr: result.stderr.trim() });
      }
      return result.code === 0;
    } finally {
      await remove(workDir);
    }
  }
}

/**
 * Debian keeps libraries under `lib/<multiarch triplet>`; report that
 * directory so it is searched under every component prefix.
 */
export async function detectMultiarchLibDirs(
  env: BuildEnvironment,
  executor: CommandExecutor,
  marker = '/etc/debian_version'
): Promise<string[]> {
  if (!(await exists(marker))) {
    return [];
  }
  const tool = await findProgram(env, 'dpkg-architecture');
  if (tool === undefined) {
    console.log('No dpkg-architecture found in path.');
    return [];
  }
  const result = await executor.capture([tool, '-qDEB_HOST_MULTIARCH'], { env: env.ENV });
  const triplet = result.stdout.trim();
  if (result.code !== 0 || !triplet) {
    logger.debug('dpkg-architecture did not report a multiarch triplet', { code: result.code });
    return [];
  }
  return [`lib/${triplet}`];
}
