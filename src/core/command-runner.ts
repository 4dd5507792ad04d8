import type { BuildEnvironment } from './environment.js';
import type { CommandExecutor } from '../utils/process.js';
import { logger } from '../utils/logger.js';

/** One command as an argv; every token is subject to `$VAR` substitution. */
export type BuildCommand = readonly string[];

export interface RunOptions {
  /** Working directory of every command in the list. */
  cwd?: string;
  /** Environment whose process variables the commands receive. */
  env?: BuildEnvironment;
}

/**
 * Runs ordered command lists. Tokens are substituted against the base
 * environment, which carries the recorded prefixes; the process variables
 * come from the environment passed per call.
 */
export class CommandRunner {
  constructor(
    private readonly executor: CommandExecutor,
    private readonly baseEnv: BuildEnvironment
  ) {}

  /** Expand one command, giving bare `make` the configured job count. */
  expand(command: BuildCommand): string[] {
    const argv: string[] = [];
    for (const part of command) {
      if (part === 'make') {
        argv.push('make', '-j', String(this.baseEnv.flags.jobs));
      } else {
        argv.push(this.baseEnv.subst(part));
      }
    }
    return argv;
  }

  /**
   * Run commands in order and stop at the first non-zero exit.
   * A dry run prints each command and reports success.
   */
  async run(commands: readonly BuildCommand[], options: RunOptions = {}): Promise<boolean> {
    const processEnv = (options.env ?? this.baseEnv).ENV;

    if (options.cwd) {
      console.log(`Running commands in ${options.cwd}`);
    }
    for (const command of commands) {
      const argv = this.expand(command);
      if (this.baseEnv.flags.dryRun) {
        console.log(`Would RUN: ${argv.join(' ')}`);
        continue;
      }
      console.log(`RUN: ${argv.join(' ')}`);
      const status = await this.executor.run(argv, { cwd: options.cwd, env: processEnv });
      if (status !== 0) {
        logger.debug(`Command exited with status ${status}`, { argv, cwd: options.cwd });
        return false;
      }
    }
    return true;
  }
}
