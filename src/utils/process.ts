import { execFile, spawn } from 'child_process';
import { promisify } from 'util';

import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
}

export interface CaptureResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs a single argv. Everything that touches a child process goes through
 * this interface so builds can be replayed against an in-process stand-in.
 */
export interface CommandExecutor {
  /** Run with inherited stdio and resolve with the exit status. */
  run(argv: string[], options?: ExecOptions): Promise<number>;
  /** Run and collect output. */
  capture(argv: string[], options?: ExecOptions): Promise<CaptureResult>;
}

/** Exit status used when the program could not be started at all. */
export const SPAWN_FAILURE_STATUS = 127;

function readExecError(error: unknown): CaptureResult {
  if (error && typeof error === 'object') {
    const code = 'code' in error && typeof error.code === 'number' ? error.code : SPAWN_FAILURE_STATUS;
    const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
    const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
    return { code, stdout, stderr };
  }
  return { code: SPAWN_FAILURE_STATUS, stdout: '', stderr: String(error) };
}

export class ChildProcessExecutor implements CommandExecutor {
  run(argv: string[], options: ExecOptions = {}): Promise<number> {
    const [file, ...args] = argv;
    return new Promise(resolve => {
      const child = spawn(file, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: 'inherit',
        shell: false
      });
      child.on('error', error => {
        logger.debug(`Failed to start ${file}`, { error: error.message });
        console.error(`Failed to start ${file}: ${error.message}`);
        resolve(SPAWN_FAILURE_STATUS);
      });
      child.on('close', code => {
        resolve(code ?? SPAWN_FAILURE_STATUS);
      });
    });
  }

  async capture(argv: string[], options: ExecOptions = {}): Promise<CaptureResult> {
    const [file, ...args] = argv;
    try {
      const { stdout, stderr } = await execFileAsync(file, args, {
        cwd: options.cwd,
        env: options.env,
        encoding: 'utf8'
      });
      return { code: 0, stdout, stderr };
    } catch (error) {
      return readExecError(error);
    }
  }
}
