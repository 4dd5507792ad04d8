import type { BuildEnvironment } from './environment.js';
import type { CommandExecutor } from '../utils/process.js';
import { logger } from '../utils/logger.js';

export type PkgConfigQuery = '--cflags' | '--libs';

export interface ParsedFlags {
  CPPPATH: string[];
  LIBPATH: string[];
  LIBS: string[];
  CPPDEFINES: string[];
  CCFLAGS: string[];
  LINKFLAGS: string[];
}

function emptyFlags(): ParsedFlags {
  return { CPPPATH: [], LIBPATH: [], LIBS: [], CPPDEFINES: [], CCFLAGS: [], LINKFLAGS: [] };
}

/**
 * Sort compiler/linker flags, as printed by pkg-config, into construction
 * variables. Flags that take a separate argument (`-I dir`) are handled too.
 */
export function parseFlags(output: string): ParsedFlags {
  const flags = emptyFlags();
  const tokens = output.split(/\s+/).filter(token => token.length > 0);

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const attached = (option: string): string | undefined => {
      if (!token.startsWith(option)) {
        return undefined;
      }
      if (token.length > option.length) {
        return token.slice(option.length);
      }
      i++;
      return tokens[i];
    };

    let value: string | undefined;
    if ((value = attached('-I')) !== undefined) {
      flags.CPPPATH.push(value);
    } else if ((value = attached('-L')) !== undefined) {
      flags.LIBPATH.push(value);
    } else if ((value = attached('-l')) !== undefined) {
      flags.LIBS.push(value);
    } else if ((value = attached('-D')) !== undefined) {
      flags.CPPDEFINES.push(value);
    } else if (token.startsWith('-Wl,')) {
      flags.LINKFLAGS.push(token);
    } else if (token === '-pthread') {
      flags.CCFLAGS.push(token);
      flags.LINKFLAGS.push(token);
    } else if (token.startsWith('-')) {
      flags.CCFLAGS.push(token);
    }
  }

  return flags;
}

export function mergeFlags(env: BuildEnvironment, flags: ParsedFlags): void {
  for (const [key, values] of Object.entries(flags)) {
    if (values.length > 0) {
      env.appendUnique(key, values);
    }
  }
}

/**
 * Run `pkg-config <query> <name>` with the environment's process variables
 * and merge the result. Returns false when pkg-config is missing or does not
 * know the package; callers treat that as "nothing to add".
 */
export async function mergePkgConfig(
  env: BuildEnvironment,
  executor: CommandExecutor,
  name: string,
  query: PkgConfigQuery
): Promise<boolean> {
  const result = await executor.capture(['pkg-config', query, name], { env: env.ENV });
  if (result.code !== 0) {
    logger.debug(`pkg-config ${query} ${name} failed`, { code: result.code, stderr: result.stderr.trim() });
    return false;
  }
  mergeFlags(env, parseFlags(result.stdout));
  return true;
}
