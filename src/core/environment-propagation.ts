import { join } from 'path';

import type { BuildEnvironment } from './environment.js';
import type { PkgConfigQuery } from './pkg-config.js';
import { DIR_PATTERNS, RUNPATH_LINK_FLAG, SYSTEM_PREFIX } from '../constants/index.js';
import { isDirectory } from '../utils/fs.js';

/**
 * What environment propagation needs to know about a component.
 */
export interface PropagationSource {
  readonly useInstalled: boolean;
  readonly componentPrefix?: string;
  readonly package?: string;
  readonly includePath: readonly string[];
  readonly libPath: readonly string[];
  readonly defines: readonly string[];
  /** Best-effort pkg-config merge; failures are ignored. */
  parsePkgConfig(env: BuildEnvironment, query: PkgConfigQuery): Promise<void>;
}

/**
 * Make a component's headers, libraries and tools visible to `env`.
 *
 * `neededLibs === null` requests headers only: compile flags are merged but
 * nothing is linked. Every append is duplicate-suppressing, so calling this
 * repeatedly with the same inputs is a no-op after the first call.
 */
export async function applyComponentEnvironment(
  env: BuildEnvironment,
  source: PropagationSource,
  neededLibs: readonly string[] | null
): Promise<void> {
  const libPaths: string[] = [];
  const prefix = source.componentPrefix;

  if (!source.useInstalled && prefix !== undefined && prefix !== SYSTEM_PREFIX) {
    // let program checks and build tools find the component's executables
    env.prependEnvPath('PATH', join(prefix, DIR_PATTERNS.BIN));

    for (const path of source.includePath) {
      env.appendUnique('CPPPATH', [join(prefix, path)]);
    }

    // dependents need the RPATH of their dependencies just as they need the headers
    for (const path of source.libPath) {
      const fullPath = join(prefix, path);
      if (!(await isDirectory(fullPath))) {
        continue;
      }
      libPaths.push(fullPath);
      env.appendUnique('RPATH_FULL', [fullPath]);
      env.appendEnvPath('LD_LIBRARY_PATH', fullPath);
    }

    // RUNPATH instead of RPATH so LD_LIBRARY_PATH still takes precedence
    env.appendUnique('LINKFLAGS', [RUNPATH_LINK_FLAG]);
  }

  if (prefix === SYSTEM_PREFIX && source.package === undefined) {
    env.appendUnique('RPATH', ['/usr/lib']);
    env.appendUnique('LINKFLAGS', [RUNPATH_LINK_FLAG]);
  }

  if (source.defines.length > 0) {
    env.appendUnique('CPPDEFINES', source.defines);
  }

  await source.parsePkgConfig(env, '--cflags');

  if (neededLibs === null) {
    return;
  }

  await source.parsePkgConfig(env, '--libs');
  if (libPaths.length > 0) {
    env.appendUnique('LIBPATH', libPaths);
  }
  if (neededLibs.length > 0) {
    env.appendUnique('LIBS', neededLibs);
  }
}
