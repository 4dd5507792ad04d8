import { resolve } from 'path';
import { cpus } from 'os';

import { COMPILERS, FILE_PATTERNS, DIR_PATTERNS } from '../constants/index.js';
import { ConfigError } from '../utils/errors.js';

export type BuildDepsMode = 'yes' | 'no' | 'only' | 'build-only';
export type BuildType = 'dev' | 'debug' | 'release';
export type TargetType = 'default' | BuildType;
export type BuildTarget = 'client' | 'server' | 'test';
export type CompilerName = keyof typeof COMPILERS;

export const BUILD_DEPS_MODES: readonly BuildDepsMode[] = ['yes', 'no', 'only', 'build-only'];
export const BUILD_TYPES: readonly BuildType[] = ['dev', 'debug', 'release'];
export const BUILD_TARGETS: readonly BuildTarget[] = ['client', 'server', 'test'];

/**
 * Flags every construction environment exposes to the engine.
 */
export interface ExecutionFlags {
  /** Parallelism handed to `make -j`. */
  jobs: number;
  /** Print commands instead of running them. */
  dryRun: boolean;
  /** Dry run that still probes the system for targets. */
  checkOnly: boolean;
  clean: boolean;
  help: boolean;
}

export interface BuildOptions extends ExecutionFlags {
  /** Project root; relative paths below resolve against it. */
  topDir: string;
  buildDeps: BuildDepsMode;
  buildConfig?: string;
  buildRoot: string;
  prefix: string;
  buildType: BuildType;
  targetType: TargetType;
  compiler: CompilerName;
  /** Path-delimited list of prefixes searched for prebuilt components. */
  altPrefix?: string;
  useInstalled: string[];
  include: string[];
  optionalComponents: string[];
  requireOptional: boolean;
  prependPath?: string;
  localeName?: string;
  targets: BuildTarget[];
  /** Components to build when `buildDeps` is `only`. */
  deps?: string[];
}

export type BuildOptionsInput = Partial<BuildOptions> & { topDir: string };

export function isBuildDepsMode(value: string): value is BuildDepsMode {
  return BUILD_DEPS_MODES.some(mode => mode === value);
}

export function isBuildType(value: string): value is BuildType {
  return BUILD_TYPES.some(type => type === value);
}

export function isTargetType(value: string): value is TargetType {
  return value === 'default' || isBuildType(value);
}

export function isCompilerName(value: string): value is CompilerName {
  return Object.prototype.hasOwnProperty.call(COMPILERS, value);
}

/**
 * Map `--build-deps` onto whether sources may be downloaded and built.
 */
export function parseBuildDeps(mode: BuildDepsMode): { downloadDeps: boolean; buildDeps: boolean } {
  switch (mode) {
    case 'yes':
    case 'only':
      return { downloadDeps: true, buildDeps: true };
    case 'build-only':
      return { downloadDeps: false, buildDeps: true };
    case 'no':
      return { downloadDeps: false, buildDeps: false };
  }
}

/**
 * Work out which of client/server/test are built. Naming none of them, or
 * naming `test`, selects all three.
 */
export function resolveBuildTargets(requested: readonly string[]): BuildTarget[] {
  const named = BUILD_TARGETS.filter(target => requested.includes(target));
  if (named.length === 0 || named.includes('test')) {
    return ['client', 'server', 'test'];
  }
  return named;
}

/**
 * Split a comma separated option value, dropping empties and the `none` marker.
 */
export function splitListOption(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0 && item !== 'none');
}

export function resolveBuildOptions(input: BuildOptionsInput): BuildOptions {
  const buildDeps = input.buildDeps ?? 'no';
  if (!isBuildDepsMode(buildDeps)) {
    throw new ConfigError(`Invalid --build-deps value '${String(buildDeps)}'`, { buildDeps });
  }
  const checkOnly = input.checkOnly ?? false;
  const jobs = input.jobs ?? cpus().length;
  if (!Number.isInteger(jobs) || jobs < 1) {
    throw new ConfigError(`Invalid job count '${String(jobs)}'`, { jobs });
  }

  return {
    topDir: resolve(input.topDir),
    jobs,
    // check-only is a dry run that is still allowed to probe
    dryRun: checkOnly || (input.dryRun ?? false),
    checkOnly,
    clean: input.clean ?? false,
    help: input.help ?? false,
    buildDeps,
    buildConfig: input.buildConfig,
    buildRoot: input.buildRoot ?? 'build',
    prefix: input.prefix ?? 'install',
    buildType: input.buildType ?? 'release',
    targetType: input.targetType ?? 'default',
    compiler: input.compiler ?? 'gcc',
    altPrefix: input.altPrefix,
    useInstalled: input.useInstalled ?? [],
    include: input.include ?? [],
    optionalComponents: input.optionalComponents ?? [],
    requireOptional: input.requireOptional ?? false,
    prependPath: input.prependPath,
    localeName: input.localeName,
    targets: resolveBuildTargets(input.targets ?? []),
    deps: input.deps
  };
}

/** Default location of the pinned-version file. */
export function defaultBuildConfigPath(topDir: string): string {
  return resolve(topDir, DIR_PATTERNS.UTILS, FILE_PATTERNS.BUILD_CONFIG);
}
