import { Command, Option } from 'commander';
import { resolve } from 'path';

import {
  BUILD_DEPS_MODES,
  BUILD_TYPES,
  defaultBuildConfigPath,
  isBuildDepsMode,
  isBuildType,
  isCompilerName,
  isTargetType,
  resolveBuildOptions,
  resolveBuildTargets,
  splitListOption,
  type BuildOptions
} from '../core/build-options.js';
import { PinnedVersionConfig } from '../core/build-config.js';
import { BuildEnvironment } from '../core/environment.js';
import { detectMultiarchLibDirs } from '../core/probe.js';
import { PrereqRegistry } from '../core/prereq-registry.js';
import { loadComponentDefinitions, type ComponentDefinitionsFile } from '../core/component-definitions.js';
import { ChildProcessExecutor } from '../utils/process.js';
import { COMPILERS, DIR_PATTERNS, FILE_PATTERNS } from '../constants/index.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Raw option values as commander hands them to an action.
 */
export interface CliBuildOptions {
  cwd?: string;
  components?: string;
  buildDeps?: string;
  checkOnly?: boolean;
  dryRun?: boolean;
  jobs?: number;
  buildConfig?: string;
  buildRoot?: string;
  prefix?: string;
  buildType?: string;
  targetType?: string;
  compiler?: string;
  altPrefix?: string;
  useInstalled?: string;
  include?: string;
  optional?: string;
  requireOptional?: boolean;
  prependPath?: string;
  localeName?: string;
  targets?: string;
  deps?: string;
  clean?: boolean;
}

function parseJobs(value: string): number {
  const jobs = Number.parseInt(value, 10);
  if (!Number.isInteger(jobs) || jobs < 1) {
    throw new ConfigError(`Invalid job count '${value}'`);
  }
  return jobs;
}

/**
 * Options shared by every command that resolves prerequisites.
 */
export function addBuildOptions(command: Command): Command {
  return command
    .option('--cwd <dir>', 'project root (defaults to the current directory)')
    .option('--components <file>', `component definitions file (default utils/${FILE_PATTERNS.COMPONENTS_YML})`)
    .addOption(new Option('--build-deps <mode>', 'download and build missing prerequisites').choices(BUILD_DEPS_MODES).default('no'))
    .option('--check-only', 'check prerequisites only, do not download or build')
    .option('-n, --dry-run', 'print what would run without running it')
    .option('-j, --jobs <n>', 'parallel jobs handed to make', parseJobs)
    .option('--build-config <file>', 'pinned-version file (default utils/build.config)')
    .option('--build-root <dir>', 'build root directory', 'build')
    .option('--prefix <dir>', 'installation prefix', 'install')
    .addOption(new Option('--build-type <type>', 'build type').choices(BUILD_TYPES).default('release'))
    .addOption(new Option('--target-type <type>', 'prerequisite build type').choices(['default', ...BUILD_TYPES]).default('default'))
    .addOption(new Option('--compiler <name>', 'compiler family').choices(Object.keys(COMPILERS)).default('gcc'))
    .option('--alt-prefix <paths>', 'path-delimited list of prefixes holding prebuilt components')
    .option('--use-installed <list>', "comma separated installed components, or 'all'")
    .option('--include <list>', "comma separated optional components to build, or 'all'")
    .option('--optional <list>', 'comma separated components that are optional')
    .option('--require-optional', 'fail when an optional component check fails')
    .option('--prepend-path <path>', 'prepended to PATH for build commands')
    .option('--locale-name <name>', 'locale used for building', 'en_US.UTF8')
    .option('--targets <list>', 'comma separated targets: client, server, test')
    .option('--deps <list>', 'components built with --build-deps=only')
    .option('-c, --clean', 'clean mode; skip builds');
}

export function toBuildOptions(cli: CliBuildOptions): BuildOptions {
  const topDir = resolve(cli.cwd ?? process.cwd());
  const { buildDeps, buildType, targetType, compiler } = cli;

  if (buildDeps !== undefined && !isBuildDepsMode(buildDeps)) {
    throw new ConfigError(`Invalid --build-deps value '${buildDeps}'`);
  }
  if (buildType !== undefined && !isBuildType(buildType)) {
    throw new ConfigError(`Invalid --build-type value '${buildType}'`);
  }
  if (targetType !== undefined && !isTargetType(targetType)) {
    throw new ConfigError(`Invalid --target-type value '${targetType}'`);
  }
  if (compiler !== undefined && !isCompilerName(compiler)) {
    throw new ConfigError(`Invalid --compiler value '${compiler}'`);
  }

  return resolveBuildOptions({
    topDir,
    buildDeps,
    buildType,
    targetType,
    compiler,
    checkOnly: cli.checkOnly,
    dryRun: cli.dryRun,
    clean: cli.clean,
    jobs: cli.jobs,
    buildConfig: cli.buildConfig ? resolve(topDir, cli.buildConfig) : defaultBuildConfigPath(topDir),
    buildRoot: cli.buildRoot,
    prefix: cli.prefix,
    altPrefix: cli.altPrefix,
    useInstalled: splitListOption(cli.useInstalled),
    include: splitListOption(cli.include),
    optionalComponents: splitListOption(cli.optional),
    requireOptional: cli.requireOptional,
    prependPath: cli.prependPath,
    localeName: cli.localeName,
    targets: resolveBuildTargets(splitListOption(cli.targets)),
    deps: cli.deps === undefined ? undefined : splitListOption(cli.deps)
  });
}

export interface BuildSession {
  options: BuildOptions;
  registry: PrereqRegistry;
  definitions: ComponentDefinitionsFile;
  definitionsPath: string;
}

/**
 * Load configuration and definitions and construct the registry. Nothing is
 * required yet.
 */
export async function openBuildSession(cli: CliBuildOptions): Promise<BuildSession> {
  const options = toBuildOptions(cli);

  const config = new PinnedVersionConfig();
  if (options.buildConfig && !(await config.read(options.buildConfig))) {
    console.log(`No pinned versions found at ${options.buildConfig}`);
  }

  const definitionsPath = cli.components
    ? resolve(options.topDir, cli.components)
    : resolve(options.topDir, DIR_PATTERNS.UTILS, FILE_PATTERNS.COMPONENTS_YML);
  const definitions = await loadComponentDefinitions(definitionsPath);

  const executor = new ChildProcessExecutor();
  const { jobs, dryRun, checkOnly, clean, help } = options;
  const hostEnv = new BuildEnvironment({
    flags: { jobs, dryRun, checkOnly, clean, help },
    ENV: { PATH: process.env.PATH ?? '' }
  });
  const multiarchLibDirs = await detectMultiarchLibDirs(hostEnv, executor);

  const registry = new PrereqRegistry(options, { executor, config, multiarchLibDirs });
  logger.debug('Build session ready', { topDir: options.topDir, definitionsPath, multiarchLibDirs });
  return { options, registry, definitions, definitionsPath };
}
