import { join, delimiter } from 'path';

import { BuildEnvironment } from './environment.js';
import { BuildInfo } from './build-info.js';
import { CommandRunner } from './command-runner.js';
import { CompilerProbe, type TargetProbe } from './probe.js';
import { PinnedVersionConfig } from './build-config.js';
import {
  Component,
  prefixVariable,
  type ComponentAttributes,
  type ComponentHost,
  type RequireOptions
} from './component.js';
import { parseBuildDeps, type BuildOptions, type BuildTarget } from './build-options.js';
import { ChildProcessExecutor, type CommandExecutor } from '../utils/process.js';
import { COMPILERS, CONFIG_SECTIONS, DIR_PATTERNS, LIB_DIRS, PASSTHROUGH_ENV_VARS, type ConfigSection } from '../constants/index.js';
import { ComponentScriptError, MissingDefinition, MissingPath, MissingSystemLibs } from '../utils/errors.js';
import type { Availability } from '../types/index.js';
import { ensureDirExists, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Outcome of requiring a component, kept for the lifetime of the registry.
 */
type RequireRecord =
  | { status: 'in-progress' }
  | { status: 'done'; changed: boolean }
  | { status: 'failed'; error: unknown };

/** Registers every component definition on the registry. */
export type ComponentDefiner = (registry: PrereqRegistry) => void | Promise<void>;

/**
 * Components required up front, grouped by the build target that needs them.
 */
export interface DefaultRequirements {
  common: string[];
  client?: string[];
  server?: string[];
  test?: string[];
}

export interface RegistryDependencies {
  executor?: CommandExecutor;
  probe?: TargetProbe;
  config?: PinnedVersionConfig;
  /** Extra library directories searched under every prefix, e.g. `lib/x86_64-linux-gnu`. */
  multiarchLibDirs?: string[];
  processEnv?: NodeJS.ProcessEnv;
}

function buildProcessEnv(options: BuildOptions, processEnv: NodeJS.ProcessEnv): Record<string, string> {
  const env: Record<string, string> = {};
  const path = processEnv.PATH;
  if (path) {
    env.PATH = path;
  }
  for (const name of PASSTHROUGH_ENV_VARS) {
    const value = processEnv[name];
    if (value) {
      env[name] = value;
    }
  }
  if (options.prependPath) {
    env.PATH = env.PATH ? `${options.prependPath}${delimiter}${env.PATH}` : options.prependPath;
  }
  if (options.localeName) {
    env.LC_ALL = options.localeName;
  }
  // each go build may run under make -j, so keep it to one proc
  env.GOMAXPROCS = '1';
  return env;
}

/**
 * Owns the component definitions of one build invocation and resolves them:
 * each component is required at most once, its outcome (or error) replayed to
 * every later caller.
 */
export class PrereqRegistry implements ComponentHost {
  readonly env: BuildEnvironment;
  readonly systemEnv: BuildEnvironment;
  readonly runner: CommandRunner;
  readonly probe: TargetProbe;
  readonly executor: CommandExecutor;
  readonly downloadDeps: boolean;
  readonly buildDeps: boolean;
  readonly installed: readonly string[];
  readonly prereqPrefix: string;
  readonly multiarchLibDirs: readonly string[];
  readonly targetType: string;

  private readonly defined = new Map<string, Component>();
  private readonly required = new Map<string, RequireRecord>();
  private readonly prebuiltPaths = new Map<string, string | undefined>();
  private readonly srcPaths = new Map<string, string>();
  private readonly config: PinnedVersionConfig;
  private readonly buildInfo = new BuildInfo();
  private readonly externalDir: string;
  private readonly srcBuildDir: string;
  private readonly prefix: string;
  private readonly buildTargets: readonly BuildTarget[];

  constructor(readonly options: BuildOptions, deps: RegistryDependencies = {}) {
    this.executor = deps.executor ?? new ChildProcessExecutor();
    this.probe = deps.probe ?? new CompilerProbe(this.executor);
    this.config = deps.config ?? new PinnedVersionConfig();
    this.multiarchLibDirs = deps.multiarchLibDirs ?? [];

    const { downloadDeps, buildDeps } = parseBuildDeps(options.buildDeps);
    this.downloadDeps = downloadDeps;
    this.buildDeps = buildDeps;
    this.installed = options.useInstalled;
    this.buildTargets = options.targets;

    this.targetType = options.targetType === 'default' ? options.buildType : options.targetType;
    const buildRoot = join(options.topDir, options.buildRoot);
    this.srcBuildDir = join(buildRoot, options.buildType, options.compiler);
    this.externalDir = join(buildRoot, DIR_PATTERNS.EXTERNAL, this.targetType);
    this.prefix = join(options.topDir, options.prefix);
    this.prereqPrefix = join(this.prefix, DIR_PATTERNS.PREREQ, this.targetType);

    const { jobs, dryRun, checkOnly, clean, help } = options;
    this.env = new BuildEnvironment({
      flags: { jobs, dryRun, checkOnly, clean, help },
      ENV: buildProcessEnv(options, deps.processEnv ?? process.env),
      vars: {
        ...COMPILERS[options.compiler],
        COMPILER: options.compiler,
        BUILD_TYPE: options.buildType,
        TTYPE_REAL: this.targetType,
        BUILD_ROOT: buildRoot,
        BUILD_DIR: this.srcBuildDir,
        PREFIX: this.prefix,
        LIBTOOLIZE: 'libtoolize'
      }
    });
    this.buildInfo.update('BUILD_DIR', this.srcBuildDir);
    this.buildInfo.update('PREFIX', this.prefix);

    this.systemEnv = this.env.clone();
    this.runner = new CommandRunner(this.executor, this.env);
  }

  /**
   * Create the build directories and check for the selected compiler.
   */
  async setup(): Promise<void> {
    await ensureDirExists(this.srcBuildDir, this.options.dryRun);
    await ensureDirExists(this.externalDir, this.options.dryRun);
    await this.setupCompiler();
  }

  private async setupCompiler(): Promise<void> {
    if (this.options.clean || this.options.help) {
      return;
    }
    const compiler = this.options.compiler;
    for (const [name, prog] of Object.entries(COMPILERS[compiler])) {
      if (!(await this.probe.checkProg(this.env, prog))) {
        console.log(`${prog} must be installed when COMPILER=${compiler}`);
        if (this.options.checkOnly) {
          continue;
        }
        throw new MissingSystemLibs(prog);
      }
      this.env.replace({ [name]: prog });
    }
  }

  /**
   * Run the definitions callback, then require the default set for the
   * selected targets, each against its own copy of the environment.
   */
  async initialize(definer: ComponentDefiner, requirements: DefaultRequirements, source = 'components'): Promise<void> {
    await this.setup();

    try {
      await definer(this);
    } catch (error) {
      const trace = error instanceof Error ? error.stack ?? error.message : String(error);
      throw new ComponentScriptError(source, trace);
    }

    for (const name of this.defaultRequirements(requirements)) {
      await this.require(this.env.clone(), [name]);
    }
  }

  private defaultRequirements(requirements: DefaultRequirements): string[] {
    if (this.options.buildDeps === 'only' && this.options.deps !== undefined) {
      return this.options.deps;
    }
    const reqs = [...requirements.common];
    if (this.testRequested()) {
      reqs.push(...(requirements.test ?? []));
    }
    if (this.serverRequested()) {
      reqs.push(...(requirements.server ?? []));
    }
    if (this.clientRequested()) {
      reqs.push(...(requirements.client ?? []));
    }
    return reqs;
  }

  define(name: string, attrs: ComponentAttributes = {}): Component {
    const useInstalled = this.installed.includes('all') || this.installed.includes(name);
    const component = new Component(this, name, useInstalled, attrs);
    this.defined.set(name, component);
    logger.debug(`Defined component ${name}`, { useInstalled });
    return component;
  }

  isDefined(name: string): boolean {
    return this.defined.has(name);
  }

  getComponent(name: string): Component {
    const component = this.defined.get(name);
    if (!component) {
      throw new MissingDefinition(name);
    }
    return component;
  }

  serverRequested(): boolean {
    return this.buildTargets.includes('server');
  }

  clientRequested(): boolean {
    return this.buildTargets.includes('client');
  }

  testRequested(): boolean {
    return this.buildTargets.includes('test');
  }

  /**
   * Make sure each named component is usable, building it if needed, and
   * apply its settings to `env`.
   *
   * @returns whether any of the components changed
   */
  async require(env: BuildEnvironment, names: readonly string[], options: RequireOptions = {}): Promise<boolean> {
    let changes = false;
    const flags = this.env.flags;

    for (const name of names) {
      const component = this.getComponent(name);
      const record = this.required.get(name);
      if (record?.status === 'failed') {
        throw record.error;
      }

      const neededLibs = options.headersOnly ? null : options.libs?.[name] ?? component.libs;

      if (record !== undefined) {
        if (flags.help) {
          continue;
        }
        await component.setEnvironment(env, neededLibs);
        if (flags.clean) {
          continue;
        }
        if (record.status === 'done' && record.changed) {
          changes = true;
        }
        continue;
      }

      this.required.set(name, { status: 'in-progress' });
      if (await component.isInstalled(neededLibs)) {
        this.required.set(name, { status: 'done', changed: false });
        continue;
      }

      try {
        await component.configure();
        const changed = await component.build(env, neededLibs);
        if (changed) {
          changes = true;
        } else {
          await this.modifyPrefix(component);
        }
        this.required.set(name, { status: 'done', changed });
        // new directories may be present
        await component.setEnvironment(env, neededLibs);
      } catch (error) {
        component.markFailed();
        this.required.set(name, { status: 'failed', error });
        throw error;
      }
    }

    return changes;
  }

  /**
   * Fall back to the system prefix when nothing was built and no trace of a
   * source checkout or install exists.
   */
  private async modifyPrefix(component: Component): Promise<void> {
    if (component.package !== undefined || component.srcPath === undefined) {
      return;
    }
    const variable = prefixVariable(component.name);
    const recorded = this.env.getString(variable);
    if (
      !(await exists(component.srcPath)) &&
      !(await exists(join(this.prereqPrefix, component.name))) &&
      !(recorded !== undefined && (await exists(recorded)))
    ) {
      this.saveComponentPrefix(variable, '/usr');
    }
  }

  /**
   * Whether every named optional component is selected by the `include`
   * option. Components that are not optional always count as included.
   */
  included(...names: string[]): boolean {
    const include = this.options.include;
    for (const name of names) {
      if (!this.options.optionalComponents.includes(name)) {
        continue;
      }
      if (!include.includes(name) && !include.includes('all')) {
        return false;
      }
    }
    return true;
  }

  /**
   * Try to require components against a private copy of the environment.
   * Failures become an unavailable result unless optional checks are strict.
   */
  async checkComponent(names: readonly string[], options: RequireOptions = {}): Promise<Availability> {
    const env = this.env.clone();
    try {
      await this.require(env, names, options);
    } catch (error) {
      if (this.options.requireOptional) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      logger.debug(`Optional components unavailable: ${names.join(', ')}`, { reason });
      return { available: false, reason };
    }
    return { available: true };
  }

  async isInstalled(name: string): Promise<boolean> {
    const result = await this.checkComponent([name]);
    return result.available && this.getComponent(name).useInstalled;
  }

  getBuildDir(): string {
    return this.externalDir;
  }

  /** Directory for intermediate build files of the project itself. */
  getSrcBuildDir(): string {
    return this.srcBuildDir;
  }

  getBuildInfo(): BuildInfo {
    return this.buildInfo;
  }

  /**
   * Search the alternate prefixes for an install that satisfies the
   * component. The first match wins; none means build from source.
   */
  async getPrebuiltPath(component: Component): Promise<string | undefined> {
    if (this.prebuiltPaths.has(component.name)) {
      return this.prebuiltPaths.get(component.name);
    }

    const paths = (this.options.altPrefix ?? '').split(delimiter).filter(path => path.length > 0);
    for (const path of paths) {
      if (!(await exists(path))) {
        throw new MissingPath('ALT_PREFIX', path);
      }
      const includePath = join(path, DIR_PATTERNS.INCLUDE);
      const hasInclude = await exists(includePath);
      let libPath: string | undefined;
      for (const libDir of LIB_DIRS) {
        if (await exists(join(path, libDir))) {
          libPath = join(path, libDir);
          break;
        }
      }
      if (!hasInclude && libPath === undefined) {
        continue;
      }
      const env = this.env.clone();
      if (hasInclude) {
        env.appendUnique('CPPPATH', [includePath]);
      }
      if (libPath !== undefined) {
        env.appendUnique('LIBPATH', [libPath]);
      }
      if (!(await component.hasMissingTargets(env))) {
        this.prebuiltPaths.set(component.name, path);
        return path;
      }
    }

    this.prebuiltPaths.set(component.name, undefined);
    return undefined;
  }

  private saveComponentPrefix(variable: string, value: string): void {
    this.env.replace({ [variable]: value });
    this.buildInfo.update(variable, value);
  }

  /**
   * @returns the component's own prefix and the project install prefix
   */
  getPrefixes(name: string, prebuiltPath: string | undefined): [string, string] {
    const variable = prefixVariable(name);
    const componentPrefix = prebuiltPath ?? join(this.prereqPrefix, name);
    this.saveComponentPrefix(variable, componentPrefix);
    return [componentPrefix, this.prefix];
  }

  getSrcPath(name: string): string {
    const cached = this.srcPaths.get(name);
    if (cached !== undefined) {
      return cached;
    }
    const srcPath = join(this.externalDir, name);
    this.srcPaths.set(name, srcPath);
    return srcPath;
  }

  getConfig(section: ConfigSection, key: string): string | undefined {
    return this.config.get(section, key);
  }

  /**
   * Merge the extra configuration file a component names in the `configs`
   * section, resolved against its fetched sources.
   */
  async loadConfig(name: string, path: string): Promise<void> {
    const configPath = this.getConfig(CONFIG_SECTIONS.CONFIGS, name);
    if (configPath === undefined) {
      return;
    }
    const fullPath = join(path, configPath);
    console.log(`Reading config file for ${name} from ${fullPath}`);
    await this.config.read(fullPath);
  }
}
