import { join, normalize } from 'path';
import { minimatch } from 'minimatch';

import type { BuildCommand, CommandRunner } from './command-runner.js';
import type { BuildEnvironment } from './environment.js';
import type { TargetProbe } from './probe.js';
import type { PatchMap, Retriever } from './retrievers/types.js';
import type { CommandExecutor } from '../utils/process.js';
import { applyComponentEnvironment, type PropagationSource } from './environment-propagation.js';
import { mergePkgConfig, type PkgConfigQuery } from './pkg-config.js';
import {
  CONFIG_SECTIONS,
  DIR_PATTERNS,
  FILE_PATTERNS,
  LIB_DIRS,
  SYSTEM_PREFIX,
  type ConfigSection
} from '../constants/index.js';
import {
  BuildFailure,
  BuildRequired,
  DownloadRequired,
  MissingSystemLibs,
  MissingTargets
} from '../utils/errors.js';
import { PrereqError, ErrorCodes, type Logger } from '../types/index.js';
import { ensureDirExists, emptyDirectory, exists, isDirectory, listFiles } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

export interface TargetCheckContext {
  env: BuildEnvironment;
  probe: TargetProbe;
  component: string;
}

/** Custom target check; returning false marks the targets as missing. */
export type ConfigCallback = (context: TargetCheckContext) => boolean | Promise<boolean>;

/**
 * Attributes a component definition accepts.
 */
export interface ComponentAttributes {
  /** Libraries dependents link against. */
  libs?: string[];
  /** Compiler used instead of `$CC` when checking `libs`. */
  libsCc?: string;
  /** Library → functions expected in it. */
  functions?: Record<string, string[]>;
  headers?: string[];
  progs?: string[];
  pkgconfig?: string;
  requires?: string[];
  /** System libraries that must exist before a source build starts. */
  requiredLibs?: string[];
  /** System programs that must exist before a source build starts. */
  requiredProgs?: string[];
  defines?: string[];
  /** Distribution package that provides the component. */
  package?: string;
  commands?: BuildCommand[];
  configCb?: ConfigCallback;
  /** Absent means the component is expected to be installed on the system. */
  retriever?: Retriever;
  extraLibPath?: string[];
  extraIncludePath?: string[];
  outOfSrcBuild?: boolean;
  /** Install subdirectories whose shared objects get relative RPATHs. */
  patchRpath?: string[];
}

export interface RequireOptions {
  /** Only compile-time paths; no libraries are linked. */
  headersOnly?: boolean;
  /** Per-component override of the libraries to link. */
  libs?: Record<string, string[]>;
}

/**
 * `execute` runs real probes; `skip` reports targets as missing without
 * probing (a dry run that was not asked to check).
 */
export type ProbeMode = 'execute' | 'skip';

export type ComponentState = 'unconfigured' | 'configured' | 'installed' | 'needs-build' | 'built' | 'failed';

/**
 * Services a component borrows from the registry that owns it.
 */
export interface ComponentHost {
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
  getPrebuiltPath(component: Component): Promise<string | undefined>;
  getPrefixes(name: string, prebuiltPath: string | undefined): [string, string];
  getSrcPath(name: string): string;
  getBuildDir(): string;
  getConfig(section: ConfigSection, key: string): string | undefined;
  loadConfig(name: string, path: string): Promise<void>;
  require(env: BuildEnvironment, names: readonly string[], options?: RequireOptions): Promise<boolean>;
  getComponent(name: string): Component;
}

export function resolveProbeMode(flags: { dryRun: boolean; checkOnly: boolean }): ProbeMode {
  if (flags.checkOnly) {
    return 'execute';
  }
  return flags.dryRun ? 'skip' : 'execute';
}

/**
 * An external prerequisite: how to detect it, fetch it, build it, and what
 * dependents need to use it.
 */
export class Component implements PropagationSource {
  readonly name: string;
  readonly libs: string[];
  readonly libsCc?: string;
  readonly functions: Record<string, string[]>;
  readonly headers: string[];
  readonly progs: string[];
  readonly pkgconfig?: string;
  readonly requires: string[];
  readonly requiredLibs: string[];
  readonly requiredProgs: string[];
  readonly defines: string[];
  readonly package?: string;
  readonly commands: BuildCommand[];
  readonly configCb?: ConfigCallback;
  readonly retriever?: Retriever;
  readonly outOfSrcBuild: boolean;
  readonly patchRpath: string[];
  readonly libPath: string[];
  readonly includePath: string[];
  private readonly log: Logger;

  useInstalled: boolean;
  targetsFound = false;
  state: ComponentState = 'unconfigured';
  prebuiltPath?: string;
  componentPrefix?: string;
  prefix?: string;
  srcPath?: string;
  buildPath?: string;

  constructor(
    private readonly host: ComponentHost,
    name: string,
    useInstalled: boolean,
    attrs: ComponentAttributes = {}
  ) {
    this.name = name;
    this.useInstalled = useInstalled;
    this.libs = attrs.libs ?? [];
    this.libsCc = attrs.libsCc;
    this.functions = attrs.functions ?? {};
    this.headers = attrs.headers ?? [];
    this.progs = attrs.progs ?? [];
    this.pkgconfig = attrs.pkgconfig;
    this.requires = attrs.requires ?? [];
    this.requiredLibs = attrs.requiredLibs ?? [];
    this.requiredProgs = [...(attrs.requiredProgs ?? [])];
    this.defines = attrs.defines ?? [];
    this.package = attrs.package;
    this.commands = attrs.commands ?? [];
    this.configCb = attrs.configCb;
    this.retriever = attrs.retriever;
    this.outOfSrcBuild = attrs.outOfSrcBuild ?? false;
    this.patchRpath = attrs.patchRpath ?? [];
    if (this.patchRpath.length > 0 && !this.requiredProgs.includes('patchelf')) {
      this.requiredProgs.push('patchelf');
    }
    this.libPath = ['lib', 'lib64', ...host.multiarchLibDirs, ...(attrs.extraLibPath ?? [])];
    this.includePath = [DIR_PATTERNS.INCLUDE, ...(attrs.extraIncludePath ?? [])];
    this.log = logger.child(name);
  }

  private get dryRun(): boolean {
    return this.host.env.flags.dryRun;
  }

  private get probeMode(): ProbeMode {
    return resolveProbeMode(this.host.env.flags);
  }

  /**
   * Assign prefixes and source/build directories. Runs once; the component
   * prefix never changes afterwards.
   */
  async configure(): Promise<void> {
    if (this.state !== 'unconfigured') {
      return;
    }
    this.prebuiltPath = this.retriever
      ? await this.host.getPrebuiltPath(this)
      : SYSTEM_PREFIX;

    [this.componentPrefix, this.prefix] = this.host.getPrefixes(this.name, this.prebuiltPath);

    this.srcPath = this.retriever ? this.host.getSrcPath(this.name) : undefined;
    this.buildPath = this.srcPath;
    if (this.outOfSrcBuild) {
      this.buildPath = join(this.host.getBuildDir(), `${this.name}${DIR_PATTERNS.OUT_OF_SOURCE_SUFFIX}`);
      await ensureDirExists(this.buildPath, this.dryRun);
    }
    this.state = 'configured';
    this.log.debug('Configured', { prefix: this.componentPrefix, srcPath: this.srcPath, buildPath: this.buildPath });
  }

  markFailed(): void {
    this.state = 'failed';
  }

  async setEnvironment(env: BuildEnvironment, neededLibs: readonly string[] | null): Promise<void> {
    await applyComponentEnvironment(env, this, neededLibs);
  }

  /**
   * Merge pkg-config output for this component. Prefers the `.pc` files of
   * the component's own install; when it has none the merge is skipped.
   */
  async parsePkgConfig(env: BuildEnvironment, query: PkgConfigQuery): Promise<void> {
    if (this.pkgconfig === undefined) {
      return;
    }
    const inherited = process.env.PKG_CONFIG_PATH;
    if (inherited && env.ENV.PKG_CONFIG_PATH === undefined) {
      env.ENV.PKG_CONFIG_PATH = inherited;
    }
    const prefix = this.componentPrefix;
    if (!this.useInstalled && prefix !== undefined && prefix !== SYSTEM_PREFIX) {
      let found = false;
      for (const libDir of ['lib', 'lib64']) {
        const configDir = join(prefix, libDir, 'pkgconfig');
        if (!(await isDirectory(configDir))) {
          continue;
        }
        found = true;
        env.appendEnvPath('PKG_CONFIG_PATH', configDir);
      }
      if (!found) {
        return;
      }
    }
    await mergePkgConfig(env, this.host.executor, this.pkgconfig, query);
  }

  /**
   * Check that programs, headers, libraries and functions are all present.
   * "Present" is cached; "missing" is re-checked every time since a build may
   * have fixed it.
   */
  async hasMissingTargets(env: BuildEnvironment, mode: ProbeMode = this.probeMode): Promise<boolean> {
    if (this.targetsFound) {
      return false;
    }

    if (mode === 'skip') {
      console.log('Would check for missing build targets');
      return true;
    }

    // the .pc file is not always generated, so a failure here is not fatal
    await this.parsePkgConfig(env, '--cflags');

    if (this.host.env.flags.help) {
      return true;
    }

    console.log(`Checking targets for component '${this.name}'`);

    const probe = this.host.probe;
    if (this.configCb && !(await this.configCb({ env, probe, component: this.name }))) {
      return true;
    }

    for (const prog of this.progs) {
      if (!(await probe.checkProg(env, prog))) {
        return true;
      }
    }

    for (const header of this.headers) {
      if (!(await probe.checkHeader(env, header))) {
        return true;
      }
    }

    for (const lib of this.libs) {
      if (!(await this.checkLib(env, lib))) {
        return true;
      }
    }

    for (const [lib, functions] of Object.entries(this.functions)) {
      const funcEnv = env.clone();
      funcEnv.appendUnique('LIBS', [lib]);
      for (const func of functions) {
        if (!(await probe.checkFunc(funcEnv, func))) {
          return true;
        }
      }
    }

    this.targetsFound = true;
    return false;
  }

  private async checkLib(env: BuildEnvironment, lib: string): Promise<boolean> {
    if (this.libsCc === undefined) {
      return this.host.probe.checkLib(env, lib);
    }
    const oldCc = env.get('CC');
    env.replace({ [prefixVariable(this.name)]: this.componentPrefix ?? '', CC: this.libsCc });
    try {
      env.replace({ CC: env.subst(this.libsCc) });
      return await this.host.probe.checkLib(env, lib);
    } finally {
      if (oldCc === undefined) {
        env.unset('CC');
      } else {
        env.replace({ CC: oldCc });
      }
    }
  }

  /**
   * Libraries and programs needed on the system before building from source.
   */
  async hasMissingSystemDeps(env: BuildEnvironment, mode: ProbeMode = this.probeMode): Promise<boolean> {
    if (mode === 'skip') {
      console.log('Would check for missing system libraries');
      return false;
    }
    if (this.host.env.flags.help) {
      return true;
    }
    for (const lib of this.requiredLibs) {
      if (!(await this.host.probe.checkLib(env, lib))) {
        return true;
      }
    }
    for (const prog of this.requiredProgs) {
      if (!(await this.host.probe.checkProg(env, prog))) {
        return true;
      }
    }
    return false;
  }

  /**
   * Whether the system already provides the component. Only consulted when
   * the user asked for installed copies; a failed check turns that off for
   * the rest of the run.
   */
  async isInstalled(neededLibs: readonly string[] | null): Promise<boolean> {
    if (!this.useInstalled) {
      return false;
    }
    const env = this.host.systemEnv.clone();
    await this.setEnvironment(env, neededLibs);
    if (await this.hasMissingTargets(env)) {
      this.useInstalled = false;
      return false;
    }
    this.state = 'installed';
    return true;
  }

  /**
   * Parse the `patch_versions` entry: comma separated patches, each optionally
   * prefixed with `subdir^`. Remote patches are downloaded once into the build
   * directory.
   */
  async resolvePatches(): Promise<PatchMap> {
    const patches: PatchMap = new Map();
    const spec = this.host.getConfig(CONFIG_SECTIONS.PATCH_VERSIONS, this.name);
    if (spec === undefined) {
      return patches;
    }

    let patchNum = 1;
    for (const entry of spec.split(',')) {
      let raw = entry.trim();
      if (!raw) {
        continue;
      }
      let subdir: string | undefined;
      const caret = raw.indexOf('^');
      if (caret !== -1) {
        subdir = raw.slice(0, caret);
        raw = raw.slice(caret + 1);
      }
      if (!raw.includes('https://')) {
        patches.set(raw, subdir);
        continue;
      }
      const patchPath = join(this.host.getBuildDir(), `${this.name}_patch_${patchNum}`);
      patchNum++;
      patches.set(patchPath, subdir);
      if (await exists(patchPath)) {
        continue;
      }
      const command = ['curl', '-sSfL', '--retry', '10', '--retry-max-time', '60', '-o', patchPath, raw];
      if (!(await this.host.runner.run([command]))) {
        throw new BuildFailure(raw);
      }
    }
    return patches;
  }

  /**
   * Download the component sources, if there are any to download.
   */
  async get(): Promise<void> {
    if (this.prebuiltPath) {
      console.log(`Using prebuilt binaries for ${this.name}`);
      return;
    }
    const branch = this.host.getConfig(CONFIG_SECTIONS.BRANCHES, this.name);
    const commitSha = this.host.getConfig(CONFIG_SECTIONS.COMMIT_VERSIONS, this.name);

    if (!this.retriever) {
      console.log(`Using installed version of ${this.name}`);
      return;
    }
    if (!this.host.downloadDeps) {
      throw new DownloadRequired(this.name);
    }

    console.log(`Downloading source for ${this.name}`);
    const patches = await this.resolvePatches();
    await this.retriever.fetch(this.requireSrcPath(), { commitSha, branch, patches }, {
      runner: this.host.runner,
      env: this.host.env
    });
  }

  private requireSrcPath(): string {
    if (this.srcPath === undefined) {
      throw new PrereqError(`${this.name} has no source path; configure() must run first`, ErrorCodes.CONFIG_ERROR);
    }
    return this.srcPath;
  }

  /**
   * Build the component when needed and verify its targets afterwards.
   *
   * @returns true when something was built, or when help/clean handling
   * short-circuited the build.
   */
  async build(env: BuildEnvironment, neededLibs: readonly string[] | null): Promise<boolean> {
    let changes = false;
    const envcopy = this.host.systemEnv.clone();

    if (await this.checkUserOptions(env, neededLibs)) {
      return true;
    }
    await this.setEnvironment(envcopy, this.libs);

    if (this.prebuiltPath) {
      await this.checkInstalledPackage(envcopy);
      return false;
    }

    let buildDep = this.host.buildDeps;
    if (this.host.installed.includes('all') || this.host.installed.includes(this.name)) {
      buildDep = false;
    }
    if (this.componentPrefix !== undefined && (await exists(this.componentPrefix))) {
      buildDep = false;
    }

    // an installable package wins over a source build when it is already present
    let missingTargets = false;
    if (buildDep) {
      if (this.package !== undefined && !(await this.hasMissingTargets(envcopy))) {
        buildDep = false;
      }
    } else {
      missingTargets = await this.hasMissingTargets(envcopy);
    }

    if (buildDep) {
      if (await this.hasMissingSystemDeps(this.host.systemEnv)) {
        throw new MissingSystemLibs(this.name);
      }

      await this.get();
      await this.host.loadConfig(this.name, this.requireSrcPath());

      if (this.requires.length > 0) {
        await this.host.require(envcopy, this.requires, { headersOnly: true });
        await this.setEnvironment(envcopy, this.libs);
      }

      await ensureDirExists(this.host.prereqPrefix, this.dryRun);
      changes = true;
      if (this.outOfSrcBuild && this.buildPath !== undefined) {
        await this.removeOldDir(this.buildPath);
      }
      if (!(await this.host.runner.run(this.commands, { cwd: this.buildPath, env: envcopy }))) {
        throw new BuildFailure(this.name);
      }
      this.state = 'built';
    } else if (missingTargets) {
      if (!this.dryRun) {
        throw new BuildRequired(this.name);
      }
      console.log(`Would do required build of ${this.name}`);
      this.state = 'needs-build';
    }

    // new directories may exist now
    if (this.requires.length > 0) {
      await this.host.require(envcopy, this.requires, { headersOnly: true });
    }
    await this.setEnvironment(envcopy, this.libs);
    if (changes) {
      await this.patchRpaths();
    }
    if ((await this.hasMissingTargets(envcopy)) && !this.dryRun) {
      throw new MissingTargets(this.name);
    }
    if (this.state === 'configured') {
      this.state = 'installed';
    }
    return changes;
  }

  private async checkUserOptions(env: BuildEnvironment, neededLibs: readonly string[] | null): Promise<boolean> {
    const flags = this.host.env.flags;
    if (flags.help) {
      if (this.requires.length > 0) {
        await this.host.require(env, this.requires);
      }
      return true;
    }
    await this.setEnvironment(env, neededLibs);
    return flags.clean;
  }

  private async checkInstalledPackage(env: BuildEnvironment): Promise<void> {
    if (!(await this.hasMissingTargets(env))) {
      this.state = 'installed';
      return;
    }
    if (this.dryRun) {
      console.log(this.package === undefined ? `Missing ${this.name}` : `Missing package ${this.package} ${this.name}`);
      this.state = 'needs-build';
      return;
    }
    throw new MissingTargets(this.name, this.package ?? this.name);
  }

  private async removeOldDir(path: string): Promise<void> {
    if (this.dryRun) {
      console.log(`Would empty ${path}`);
      return;
    }
    await emptyDirectory(path);
  }

  /**
   * The RUNPATH given to this component's shared objects: `$ORIGIN`, then the
   * library directory of every prerequisite (origin-relative when it is
   * installed as a sibling), then the absolute library directories.
   * `$$` is the substitution escape for a literal `$`.
   */
  async computeRpath(): Promise<string[] | undefined> {
    const compPath = this.componentPrefix;
    if (!compPath || compPath.startsWith(SYSTEM_PREFIX)) {
      return undefined;
    }
    if (!(await exists(compPath))) {
      return undefined;
    }

    const rpath = ['$$ORIGIN'];
    const norigin: string[] = [];

    for (const libDir of LIB_DIRS) {
      const path = join(compPath, libDir);
      if (await exists(path)) {
        norigin.push(normalize(path));
        break;
      }
    }

    for (const prereq of this.requires) {
      const rootPath = join(compPath, '..', prereq);
      if (!(await exists(rootPath))) {
        const subPath = this.host.getComponent(prereq).componentPrefix;
        if (subPath && !subPath.startsWith(SYSTEM_PREFIX)) {
          for (const libDir of LIB_DIRS) {
            const libPath = join(subPath, libDir);
            if (await exists(libPath)) {
              rpath.push(libPath);
            }
          }
        }
        continue;
      }

      for (const libDir of LIB_DIRS) {
        const path = join(rootPath, libDir);
        if (!(await exists(path))) {
          continue;
        }
        rpath.push(`$$ORIGIN/../../${prereq}/${libDir}`);
        norigin.push(normalize(path));
        break;
      }
    }

    return [...rpath, ...norigin];
  }

  /**
   * Rewrite the RUNPATH of every shared object in the `patchRpath`
   * subdirectories. A file that cannot be patched is reported and skipped.
   */
  async patchRpaths(): Promise<void> {
    const rpath = await this.computeRpath();
    const compPath = this.componentPrefix;
    if (rpath === undefined || compPath === undefined) {
      return;
    }

    for (const folder of this.patchRpath) {
      const path = join(compPath, folder);
      if (!(await isDirectory(path))) {
        this.log.warn(`No ${folder} directory to patch in ${compPath}`);
        continue;
      }
      const sharedObjects = (await listFiles(path))
        .filter(file => FILE_PATTERNS.SHARED_OBJECTS.some(pattern => minimatch(file, pattern)));
      for (const lib of sharedObjects) {
        const fullLib = join(path, lib);
        const command = ['patchelf', '--set-rpath', rpath.join(':'), fullLib];
        if (!(await this.host.runner.run([command]))) {
          this.log.warn(`patchelf failed for ${fullLib}`);
          console.log(`Skipped patching ${fullLib}`);
        }
      }
    }
  }
}

/**
 * Construction variable holding a component's prefix, e.g. `json-c` →
 * `JSON_C_PREFIX`.
 */
export function prefixVariable(name: string): string {
  return `${name.toUpperCase().replace(/[^A-Z0-9_]/g, '_')}_PREFIX`;
}
