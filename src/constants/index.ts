/**
 * Shared constants for the prerequisite build engine
 */

export const FILE_PATTERNS = {
  BUILD_CONFIG: 'build.config',
  BUILD_VARS_JSON: '.build_vars.json',
  COMPONENTS_YML: 'components.yml',
  SHARED_OBJECTS: ['*.so', '*.so.*']
} as const;

export const DIR_PATTERNS = {
  EXTERNAL: 'external',
  PREREQ: 'prereq',
  UTILS: 'utils',
  INCLUDE: 'include',
  BIN: 'bin',
  OUT_OF_SOURCE_SUFFIX: '.build'
} as const;

/** Library subdirectories probed under every prefix, in lookup order. */
export const LIB_DIRS = ['lib64', 'lib'] as const;

/** Prefix that marks a component as provided by the operating system. */
export const SYSTEM_PREFIX = '/usr';

/** Sections of the pinned-version configuration file. */
export const CONFIG_SECTIONS = {
  BRANCHES: 'branches',
  COMMIT_VERSIONS: 'commit_versions',
  PATCH_VERSIONS: 'patch_versions',
  CONFIGS: 'configs'
} as const;

export type ConfigSection = typeof CONFIG_SECTIONS[keyof typeof CONFIG_SECTIONS];

/** Process environment variables carried into every build command. */
export const PASSTHROUGH_ENV_VARS = [
  'HOME',
  'TERM',
  'SSH_AUTH_SOCK',
  'http_proxy',
  'https_proxy',
  'PKG_CONFIG_PATH',
  'MODULEPATH',
  'MODULESHOME',
  'MODULESLOADED',
  'I_MPI_ROOT'
] as const;

export const COMPILERS = {
  gcc: { CC: 'gcc', CXX: 'g++' },
  clang: { CC: 'clang', CXX: 'clang++' }
} as const;

export const RUNPATH_LINK_FLAG = '-Wl,--enable-new-dtags';
