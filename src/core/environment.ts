import { delimiter } from 'path';

import type { ExecutionFlags } from './build-options.js';

export type EnvValue = string | string[];

export interface BuildEnvironmentInit {
  vars?: Record<string, EnvValue>;
  ENV?: Record<string, string>;
  flags: ExecutionFlags;
}

const VARIABLE_PATTERN = /\$(\$|\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

function copyValue(value: EnvValue): EnvValue {
  return Array.isArray(value) ? [...value] : value;
}

function splitPathList(value: string | undefined): string[] {
  return value ? value.split(delimiter).filter(entry => entry.length > 0) : [];
}

/**
 * Mutable construction context shared by every build step: construction
 * variables (include paths, libraries, flags, prefixes), the process
 * environment handed to build commands, and the execution flags of the run.
 *
 * Every append helper suppresses duplicates, so applying a component's
 * settings twice leaves the environment unchanged. `clone()` is the only way
 * to get an isolated copy; the flags object is shared between clones.
 */
export class BuildEnvironment {
  readonly ENV: Record<string, string>;
  readonly flags: ExecutionFlags;
  private readonly vars: Map<string, EnvValue>;

  constructor(init: BuildEnvironmentInit) {
    this.flags = init.flags;
    this.ENV = { ...(init.ENV ?? {}) };
    this.vars = new Map(Object.entries(init.vars ?? {}).map(([key, value]) => [key, copyValue(value)]));
  }

  get(key: string): EnvValue | undefined {
    return this.vars.get(key);
  }

  /** Scalar view of a variable; lists are joined with spaces. */
  getString(key: string): string | undefined {
    const value = this.vars.get(key);
    if (value === undefined) {
      return undefined;
    }
    return Array.isArray(value) ? value.join(' ') : value;
  }

  /** List view of a variable; a scalar becomes a one-element list. */
  getList(key: string): string[] {
    const value = this.vars.get(key);
    if (value === undefined) {
      return [];
    }
    return Array.isArray(value) ? [...value] : [value];
  }

  has(key: string): boolean {
    return this.vars.has(key);
  }

  replace(values: Record<string, EnvValue>): void {
    for (const [key, value] of Object.entries(values)) {
      this.vars.set(key, copyValue(value));
    }
  }

  unset(key: string): void {
    this.vars.delete(key);
  }

  appendUnique(key: string, values: readonly string[]): void {
    const current = this.getList(key);
    for (const value of values) {
      if (!current.includes(value)) {
        current.push(value);
      }
    }
    this.vars.set(key, current);
  }

  prependUnique(key: string, values: readonly string[]): void {
    const current = this.getList(key);
    const added = values.filter((value, index) => !current.includes(value) && values.indexOf(value) === index);
    this.vars.set(key, [...added, ...current]);
  }

  /** Append a directory to a path-list variable of the process environment. */
  appendEnvPath(name: string, path: string): void {
    const entries = splitPathList(this.ENV[name]);
    if (entries.includes(path)) {
      return;
    }
    entries.push(path);
    this.ENV[name] = entries.join(delimiter);
  }

  /** Prepend a directory to a path-list variable of the process environment. */
  prependEnvPath(name: string, path: string): void {
    const entries = splitPathList(this.ENV[name]);
    if (entries.includes(path)) {
      return;
    }
    this.ENV[name] = [path, ...entries].join(delimiter);
  }

  /**
   * Expand `$NAME` and `${NAME}` against the construction variables. `$$` is a
   * literal dollar sign and unknown variables expand to nothing.
   */
  subst(text: string): string {
    return text.replace(VARIABLE_PATTERN, (_match, token: string, braced?: string, bare?: string) => {
      if (token === '$') {
        return '$';
      }
      const name = braced ?? bare;
      return name === undefined ? '' : this.getString(name) ?? '';
    });
  }

  clone(): BuildEnvironment {
    const vars: Record<string, EnvValue> = {};
    for (const [key, value] of this.vars) {
      vars[key] = value;
    }
    return new BuildEnvironment({ vars, ENV: this.ENV, flags: this.flags });
  }

  toJSON(): Record<string, EnvValue> {
    return Object.fromEntries(this.vars);
  }
}
