import yaml from 'js-yaml';

import type { ComponentAttributes } from './component.js';
import type { ComponentDefiner, DefaultRequirements } from './prereq-registry.js';
import { ArchiveRetriever, GitRetriever, PathRetriever, type Retriever } from './retrievers/index.js';
import { ComponentScriptError } from '../utils/errors.js';
import { readTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Component definitions read from a YAML file:
 *
 * ```yaml
 * requirements:
 *   common: [isal]
 *   test: [cmocka]
 * components:
 *   isal:
 *     retriever: { type: git, url: https://example.com/isal.git }
 *     libs: [isal]
 *     headers: [isa-l.h]
 *     commands:
 *       - [./autogen.sh]
 *       - [./configure, --prefix=$ISAL_PREFIX]
 *       - [make]
 *       - [make, install]
 * ```
 *
 * Keys are snake_case, mirroring the attribute names of `define()`.
 */
export interface ComponentDefinitionsFile {
  definer: ComponentDefiner;
  requirements: DefaultRequirements;
  names: string[];
}

type YamlObject = Record<string, unknown>;

class DefinitionShapeError extends Error {}

function isObject(value: unknown): value is YamlObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, field: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new DefinitionShapeError(`${field} must be a list`);
  }
  return value.map((item, index) => {
    if (typeof item !== 'string' && typeof item !== 'number') {
      throw new DefinitionShapeError(`${field}[${index}] must be a string`);
    }
    return String(item);
  });
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new DefinitionShapeError(`${field} must be a string`);
  }
  return value;
}

function optionalBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new DefinitionShapeError(`${field} must be true or false`);
  }
  return value;
}

function parseRetriever(value: unknown, field: string): Retriever | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isObject(value)) {
    throw new DefinitionShapeError(`${field} must be a mapping`);
  }
  const type = value.type;
  switch (type) {
    case 'git': {
      const url = optionalString(value.url, `${field}.url`);
      if (!url) {
        throw new DefinitionShapeError(`${field}.url is required`);
      }
      return new GitRetriever(url, {
        hasSubmodules: optionalBoolean(value.has_submodules, `${field}.has_submodules`),
        branch: optionalString(value.branch, `${field}.branch`)
      });
    }
    case 'archive': {
      const url = optionalString(value.url, `${field}.url`);
      const md5 = optionalString(value.md5, `${field}.md5`);
      if (!url || !md5) {
        throw new DefinitionShapeError(`${field} needs both url and md5`);
      }
      return new ArchiveRetriever(url, md5);
    }
    case 'path': {
      const path = optionalString(value.path, `${field}.path`);
      if (!path) {
        throw new DefinitionShapeError(`${field}.path is required`);
      }
      return new PathRetriever(path);
    }
    default:
      throw new DefinitionShapeError(`${field}.type must be git, archive or path`);
  }
}

function parseFunctions(value: unknown, field: string): Record<string, string[]> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isObject(value)) {
    throw new DefinitionShapeError(`${field} must map libraries to function lists`);
  }
  const functions: Record<string, string[]> = {};
  for (const [lib, list] of Object.entries(value)) {
    functions[lib] = stringList(list, `${field}.${lib}`) ?? [];
  }
  return functions;
}

function parseCommands(value: unknown, field: string): string[][] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new DefinitionShapeError(`${field} must be a list of commands`);
  }
  return value.map((command, index) => stringList(command, `${field}[${index}]`) ?? []);
}

function parseAttributes(name: string, value: unknown): ComponentAttributes {
  const field = `components.${name}`;
  if (value === null || value === undefined) {
    return {};
  }
  if (!isObject(value)) {
    throw new DefinitionShapeError(`${field} must be a mapping`);
  }
  return {
    libs: stringList(value.libs, `${field}.libs`),
    libsCc: optionalString(value.libs_cc, `${field}.libs_cc`),
    functions: parseFunctions(value.functions, `${field}.functions`),
    headers: stringList(value.headers, `${field}.headers`),
    progs: stringList(value.progs, `${field}.progs`),
    pkgconfig: optionalString(value.pkgconfig, `${field}.pkgconfig`),
    requires: stringList(value.requires, `${field}.requires`),
    requiredLibs: stringList(value.required_libs, `${field}.required_libs`),
    requiredProgs: stringList(value.required_progs, `${field}.required_progs`),
    defines: stringList(value.defines, `${field}.defines`),
    package: optionalString(value.package, `${field}.package`),
    commands: parseCommands(value.commands, `${field}.commands`),
    retriever: parseRetriever(value.retriever, `${field}.retriever`),
    extraLibPath: stringList(value.extra_lib_path, `${field}.extra_lib_path`),
    extraIncludePath: stringList(value.extra_include_path, `${field}.extra_include_path`),
    outOfSrcBuild: optionalBoolean(value.out_of_src_build, `${field}.out_of_src_build`),
    patchRpath: stringList(value.patch_rpath, `${field}.patch_rpath`)
  };
}

function parseRequirements(value: unknown): DefaultRequirements {
  if (value === undefined || value === null) {
    return { common: [] };
  }
  if (!isObject(value)) {
    throw new DefinitionShapeError('requirements must be a mapping');
  }
  return {
    common: stringList(value.common, 'requirements.common') ?? [],
    client: stringList(value.client, 'requirements.client'),
    server: stringList(value.server, 'requirements.server'),
    test: stringList(value.test, 'requirements.test')
  };
}

/**
 * Parse definitions from YAML text. Any problem, including invalid YAML,
 * surfaces as a `ComponentScriptError` naming `source`.
 */
export function parseComponentDefinitions(text: string, source: string): ComponentDefinitionsFile {
  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    throw new ComponentScriptError(source, error instanceof Error ? error.message : String(error));
  }

  try {
    if (!isObject(document)) {
      throw new DefinitionShapeError('expected a mapping at the top level');
    }
    const components = document.components ?? {};
    if (!isObject(components)) {
      throw new DefinitionShapeError('components must be a mapping');
    }
    const definitions = Object.entries(components).map(
      ([name, attrs]): [string, ComponentAttributes] => [name, parseAttributes(name, attrs)]
    );
    const requirements = parseRequirements(document.requirements);
    logger.debug(`Parsed ${definitions.length} component definitions from ${source}`);

    return {
      names: definitions.map(([name]) => name),
      requirements,
      definer: registry => {
        for (const [name, attrs] of definitions) {
          registry.define(name, attrs);
        }
      }
    };
  } catch (error) {
    if (error instanceof DefinitionShapeError) {
      throw new ComponentScriptError(source, error.message);
    }
    throw error;
  }
}

export async function loadComponentDefinitions(path: string): Promise<ComponentDefinitionsFile> {
  return parseComponentDefinitions(await readTextFile(path), path);
}
