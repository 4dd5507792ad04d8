import ini from 'ini';

import { readTextFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Pinned versions read from INI files:
 *
 * ```ini
 * [commit_versions]
 * isal = v2.30.0
 *
 * [patch_versions]
 * spdk = src^fix-build.patch,https://example.com/a.patch
 * ```
 *
 * Sections are `branches`, `commit_versions`, `patch_versions` and `configs`,
 * each keyed by component name. Reading more files merges into what is already
 * loaded, later files winning per key. Keys are case-insensitive.
 */
export class PinnedVersionConfig {
  private readonly sections = new Map<string, Map<string, string>>();

  static fromString(text: string): PinnedVersionConfig {
    const config = new PinnedVersionConfig();
    config.merge(text);
    return config;
  }

  /**
   * Merge an INI file. A missing file is skipped and reported as `false`.
   */
  async read(path: string): Promise<boolean> {
    if (!(await exists(path))) {
      logger.debug(`Config file not found: ${path}`);
      return false;
    }
    logger.debug(`Loading config from: ${path}`);
    const text = await readTextFile(path);
    try {
      this.merge(text);
    } catch (error) {
      throw new ConfigError(`Failed to parse configuration file ${path}: ${String(error)}`, { path, error });
    }
    return true;
  }

  merge(text: string): void {
    const parsed: Record<string, unknown> = ini.parse(text);
    for (const [sectionName, section] of Object.entries(parsed)) {
      // keys above the first section header belong to no section
      if (!section || typeof section !== 'object' || Array.isArray(section)) {
        continue;
      }
      const target = this.sections.get(sectionName) ?? new Map<string, string>();
      for (const [key, value] of Object.entries(section)) {
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
          target.set(key.toLowerCase(), String(value));
        }
      }
      this.sections.set(sectionName, target);
    }
  }

  get(section: string, key: string): string | undefined {
    return this.sections.get(section)?.get(key.toLowerCase());
  }

  hasSection(section: string): boolean {
    return this.sections.has(section);
  }
}
