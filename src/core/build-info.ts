import { join } from 'path';

import { FILE_PATTERNS } from '../constants/index.js';
import { writeJsonFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Key/value record of resolved build paths (`BUILD_DIR`, `PREFIX`,
 * `<NAME>_PREFIX`) that downstream tooling reads back from
 * `.build_vars.json`.
 */
export class BuildInfo {
  private readonly values = new Map<string, string>();

  update(key: string, value: string): void {
    this.values.set(key, value);
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries([...this.values].sort(([a], [b]) => a.localeCompare(b)));
  }

  async save(dir: string): Promise<string> {
    const path = join(dir, FILE_PATTERNS.BUILD_VARS_JSON);
    await writeJsonFile(path, this.toJSON());
    logger.debug(`Saved build info to ${path}`);
    return path;
  }
}
