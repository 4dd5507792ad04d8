import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

/**
 * Version of this tool, read from the nearest package.json above this module
 * (src/utils when run from sources, dist/src/utils once built).
 */
export function getVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 4; depth++) {
    const packagePath = join(dir, 'package.json');
    if (existsSync(packagePath)) {
      const parsed: unknown = JSON.parse(readFileSync(packagePath, 'utf8'));
      if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    }
    dir = dirname(dir);
  }
  return '0.0.0';
}
