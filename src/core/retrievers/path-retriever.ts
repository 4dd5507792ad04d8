import { resolve } from 'path';

import type { FetchRequest, RetrievalContext, Retriever } from './types.js';
import { DownloadFailure } from '../../utils/errors.js';
import { copyDirectory, exists, isDirectory } from '../../utils/fs.js';

/**
 * Uses a source tree that already exists on disk, copying it into the build
 * area so builds never write into the original.
 */
export class PathRetriever implements Retriever {
  readonly kind = 'path' as const;
  readonly url: string;

  constructor(sourcePath: string) {
    this.url = resolve(sourcePath);
  }

  async fetch(destDir: string, _request: FetchRequest, context: RetrievalContext): Promise<void> {
    if (await exists(destDir)) {
      return;
    }
    if (!(await isDirectory(this.url))) {
      console.error(`Source directory ${this.url} does not exist`);
      throw new DownloadFailure(this.url, destDir);
    }
    if (context.env.flags.dryRun) {
      console.log(`Would copy ${this.url} to ${destDir}`);
      return;
    }
    await copyDirectory(this.url, destDir);
  }
}
