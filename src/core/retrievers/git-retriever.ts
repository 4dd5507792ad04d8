import { basename } from 'path';

import type { BuildCommand } from '../command-runner.js';
import type { FetchRequest, PatchMap, RetrievalContext, Retriever } from './types.js';
import { DownloadFailure } from '../../utils/errors.js';
import { exists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface GitRetrieverOptions {
  hasSubmodules?: boolean;
  /** Branch checked out when the pinned-version file names none. */
  branch?: string;
}

/**
 * Clones a git repository and checks out a pinned branch and/or commit.
 */
export class GitRetriever implements Retriever {
  readonly kind = 'git' as const;
  readonly hasSubmodules: boolean;
  readonly branch?: string;

  constructor(readonly url: string, options: GitRetrieverOptions = {}) {
    this.hasSubmodules = options.hasSubmodules ?? false;
    this.branch = options.branch;
  }

  async fetch(destDir: string, request: FetchRequest, context: RetrievalContext): Promise<void> {
    const branch = request.branch ?? this.branch;
    if (request.commitSha === undefined && branch === undefined) {
      const component = basename(destDir);
      console.error([
        '',
        '*********************** ERROR ************************',
        `No commit_versions entry in the build config for`,
        `${component}. Please specify one to avoid breaking the`,
        'build with random upstream changes.',
        '*********************** ERROR ************************',
        ''
      ].join('\n'));
      throw new DownloadFailure(this.url, destDir);
    }

    if (!(await exists(destDir))) {
      await this.runOrFail(destDir, [['git', 'clone', this.url, destDir]], context, false);
    }

    if (branch !== undefined) {
      await this.checkout(destDir, branch, context);
    }
    if (request.commitSha !== undefined) {
      await this.checkout(destDir, request.commitSha, context);
    }

    // drop anything a previous patch run left behind
    await this.runOrFail(destDir, [['git', 'reset', '--hard', 'HEAD']], context);

    if (this.hasSubmodules) {
      await this.runOrFail(destDir, [['git', 'submodule', 'init'], ['git', 'submodule', 'update']], context);
    }

    await this.applyPatches(destDir, request.patches, context);
  }

  /**
   * Check out a ref; when it is unknown locally, fetch tags and refs and try once more.
   */
  private async checkout(destDir: string, ref: string, context: RetrievalContext): Promise<void> {
    const checkout: BuildCommand[] = [['git', 'checkout', ref]];
    if (await context.runner.run(checkout, { cwd: destDir, env: context.env })) {
      return;
    }
    logger.debug(`Checkout of ${ref} failed, fetching refs for ${this.url}`);
    await this.runOrFail(destDir, [['git', 'fetch', '-t', '-a']], context);
    await this.runOrFail(destDir, checkout, context);
  }

  private async applyPatches(destDir: string, patches: PatchMap | undefined, context: RetrievalContext): Promise<void> {
    if (!patches) {
      return;
    }
    for (const [patch, subdir] of patches) {
      console.log(`Applying patch ${patch}`);
      const command = ['git', 'apply'];
      if (subdir !== undefined) {
        command.push('--directory', subdir);
      }
      command.push(patch);
      await this.runOrFail(destDir, [command], context);
    }
  }

  /** Run commands inside the checkout (or from the current directory for the clone itself). */
  private async runOrFail(destDir: string, commands: BuildCommand[], context: RetrievalContext, inCheckout = true): Promise<void> {
    const cwd = inCheckout ? destDir : undefined;
    if (!(await context.runner.run(commands, { cwd, env: context.env }))) {
      throw new DownloadFailure(this.url, destDir);
    }
  }
}
