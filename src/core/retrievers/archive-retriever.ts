import { createHash } from 'crypto';
import { mkdtemp, readFile } from 'fs/promises';
import { basename, dirname, join, resolve, sep } from 'path';
import { setTimeout as delay } from 'timers/promises';
import { extract, list, type ReadEntry } from 'tar';

import type { FetchRequest, RetrievalContext, Retriever } from './types.js';
import { DownloadFailure, ExtractionError, UnsupportedCompression } from '../../utils/errors.js';
import { ensureDir, exists, remove, renameDirectory } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

const GZIP_TAR_SUFFIXES = ['.tar.gz', '.tgz'];

export interface ArchiveRetrieverOptions {
  /** Extra download attempts after the first one. */
  retries?: number;
  /** Pause before the first retry; doubles after every failed attempt. */
  backoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

interface ArchiveEntry {
  path: string;
  type: string;
  linkpath?: string;
}

export function isGzipTarball(url: string): boolean {
  return GZIP_TAR_SUFFIXES.some(suffix => url.endsWith(suffix));
}

export async function md5File(path: string): Promise<string> {
  const content = await readFile(path);
  return createHash('md5').update(content).digest('hex');
}

function isWithin(root: string, target: string): boolean {
  return target === root || target.startsWith(root + sep);
}

/**
 * Reject any entry that would land outside `root`, including links that
 * point outside it.
 */
export function assertEntriesContained(root: string, entries: readonly ArchiveEntry[]): void {
  const base = resolve(root);
  for (const entry of entries) {
    const target = resolve(base, entry.path);
    if (!isWithin(base, target)) {
      throw new Error(`Attempted path traversal in tar file: ${entry.path}`);
    }
    if (entry.linkpath !== undefined) {
      const linkTarget = entry.type === 'SymbolicLink'
        ? resolve(dirname(target), entry.linkpath)
        : resolve(base, entry.linkpath);
      if (!isWithin(base, linkTarget)) {
        throw new Error(`Attempted path traversal in tar file: ${entry.path} -> ${entry.linkpath}`);
      }
    }
  }
}

/** The single top-level directory every entry lives under, if there is one. */
export function commonRootDirectory(entries: readonly ArchiveEntry[]): string | undefined {
  let root: string | undefined;
  let nested = false;
  for (const entry of entries) {
    const segments = entry.path.split('/').filter(segment => segment.length > 0 && segment !== '.');
    if (segments.length === 0) {
      continue;
    }
    if (root === undefined) {
      root = segments[0];
    } else if (root !== segments[0]) {
      return undefined;
    }
    if (segments.length > 1 || entry.type === 'Directory') {
      nested = true;
    }
  }
  return nested ? root : undefined;
}

async function readEntries(archive: string): Promise<ArchiveEntry[]> {
  const entries: ArchiveEntry[] = [];
  await list({
    file: archive,
    strict: true,
    onReadEntry: (entry: ReadEntry) => {
      entries.push({ path: entry.path, type: entry.type, linkpath: entry.linkpath });
    }
  });
  return entries;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Downloads a checksummed gzip tarball and unpacks it. An existing
 * destination is taken as a previous successful fetch.
 */
export class ArchiveRetriever implements Retriever {
  readonly kind = 'archive' as const;
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(readonly url: string, readonly md5: string, options: ArchiveRetrieverOptions = {}) {
    this.retries = options.retries ?? 3;
    this.backoffMs = options.backoffMs ?? 1000;
    this.sleep = options.sleep ?? (ms => delay(ms));
  }

  async fetch(destDir: string, _request: FetchRequest, context: RetrievalContext): Promise<void> {
    if (await exists(destDir)) {
      logger.debug(`Sources for ${this.url} already present in ${destDir}`);
      return;
    }
    if (!isGzipTarball(this.url)) {
      throw new UnsupportedCompression(destDir);
    }

    const downloadDir = dirname(destDir);
    const archive = join(downloadDir, basename(this.url));

    if (context.env.flags.dryRun) {
      console.log(`Would download ${this.url}`);
      console.log(`Would unpack gzipped tar file: ${basename(archive)}`);
      return;
    }

    await ensureDir(downloadDir);
    if (!(await this.checkMd5(archive)) && !(await this.download(archive, context))) {
      throw new DownloadFailure(this.url, destDir);
    }
    await this.unpack(archive, destDir);
  }

  /** True when `file` exists with the expected checksum; a stale file is deleted. */
  async checkMd5(file: string): Promise<boolean> {
    if (!(await exists(file))) {
      return false;
    }
    const digest = await md5File(file);
    if (digest !== this.md5) {
      console.log(`Removing existing file ${file}: md5 ${this.md5} != ${digest}`);
      await remove(file);
      return false;
    }
    console.log(`File ${file} matches md5 ${this.md5}`);
    return true;
  }

  /**
   * Fetch the archive with curl, verifying the checksum after every attempt.
   */
  async download(archive: string, context: RetrievalContext): Promise<boolean> {
    let pause = this.backoffMs;
    for (let attempt = 0; attempt <= this.retries; attempt++) {
      const command = ['curl', '-sSf', '--location', '--remote-name', this.url];
      let failureReason = 'Download command failed';
      if (await context.runner.run([command], { cwd: dirname(archive), env: context.env })) {
        if (await this.checkMd5(archive)) {
          console.log(`Successfully downloaded ${this.url}`);
          return true;
        }
        failureReason = 'md5 mismatch';
      }

      console.log(`Try #${attempt + 1} to get ${this.url} failed: ${failureReason}`);

      if (attempt !== this.retries) {
        await this.sleep(pause);
        pause *= 2;
      }
    }
    return false;
  }

  /**
   * Unpack into a staging directory next to `destDir`, then move the archive's
   * top-level directory into place. Every entry is validated before anything
   * is written.
   */
  async unpack(archive: string, destDir: string): Promise<void> {
    let entries: ArchiveEntry[];
    try {
      entries = await readEntries(archive);
    } catch (error) {
      console.error(`Unable to read ${archive}: ${describe(error)}`);
      throw new ExtractionError(destDir, describe(error));
    }
    if (entries.length === 0) {
      throw new ExtractionError(destDir, `${archive} has no entries`);
    }

    const staging = await mkdtemp(join(dirname(destDir), `.${basename(destDir)}-`));
    try {
      assertEntriesContained(staging, entries);
      await extract({ file: archive, cwd: staging, strict: true });
      const root = commonRootDirectory(entries);
      await renameDirectory(root === undefined ? staging : join(staging, root), destDir);
    } catch (error) {
      console.error(`Failed to extract ${archive}: ${describe(error)}`);
      throw new ExtractionError(destDir, describe(error));
    } finally {
      await remove(staging);
    }
  }
}
