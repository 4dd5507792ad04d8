import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { createHash } from 'crypto';
import { join } from 'path';

import { BuildEnvironment } from '../../../src/core/environment.js';
import { CommandRunner } from '../../../src/core/command-runner.js';
import {
  ArchiveRetriever,
  assertEntriesContained,
  commonRootDirectory
} from '../../../src/core/retrievers/archive-retriever.js';
import type { RetrievalContext } from '../../../src/core/retrievers/types.js';
import { DownloadFailure, ExtractionError, UnsupportedCompression } from '../../../src/utils/errors.js';
import { FakeExecutor, makeTempDir, testFlags } from '../../helpers/fakes.js';
import { buildTarGz } from '../../helpers/tarball.js';

const URL = 'https://example.com/dist/pkg-1.0.tar.gz';

let root: string;

before(async () => {
  root = await makeTempDir('archive');
});

after(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

function setup(dryRun = false): { executor: FakeExecutor; context: RetrievalContext } {
  const executor = new FakeExecutor();
  const env = new BuildEnvironment({ flags: testFlags({ dryRun }) });
  return { executor, context: { runner: new CommandRunner(executor, env), env } };
}

function md5(data: Buffer): string {
  return createHash('md5').update(data).digest('hex');
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

/** A fresh download directory holding `archive` under the URL's file name. */
async function downloadDir(name: string, archive?: Buffer): Promise<string> {
  const dir = join(root, name, 'external');
  await fs.mkdir(dir, { recursive: true });
  if (archive) {
    await fs.writeFile(join(dir, 'pkg-1.0.tar.gz'), archive);
  }
  return dir;
}

describe('archive entry checks', () => {
  it('rejects entries that climb out of the extraction directory', () => {
    assert.throws(
      () => assertEntriesContained('/work/stage', [{ path: '../../evil', type: 'File' }]),
      /path traversal/
    );
    assert.throws(
      () => assertEntriesContained('/work/stage', [{ path: 'pkg/link', type: 'SymbolicLink', linkpath: '../../../etc' }]),
      /path traversal/
    );
    assert.doesNotThrow(() => assertEntriesContained('/work/stage', [{ path: 'pkg/./src/a.c', type: 'File' }]));
  });

  it('finds the single top-level directory', () => {
    assert.equal(commonRootDirectory([
      { path: 'pkg-1.0/', type: 'Directory' },
      { path: 'pkg-1.0/configure', type: 'File' }
    ]), 'pkg-1.0');
    assert.equal(commonRootDirectory([
      { path: 'a/x', type: 'File' },
      { path: 'b/y', type: 'File' }
    ]), undefined);
    assert.equal(commonRootDirectory([{ path: 'README', type: 'File' }]), undefined);
  });
});

describe('ArchiveRetriever', () => {
  it('unpacks a cached archive whose checksum matches', async () => {
    const archive = buildTarGz([
      { name: 'pkg-1.0/', type: '5' },
      { name: 'pkg-1.0/configure', content: 'echo configured\n' }
    ]);
    const dir = await downloadDir('valid', archive);
    const dest = join(dir, 'pkg');
    const { executor, context } = setup();

    await new ArchiveRetriever(URL, md5(archive)).fetch(dest, {}, context);

    assert.equal(executor.runs.length, 0);
    assert.equal(await fs.readFile(join(dest, 'configure'), 'utf8'), 'echo configured\n');
    assert.deepEqual((await fs.readdir(dir)).sort(), ['pkg', 'pkg-1.0.tar.gz']);
  });

  it('refuses an archive with a path traversal entry and writes nothing', async () => {
    const archive = buildTarGz([
      { name: 'pkg-1.0/', type: '5' },
      { name: 'pkg-1.0/ok.txt', content: 'ok\n' },
      { name: '../../evil', content: 'gotcha\n' }
    ]);
    const dir = await downloadDir('traversal', archive);
    const dest = join(dir, 'pkg');
    const { context } = setup();

    await assert.rejects(new ArchiveRetriever(URL, md5(archive)).fetch(dest, {}, context), ExtractionError);

    assert.equal(await pathExists(dest), false);
    assert.equal(await pathExists(join(root, 'traversal', 'evil')), false);
    assert.equal(await pathExists(join(root, 'evil')), false);
    assert.deepEqual(await fs.readdir(dir), ['pkg-1.0.tar.gz']);
  });

  it('retries the download with doubling pauses and then gives up', async () => {
    const dir = await downloadDir('retry', Buffer.from('stale'));
    const dest = join(dir, 'pkg');
    const { executor, context } = setup();
    const pauses: number[] = [];
    const retriever = new ArchiveRetriever(URL, '0123456789abcdef0123456789abcdef', {
      backoffMs: 1,
      sleep: async ms => {
        pauses.push(ms);
      }
    });

    await assert.rejects(retriever.fetch(dest, {}, context), DownloadFailure);

    assert.equal(executor.runs.length, 4);
    assert.deepEqual(executor.runs[0].argv, ['curl', '-sSf', '--location', '--remote-name', URL]);
    assert.equal(executor.runs[0].cwd, dir);
    assert.deepEqual(pauses, [1, 2, 4]);
    // the stale file with the wrong checksum was removed
    assert.equal(await pathExists(join(dir, 'pkg-1.0.tar.gz')), false);
  });

  it('does nothing when the destination already exists', async () => {
    const dir = await downloadDir('present');
    const dest = join(dir, 'pkg');
    await fs.mkdir(dest);
    const { executor, context } = setup();

    await new ArchiveRetriever(URL, 'unused').fetch(dest, {}, context);

    assert.equal(executor.runs.length, 0);
  });

  it('rejects formats other than gzipped tar before downloading', async () => {
    const dir = await downloadDir('zip');
    const { executor, context } = setup();

    await assert.rejects(
      new ArchiveRetriever('https://example.com/pkg-1.0.zip', 'unused').fetch(join(dir, 'pkg'), {}, context),
      UnsupportedCompression
    );
    assert.equal(executor.runs.length, 0);
  });

  it('only reports its intent in a dry run', async () => {
    const dir = await downloadDir('dry');
    const dest = join(dir, 'pkg');
    const { executor, context } = setup(true);

    await new ArchiveRetriever(URL, 'unused').fetch(dest, {}, context);

    assert.equal(executor.runs.length, 0);
    assert.equal(await pathExists(dest), false);
  });
});
