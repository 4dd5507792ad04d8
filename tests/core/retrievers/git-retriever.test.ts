import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';

import { BuildEnvironment } from '../../../src/core/environment.js';
import { CommandRunner } from '../../../src/core/command-runner.js';
import { GitRetriever } from '../../../src/core/retrievers/git-retriever.js';
import type { RetrievalContext } from '../../../src/core/retrievers/types.js';
import { DownloadFailure } from '../../../src/utils/errors.js';
import { FakeExecutor, makeTempDir, testFlags, type RunHandler } from '../../helpers/fakes.js';

let root: string;

before(async () => {
  root = await makeTempDir('git');
});

after(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

function setup(onRun?: RunHandler): { executor: FakeExecutor; context: RetrievalContext } {
  const executor = new FakeExecutor(onRun);
  const env = new BuildEnvironment({ flags: testFlags() });
  return { executor, context: { runner: new CommandRunner(executor, env), env } };
}

describe('GitRetriever', () => {
  it('refuses to fetch without a pinned commit or branch', async () => {
    const { executor, context } = setup();
    const retriever = new GitRetriever('https://example.com/bar.git');

    await assert.rejects(retriever.fetch(join(root, 'bar'), {}, context), DownloadFailure);
    assert.equal(executor.runs.length, 0);
  });

  it('clones, checks out the pinned commit and resets', async () => {
    const { executor, context } = setup();
    const dest = join(root, 'bar');

    await new GitRetriever('https://example.com/bar.git').fetch(dest, { commitSha: 'abc123' }, context);

    assert.deepEqual(executor.commands(), [
      `git clone https://example.com/bar.git ${dest}`,
      'git checkout abc123',
      'git reset --hard HEAD'
    ]);
    assert.equal(executor.runs[0].cwd, undefined);
    assert.equal(executor.runs[1].cwd, dest);
  });

  it('fetches refs and retries a failed checkout once', async () => {
    let checkouts = 0;
    const { executor, context } = setup(call => {
      if (call.argv[1] === 'checkout') {
        checkouts++;
        return checkouts === 1 ? 1 : 0;
      }
      return 0;
    });
    const dest = join(root, 'existing');
    await fs.mkdir(dest);

    await new GitRetriever('https://example.com/bar.git', { branch: 'main' }).fetch(dest, { commitSha: 'abc123' }, context);

    assert.deepEqual(executor.commands(), [
      'git checkout main',
      'git fetch -t -a',
      'git checkout main',
      'git checkout abc123',
      'git reset --hard HEAD'
    ]);
  });

  it('fails when the retried checkout fails too', async () => {
    const { context } = setup(call => (call.argv[1] === 'checkout' ? 1 : 0));
    const dest = join(root, 'broken');
    await fs.mkdir(dest);

    await assert.rejects(
      new GitRetriever('https://example.com/bar.git').fetch(dest, { commitSha: 'abc123' }, context),
      { message: `Failed to get ${dest} from https://example.com/bar.git` }
    );
  });

  it('prefers the configured branch and applies submodules and patches', async () => {
    const { executor, context } = setup();
    const dest = join(root, 'patched');
    await fs.mkdir(dest);
    const patches = new Map<string, string | undefined>([
      ['/patches/fix-build.patch', 'src'],
      ['/patches/quiet.patch', undefined]
    ]);

    await new GitRetriever('https://example.com/spdk.git', { hasSubmodules: true, branch: 'main' })
      .fetch(dest, { branch: 'v22.01', patches }, context);

    assert.deepEqual(executor.commands(), [
      'git checkout v22.01',
      'git reset --hard HEAD',
      'git submodule init',
      'git submodule update',
      'git apply --directory src /patches/fix-build.patch',
      'git apply /patches/quiet.patch'
    ]);
  });
});
