import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';

import { BuildEnvironment } from '../../../src/core/environment.js';
import { CommandRunner } from '../../../src/core/command-runner.js';
import { PathRetriever } from '../../../src/core/retrievers/path-retriever.js';
import type { RetrievalContext } from '../../../src/core/retrievers/types.js';
import { DownloadFailure } from '../../../src/utils/errors.js';
import { FakeExecutor, makeTempDir, testFlags, writeFileAt } from '../../helpers/fakes.js';

let root: string;

before(async () => {
  root = await makeTempDir('path');
});

after(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

function context(dryRun = false): RetrievalContext {
  const env = new BuildEnvironment({ flags: testFlags({ dryRun }) });
  return { runner: new CommandRunner(new FakeExecutor(), env), env };
}

describe('PathRetriever', () => {
  it('copies a local source tree into place', async () => {
    const source = join(root, 'src', 'local-dep');
    await writeFileAt(join(source, 'Makefile'), 'all:\n');
    const dest = join(root, 'external', 'local-dep');

    await new PathRetriever(source).fetch(dest, {}, context());

    assert.equal(await fs.readFile(join(dest, 'Makefile'), 'utf8'), 'all:\n');
  });

  it('fails for a missing source tree', async () => {
    await assert.rejects(
      new PathRetriever(join(root, 'nowhere')).fetch(join(root, 'external', 'nowhere'), {}, context()),
      DownloadFailure
    );
  });

  it('copies nothing in a dry run', async () => {
    const source = join(root, 'src', 'dry-dep');
    await writeFileAt(join(source, 'Makefile'), 'all:\n');
    const dest = join(root, 'external', 'dry-dep');

    await new PathRetriever(source).fetch(dest, {}, context(true));

    await assert.rejects(fs.access(dest));
  });
});
