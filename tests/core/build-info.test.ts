import { describe, it, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';

import { BuildInfo } from '../../src/core/build-info.js';
import { makeTempDir } from '../helpers/fakes.js';

const tempDirs: string[] = [];

after(async () => {
  for (const dir of tempDirs) {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

describe('BuildInfo', () => {
  it('saves the recorded values as sorted JSON', async () => {
    const dir = await makeTempDir('info');
    tempDirs.push(dir);
    const info = new BuildInfo();
    info.update('PREFIX', '/work/install');
    info.update('BUILD_DIR', '/work/build/release/gcc');
    info.update('FOO_PREFIX', '/usr');

    const path = await info.save(dir);

    assert.equal(path, join(dir, '.build_vars.json'));
    const saved: unknown = JSON.parse(await fs.readFile(path, 'utf8'));
    assert.deepEqual(saved, {
      BUILD_DIR: '/work/build/release/gcc',
      FOO_PREFIX: '/usr',
      PREFIX: '/work/install'
    });
    assert.deepEqual(Object.keys(info.toJSON()), ['BUILD_DIR', 'FOO_PREFIX', 'PREFIX']);
  });
});
