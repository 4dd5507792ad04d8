import { describe, it, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { delimiter, join } from 'path';

import { BuildEnvironment } from '../../src/core/environment.js';
import { applyComponentEnvironment, type PropagationSource } from '../../src/core/environment-propagation.js';
import type { PkgConfigQuery } from '../../src/core/pkg-config.js';
import { makeTempDir, testFlags } from '../helpers/fakes.js';

const tempDirs: string[] = [];

after(async () => {
  for (const dir of tempDirs) {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

function source(prefix: string | undefined, overrides: Partial<PropagationSource> = {}): PropagationSource & { queries: PkgConfigQuery[] } {
  const queries: PkgConfigQuery[] = [];
  return {
    useInstalled: false,
    componentPrefix: prefix,
    includePath: ['include'],
    libPath: ['lib', 'lib64'],
    defines: ['USE_FOO'],
    queries,
    async parsePkgConfig(_env: BuildEnvironment, query: PkgConfigQuery): Promise<void> {
      queries.push(query);
    },
    ...overrides
  };
}

describe('applyComponentEnvironment', () => {
  it('exposes a built component and is idempotent', async () => {
    const prefix = await makeTempDir('prop');
    tempDirs.push(prefix);
    await fs.mkdir(join(prefix, 'lib64'));
    const env = new BuildEnvironment({ flags: testFlags(), ENV: { PATH: '/usr/bin' } });
    const foo = source(prefix);

    await applyComponentEnvironment(env, foo, ['foo']);
    await applyComponentEnvironment(env, foo, ['foo']);

    const libDir = join(prefix, 'lib64');
    assert.equal(env.ENV.PATH, `${join(prefix, 'bin')}${delimiter}/usr/bin`);
    assert.equal(env.ENV.LD_LIBRARY_PATH, libDir);
    assert.deepEqual(env.getList('CPPPATH'), [join(prefix, 'include')]);
    assert.deepEqual(env.getList('LIBPATH'), [libDir]);
    assert.deepEqual(env.getList('RPATH_FULL'), [libDir]);
    assert.deepEqual(env.getList('LIBS'), ['foo']);
    assert.deepEqual(env.getList('CPPDEFINES'), ['USE_FOO']);
    assert.deepEqual(env.getList('LINKFLAGS'), ['-Wl,--enable-new-dtags']);
    assert.deepEqual(foo.queries, ['--cflags', '--libs', '--cflags', '--libs']);
  });

  it('stops after compile flags for a headers-only request', async () => {
    const prefix = await makeTempDir('prop');
    tempDirs.push(prefix);
    await fs.mkdir(join(prefix, 'lib'));
    const env = new BuildEnvironment({ flags: testFlags() });
    const foo = source(prefix);

    await applyComponentEnvironment(env, foo, null);

    assert.deepEqual(env.getList('CPPPATH'), [join(prefix, 'include')]);
    assert.equal(env.has('LIBPATH'), false);
    assert.equal(env.has('LIBS'), false);
    assert.deepEqual(env.getList('RPATH_FULL'), [join(prefix, 'lib')]);
    assert.deepEqual(foo.queries, ['--cflags']);
  });

  it('adds the system RPATH fallback for a bare system install', async () => {
    const env = new BuildEnvironment({ flags: testFlags() });

    await applyComponentEnvironment(env, source('/usr', { defines: [] }), []);

    assert.deepEqual(env.getList('RPATH'), ['/usr/lib']);
    assert.deepEqual(env.getList('LINKFLAGS'), ['-Wl,--enable-new-dtags']);
    assert.equal(env.has('CPPPATH'), false);
    assert.equal(env.has('LIBS'), false);
  });

  it('leaves paths alone for a component taken from the system', async () => {
    const env = new BuildEnvironment({ flags: testFlags() });

    await applyComponentEnvironment(env, source('/opt/foo', { useInstalled: true }), ['foo']);

    assert.equal(env.has('CPPPATH'), false);
    assert.equal(env.ENV.PATH, undefined);
    assert.deepEqual(env.getList('LIBS'), ['foo']);
  });
});
