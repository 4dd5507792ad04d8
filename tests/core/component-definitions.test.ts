import { describe, it, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';

import { parseComponentDefinitions } from '../../src/core/component-definitions.js';
import { GitRetriever } from '../../src/core/retrievers/git-retriever.js';
import { ArchiveRetriever } from '../../src/core/retrievers/archive-retriever.js';
import { ComponentScriptError } from '../../src/utils/errors.js';
import { createTestRegistry } from '../helpers/registry.js';

const topDirs: string[] = [];

after(async () => {
  for (const dir of topDirs) {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

const DEFINITIONS = `
requirements:
  common: [isal]
  test: [cmocka]
components:
  isal:
    retriever:
      type: git
      url: https://example.com/isal.git
      has_submodules: true
    libs: [isal]
    headers: [isa-l.h]
    required_progs: [nasm]
    out_of_src_build: true
    commands:
      - [./autogen.sh]
      - [./configure, --prefix=$ISAL_PREFIX]
      - [make]
      - [make, install]
  cmocka:
    retriever:
      type: archive
      url: https://example.com/cmocka-1.1.tar.gz
      md5: 0123456789abcdef0123456789abcdef
    headers: [cmocka.h]
    functions:
      cmocka: [_cmocka_run_group_tests]
  uuid:
    headers: [uuid/uuid.h]
    package: libuuid-devel
`;

describe('parseComponentDefinitions', () => {
  it('defines every component with its attributes', async () => {
    const file = parseComponentDefinitions(DEFINITIONS, 'components.yml');
    const { registry, topDir } = await createTestRegistry();
    topDirs.push(topDir);

    await file.definer(registry);

    assert.deepEqual(file.names, ['isal', 'cmocka', 'uuid']);
    assert.deepEqual(file.requirements, { common: ['isal'], client: undefined, server: undefined, test: ['cmocka'] });

    const isal = registry.getComponent('isal');
    assert.ok(isal.retriever instanceof GitRetriever);
    assert.equal(isal.retriever.hasSubmodules, true);
    assert.equal(isal.retriever.url, 'https://example.com/isal.git');
    assert.deepEqual(isal.commands, [['./autogen.sh'], ['./configure', '--prefix=$ISAL_PREFIX'], ['make'], ['make', 'install']]);
    assert.deepEqual(isal.requiredProgs, ['nasm']);
    assert.equal(isal.outOfSrcBuild, true);

    const cmocka = registry.getComponent('cmocka');
    assert.ok(cmocka.retriever instanceof ArchiveRetriever);
    assert.equal(cmocka.retriever.md5, '0123456789abcdef0123456789abcdef');
    assert.deepEqual(cmocka.functions, { cmocka: ['_cmocka_run_group_tests'] });

    const uuid = registry.getComponent('uuid');
    assert.equal(uuid.retriever, undefined);
    assert.equal(uuid.package, 'libuuid-devel');
  });

  it('rejects an unknown retriever type', () => {
    const text = 'components:\n  foo:\n    retriever:\n      type: svn\n      url: https://example.com/foo\n';

    assert.throws(() => parseComponentDefinitions(text, 'components.yml'), (error: unknown) => {
      assert.ok(error instanceof ComponentScriptError);
      assert.equal(error.message, 'Failed to execute components.yml:\ncomponents.foo.retriever.type must be git, archive or path');
      return true;
    });
  });

  it('rejects attributes of the wrong shape', () => {
    const text = 'components:\n  foo:\n    headers: foo.h\n';

    assert.throws(() => parseComponentDefinitions(text, 'defs.yml'), {
      message: 'Failed to execute defs.yml:\ncomponents.foo.headers must be a list'
    });
  });

  it('wraps YAML syntax errors', () => {
    assert.throws(() => parseComponentDefinitions('components: [unclosed', 'defs.yml'), ComponentScriptError);
  });

  it('accepts a file without requirements', () => {
    const file = parseComponentDefinitions('components:\n  foo: {}\n', 'defs.yml');

    assert.deepEqual(file.requirements, { common: [] });
    assert.deepEqual(file.names, ['foo']);
  });
});
