import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { discoverManifests, displayPath, loadRepo } from '../../../src/core/repo/repo-loader.js';
import { getPackage } from '../../../src/core/graph/graph-builder.js';
import { CycleError } from '../../../src/utils/errors.js';
import { createRepo, removeDir } from '../../test-helpers.js';

let root: string;

before(() => {
  root = createRepo({
    'monoforge.yml': [
      'workspaces:',
      '  libs: ["libs/*"]',
      '  apps: ["apps/*"]',
      'dependencies:',
      '  requests: "^2.31.0"',
      ''
    ].join('\n'),
    'libs/core/project.yml': 'name: core\nversion: 1.0.0\n',
    'libs/utils/project.yml': 'name: utils\nversion: 1.1.0\ndependencies:\n  internal: [core]\n',
    'apps/web/project.yml': 'name: web\nversion: 0.2.0\ndependencies:\n  internal: [utils]\n',
    'apps/web/node_modules/dep/project.yml': 'name: vendored\nversion: 9.9.9\n',
    'apps/.hidden/project.yml': 'name: hidden\nversion: 1.0.0\n',
    'scratch/project.yml': 'name: scratch\nversion: 1.0.0\n',
    'monoforge.lock.yml': 'requests: 2.32.3\n'
  });
});

after(() => {
  removeDir(root);
});

describe('discoverManifests', () => {
  it('matches package directories against workspace globs', async () => {
    const found = await discoverManifests(root, { libs: ['libs/*'], apps: ['apps/*'] });
    assert.deepEqual(
      found.map((entry) => [entry.relativeDir, entry.workspace]),
      [
        ['apps/web', 'apps'],
        ['libs/core', 'libs'],
        ['libs/utils', 'libs']
      ]
    );
  });
});

describe('loadRepo', () => {
  it('loads packages, graph and lock from a nested directory', async () => {
    const repo = await loadRepo(path.join(root, 'apps', 'web'));

    assert.equal(repo.root, root);
    assert.deepEqual(repo.graph.order, ['core', 'utils', 'web']);
    assert.deepEqual(repo.config.dependencies, { requests: '^2.31.0' });
    assert.deepEqual(repo.lock, { requests: '2.32.3' });

    const web = getPackage(repo.graph, 'web');
    assert.equal(web.workspace, 'apps');
    assert.equal(web.path, path.join(root, 'apps', 'web'));
    assert.equal(displayPath(repo, web), 'apps/web');
  });

  it('surfaces graph errors', async () => {
    const cyclic = createRepo({
      'monoforge.yml': '',
      'a/project.yml': 'name: a\nversion: 1.0.0\ndependencies:\n  internal: [b]\n',
      'b/project.yml': 'name: b\nversion: 1.0.0\ndependencies:\n  internal: [a]\n'
    });
    try {
      await assert.rejects(loadRepo(cyclic), (error: unknown) => {
        assert.ok(error instanceof CycleError);
        assert.deepEqual(error.cycle, ['a', 'b', 'a']);
        return true;
      });
    } finally {
      removeDir(cyclic);
    }
  });
});
