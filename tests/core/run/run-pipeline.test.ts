import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';

import { loadRepo, type Repo } from '../../../src/core/repo/repo-loader.js';
import { planSelection, runPackages, uninstallPackages } from '../../../src/core/run/run-pipeline.js';
import {
  ConfigError,
  ConflictingSelectionError,
  UnknownWorkspaceError,
  UnsatisfiableSelectionError
} from '../../../src/utils/errors.js';
import { RecordingAction, createRepo, removeDir } from '../../test-helpers.js';

let root: string;
let repo: Repo;

const printPackage = "console.log(process.env.MONOFORGE_PACKAGE)";

before(async () => {
  root = createRepo({
    'monoforge.yml': [
      'workspaces:',
      '  libs: ["libs/*"]',
      '  apps: ["apps/*"]',
      'dependencies:',
      '  requests: "^2.31.0"',
      'commands:',
      `  build: [${JSON.stringify(process.execPath)}, "-e", ${JSON.stringify(printPackage)}]`,
      ''
    ].join('\n'),
    'libs/core/project.yml': 'name: core\nversion: 1.0.0\n',
    'libs/utils/project.yml': 'name: utils\nversion: 1.1.0\ndependencies:\n  internal: [core]\n',
    'apps/web/project.yml': 'name: web\nversion: 0.2.0\ndependencies:\n  internal: [utils]\n',
    'monoforge.lock.yml': 'requests: 2.32.3\n'
  });
  repo = await loadRepo(root);
});

after(() => {
  removeDir(root);
});

describe('planSelection', () => {
  it('plans an include list with its dependencies', () => {
    assert.deepEqual(planSelection(repo, { include: ['web'] }).batches, [['core'], ['utils'], ['web']]);
  });

  it('expands workspaces', () => {
    assert.deepEqual(planSelection(repo, { workspaces: ['libs'] }).batches, [['core'], ['utils']]);
    assert.throws(() => planSelection(repo, { workspaces: ['nope'] }), UnknownWorkspaceError);
  });

  it('drops excluded names from a workspace before resolving', () => {
    assert.deepEqual(planSelection(repo, { workspaces: ['libs'], exclude: ['utils'] }).batches, [['core']]);
    assert.deepEqual(planSelection(repo, { workspaces: ['apps'], exclude: ['web'] }).batches, []);
  });

  it('still refuses to exclude a dependency of a selected package', () => {
    assert.throws(
      () => planSelection(repo, { workspaces: ['libs'], exclude: ['core'] }),
      (error: unknown) => {
        assert.ok(error instanceof UnsatisfiableSelectionError);
        assert.equal(error.message, "Package 'utils' requires 'core', which is excluded");
        return true;
      }
    );
    assert.throws(
      () => planSelection(repo, { include: ['utils'], workspaces: ['libs'], exclude: ['utils'] }),
      ConflictingSelectionError
    );
    assert.throws(() => planSelection(repo, { include: ['web'], exclude: ['core'] }), UnsatisfiableSelectionError);
  });
});

describe('runPackages', () => {
  it('runs the selection with the given action', async () => {
    const action = new RecordingAction();
    const report = await runPackages(repo, { kind: 'install', exclude: ['utils'], action });

    assert.equal(report.success, true);
    assert.deepEqual(action.started, ['core']);
    assert.equal(action.manifests.get('core')?.dependencies.requests, '^2.31.0');
  });

  it('pins locked versions on request', async () => {
    const action = new RecordingAction();
    await runPackages(repo, { kind: 'build', include: ['core'], lockVersions: true, action });
    const manifest = action.manifests.get('core');
    assert.ok(manifest);
    assert.equal(manifest.dependencies.requests, '2.32.3');
    assert.deepEqual(manifest.locked, ['requests']);
  });

  it('runs the configured command by default', async () => {
    const report = await runPackages(repo, { kind: 'build', include: ['utils'], concurrency: 1 });

    assert.equal(report.success, true);
    assert.deepEqual(
      report.results.map((result) => [result.packageName, result.exitInfo?.output]),
      [
        ['core', 'core'],
        ['utils', 'utils']
      ]
    );
  });

  it('fails packages without a command for the action kind', async () => {
    const report = await runPackages(repo, { kind: 'install', include: ['core'] });
    assert.equal(report.success, false);
    assert.deepEqual(report.results[0].exitInfo, {
      code: 'ERROR',
      message: "No install command configured for 'core'"
    });
  });

  it('runs an ad-hoc command for every selected package', async () => {
    const report = await runPackages(repo, {
      kind: 'run',
      include: ['utils'],
      command: [process.execPath, '-e', printPackage],
      concurrency: 1
    });

    assert.equal(report.success, true);
    assert.deepEqual(
      report.results.map((result) => result.exitInfo?.output),
      ['core', 'utils']
    );
  });

  it('does not fall back to a configured command for ad-hoc runs', async () => {
    const report = await runPackages(repo, { kind: 'run', include: ['core'] });
    assert.deepEqual(report.results[0].exitInfo, {
      code: 'ERROR',
      message: "No run command configured for 'core'"
    });
  });
});

describe('uninstallPackages', () => {
  const printArgs = [process.execPath, '-e', "console.log(process.argv.slice(1).join(','))"];

  it('runs one command with the selected names, dependents first', async () => {
    const report = await uninstallPackages(repo, { workspaces: ['libs'], command: printArgs });
    assert.deepEqual(report, {
      packages: ['utils', 'core'],
      success: true,
      code: 0,
      output: 'utils,core',
      cancelled: false
    });
  });

  it('does not pull in dependencies of the named packages', async () => {
    const report = await uninstallPackages(repo, { include: ['web'], command: printArgs });
    assert.deepEqual(report.packages, ['web']);
    assert.equal(report.output, 'web');
  });

  it('removes every package but the excluded ones by default', async () => {
    const report = await uninstallPackages(repo, { exclude: ['core'], command: printArgs });
    assert.equal(report.output, 'web,utils');
  });

  it('succeeds without running anything when nothing is selected', async () => {
    const report = await uninstallPackages(repo, { workspaces: ['apps'], exclude: ['web'] });
    assert.deepEqual(report, { packages: [], success: true, code: 0, output: '', cancelled: false });
  });

  it('requires an uninstall command', async () => {
    await assert.rejects(uninstallPackages(repo, { include: ['core'] }), ConfigError);
  });
});
