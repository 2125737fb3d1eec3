import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { buildGraph, getPackage } from '../../../src/core/graph/graph-builder.js';
import { ManifestSynthesizer } from '../../../src/core/synthesis/manifest-synthesizer.js';
import { CommandAction } from '../../../src/core/orchestrator/command-action.js';
import type { Package } from '../../../src/core/manifest/types.js';
import type { MergedManifest } from '../../../src/core/synthesis/types.js';
import { makePackage, makeTempDir, removeDir } from '../../test-helpers.js';

let dir: string;
let pkg: Package;
let manifest: MergedManifest;

const node = process.execPath;

before(() => {
  dir = makeTempDir('action');
  const graph = buildGraph([makePackage('lib', { path: dir, external: { attrs: '>=23' } })]);
  pkg = getPackage(graph, 'lib');
  manifest = new ManifestSynthesizer(graph).synthesize(pkg, {});
});

after(() => {
  removeDir(dir);
});

const context = (signal: AbortSignal = new AbortController().signal) => ({ pkg, signal });

describe('CommandAction', () => {
  it('runs the command in the package directory with the manifest available', async () => {
    const script =
      "const fs = require('fs');" +
      "const m = JSON.parse(fs.readFileSync(process.env.MONOFORGE_MANIFEST, 'utf8'));" +
      "console.log(m.name + ' ' + process.env.MONOFORGE_PACKAGE + ' ' + process.cwd());";
    const action = new CommandAction({ kind: 'install', command: [node, '-e', script] });

    const result = await action.execute(manifest, context());

    assert.deepEqual(result, { ok: true, output: `lib lib ${fs.realpathSync(dir)}` });
    assert.equal(fs.existsSync(path.join(dir, '.monoforge-manifest.json')), false);
  });

  it('keeps the manifest file when asked to', async () => {
    const action = new CommandAction({
      kind: 'build',
      command: [node, '-e', ''],
      manifestFileName: 'merged.json',
      keepManifests: true
    });

    const result = await action.execute(manifest, context());

    assert.equal(result.ok, true);
    const written: unknown = JSON.parse(fs.readFileSync(path.join(dir, 'merged.json'), 'utf8'));
    assert.deepEqual(written, manifest);
  });

  it('maps a non-zero exit to a failure with the exit code and output', async () => {
    const action = new CommandAction({
      kind: 'build',
      command: [node, '-e', "console.error('bad'); process.exit(3)"]
    });

    const result = await action.execute(manifest, context());

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.code, 3);
      assert.equal(result.output, 'bad');
      assert.match(result.message, /exited with code 3$/);
    }
  });

  it('keeps only the tail of long output', async () => {
    const action = new CommandAction({
      kind: 'build',
      command: [node, '-e', 'for (let i = 1; i <= 50; i++) console.log("line " + i)']
    });

    const result = await action.execute(manifest, context());

    assert.equal(result.ok, true);
    if (result.ok) {
      const lines = (result.output ?? '').split('\n');
      assert.equal(lines.length, 40);
      assert.equal(lines[0], 'line 11');
      assert.equal(lines[39], 'line 50');
    }
  });

  it('fails without a configured command', async () => {
    const action = new CommandAction({ kind: 'build' });
    const result = await action.execute(manifest, context());
    assert.deepEqual(result, { ok: false, code: 'ERROR', message: "No build command configured for 'lib'" });
  });

  it('kills the process when the signal aborts', async () => {
    const controller = new AbortController();
    const action = new CommandAction({
      kind: 'install',
      command: [node, '-e', 'setTimeout(() => {}, 10000)']
    });

    setTimeout(() => controller.abort(), 50);
    const result = await action.execute(manifest, context(controller.signal));

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.code, 'CANCELLED');
    }
    assert.equal(fs.existsSync(path.join(dir, '.monoforge-manifest.json')), false);
  });
});
