import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { buildGraph, type DependencyGraph } from '../../../src/core/graph/graph-builder.js';
import { ManifestSynthesizer } from '../../../src/core/synthesis/manifest-synthesizer.js';
import { Orchestrator } from '../../../src/core/orchestrator/orchestrator.js';
import type { RunReport, TaskResult } from '../../../src/core/orchestrator/types.js';
import { OrchestratorInvariantError, ValidationError } from '../../../src/utils/errors.js';
import { RecordingAction, deferred, makePackage, tick, whenAborted } from '../../test-helpers.js';

function orchestratorFor(graph: DependencyGraph, shared: Record<string, string> = {}): Orchestrator {
  return new Orchestrator(new ManifestSynthesizer(graph), shared);
}

function statuses(report: RunReport): Record<string, TaskResult['status']> {
  return Object.fromEntries(report.results.map((result) => [result.packageName, result.status]));
}

function resultOf(report: RunReport, name: string): TaskResult {
  const result = report.results.find((entry) => entry.packageName === name);
  assert.ok(result, `no result for ${name}`);
  return result;
}

// A -> B -> C, D independent
const chain = buildGraph([
  makePackage('A', { deps: ['B'] }),
  makePackage('B', { deps: ['C'] }),
  makePackage('C'),
  makePackage('D')
]);

describe('Orchestrator', () => {
  it('runs every package once, dependencies first', async () => {
    const events: string[] = [];
    const action = new RecordingAction();
    const report = await orchestratorFor(chain).run(chain, chain.order, action, {
      concurrency: 4,
      reporter: {
        onTaskStart: (name) => events.push(`start ${name}`),
        onTaskFinish: (result) => events.push(`finish ${result.packageName}`)
      }
    });

    assert.equal(report.success, true);
    assert.equal(report.cancelled, false);
    assert.deepEqual(report.plan.batches, [['C', 'D'], ['B'], ['A']]);
    assert.deepEqual(report.results.map((result) => result.packageName), ['C', 'D', 'B', 'A']);
    assert.deepEqual([...action.started].sort(), ['A', 'B', 'C', 'D']);
    assert.ok(events.indexOf('finish C') < events.indexOf('start B'));
    assert.ok(events.indexOf('finish B') < events.indexOf('start A'));
  });

  it('hands actions merged manifests', async () => {
    const graph = buildGraph([makePackage('api', { external: { numpy: '>=2' } })]);
    const action = new RecordingAction();
    await orchestratorFor(graph, { numpy: '^1', requests: '^2' }).run(graph, ['api'], action);

    const manifest = action.manifests.get('api');
    assert.ok(manifest);
    assert.equal(manifest.sharedDepsApplied, true);
    assert.deepEqual(manifest.dependencies, { numpy: '>=2', requests: '^2' });
  });

  it('skips the dependents of a failed package and keeps independent branches going', async () => {
    const action = new RecordingAction({ B: () => ({ ok: false, message: 'exit 1', code: 1 }) });
    const report = await orchestratorFor(chain).run(chain, chain.order, action, { concurrency: 2 });

    assert.equal(report.success, false);
    assert.deepEqual(statuses(report), { C: 'success', D: 'success', B: 'failed', A: 'skipped' });
    assert.deepEqual(resultOf(report, 'B').exitInfo, { code: 1, message: 'exit 1' });
    assert.deepEqual(resultOf(report, 'A').exitInfo?.blockedBy, ['B']);
    assert.ok(!action.started.includes('A'));
  });

  it('skips every transitive dependent when the root fails', async () => {
    const action = new RecordingAction({ C: () => ({ ok: false, message: 'broken' }) });
    const report = await orchestratorFor(chain).run(chain, chain.order, action, {
      failurePolicy: 'continue-independent'
    });

    assert.deepEqual(statuses(report), { C: 'failed', D: 'success', B: 'skipped', A: 'skipped' });
    assert.deepEqual(resultOf(report, 'A').exitInfo?.blockedBy, ['C']);
    assert.deepEqual(resultOf(report, 'B').exitInfo?.blockedBy, ['C']);
  });

  it('stops the whole run under fail-fast', async () => {
    const graph = buildGraph([makePackage('a'), makePackage('b'), makePackage('c')]);
    const action = new RecordingAction({ a: () => ({ ok: false, message: 'nope' }) });
    const report = await orchestratorFor(graph).run(graph, graph.order, action, {
      concurrency: 1,
      failurePolicy: 'fail-fast'
    });

    assert.deepEqual(statuses(report), { a: 'failed', b: 'skipped', c: 'skipped' });
    assert.deepEqual(action.started, ['a']);
    assert.deepEqual(resultOf(report, 'b').exitInfo, {
      message: "Run stopped after 'a' failed",
      blockedBy: ['a']
    });
  });

  it('never exceeds the concurrency bound', async () => {
    const graph = buildGraph(['p1', 'p2', 'p3', 'p4', 'p5', 'p6'].map((name) => makePackage(name)));
    const action = new RecordingAction({}, async () => {
      await tick(10);
      return { ok: true };
    });
    const report = await orchestratorFor(graph).run(graph, graph.order, action, { concurrency: 2 });

    assert.equal(report.success, true);
    assert.equal(action.peak, 2);
    assert.equal(report.peakConcurrency, 2);
  });

  it('records thrown errors as failures', async () => {
    const graph = buildGraph([makePackage('x')]);
    const action = new RecordingAction({
      x: () => {
        throw new Error('boom');
      }
    });
    const report = await orchestratorFor(graph).run(graph, ['x'], action);
    assert.deepEqual(resultOf(report, 'x').exitInfo, { code: 'ERROR', message: 'boom' });
  });

  it('fails a package that exceeds the timeout and aborts its signal', async () => {
    const graph = buildGraph([makePackage('slow')]);
    let sawAbort = false;
    const action = new RecordingAction({
      slow: async (_manifest, { signal }) => {
        await whenAborted(signal);
        sawAbort = true;
        return { ok: false, message: 'aborted' };
      }
    });
    const report = await orchestratorFor(graph).run(graph, ['slow'], action, { timeoutMs: 20 });

    assert.equal(resultOf(report, 'slow').status, 'failed');
    assert.deepEqual(resultOf(report, 'slow').exitInfo, {
      code: 'TIMEOUT',
      message: 'Timed out after 20ms'
    });
    assert.equal(sawAbort, true);
  });

  it('keeps the slot of a timed-out action until it settles', async () => {
    const graph = buildGraph([makePackage('a'), makePackage('b')]);
    const action = new RecordingAction({
      a: async () => {
        await tick(150);
        return { ok: true };
      }
    });
    const report = await orchestratorFor(graph).run(graph, graph.order, action, {
      concurrency: 1,
      timeoutMs: 20
    });

    assert.equal(action.peak, 1);
    assert.deepEqual(action.started, ['a', 'b']);
    assert.deepEqual(action.finished, ['a', 'b']);
    assert.deepEqual(statuses(report), { a: 'failed', b: 'success' });
    assert.deepEqual(resultOf(report, 'a').exitInfo, {
      code: 'TIMEOUT',
      message: 'Timed out after 20ms'
    });
  });

  it('rejects the run when a reporter throws, without starting the action', async () => {
    const graph = buildGraph([makePackage('x'), makePackage('y')]);
    const action = new RecordingAction();
    await assert.rejects(
      orchestratorFor(graph).run(graph, graph.order, action, {
        concurrency: 1,
        reporter: {
          onTaskStart: () => {
            throw new Error('reporter exploded');
          }
        }
      }),
      /reporter exploded/
    );
    assert.deepEqual(action.started, []);
  });

  it('only runs the selected packages', async () => {
    const action = new RecordingAction();
    const report = await orchestratorFor(chain).run(chain, ['B', 'D'], action);
    assert.deepEqual(report.plan.batches, [['B', 'D']]);
    assert.deepEqual([...action.started].sort(), ['B', 'D']);
  });

  it('rejects an invalid concurrency', async () => {
    await assert.rejects(
      orchestratorFor(chain).run(chain, chain.order, new RecordingAction(), { concurrency: 0 }),
      ValidationError
    );
  });
});

describe('Orchestrator cancellation', () => {
  // a and b independent, c depends on a
  const graph = buildGraph([makePackage('a'), makePackage('b'), makePackage('c', { deps: ['a'] })]);

  it('lets a cooperating action stop and skips everything not started', async () => {
    const controller = new AbortController();
    const started = deferred<void>();
    const action = new RecordingAction({
      a: async (_manifest, { signal }) => {
        started.resolve();
        await whenAborted(signal);
        return { ok: false, message: 'interrupted' };
      }
    });

    const running = orchestratorFor(graph).run(graph, graph.order, action, {
      concurrency: 1,
      signal: controller.signal
    });
    await started.promise;
    controller.abort();
    const report = await running;

    assert.equal(report.cancelled, true);
    assert.equal(report.success, false);
    assert.deepEqual(statuses(report), { a: 'failed', b: 'skipped', c: 'skipped' });
    assert.equal(resultOf(report, 'b').exitInfo?.code, 'CANCELLED');
    assert.equal(resultOf(report, 'c').exitInfo?.code, 'CANCELLED');
    assert.deepEqual(action.started, ['a']);
  });

  it('lets an action that ignores the signal finish normally', async () => {
    const controller = new AbortController();
    const started = deferred<void>();
    const release = deferred<void>();
    const action = new RecordingAction({
      a: async () => {
        started.resolve();
        await release.promise;
        return { ok: true };
      }
    });

    const running = orchestratorFor(graph).run(graph, graph.order, action, {
      concurrency: 1,
      signal: controller.signal
    });
    await started.promise;
    controller.abort();
    release.resolve();
    const report = await running;

    assert.equal(report.cancelled, true);
    assert.deepEqual(statuses(report), { a: 'success', b: 'skipped', c: 'skipped' });
    assert.deepEqual(action.started, ['a']);
  });

  it('runs nothing when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const action = new RecordingAction();
    const report = await orchestratorFor(graph).run(graph, graph.order, action, { signal: controller.signal });

    assert.equal(report.cancelled, true);
    assert.deepEqual(statuses(report), { a: 'skipped', b: 'skipped', c: 'skipped' });
    assert.deepEqual(action.started, []);
  });
});

describe('Orchestrator scheduling invariant', () => {
  it('rejects the run when a package is admitted before its dependency succeeded', async () => {
    // B depends on C; the corrupted graph also lists B as a dependent of A
    const graph = buildGraph([makePackage('A'), makePackage('B', { deps: ['C'] }), makePackage('C')]);
    const indexA = graph.indexOf.get('A');
    const indexB = graph.indexOf.get('B');
    assert.ok(indexA !== undefined && indexB !== undefined);
    const corrupted: DependencyGraph = {
      ...graph,
      dependents: graph.dependents.map((list, index) => (index === indexA ? [...list, indexB] : list))
    };

    let cSawAbort = false;
    const action = new RecordingAction({
      C: async (_manifest, { signal }) => {
        await whenAborted(signal);
        cSawAbort = true;
        return { ok: false, message: 'stopped' };
      }
    });

    await assert.rejects(
      orchestratorFor(corrupted).run(corrupted, corrupted.order, action, { concurrency: 2 }),
      (error: unknown) => {
        assert.ok(error instanceof OrchestratorInvariantError);
        assert.equal(
          error.message,
          "Scheduling invariant violated: 'B' was admitted before dependency 'C' succeeded"
        );
        return true;
      }
    );
    assert.equal(cSawAbort, true);
    assert.ok(!action.started.includes('B'));
  });
});
