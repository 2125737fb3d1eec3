import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  buildGraph,
  dependenciesOf,
  dependentsOf,
  getPackage
} from '../../../src/core/graph/graph-builder.js';
import {
  CycleError,
  DuplicatePackageError,
  GraphError,
  UnknownDependencyError
} from '../../../src/utils/errors.js';
import { makeChain, makePackage } from '../../test-helpers.js';

// app -> api -> core, app -> ui -> core, tools (independent)
function diamond() {
  return [
    makePackage('app', { deps: ['ui', 'api'] }),
    makePackage('ui', { deps: ['core'] }),
    makePackage('tools'),
    makePackage('api', { deps: ['core'] }),
    makePackage('core')
  ];
}

describe('buildGraph', () => {
  it('orders dependencies before dependents with a lexicographic tie-break', () => {
    const graph = buildGraph(diamond());
    assert.deepEqual(graph.batches, [['core', 'tools'], ['api', 'ui'], ['app']]);
    assert.deepEqual(graph.order, ['core', 'tools', 'api', 'ui', 'app']);
    assert.deepEqual(
      graph.packages.map((pkg) => pkg.name),
      ['api', 'app', 'core', 'tools', 'ui']
    );
  });

  it('is deterministic regardless of input order', () => {
    const first = buildGraph(diamond());
    const second = buildGraph([...diamond()].reverse());
    assert.deepEqual(second.batches, first.batches);
    assert.deepEqual(second.order, first.order);
  });

  it('builds an empty graph', () => {
    const graph = buildGraph([]);
    assert.deepEqual(graph.order, []);
    assert.deepEqual(graph.batches, []);
  });

  it('reports a cycle with its full path', () => {
    const packages = [
      makePackage('a', { deps: ['b'] }),
      makePackage('b', { deps: ['c'] }),
      makePackage('c', { deps: ['a'] })
    ];
    assert.throws(
      () => buildGraph(packages),
      (error: unknown) => {
        assert.ok(error instanceof CycleError);
        assert.deepEqual(error.cycle, ['a', 'b', 'c', 'a']);
        assert.equal(error.message, 'Dependency cycle detected: a -> b -> c -> a');
        return true;
      }
    );
  });

  it('reports a self dependency as a cycle', () => {
    assert.throws(
      () => buildGraph([makePackage('solo', { deps: ['solo'] })]),
      { message: 'Dependency cycle detected: solo -> solo' }
    );
  });

  it('rejects duplicate package names', () => {
    assert.throws(
      () => buildGraph([makePackage('a', { path: '/x/a' }), makePackage('a', { path: '/y/a' })]),
      (error: unknown) => {
        assert.ok(error instanceof DuplicatePackageError);
        assert.deepEqual(error.paths, ['/x/a', '/y/a']);
        return true;
      }
    );
  });

  it('rejects unknown internal dependencies', () => {
    assert.throws(
      () => buildGraph([makePackage('a', { deps: ['ghost'] })]),
      (error: unknown) => {
        assert.ok(error instanceof UnknownDependencyError);
        assert.equal(error.from, 'a');
        assert.equal(error.to, 'ghost');
        return true;
      }
    );
  });
});

describe('graph queries', () => {
  const graph = buildGraph(diamond());

  it('returns direct dependencies sorted by name', () => {
    assert.deepEqual(dependenciesOf(graph, 'app'), ['api', 'ui']);
  });

  it('returns transitive dependencies in topological order', () => {
    assert.deepEqual(dependenciesOf(graph, 'app', { transitive: true }), ['core', 'api', 'ui']);
  });

  it('returns transitive dependents', () => {
    assert.deepEqual(dependentsOf(graph, 'core'), ['api', 'ui']);
    assert.deepEqual(dependentsOf(graph, 'core', { transitive: true }), ['api', 'ui', 'app']);
    assert.deepEqual(dependentsOf(graph, 'tools', { transitive: true }), []);
  });

  it('looks up packages by name', () => {
    assert.equal(getPackage(graph, 'ui').name, 'ui');
    assert.throws(() => getPackage(graph, 'nope'), GraphError);
  });
});

describe('deep chains', () => {
  it('orders a chain deeper than the call stack', () => {
    const graph = buildGraph(makeChain(20000));
    assert.equal(graph.order.length, 20000);
    assert.equal(graph.order[0], 'p19999');
    assert.equal(graph.order[19999], 'p00000');
  });

  it('reports a cycle spanning the whole chain', () => {
    assert.throws(
      () => buildGraph(makeChain(20000, true)),
      (error: unknown) => {
        assert.ok(error instanceof CycleError);
        assert.equal(error.cycle.length, 20001);
        assert.equal(error.cycle[0], 'p00000');
        assert.equal(error.cycle[19999], 'p19999');
        assert.equal(error.cycle[20000], 'p00000');
        return true;
      }
    );
  });
});
