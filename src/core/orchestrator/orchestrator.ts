/**
 * Orchestrator
 *
 * Runs one action per selected package in dependency order. A package is
 * admitted to the worker queue only once every selected internal
 * dependency has succeeded; the queue bounds how many actions run at once.
 * All per-package state is owned here and only changes from task
 * callbacks on the event loop.
 */

import PQueue from 'p-queue';
import { DEFAULTS } from '../../constants/index.js';
import type { FailurePolicy } from '../../types/index.js';
import { getPackage, type DependencyGraph } from '../graph/graph-builder.js';
import { planBatches, planOrder } from '../graph/execution-plan.js';
import type { ManifestSynthesizer } from '../synthesis/manifest-synthesizer.js';
import type { MergedManifest, SharedDependencySet } from '../synthesis/types.js';
import type { Package } from '../manifest/types.js';
import { OrchestratorInvariantError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type {
  ActionResult,
  ExitInfo,
  PackageAction,
  PackageState,
  RunOptions,
  RunReport,
  TaskResult
} from './types.js';

export const EXIT_CODES = {
  TIMEOUT: 'TIMEOUT',
  CANCELLED: 'CANCELLED',
  ERROR: 'ERROR'
} as const;

export class Orchestrator {
  constructor(
    private readonly synthesizer: ManifestSynthesizer,
    private readonly sharedDeps: SharedDependencySet
  ) {}

  async run(
    graph: DependencyGraph,
    selectedNames: Iterable<string>,
    action: PackageAction,
    options: RunOptions = {}
  ): Promise<RunReport> {
    const concurrency = options.concurrency ?? DEFAULTS.CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ValidationError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    const failurePolicy: FailurePolicy = options.failurePolicy ?? DEFAULTS.FAILURE_POLICY;
    const { timeoutMs, reporter, signal: externalSignal } = options;
    if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
      throw new ValidationError(`timeout must be a positive number of milliseconds, got ${timeoutMs}`);
    }

    const startedAt = Date.now();
    const plan = planBatches(graph, selectedNames);
    const order = planOrder(plan);
    const selected = new Set(order);

    // Every manifest exists before the first action is admitted
    const packages = new Map<string, Package>(order.map((name) => [name, getPackage(graph, name)]));
    const manifests = this.synthesizer.synthesizeAll(packages.values(), this.sharedDeps);

    const selectedDeps = (name: string): string[] => {
      const index = graph.indexOf.get(name);
      if (index === undefined) {
        return [];
      }
      return graph.dependencies[index]
        .map((depIndex) => graph.packages[depIndex].name)
        .filter((depName) => selected.has(depName));
    };
    const selectedDependents = (name: string): string[] => {
      const index = graph.indexOf.get(name);
      if (index === undefined) {
        return [];
      }
      return graph.dependents[index]
        .map((depIndex) => graph.packages[depIndex].name)
        .filter((depName) => selected.has(depName));
    };

    const state = new Map<string, PackageState>();
    const remaining = new Map<string, number>();
    const results = new Map<string, TaskResult>();
    for (const name of order) {
      const count = selectedDeps(name).length;
      remaining.set(name, count);
      state.set(name, count === 0 ? 'ready' : 'pending');
    }

    logger.info(`Running ${order.length} package(s)`, { concurrency, failurePolicy, timeoutMs });

    const queue = new PQueue({ concurrency });
    const controller = new AbortController();
    let running = 0;
    let peakConcurrency = 0;
    let stopped = false;
    let cancelled = false;
    let fatal: Error | undefined;

    const finish = (result: TaskResult): void => {
      results.set(result.packageName, result);
      state.set(result.packageName, result.status);
      reporter?.onTaskFinish?.(result);
    };

    const skip = (name: string, exitInfo: ExitInfo): void => {
      const current = state.get(name);
      if (current === 'skipped') {
        // Already blocked by another failure: record this one too
        const previous = results.get(name);
        const blockedBy = previous?.exitInfo?.blockedBy;
        if (blockedBy && exitInfo.blockedBy) {
          for (const blocker of exitInfo.blockedBy) {
            if (!blockedBy.includes(blocker)) {
              blockedBy.push(blocker);
            }
          }
        }
        return;
      }
      if (current !== 'pending' && current !== 'ready') {
        return;
      }
      finish({ packageName: name, status: 'skipped', exitInfo, durationMs: 0 });
    };

    const stopAdmissions = (exitInfo: ExitInfo): void => {
      stopped = true;
      queue.clear();
      for (const name of order) {
        skip(name, { ...exitInfo, ...(exitInfo.blockedBy ? { blockedBy: [...exitInfo.blockedBy] } : {}) });
      }
    };

    const halt = (error: unknown): void => {
      if (fatal) {
        return;
      }
      fatal = error instanceof Error ? error : new Error(String(error));
      logger.error('Run aborted', fatal);
      controller.abort(fatal);
      stopAdmissions({ code: EXIT_CODES.ERROR, message: fatal.message });
    };

    const cancel = (): void => {
      if (cancelled || stopped) {
        return;
      }
      cancelled = true;
      logger.info('Run cancelled, waiting for running actions');
      controller.abort(new Error('Run cancelled'));
      stopAdmissions({ code: EXIT_CODES.CANCELLED, message: 'Run cancelled' });
    };

    const onFailure = (name: string): void => {
      if (failurePolicy === 'fail-fast') {
        stopAdmissions({ message: `Run stopped after '${name}' failed`, blockedBy: [name] });
        return;
      }
      const index = graph.indexOf.get(name);
      if (index === undefined) {
        return;
      }
      const blocked = new Set<string>();
      const queueOfNames = selectedDependents(name);
      while (queueOfNames.length > 0) {
        const next = queueOfNames.shift();
        if (next === undefined || blocked.has(next)) {
          continue;
        }
        blocked.add(next);
        queueOfNames.push(...selectedDependents(next));
      }
      for (const dependent of order.filter((pkgName) => blocked.has(pkgName))) {
        skip(dependent, { message: `Blocked by failed dependency '${name}'`, blockedBy: [name] });
      }
    };

    const runTask = async (name: string): Promise<void> => {
      if (stopped) {
        return;
      }
      const unmet = selectedDeps(name).find((depName) => state.get(depName) !== 'success');
      if (unmet !== undefined) {
        halt(
          new OrchestratorInvariantError(`'${name}' was admitted before dependency '${unmet}' succeeded`, {
            package: name,
            dependency: unmet,
            dependencyState: state.get(unmet)
          })
        );
        return;
      }
      const manifest = manifests.get(name);
      const pkg = packages.get(name);
      if (!manifest || !pkg) {
        halt(new OrchestratorInvariantError(`no synthesized manifest for '${name}'`, { package: name }));
        return;
      }

      const taskLog = logger.child(name);
      state.set(name, 'running');
      running++;
      peakConcurrency = Math.max(peakConcurrency, running);
      const taskStartedAt = Date.now();
      let outcome: ActionResult;
      try {
        reporter?.onTaskStart?.(name);
        taskLog.debug('Starting', { running });
        outcome = await this.execute(action, manifest, pkg, controller.signal, timeoutMs);
      } finally {
        running--;
      }
      const durationMs = Date.now() - taskStartedAt;

      if (outcome.ok) {
        finish({
          packageName: name,
          status: 'success',
          ...(outcome.output !== undefined ? { exitInfo: { code: 0, output: outcome.output } } : {}),
          durationMs
        });
        for (const dependent of selectedDependents(name)) {
          const count = (remaining.get(dependent) ?? 0) - 1;
          remaining.set(dependent, count);
          if (count === 0 && !stopped) {
            admit(dependent);
          }
        }
        return;
      }

      taskLog.warn(`Failed: ${outcome.message}`);
      finish({
        packageName: name,
        status: 'failed',
        exitInfo: {
          ...(outcome.code !== undefined ? { code: outcome.code } : {}),
          message: outcome.message,
          ...(outcome.output !== undefined ? { output: outcome.output } : {})
        },
        durationMs
      });
      if (!stopped) {
        onFailure(name);
      }
    };

    const admit = (name: string): void => {
      state.set(name, 'ready');
      queue.add(() => runTask(name)).catch(halt);
    };

    const onExternalAbort = (): void => cancel();
    if (externalSignal?.aborted) {
      cancel();
    } else {
      externalSignal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    try {
      for (const name of order) {
        if (!stopped && state.get(name) === 'ready') {
          admit(name);
        }
      }
      await queue.onIdle();
    } finally {
      externalSignal?.removeEventListener('abort', onExternalAbort);
    }

    if (fatal) {
      throw fatal;
    }

    const ordered: TaskResult[] = [];
    for (const name of order) {
      const result = results.get(name);
      if (!result) {
        throw new OrchestratorInvariantError(`'${name}' never reached a terminal state`, {
          package: name,
          state: state.get(name)
        });
      }
      ordered.push(result);
    }

    const report: RunReport = {
      success: ordered.every((result) => result.status === 'success'),
      cancelled,
      results: ordered,
      plan,
      durationMs: Date.now() - startedAt,
      peakConcurrency
    };
    logger.info(report.success ? 'Run succeeded' : 'Run finished with failures', {
      durationMs: report.durationMs,
      peakConcurrency
    });
    return report;
  }

  /**
   * Run the action under its own AbortSignal, chained to the run's signal
   * and to the optional timeout. Never rejects, and only resolves once the
   * action has settled: a timed-out action keeps its queue slot until then.
   */
  private async execute(
    action: PackageAction,
    manifest: MergedManifest,
    pkg: Package,
    runSignal: AbortSignal,
    timeoutMs: number | undefined
  ): Promise<ActionResult> {
    const controller = new AbortController();
    const forward = (): void => controller.abort(runSignal.reason);
    if (runSignal.aborted) {
      controller.abort(runSignal.reason);
    } else {
      runSignal.addEventListener('abort', forward, { once: true });
    }

    let timedOut = false;
    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            logger.child(pkg.name).warn(`Exceeded ${timeoutMs}ms, aborting`);
            controller.abort(new Error('Timed out'));
          }, timeoutMs);

    try {
      const result = await Promise.resolve()
        .then(() => action.execute(manifest, { pkg, signal: controller.signal }))
        .catch((error: unknown): ActionResult => ({
          ok: false,
          code: EXIT_CODES.ERROR,
          message: error instanceof Error ? error.message : String(error)
        }));

      if (!timedOut) {
        return result;
      }
      return {
        ok: false,
        code: EXIT_CODES.TIMEOUT,
        message: `Timed out after ${timeoutMs}ms`,
        ...(result.output !== undefined ? { output: result.output } : {})
      };
    } finally {
      clearTimeout(timer);
      runSignal.removeEventListener('abort', forward);
    }
  }
}
