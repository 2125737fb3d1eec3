/**
 * Run pipeline: selection -> synthesis -> orchestration for one action kind,
 * plus the repo-level uninstall.
 */

import type { ActionKind, FailurePolicy } from '../../types/index.js';
import { planBatches, type ExecutionPlan } from '../graph/execution-plan.js';
import { expandWorkspaces, filterPackages, selectPackages } from '../selection/selection-resolver.js';
import { ManifestSynthesizer } from '../synthesis/manifest-synthesizer.js';
import type { ExtrasSelection } from '../synthesis/types.js';
import { Orchestrator } from '../orchestrator/orchestrator.js';
import { CommandAction } from '../orchestrator/command-action.js';
import type { PackageAction, RunReport, RunReporter } from '../orchestrator/types.js';
import type { Repo } from '../repo/repo-loader.js';
import { ConfigError } from '../../utils/errors.js';
import { runCommand } from '../../utils/run-command.js';
import { logger } from '../../utils/logger.js';

export interface SelectionOptions {
  include?: string[];
  exclude?: string[];
  workspaces?: string[];
}

export interface RunPackagesOptions extends SelectionOptions {
  kind: ActionKind;
  /** argv for every package; required for 'run', overrides the repo default otherwise */
  command?: readonly string[];
  extras?: ExtrasSelection;
  concurrency?: number;
  failurePolicy?: FailurePolicy;
  timeoutMs?: number;
  /** Pin dependencies to the lock mapping */
  lockVersions?: boolean;
  keepManifests?: boolean;
  signal?: AbortSignal;
  /** Defaults to a CommandAction built from the repo configuration */
  action?: PackageAction;
  reporter?: RunReporter;
}

export interface UninstallOptions extends SelectionOptions {
  /** Defaults to commands.uninstall from monoforge.yml */
  command?: readonly string[];
  signal?: AbortSignal;
}

export interface UninstallReport {
  /** Removed packages, dependents first */
  packages: string[];
  success: boolean;
  code: number | string | null;
  output: string;
  cancelled: boolean;
}

/**
 * Merge the workspace expansion into the include list. Excluded names are
 * dropped from the expansion, so only names given explicitly can conflict.
 * Undefined means the workspaces had nothing left to select.
 */
function selectionInputs(repo: Repo, options: SelectionOptions): { include: string[]; exclude: string[] } | undefined {
  const include = [...(options.include ?? [])];
  const exclude = options.exclude ?? [];
  if (options.workspaces && options.workspaces.length > 0) {
    const excluded = new Set(exclude);
    const members = expandWorkspaces(repo.graph, options.workspaces, Object.keys(repo.config.workspaces)).filter(
      (name) => !excluded.has(name)
    );
    if (members.length === 0 && include.length === 0) {
      logger.warn(`Nothing left to select in workspace(s) ${options.workspaces.join(', ')}`);
      return undefined;
    }
    include.push(...members);
  }
  return { include, exclude };
}

/**
 * Resolve include/exclude/workspace filters into the selected set.
 */
export function resolveSelection(repo: Repo, options: SelectionOptions): Set<string> {
  const inputs = selectionInputs(repo, options);
  return inputs ? selectPackages(repo.graph, inputs.include, inputs.exclude) : new Set();
}

export function planSelection(repo: Repo, options: SelectionOptions): ExecutionPlan {
  return planBatches(repo.graph, resolveSelection(repo, options));
}

export async function runPackages(repo: Repo, options: RunPackagesOptions): Promise<RunReport> {
  const selected = resolveSelection(repo, options);
  logger.debug(`Selected ${selected.size} package(s) for ${options.kind}`, { selected: [...selected] });

  const synthesizer = new ManifestSynthesizer(repo.graph, {
    mode: options.kind,
    lock: repo.lock,
    lockVersions: options.lockVersions ?? false,
    ...(options.extras ? { extras: options.extras } : {})
  });

  const command = options.command ?? (options.kind === 'run' ? undefined : repo.config.commands[options.kind]);
  const action =
    options.action ??
    new CommandAction({
      kind: options.kind,
      ...(command ? { command } : {}),
      manifestFileName: repo.config.manifestFile,
      keepManifests: options.keepManifests ?? false
    });

  const orchestrator = new Orchestrator(synthesizer, repo.config.dependencies);
  const timeoutMs = options.timeoutMs ?? repo.config.timeoutMs;
  return orchestrator.run(repo.graph, selected, action, {
    concurrency: options.concurrency ?? repo.config.concurrency,
    failurePolicy: options.failurePolicy ?? repo.config.failurePolicy,
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    ...(options.signal ? { signal: options.signal } : {}),
    ...(options.reporter ? { reporter: options.reporter } : {})
  });
}

/**
 * Uninstall the selected packages with one command run at the repo root,
 * the package names appended dependents first. Names are filtered, not
 * closed over their dependencies.
 */
export async function uninstallPackages(repo: Repo, options: UninstallOptions = {}): Promise<UninstallReport> {
  const inputs = selectionInputs(repo, options);
  const packages = inputs ? [...filterPackages(repo.graph, inputs.include, inputs.exclude)].reverse() : [];
  if (packages.length === 0) {
    return { packages, success: true, code: 0, output: '', cancelled: false };
  }

  const base = options.command ?? repo.config.commands.uninstall;
  if (!base || base.length === 0) {
    throw new ConfigError("No uninstall command configured: set 'commands.uninstall' in monoforge.yml");
  }

  const argv = [...base, ...packages];
  logger.debug(`Uninstalling ${packages.length} package(s)`, { argv });
  const result = await runCommand(argv, { cwd: repo.root, ...(options.signal ? { signal: options.signal } : {}) });
  return {
    packages,
    success: result.code === 0 && !result.aborted,
    code: result.code ?? result.signal,
    output: result.output,
    cancelled: result.aborted
  };
}
