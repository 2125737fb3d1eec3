import { Command, Option } from 'commander';

import type { ActionKind, CommandResult, ExecutionContext, FailurePolicy } from '../types/index.js';
import { FAILURE_POLICIES } from '../types/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { loadRepo } from '../core/repo/repo-loader.js';
import { runPackages } from '../core/run/run-pipeline.js';
import type { RunReport } from '../core/orchestrator/types.js';
import type { ExtrasSelection } from '../core/synthesis/types.js';
import { isFailurePolicy, parsePositiveInteger } from '../core/repo/repo-config.js';
import { RunFailedError, ValidationError, withErrorHandling } from '../utils/errors.js';
import { formatReportSummary, formatTaskResult } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';

/** Options shared by every command that takes a selection */
export interface SelectionCliOptions {
  exclude?: string[];
  workspace?: string[];
}

export interface RunCliOptions extends SelectionCliOptions {
  concurrency?: string;
  failurePolicy?: string;
  timeout?: string;
  keepManifests?: boolean;
  lock?: boolean;
  with?: string[];
  without?: string[];
  only?: string[];
  default?: boolean;
}

/** What a run command passes on top of the shared flags */
export interface RunTarget {
  kind: ActionKind;
  projects: string[];
  command?: readonly string[];
}

export function addSelectionOptions(command: Command): Command {
  return command
    .option('-e, --exclude <projects...>', 'exclude projects (and, without explicit projects, everything depending on them)')
    .option('-w, --workspace <workspaces...>', 'select every project of the given workspaces');
}

/**
 * Resolve the global --cwd into an ExecutionContext.
 * Machine-readable output passes interactive: false to get plain stdout.
 */
export async function contextFromCommand(
  command: Command,
  options: { interactive?: boolean } = {}
): Promise<ExecutionContext> {
  const { cwd } = command.optsWithGlobals<{ cwd?: string }>();
  return createCliExecutionContext({ ...(cwd ? { cwd } : {}), ...options });
}

function extrasFromOptions(options: RunCliOptions): ExtrasSelection | undefined {
  const extras: ExtrasSelection = {
    ...(options.default ? { none: true } : {}),
    ...(options.only ? { only: options.only } : {}),
    ...(options.with ? { with: options.with } : {}),
    ...(options.without ? { without: options.without } : {})
  };
  return Object.keys(extras).length > 0 ? extras : undefined;
}

/**
 * Run packages and report each task through the output port.
 */
async function executeRun(
  target: RunTarget,
  options: RunCliOptions,
  ctx: ExecutionContext
): Promise<CommandResult<RunReport>> {
  const { kind, projects } = target;
  const output = resolveOutput(ctx);
  const extras = extrasFromOptions(options);

  let failurePolicy: FailurePolicy | undefined;
  if (options.failurePolicy !== undefined) {
    if (!isFailurePolicy(options.failurePolicy)) {
      throw new ValidationError(
        `Invalid --failure-policy '${options.failurePolicy}'. Use one of: ${FAILURE_POLICIES.join(', ')}.`
      );
    }
    failurePolicy = options.failurePolicy;
  }

  const repo = await loadRepo(ctx.targetDir);

  const controller = new AbortController();
  const onSigint = (): void => {
    output.warn('Interrupted: waiting for running projects to finish');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  let report: RunReport;
  try {
    report = await runPackages(repo, {
      kind,
      include: projects,
      ...(target.command ? { command: target.command } : {}),
      ...(extras ? { extras } : {}),
      exclude: options.exclude ?? [],
      workspaces: options.workspace ?? [],
      ...(options.concurrency !== undefined
        ? { concurrency: parsePositiveInteger(options.concurrency, '--concurrency') }
        : {}),
      ...(failurePolicy !== undefined ? { failurePolicy } : {}),
      ...(options.timeout !== undefined ? { timeoutMs: parsePositiveInteger(options.timeout, '--timeout') } : {}),
      lockVersions: options.lock ?? false,
      keepManifests: options.keepManifests ?? false,
      signal: controller.signal,
      reporter: {
        onTaskStart: (name) => output.step(`${kind} ${name}`),
        onTaskFinish: (result) => {
          const line = formatTaskResult(result);
          if (result.status === 'success') {
            output.success(line);
          } else if (result.status === 'failed') {
            output.error(line);
            if (result.exitInfo?.output) {
              output.note(result.exitInfo.output, `${result.packageName} output`);
            }
          } else {
            output.warn(line);
          }
        }
      }
    });
  } finally {
    process.removeListener('SIGINT', onSigint);
  }

  const summary = formatReportSummary(report);
  if (report.success) {
    output.success(summary);
    return { success: true, data: report };
  }
  logger.debug('Run report', report);
  return { success: false, data: report, error: summary };
}

/**
 * Flags shared by install, build and run.
 */
export function addRunOptions(command: Command): Command {
  return command
    .option('-j, --concurrency <n>', 'maximum number of projects processed at once')
    .addOption(
      new Option('--failure-policy <policy>', 'what to do when a project fails').choices([...FAILURE_POLICIES])
    )
    .option('--timeout <ms>', 'per-project timeout in milliseconds')
    .option('--keep-manifests', 'keep the generated manifest files after the run');
}

export async function runOrThrow(target: RunTarget, options: RunCliOptions, cmd: Command): Promise<void> {
  const ctx = await contextFromCommand(cmd);
  const result = await executeRun(target, options, ctx);
  if (!result.success) {
    throw new RunFailedError(result.error ?? `${target.kind} failed`);
  }
}

/**
 * Register an install/build command.
 */
export function setupActionCommand(program: Command, kind: 'install' | 'build', description: string): Command {
  const command = program
    .command(kind)
    .description(description)
    .argument('[projects...]', 'projects to act on, with their internal dependencies (default: all)');

  addRunOptions(addSelectionOptions(command)).action(
    withErrorHandling(async (projects: string[], options: RunCliOptions, cmd: Command) => {
      await runOrThrow({ kind, projects }, options, cmd);
    })
  );

  return command;
}
