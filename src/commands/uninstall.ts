import { Command } from 'commander';

import type { CommandResult, ExecutionContext } from '../types/index.js';
import { RunFailedError, withErrorHandling } from '../utils/errors.js';
import { addSelectionOptions, contextFromCommand, type SelectionCliOptions } from './run-options.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { loadRepo } from '../core/repo/repo-loader.js';
import { uninstallPackages, type UninstallReport } from '../core/run/run-pipeline.js';

async function uninstallCommand(
  projects: string[],
  options: SelectionCliOptions,
  ctx: ExecutionContext
): Promise<CommandResult<UninstallReport>> {
  const output = resolveOutput(ctx);
  const repo = await loadRepo(ctx.targetDir);

  const controller = new AbortController();
  const onSigint = (): void => {
    output.warn('Interrupted: stopping the uninstall command');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  let report: UninstallReport;
  try {
    report = await uninstallPackages(repo, {
      include: projects,
      exclude: options.exclude ?? [],
      workspaces: options.workspace ?? [],
      signal: controller.signal
    });
  } finally {
    process.removeListener('SIGINT', onSigint);
  }

  if (report.packages.length === 0) {
    output.info('No projects to uninstall');
    return { success: true, data: report };
  }
  if (report.success) {
    output.success(`Uninstalled ${report.packages.join(', ')}`);
    return { success: true, data: report };
  }
  if (report.output) {
    output.note(report.output, 'uninstall output');
  }
  return {
    success: false,
    data: report,
    error: report.cancelled ? 'Uninstall interrupted' : `Uninstall failed [${String(report.code)}]`
  };
}

export function setupUninstallCommand(program: Command): void {
  const command = program
    .command('uninstall')
    .description('Uninstall projects with the repo uninstall command, dependents first')
    .argument('[projects...]', 'projects to uninstall, without their dependencies (default: all)');

  addSelectionOptions(command).action(
    withErrorHandling(async (projects: string[], options: SelectionCliOptions, cmd: Command) => {
      const ctx = await contextFromCommand(cmd);
      const result = await uninstallCommand(projects, options, ctx);
      if (!result.success) {
        throw new RunFailedError(result.error ?? 'uninstall failed');
      }
    })
  );
}
