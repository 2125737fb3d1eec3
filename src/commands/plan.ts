import { Command } from 'commander';

import type { CommandResult, ExecutionContext } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatPlan } from '../utils/formatters.js';
import { addSelectionOptions, contextFromCommand, type SelectionCliOptions } from './run-options.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { loadRepo } from '../core/repo/repo-loader.js';
import { planSelection } from '../core/run/run-pipeline.js';
import type { ExecutionPlan } from '../core/graph/execution-plan.js';

interface PlanOptions extends SelectionCliOptions {
  json?: boolean;
}

async function planCommand(
  projects: string[],
  options: PlanOptions,
  ctx: ExecutionContext
): Promise<CommandResult<ExecutionPlan>> {
  const output = resolveOutput(ctx);
  const repo = await loadRepo(ctx.targetDir);
  const plan = planSelection(repo, {
    include: projects,
    exclude: options.exclude ?? [],
    workspaces: options.workspace ?? []
  });

  if (options.json) {
    output.message(JSON.stringify(plan.batches, null, 2));
  } else {
    output.message(formatPlan(plan).join('\n'));
  }
  return { success: true, data: plan };
}

export function setupPlanCommand(program: Command): void {
  const command = program
    .command('plan')
    .description('Show the execution batches for a selection without running anything')
    .argument('[projects...]', 'projects to plan, with their internal dependencies (default: all)');

  addSelectionOptions(command)
    .option('--json', 'print the batches as JSON')
    .action(withErrorHandling(async (projects: string[], options: PlanOptions, cmd: Command) => {
      const ctx = await contextFromCommand(cmd, options.json ? { interactive: false } : {});
      await planCommand(projects, options, ctx);
    }));
}
