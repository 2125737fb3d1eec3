import { Command } from 'commander';

import type { CommandResult, ExecutionContext } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatCustomTable } from '../utils/formatters.js';
import { contextFromCommand } from './run-options.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { displayPath, loadRepo, type Repo } from '../core/repo/repo-loader.js';
import { getPackage } from '../core/graph/graph-builder.js';

interface ListOptions {
  json?: boolean;
}

export interface ListEntry {
  name: string;
  version: string;
  workspace: string | null;
  path: string;
  dependencies: string[];
}

/**
 * Packages in topological order.
 */
export function collectListEntries(repo: Repo): ListEntry[] {
  return repo.graph.order.map((name) => {
    const pkg = getPackage(repo.graph, name);
    return {
      name: pkg.name,
      version: pkg.version,
      workspace: pkg.workspace ?? null,
      path: displayPath(repo, pkg),
      dependencies: [...pkg.internalDeps].sort()
    };
  });
}

async function listCommand(options: ListOptions, ctx: ExecutionContext): Promise<CommandResult<ListEntry[]>> {
  const output = resolveOutput(ctx);
  const repo = await loadRepo(ctx.targetDir);
  const entries = collectListEntries(repo);

  if (options.json) {
    output.message(JSON.stringify(entries, null, 2));
    return { success: true, data: entries };
  }

  const lines = formatCustomTable(entries, [
    { header: 'PROJECT', width: 24, accessor: (entry) => entry.name },
    { header: 'VERSION', width: 12, accessor: (entry) => entry.version },
    { header: 'WORKSPACE', width: 14, accessor: (entry) => entry.workspace ?? '-' },
    { header: 'DEPENDS ON', width: 0, accessor: (entry) => entry.dependencies.join(', ') || '-' }
  ]);
  output.message(lines.join('\n'));
  output.info(`Total: ${entries.length} project${entries.length === 1 ? '' : 's'}`);
  return { success: true, data: entries };
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List the projects of the repo in dependency order')
    .option('--json', 'print machine-readable JSON')
    .action(withErrorHandling(async (options: ListOptions, cmd: Command) => {
      const ctx = await contextFromCommand(cmd, options.json ? { interactive: false } : {});
      await listCommand(options, ctx);
    }));
}
