import { Command, Option } from 'commander';

import type { ActionKind, CommandResult, ExecutionContext } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { contextFromCommand } from './run-options.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { loadRepo } from '../core/repo/repo-loader.js';
import { getPackage } from '../core/graph/graph-builder.js';
import { ManifestSynthesizer } from '../core/synthesis/manifest-synthesizer.js';
import type { MergedManifest } from '../core/synthesis/types.js';

interface ManifestOptions {
  mode: ActionKind;
  lock?: boolean;
}

async function manifestCommand(
  project: string,
  options: ManifestOptions,
  ctx: ExecutionContext
): Promise<CommandResult<MergedManifest>> {
  const output = resolveOutput(ctx);
  const repo = await loadRepo(ctx.targetDir);
  const pkg = getPackage(repo.graph, project);

  const synthesizer = new ManifestSynthesizer(repo.graph, {
    mode: options.mode,
    lock: repo.lock,
    lockVersions: options.lock ?? false
  });
  const manifest = synthesizer.synthesize(pkg, repo.config.dependencies);

  output.message(JSON.stringify(manifest, null, 2));
  return { success: true, data: manifest };
}

export function setupManifestCommand(program: Command): void {
  program
    .command('manifest')
    .description('Print the merged manifest of a project')
    .argument('<project>', 'project name')
    .addOption(new Option('--mode <mode>', 'manifest flavour').choices(['install', 'build']).default('install'))
    .option('--lock', 'pin dependencies to the versions in the lock file')
    .action(withErrorHandling(async (project: string, options: ManifestOptions, cmd: Command) => {
      const ctx = await contextFromCommand(cmd, { interactive: false });
      await manifestCommand(project, options, ctx);
    }));
}
