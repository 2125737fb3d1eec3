import { Command } from 'commander';

import { setupActionCommand } from './run-options.js';

export function setupBuildCommand(program: Command): void {
  setupActionCommand(
    program,
    'build',
    'Build projects in dependency order from their merged manifests.'
  ).option('--lock', 'pin dependencies to the versions in the lock file');
}
