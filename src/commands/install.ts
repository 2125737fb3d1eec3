import { Command } from 'commander';

import { setupActionCommand } from './run-options.js';

export function setupInstallCommand(program: Command): void {
  setupActionCommand(
    program,
    'install',
    'Install projects in dependency order, with internal dependencies referenced as editable local paths.'
  )
    .alias('i')
    .option('--with <groups...>', 'only install these optional dependency groups')
    .option('--without <groups...>', 'skip these optional dependency groups')
    .option('--only <groups...>', 'install exactly these optional dependency groups')
    .option('-d, --default', 'install no optional dependency groups');
}
