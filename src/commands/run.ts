import { Command } from 'commander';

import { addRunOptions, addSelectionOptions, runOrThrow, type RunCliOptions } from './run-options.js';
import { withErrorHandling } from '../utils/errors.js';

interface RunCommandCliOptions extends RunCliOptions {
  projects?: string[];
}

export function setupRunCommand(program: Command): void {
  const command = program
    .command('run')
    .description('Run a command in every selected project, in dependency order. Put the command after --.')
    .argument('<command...>', 'command and arguments, run without a shell')
    .option('-p, --projects <projects...>', 'projects to run in, with their internal dependencies (default: all)');

  addRunOptions(addSelectionOptions(command)).action(
    withErrorHandling(async (argv: string[], options: RunCommandCliOptions, cmd: Command) => {
      await runOrThrow({ kind: 'run', projects: options.projects ?? [], command: argv }, options, cmd);
    })
  );
}
