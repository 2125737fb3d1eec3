/**
 * Command action: materializes the merged manifest inside the package
 * directory and runs the install, build or ad-hoc command there.
 */

import { join } from 'path';
import type { ActionKind } from '../../types/index.js';
import { ENV_VARS, FILE_PATTERNS } from '../../constants/index.js';
import type { MergedManifest } from '../synthesis/types.js';
import { remove, writeJsonFile } from '../../utils/fs.js';
import { runCommand } from '../../utils/run-command.js';
import { logger } from '../../utils/logger.js';
import type { ActionContext, ActionResult, PackageAction } from './types.js';
import { EXIT_CODES } from './orchestrator.js';

export interface CommandActionOptions {
  kind: ActionKind;
  /** Repo-wide default argv; a package's own install/build override wins */
  command?: readonly string[];
  manifestFileName?: string;
  keepManifests?: boolean;
  /** Extra environment for every package */
  env?: Record<string, string>;
}

export class CommandAction implements PackageAction {
  private readonly manifestFileName: string;

  constructor(private readonly options: CommandActionOptions) {
    this.manifestFileName = options.manifestFileName ?? FILE_PATTERNS.MANIFEST_JSON;
  }

  async execute(manifest: MergedManifest, context: ActionContext): Promise<ActionResult> {
    const { pkg, signal } = context;
    const { kind } = this.options;
    const argv = (kind === 'run' ? undefined : pkg.build.commands[kind]) ?? this.options.command;
    if (!argv || argv.length === 0) {
      return { ok: false, code: EXIT_CODES.ERROR, message: `No ${kind} command configured for '${pkg.name}'` };
    }

    const manifestPath = join(pkg.path, this.manifestFileName);
    await writeJsonFile(manifestPath, manifest);

    try {
      const result = await runCommand(argv, {
        cwd: pkg.path,
        env: {
          ...this.options.env,
          ...pkg.build.env,
          [ENV_VARS.MANIFEST]: manifestPath,
          [ENV_VARS.PACKAGE]: pkg.name
        },
        signal
      });

      if (result.aborted) {
        return { ok: false, code: EXIT_CODES.CANCELLED, message: `${kind} of '${pkg.name}' was interrupted`, output: result.output };
      }
      if (result.code === 0) {
        return { ok: true, output: result.output };
      }
      return {
        ok: false,
        code: result.code ?? result.signal ?? EXIT_CODES.ERROR,
        message: `'${argv.join(' ')}' exited with ${result.code !== null ? `code ${result.code}` : `signal ${result.signal}`}`,
        output: result.output
      };
    } finally {
      if (!this.options.keepManifests) {
        await remove(manifestPath);
      } else {
        logger.child(pkg.name).debug(`Kept manifest ${manifestPath}`);
      }
    }
  }
}
