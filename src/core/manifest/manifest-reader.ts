import * as yaml from 'js-yaml';
import { dirname } from 'path';
import { readTextFile } from '../../utils/fs.js';
import { ManifestError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { loadManifest } from './manifest-model.js';
import type { Package } from './types.js';

/**
 * Read and validate a project.yml file.
 * The package path is the directory holding the manifest.
 */
export async function readManifest(manifestPath: string, workspace?: string): Promise<Package> {
  const content = await readTextFile(manifestPath);

  let raw: unknown;
  try {
    raw = yaml.load(content, { filename: manifestPath });
  } catch (error) {
    // Syntax errors, including duplicated mapping keys
    const reason = error instanceof Error ? error.message : String(error);
    throw new ManifestError(reason, manifestPath);
  }

  const pkg = loadManifest(raw, {
    path: dirname(manifestPath),
    workspace,
    location: manifestPath
  });
  logger.debug(`Loaded manifest ${pkg.name}@${pkg.version}`, { path: pkg.path, workspace });
  return pkg;
}
