import * as yaml from 'js-yaml';
import { ConfigError } from '../../utils/errors.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { isRecord } from '../manifest/manifest-model.js';
import type { LockMapping } from '../synthesis/types.js';

/**
 * Read the lock file as a flat name -> version mapping.
 * A missing file is an empty mapping.
 */
export async function readLockMapping(lockPath: string): Promise<LockMapping> {
  if (!(await exists(lockPath))) {
    logger.debug(`No lock file at ${lockPath}`);
    return {};
  }

  let raw: unknown;
  try {
    raw = yaml.load(await readTextFile(lockPath), { filename: lockPath });
  } catch (error) {
    throw new ConfigError(
      `Failed to parse lock file ${lockPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`Lock file ${lockPath} must be a mapping of package name to version`);
  }

  const entries = Object.entries(raw).map(([name, version]): [string, string] => {
    if (typeof version !== 'string' && typeof version !== 'number') {
      throw new ConfigError(`Locked version of '${name}' in ${lockPath} must be a string`);
    }
    return [name, String(version)];
  });
  return Object.freeze(Object.fromEntries(entries));
}
