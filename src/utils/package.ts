import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { isRecord } from '../core/manifest/manifest-model.js';

/**
 * Version of the monoforge package itself, read from its package.json.
 * Resolves the same from src/utils and from dist/utils.
 */
export function getVersion(): string {
  const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    if (isRecord(parsed) && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch {
    // Fall through to the placeholder
  }
  return '0.0.0';
}
