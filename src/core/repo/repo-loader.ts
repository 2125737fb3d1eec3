/**
 * Repo loading: configuration, package discovery, graph and lock mapping.
 */

import { basename, dirname, relative, resolve, sep } from 'path';
import { minimatch } from 'minimatch';
import { FILE_PATTERNS, IGNORED_DIRS } from '../../constants/index.js';
import type { RepoConfig } from '../../types/index.js';
import { walkFiles } from '../../utils/file-walker.js';
import { applyConfiguredLogLevel, logger } from '../../utils/logger.js';
import { readManifest } from '../manifest/manifest-reader.js';
import type { Package } from '../manifest/types.js';
import { buildGraph, type DependencyGraph } from '../graph/graph-builder.js';
import type { LockMapping } from '../synthesis/types.js';
import { readLockMapping } from './lock-reader.js';
import { findRepoRoot, loadRepoConfig } from './repo-config.js';

export interface Repo {
  root: string;
  config: RepoConfig;
  packages: Package[];
  graph: DependencyGraph;
  lock: LockMapping;
}

export interface DiscoveredManifest {
  manifestPath: string;
  /** Root-relative package directory, '/'-separated */
  relativeDir: string;
  workspace: string;
}

const IGNORED = new Set<string>(IGNORED_DIRS);

function toPosix(path: string): string {
  return path.split(sep).join('/');
}

/**
 * Find every project.yml below root whose directory matches a workspace
 * glob. Workspaces are tried in name order; the first match wins.
 */
export async function discoverManifests(
  root: string,
  workspaces: Record<string, string[]>
): Promise<DiscoveredManifest[]> {
  const workspaceNames = Object.keys(workspaces).sort();
  const discovered: DiscoveredManifest[] = [];

  const walker = walkFiles(root, (path, isDirectory) => {
    const name = basename(path);
    if (isDirectory) {
      return !IGNORED.has(name) && !name.startsWith('.');
    }
    return name === FILE_PATTERNS.PROJECT_YML;
  });

  for await (const manifestPath of walker) {
    const relativeDir = toPosix(relative(root, dirname(manifestPath)));
    if (relativeDir === '') {
      logger.debug(`Ignoring ${FILE_PATTERNS.PROJECT_YML} at the repo root`);
      continue;
    }

    const workspace = workspaceNames.find((candidate) =>
      workspaces[candidate].some((pattern) => minimatch(relativeDir, pattern))
    );
    if (workspace === undefined) {
      logger.debug(`Skipping ${relativeDir}: not in any workspace`);
      continue;
    }
    discovered.push({ manifestPath, relativeDir, workspace });
  }

  return discovered;
}

/**
 * Load the repo containing startDir.
 */
export async function loadRepo(startDir: string): Promise<Repo> {
  const root = await findRepoRoot(startDir);
  const config = await loadRepoConfig(root);
  applyConfiguredLogLevel(config.logLevel);

  const discovered = await discoverManifests(root, config.workspaces);
  const packages: Package[] = [];
  for (const entry of discovered) {
    packages.push(await readManifest(entry.manifestPath, entry.workspace));
  }

  const graph = buildGraph(packages);
  const lock = await readLockMapping(resolve(root, config.lockfile));

  logger.debug(`Loaded repo ${config.name ?? basename(root)}`, {
    root,
    packages: packages.length,
    workspaces: Object.keys(config.workspaces)
  });

  return { root, config, packages, graph, lock };
}

/** Path of a package relative to the repo root, for display */
export function displayPath(repo: Repo, pkg: Package): string {
  return toPosix(relative(repo.root, pkg.path)) || '.';
}
