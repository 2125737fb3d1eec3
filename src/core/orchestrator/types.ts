import type { FailurePolicy } from '../../types/index.js';
import type { Package } from '../manifest/types.js';
import type { MergedManifest } from '../synthesis/types.js';
import type { ExecutionPlan } from '../graph/execution-plan.js';

export type PackageState = 'pending' | 'ready' | 'running' | 'success' | 'failed' | 'skipped';

export type TerminalStatus = 'success' | 'failed' | 'skipped';

export interface ActionContext {
  pkg: Package;
  /** Aborted on cancellation, timeout or an invariant violation */
  signal: AbortSignal;
}

export type ActionResult =
  | { ok: true; output?: string }
  | { ok: false; message: string; code?: number | string; output?: string };

/**
 * Work performed once per package (install, build, or a test double).
 */
export interface PackageAction {
  execute(manifest: MergedManifest, context: ActionContext): Promise<ActionResult>;
}

export interface ExitInfo {
  /** Process exit code, or TIMEOUT / CANCELLED / ERROR */
  code?: number | string;
  message?: string;
  output?: string;
  /** Failed packages that caused a skip */
  blockedBy?: string[];
}

export interface TaskResult {
  packageName: string;
  status: TerminalStatus;
  exitInfo?: ExitInfo;
  durationMs: number;
}

export interface RunReport {
  /** No package failed or was skipped */
  success: boolean;
  cancelled: boolean;
  /** One result per selected package, in plan order */
  results: TaskResult[];
  plan: ExecutionPlan;
  durationMs: number;
  peakConcurrency: number;
}

export interface RunReporter {
  onTaskStart?(packageName: string): void;
  onTaskFinish?(result: TaskResult): void;
}

export interface RunOptions {
  concurrency?: number;
  failurePolicy?: FailurePolicy;
  timeoutMs?: number;
  signal?: AbortSignal;
  reporter?: RunReporter;
}
