import type { ExecutionPlan } from '../core/graph/execution-plan.js';
import type { RunReport, TaskResult } from '../core/orchestrator/types.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Generic table formatter for custom column layouts.
 * Returns the lines to print; an empty item list yields a single notice line.
 */
export function formatCustomTable<T>(
  items: T[],
  columns: Array<{
    header: string;
    width: number;
    accessor: (item: T) => string;
  }>
): string[] {
  if (items.length === 0) {
    return ['No items found.'];
  }

  const headerLine = columns.map(col => col.header.padEnd(col.width)).join('').trimEnd();
  const separatorLine = columns.map(col => '-'.repeat(col.header.length).padEnd(col.width)).join('').trimEnd();

  const lines = [headerLine, separatorLine];
  for (const item of items) {
    lines.push(columns.map(col => col.accessor(item).padEnd(col.width)).join('').trimEnd());
  }
  return lines;
}

/**
 * Format project summary line
 */
export function formatProjectSummary(name: string, version: string): string {
  return `${name}@${version}`;
}

/**
 * Format tree connector symbols
 */
export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

/**
 * Format a duration in milliseconds: 850ms, 1.5s, 2m 05s
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const rest = Math.floor(seconds % 60);
  return `${minutes}m ${String(rest).padStart(2, '0')}s`;
}

/**
 * One line per batch: "batch 1: a, b"
 */
export function formatPlan(plan: ExecutionPlan): string[] {
  if (plan.batches.length === 0) {
    return ['Nothing to do.'];
  }
  return plan.batches.map((batch, index) => `batch ${index + 1}: ${batch.join(', ')}`);
}

export function formatTaskResult(result: TaskResult): string {
  const info = result.exitInfo;
  switch (result.status) {
    case 'success':
      return `${result.packageName} (${formatDuration(result.durationMs)})`;
    case 'failed':
      return `${result.packageName} failed${info?.code !== undefined ? ` [${info.code}]` : ''}: ${info?.message ?? 'unknown error'}`;
    case 'skipped':
      if (info?.blockedBy && info.blockedBy.length > 0) {
        return `${result.packageName} skipped (blocked by ${info.blockedBy.join(', ')})`;
      }
      return `${result.packageName} skipped${info?.message ? ` (${info.message})` : ''}`;
  }
}

/**
 * "3 succeeded, 1 failed, 2 skipped in 1.5s"
 */
export function formatReportSummary(report: RunReport): string {
  const count = (status: TaskResult['status']): number =>
    report.results.filter((result) => result.status === status).length;
  const parts = [`${count('success')} succeeded`];
  if (count('failed') > 0) {
    parts.push(`${count('failed')} failed`);
  }
  if (count('skipped') > 0) {
    parts.push(`${count('skipped')} skipped`);
  }
  return `${parts.join(', ')} in ${formatDuration(report.durationMs)}${report.cancelled ? ' (cancelled)' : ''}`;
}
