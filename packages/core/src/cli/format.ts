import type { DryRunReport, RunSummary } from '../hopper.js';
import type { TaskResult } from '../types.js';

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function idsWith(results: TaskResult[], status: TaskResult['status']): string[] {
  return results.filter((result) => result.status === status).map((result) => result.taskId);
}

/**
 * End-of-run summary printed by `hopper run`
 */
export function formatSummary(summary: RunSummary): string {
  const { counts, total } = summary;
  const lines = [
    `  Tasks:  ${counts.succeeded + counts.cached} successful, ${total} total`,
    ` Cached:  ${counts.cached} cached, ${total} total`,
    `   Time:  ${formatDuration(summary.duration)}`,
  ];

  const failed = idsWith(summary.results, 'failed');
  if (failed.length > 0) lines.push(` Failed:  ${failed.join(', ')}`);

  const skipped = idsWith(summary.results, 'skipped');
  if (skipped.length > 0) lines.push(`Skipped:  ${skipped.join(', ')}`);

  if (summary.cancelled) lines.push('Run cancelled');

  return `${lines.join('\n')}\n`;
}

/**
 * Human-readable dry run
 */
export function formatDryRun(report: DryRunReport): string {
  const lines = [`Packages in scope: ${report.packages.join(', ') || '(none)'}`, '', 'Tasks to run:'];

  for (const task of report.tasks) {
    lines.push(
      task.taskId,
      `  Task         = ${task.task}`,
      `  Package      = ${task.package}`,
      `  Hash         = ${task.hash}`,
      `  Command      = ${task.command ?? '<NONEXISTENT>'}`,
      `  Directory    = ${task.directory || '.'}`,
      `  Outputs      = ${task.outputs.join(', ')}`,
      `  Cache        = ${task.cache}`,
      `  Dependencies = ${task.dependencies.join(', ')}`,
      `  Dependents   = ${task.dependents.join(', ')}`
    );
  }

  return `${lines.join('\n')}\n`;
}
