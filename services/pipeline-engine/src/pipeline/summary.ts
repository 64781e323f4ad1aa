import type { RunOutcome } from '@telco-churn/shared';

const formatDuration = (ms: number): string => `${(ms / 1000).toFixed(1)}s`;

const FAILURE_OUTPUT_LINES = 20;

/** Plain-text report of a run: one row per stage, then hooks, warnings and the failing stage's output. */
export const formatRunSummary = (outcome: RunOutcome): string => {
  const nameWidth = Math.max('STAGE'.length, ...outcome.stages.map((stage) => stage.name.length));
  const row = (name: string, status: string, kind: string, duration: string) =>
    `${name.padEnd(nameWidth)}  ${status.padEnd(9)}  ${kind.padEnd(10)}  ${duration}`;

  const lines = [
    `Pipeline ${outcome.pipeline} run ${outcome.runId}: ${outcome.status.toUpperCase()}${outcome.cancelled ? ' (canceled)' : ''} in ${formatDuration(outcome.durationMs)}`,
    row('STAGE', 'STATUS', 'KIND', 'DURATION'),
    ...outcome.stages.map((stage) =>
      row(stage.name, stage.status, stage.failureKind ?? '-', stage.status === 'skipped' ? '-' : formatDuration(stage.durationMs)),
    ),
    `Hooks: ${outcome.hooks.length > 0 ? outcome.hooks.join(', ') : 'none'}`,
  ];

  if (outcome.warnings.length > 0) {
    lines.push('Warnings:');
    for (const warning of outcome.warnings) {
      lines.push(`  - ${warning.code}${warning.hook ? ` (${warning.hook} hook)` : ''}: ${warning.message}`);
    }
  }

  const failed = outcome.stages.find((stage) => stage.status === 'failed');
  if (failed) {
    const tail = failed.output.slice(-FAILURE_OUTPUT_LINES);
    lines.push(`Stage "${failed.name}" failed: ${failed.message ?? 'no message'}`);
    if (tail.length > 0) {
      lines.push(`Last ${tail.length} line(s) of output:`);
      lines.push(...tail.map((line) => `  ${line}`));
    }
  }

  return lines.join('\n');
};
