import { describe, expect, it } from 'vitest';

import type { RunOutcome } from '@telco-churn/shared';

import { formatRunSummary } from '../src/pipeline/summary.js';

const failedRun: RunOutcome = {
  runId: '42',
  pipeline: 'telco',
  status: 'failure',
  exitCode: 1,
  stages: [
    { name: 'Train Model', status: 'succeeded', durationMs: 1500, output: [] },
    {
      name: 'Push to Registry',
      status: 'failed',
      failureKind: 'WorkFailed',
      errorCode: 'PublishFailed',
      message: 'Push of telco-churn-prediction:42 failed: denied',
      durationMs: 200,
      output: ['Pushing telco-churn-prediction:42...', 'denied: requested access to the resource is denied'],
    },
    { name: 'Deploy to Staging', status: 'skipped', durationMs: 0, output: [] },
  ],
  hooks: ['failure', 'always'],
  warnings: [{ code: 'NotificationDispatchFailed', hook: 'failure', message: 'smtp unreachable' }],
  cancelled: false,
  durationMs: 1700,
  startedAt: '2026-01-02T03:04:00.000Z',
  finishedAt: '2026-01-02T03:04:01.700Z',
};

describe('formatRunSummary', () => {
  it('lists stages, hooks, warnings and the failing output', () => {
    expect(formatRunSummary(failedRun).split('\n')).toEqual([
      'Pipeline telco run 42: FAILURE in 1.7s',
      'STAGE              STATUS     KIND        DURATION',
      'Train Model        succeeded  -           1.5s',
      'Push to Registry   failed     WorkFailed  0.2s',
      'Deploy to Staging  skipped    -           -',
      'Hooks: failure, always',
      'Warnings:',
      '  - NotificationDispatchFailed (failure hook): smtp unreachable',
      'Stage "Push to Registry" failed: Push of telco-churn-prediction:42 failed: denied',
      'Last 2 line(s) of output:',
      '  Pushing telco-churn-prediction:42...',
      '  denied: requested access to the resource is denied',
    ]);
  });

  it('marks canceled runs and runs without hooks', () => {
    const summary = formatRunSummary({
      ...failedRun,
      stages: [{ name: 'Build', status: 'skipped', durationMs: 0, output: [] }],
      hooks: [],
      warnings: [],
      cancelled: true,
    });

    expect(summary.split('\n')).toEqual([
      'Pipeline telco run 42: FAILURE (canceled) in 1.7s',
      'STAGE  STATUS     KIND        DURATION',
      'Build  skipped    -           -',
      'Hooks: none',
    ]);
  });
});
