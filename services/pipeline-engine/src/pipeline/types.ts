import type { RunStatus, StageOutcome } from '@telco-churn/shared';

import type { LogCallback } from '../core/run-command.js';
import type { RunContext } from './run-context.js';

export interface StageExecution {
  context: RunContext;
  /** Aborted when the stage times out or the run is canceled. */
  signal: AbortSignal;
  log: LogCallback;
}

export interface StageWorkResult {
  exitCode: number;
}

/** Resolving with nothing counts as exit code 0. */
export type StageWork = (execution: StageExecution) => Promise<StageWorkResult | void>;

export interface Stage {
  name: string;
  run: StageWork;
  timeoutMs?: number;
  /** Declared acquisitions, e.g. `container:telco-churn-test-42`, shown in logs. */
  resources?: string[];
}

export interface PostHookContext {
  context: RunContext;
  status: RunStatus;
  stages: readonly StageOutcome[];
}

export type PostHook = (run: PostHookContext) => Promise<void>;

export interface PostActions {
  success?: PostHook;
  failure?: PostHook;
  always?: PostHook;
}

export interface Pipeline {
  readonly name: string;
  readonly stages: readonly Readonly<Stage>[];
  readonly post: Readonly<PostActions>;
}
