import type { HookName, RunOutcome, RunWarning, StageOutcome } from '@telco-churn/shared';
import type { Redis } from 'ioredis';

export type RunEvent =
  | { type: 'run_started'; runId: string; pipeline: string; stages: string[]; timestamp: string }
  | { type: 'stage_started'; runId: string; stage: string; timestamp: string }
  | { type: 'stage_finished'; runId: string; stage: StageOutcome; timestamp: string }
  | { type: 'hook_finished'; runId: string; hook: HookName; ok: boolean; timestamp: string }
  | { type: 'warning'; runId: string; warning: RunWarning; timestamp: string }
  | { type: 'run_finished'; runId: string; outcome: RunOutcome; timestamp: string };

export interface RunEventPublisher {
  publish(event: RunEvent): Promise<void>;
}

export const runEventChannel = (runId: string): string => `telco-churn:runs:${runId}`;

export class RedisRunEventPublisher implements RunEventPublisher {
  constructor(private readonly redis: Redis) {}

  async publish(event: RunEvent): Promise<void> {
    await this.redis.publish(runEventChannel(event.runId), JSON.stringify(event));
  }
}
