import type { HookName, RunOutcome, RunStatus, StageOutcome } from '@telco-churn/shared';

import { systemClock, type Clock } from '../core/clock.js';
import { NotificationDispatchFailedError, toErrorMessage } from '../core/errors.js';
import { logger as rootLogger, type Logger } from '../core/logger.js';
import type { RunEvent, RunEventPublisher } from '../events/run-events.js';
import { pipelineRunCounter, pipelineRunDurationHistogram } from '../monitoring/metrics.js';
import { StageRunner } from '../runner/stage-runner.js';
import type { RunContext } from './run-context.js';
import type { Pipeline, PostActions, PostHook, PostHookContext, Stage } from './types.js';

export interface PipelineDefinition {
  name: string;
  stages: Stage[];
  post?: PostActions;
}

/** Validates a definition and freezes it; stage order cannot change afterwards. */
export const definePipeline = (definition: PipelineDefinition): Pipeline => {
  if (definition.stages.length === 0) {
    throw new Error(`Pipeline "${definition.name}" has no stages.`);
  }

  const seen = new Set<string>();
  for (const stage of definition.stages) {
    if (!stage.name.trim()) {
      throw new Error(`Pipeline "${definition.name}" has a stage without a name.`);
    }
    if (seen.has(stage.name)) {
      throw new Error(`Pipeline "${definition.name}" declares stage "${stage.name}" twice.`);
    }
    seen.add(stage.name);
  }

  return Object.freeze({
    name: definition.name,
    stages: Object.freeze(definition.stages.map((stage) => Object.freeze({ ...stage }))),
    post: Object.freeze({ ...definition.post }),
  });
};

export interface OrchestratorOptions {
  runner?: StageRunner;
  events?: RunEventPublisher | null;
  clock?: Clock;
  logger?: Logger;
}

const skippedOutcome = (stage: Readonly<Stage>): StageOutcome => ({
  name: stage.name,
  status: 'skipped',
  durationMs: 0,
  output: [],
});

export class PipelineOrchestrator {
  private readonly runner: StageRunner;

  private readonly events: RunEventPublisher | null;

  private readonly clock: Clock;

  private readonly logger: Logger;

  constructor(options: OrchestratorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? rootLogger).child({ component: 'orchestrator' });
    this.runner = options.runner ?? new StageRunner({ clock: this.clock, logger: this.logger });
    this.events = options.events ?? null;
  }

  /**
   * Runs stages in declaration order and stops at the first failure; the
   * remaining stages are recorded as skipped. Then exactly one of the
   * success/failure hooks runs, followed by the always hook. Hook errors
   * become warnings and never change the run's status.
   */
  async run(pipeline: Pipeline, context: RunContext): Promise<RunOutcome> {
    const startedAt = this.clock.now();
    const { runId } = context.metadata;
    const runLogger = this.logger.child({ pipeline: pipeline.name, runId });
    let publishFailed = false;

    const publish = async (event: RunEvent) => {
      if (!this.events) {
        return;
      }
      try {
        await this.events.publish(event);
      } catch (error) {
        runLogger.warn({ error, type: event.type }, 'Failed to publish run event');
        if (!publishFailed) {
          publishFailed = true;
          context.recordWarning({
            code: 'EventPublishFailed',
            message: `Run events could not be published: ${toErrorMessage(error)}`,
          });
        }
      }
    };

    const timestamp = () => new Date(this.clock.now()).toISOString();

    runLogger.info({ stages: pipeline.stages.map((stage) => stage.name) }, 'Pipeline run started');
    await publish({
      type: 'run_started',
      runId,
      pipeline: pipeline.name,
      stages: pipeline.stages.map((stage) => stage.name),
      timestamp: timestamp(),
    });

    const stages: StageOutcome[] = [];
    let halted = false;
    let cancelled = false;

    for (const stage of pipeline.stages) {
      if (!halted && context.signal.aborted) {
        halted = true;
        cancelled = true;
        runLogger.warn({ stage: stage.name }, 'Run canceled before stage started');
      }

      if (halted) {
        const skipped = skippedOutcome(stage);
        context.recordOutcome(skipped);
        stages.push(skipped);
        continue;
      }

      await publish({ type: 'stage_started', runId, stage: stage.name, timestamp: timestamp() });
      const outcome = await this.runner.execute(stage, context);
      stages.push(outcome);
      await publish({ type: 'stage_finished', runId, stage: outcome, timestamp: timestamp() });

      if (outcome.status === 'failed') {
        halted = true;
        cancelled = context.signal.aborted;
      }
    }

    const status: RunStatus = !cancelled && stages.every((stage) => stage.status === 'succeeded') ? 'success' : 'failure';

    const hooks: HookName[] = [];
    const selected: HookName = status === 'success' ? 'success' : 'failure';
    for (const name of [selected, 'always'] as const) {
      const hook = pipeline.post[name];
      if (!hook) {
        continue;
      }
      const ok = await this.runHook(name, hook, { context, status, stages }, runLogger);
      hooks.push(name);
      await publish({ type: 'hook_finished', runId, hook: name, ok, timestamp: timestamp() });
      const warning = ok ? undefined : context.warnings[context.warnings.length - 1];
      if (warning) {
        await publish({ type: 'warning', runId, warning, timestamp: timestamp() });
      }
    }

    const finishedAt = this.clock.now();
    const outcome: RunOutcome = {
      runId,
      pipeline: pipeline.name,
      status,
      exitCode: status === 'success' ? 0 : 1,
      stages,
      hooks,
      warnings: [...context.warnings],
      cancelled,
      durationMs: Math.max(0, finishedAt - startedAt),
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
    };

    pipelineRunCounter.inc({ pipeline: pipeline.name, status });
    pipelineRunDurationHistogram.observe({ pipeline: pipeline.name }, outcome.durationMs / 1000);
    runLogger.info({ status, durationMs: outcome.durationMs, hooks }, 'Pipeline run finished');
    await publish({ type: 'run_finished', runId, outcome, timestamp: timestamp() });

    return outcome;
  }

  private async runHook(
    name: HookName,
    hook: PostHook,
    run: PostHookContext,
    runLogger: Logger,
  ): Promise<boolean> {
    try {
      await hook(run);
      return true;
    } catch (error) {
      const dispatchFailed = error instanceof NotificationDispatchFailedError;
      const message = toErrorMessage(error, `${name} hook failed`);
      run.context.recordWarning({
        code: dispatchFailed ? 'NotificationDispatchFailed' : 'HookFailed',
        hook: name,
        message,
      });
      runLogger.warn({ hook: name, error: run.context.redactor.redact(message) }, 'Post-run hook failed');
      return false;
    }
  }
}
