import type { PipelineErrorCode, StageFailureKind, StageOutcome } from '@telco-churn/shared';

import { systemClock, type Clock } from '../core/clock.js';
import { CommandFailedError, PipelineError, RunCanceledError, StageTimeoutError, toErrorMessage } from '../core/errors.js';
import { logger as rootLogger, type Logger } from '../core/logger.js';
import { stageDurationHistogram, stageFailureCounter } from '../monitoring/metrics.js';
import type { RunContext } from '../pipeline/run-context.js';
import type { Stage, StageWorkResult } from '../pipeline/types.js';

export interface StageRunnerOptions {
  defaultTimeoutMs?: number;
  /** How long a timed-out or canceled stage gets to run its own releases. */
  abortGraceMs?: number;
  outputTailLines?: number;
  clock?: Clock;
  logger?: Logger;
}

type Settlement =
  | { type: 'done'; value: StageWorkResult | void }
  | { type: 'error'; error: unknown }
  | { type: 'aborted'; reason: unknown };

interface Failure {
  kind: StageFailureKind;
  code: PipelineErrorCode;
  message: string;
  exitCode?: number;
}

const settleWithin = async (promise: Promise<unknown>, ms: number): Promise<void> => {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
    timer.unref();
  });
  await Promise.race([promise, deadline]);
  clearTimeout(timer);
};

export class StageRunner {
  private readonly defaultTimeoutMs: number;

  private readonly abortGraceMs: number;

  private readonly outputTailLines: number;

  private readonly clock: Clock;

  private readonly logger: Logger;

  constructor(options: StageRunnerOptions = {}) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30 * 60 * 1000;
    this.abortGraceMs = options.abortGraceMs ?? 5000;
    this.outputTailLines = options.outputTailLines ?? 200;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? rootLogger).child({ component: 'stage-runner' });
  }

  async execute(stage: Readonly<Stage>, context: RunContext): Promise<StageOutcome> {
    const startedAt = this.clock.now();
    const output: string[] = [];
    const stageLogger = this.logger.child({ stage: stage.name, runId: context.metadata.runId });
    let sealed = false;

    const log = (line: string) => {
      const safe = context.redactor.redact(line);
      if (sealed) {
        // Work that outlived its grace period no longer writes to the recorded outcome.
        stageLogger.debug({ line: safe }, 'Dropped output logged after the stage finished');
        return;
      }
      output.push(safe);
      if (output.length > this.outputTailLines) {
        output.shift();
      }
      stageLogger.debug(safe);
    };

    if (stage.resources?.length) {
      stageLogger.debug({ resources: stage.resources }, 'Stage declares resources');
    }

    const controller = new AbortController();
    const onRunCanceled = () => controller.abort(new RunCanceledError());
    if (context.signal.aborted) {
      onRunCanceled();
    } else {
      context.signal.addEventListener('abort', onRunCanceled, { once: true });
    }

    const aborted = new Promise<Settlement>((resolve) => {
      if (controller.signal.aborted) {
        resolve({ type: 'aborted', reason: controller.signal.reason });
        return;
      }
      controller.signal.addEventListener(
        'abort',
        () => resolve({ type: 'aborted', reason: controller.signal.reason }),
        { once: true },
      );
    });

    const timeoutMs = stage.timeoutMs ?? this.defaultTimeoutMs;
    const timer = setTimeout(() => controller.abort(new StageTimeoutError(stage.name, timeoutMs)), timeoutMs);

    const work = controller.signal.aborted
      ? Promise.resolve<Settlement>({ type: 'aborted', reason: controller.signal.reason })
      : Promise.resolve()
          .then(() => stage.run({ context, signal: controller.signal, log }))
          .then(
            (value): Settlement => ({ type: 'done', value }),
            (error: unknown): Settlement => ({ type: 'error', error }),
          );

    let settlement: Settlement;
    try {
      settlement = await Promise.race([work, aborted]);
      if (settlement.type === 'aborted') {
        await settleWithin(work, this.abortGraceMs);
      }
    } finally {
      clearTimeout(timer);
      context.signal.removeEventListener('abort', onRunCanceled);
    }

    sealed = true;
    const finishedAt = this.clock.now();
    const failure = this.classify(settlement);
    const outcome: StageOutcome = {
      name: stage.name,
      status: failure ? 'failed' : 'succeeded',
      durationMs: Math.max(0, finishedAt - startedAt),
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      output,
      exitCode: failure ? failure.exitCode ?? 1 : 0,
    };

    if (failure) {
      outcome.failureKind = failure.kind;
      outcome.errorCode = failure.code;
      outcome.message = context.redactor.redact(failure.message);
      stageFailureCounter.inc({ stage: stage.name, kind: failure.kind });
      stageLogger.warn({ kind: failure.kind, code: failure.code, durationMs: outcome.durationMs }, outcome.message);
    } else {
      stageLogger.info({ durationMs: outcome.durationMs }, 'Stage succeeded');
    }

    stageDurationHistogram.observe({ stage: stage.name, status: outcome.status }, outcome.durationMs / 1000);
    context.recordOutcome(outcome);
    return outcome;
  }

  private classify(settlement: Settlement): Failure | null {
    if (settlement.type === 'done') {
      const exitCode = settlement.value ? settlement.value.exitCode : 0;
      return exitCode === 0
        ? null
        : { kind: 'WorkFailed', code: 'WorkFailed', message: `Stage work exited with code ${exitCode}`, exitCode };
    }

    if (settlement.type === 'aborted') {
      const reason = settlement.reason;
      if (reason instanceof PipelineError) {
        return { kind: reason.stageFailureKind, code: reason.code, message: reason.message };
      }
      return { kind: 'Aborted', code: 'Aborted', message: toErrorMessage(reason, 'Stage aborted') };
    }

    const { error } = settlement;
    if (error instanceof CommandFailedError) {
      return {
        kind: 'WorkFailed',
        code: 'WorkFailed',
        message: error.message,
        ...(error.exitCode !== null ? { exitCode: error.exitCode } : {}),
      };
    }
    if (error instanceof PipelineError) {
      return { kind: error.stageFailureKind, code: error.code, message: error.message };
    }
    return { kind: 'Aborted', code: 'Aborted', message: toErrorMessage(error, 'Stage crashed') };
  }
}
