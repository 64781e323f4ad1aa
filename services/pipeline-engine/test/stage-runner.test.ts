import { describe, expect, it } from 'vitest';

import { BuildFailedError, CommandFailedError, StageTimeoutError } from '../src/core/errors.js';
import { StageRunner } from '../src/runner/stage-runner.js';
import { FakeClock } from './support/fake-clock.js';
import { createRunContext } from './support/run-context.js';

const createRunner = (options: { outputTailLines?: number; abortGraceMs?: number } = {}) =>
  new StageRunner({ clock: new FakeClock(1_000), abortGraceMs: 500, ...options });

describe('StageRunner', () => {
  it('records a succeeded stage with exit code 0 and its output', async () => {
    const context = createRunContext();
    const outcome = await createRunner().execute(
      {
        name: 'Train Model',
        run: async ({ log }) => {
          log('accuracy: 0.81');
        },
      },
      context,
    );

    expect(outcome).toMatchObject({ name: 'Train Model', status: 'succeeded', exitCode: 0, output: ['accuracy: 0.81'] });
    expect(outcome.failureKind).toBeUndefined();
    expect(context.outcomes).toEqual([outcome]);
  });

  it('maps a non-zero exit code onto a WorkFailed outcome', async () => {
    const outcome = await createRunner().execute(
      { name: 'Train Model', run: async () => ({ exitCode: 3 }) },
      createRunContext(),
    );

    expect(outcome).toMatchObject({
      status: 'failed',
      failureKind: 'WorkFailed',
      errorCode: 'WorkFailed',
      exitCode: 3,
      message: 'Stage work exited with code 3',
    });
  });

  it('keeps the exit code and stderr of a failed command', async () => {
    const outcome = await createRunner().execute(
      {
        name: 'Train Model',
        run: async () => {
          throw new CommandFailedError('python model_training.py', 2, '', 'ModuleNotFoundError: sklearn\n');
        },
      },
      createRunContext(),
    );

    expect(outcome).toMatchObject({
      failureKind: 'WorkFailed',
      exitCode: 2,
      message: 'ModuleNotFoundError: sklearn',
    });
  });

  it('reports the code of a pipeline error under its failure kind', async () => {
    const outcome = await createRunner().execute(
      {
        name: 'Build Docker Image',
        run: async () => {
          throw new BuildFailedError('Image build failed: no Dockerfile');
        },
      },
      createRunContext(),
    );

    expect(outcome).toMatchObject({
      failureKind: 'WorkFailed',
      errorCode: 'BuildFailed',
      exitCode: 1,
      message: 'Image build failed: no Dockerfile',
    });
  });

  it('classifies an unexpected exception as Aborted', async () => {
    const outcome = await createRunner().execute(
      {
        name: 'Deploy to Staging',
        run: async () => {
          throw new TypeError('cannot read properties of undefined');
        },
      },
      createRunContext(),
    );

    expect(outcome).toMatchObject({
      failureKind: 'Aborted',
      errorCode: 'Aborted',
      message: 'cannot read properties of undefined',
    });
  });

  it('aborts a stage past its timeout and lets its cleanup finish', async () => {
    let cleanedUp = false;
    const outcome = await createRunner().execute(
      {
        name: 'Slow',
        timeoutMs: 20,
        run: async ({ signal }) => {
          try {
            await new Promise((_resolve, reject) => {
              signal.addEventListener('abort', () => reject(signal.reason), { once: true });
            });
          } finally {
            cleanedUp = true;
          }
        },
      },
      createRunContext(),
    );

    expect(outcome).toMatchObject({
      status: 'failed',
      failureKind: 'Timeout',
      errorCode: 'Timeout',
      message: 'Stage "Slow" exceeded its 20ms timeout.',
    });
    expect(cleanedUp).toBe(true);
  });

  it('does not start work when the run is already canceled', async () => {
    const cancel = new AbortController();
    cancel.abort();
    let started = false;

    const outcome = await createRunner().execute(
      {
        name: 'Train Model',
        run: async () => {
          started = true;
        },
      },
      createRunContext({ signal: cancel.signal }),
    );

    expect(started).toBe(false);
    expect(outcome).toMatchObject({ failureKind: 'Aborted', message: 'Pipeline run canceled.' });
  });

  it('redacts registered secrets and inline passwords from output and messages', async () => {
    const context = createRunContext();
    context.redactor.register('test-secret');

    const outcome = await createRunner().execute(
      {
        name: 'Push to Registry',
        run: async ({ log }) => {
          log('docker login -p test-secret');
          throw new Error('connect failed: password=hunter2');
        },
      },
      context,
    );

    expect(outcome.output).toEqual(['docker login -p [REDACTED]']);
    expect(outcome.message).toBe('connect failed: password=[REDACTED]');
  });

  it('keeps only the configured tail of the output', async () => {
    const outcome = await createRunner({ outputTailLines: 2 }).execute(
      {
        name: 'Train Model',
        run: async ({ log }) => {
          log('epoch 1');
          log('epoch 2');
          log('epoch 3');
        },
      },
      createRunContext(),
    );

    expect(outcome.output).toEqual(['epoch 2', 'epoch 3']);
  });

  it('states timeouts of a second or more in seconds', () => {
    expect(new StageTimeoutError('Train Model', 1_800_000).message).toBe('Stage "Train Model" exceeded its 1800s timeout.');
  });

  it('stops recording output once the outcome is built', async () => {
    const context = createRunContext();
    let logLate: (line: string) => void = () => undefined;

    const outcome = await createRunner({ abortGraceMs: 20 }).execute(
      {
        name: 'Stuck',
        timeoutMs: 10,
        run: async ({ log }) => {
          logLate = log;
          await new Promise<void>(() => undefined);
        },
      },
      context,
    );
    logLate('late line after outcome');

    expect(outcome).toMatchObject({ failureKind: 'Timeout', output: [] });
    expect(context.outcomes[0]?.output).toEqual([]);
  });
});
