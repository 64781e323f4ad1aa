import { z } from 'zod';

import { systemClock, type Clock } from '../core/clock.js';
import { toErrorMessage } from '../core/errors.js';
import { logger as rootLogger, type Logger } from '../core/logger.js';
import type { LogCallback } from '../core/run-command.js';
import { withResource } from '../core/scope.js';
import type { ContainerLauncher, InstanceSpec } from '../deployments/container-launcher.js';

export interface RunningTarget {
  kind: 'running';
  host: string;
  port: number;
  /** When set, a container that stops running ends the wait early. */
  containerName?: string;
}

export interface EphemeralTarget extends InstanceSpec {
  kind: 'ephemeral';
  host: string;
}

export type HealthTarget = RunningTarget | EphemeralTarget;

export type LivenessResult =
  | { status: 'healthy'; attempts: number; elapsedMs: number; httpStatus: number }
  | {
      status: 'unhealthy';
      reason: 'timeout' | 'exited' | 'aborted';
      attempts: number;
      elapsedMs: number;
      lastError: string | null;
    };

export interface HealthGateOptions {
  launcher: ContainerLauncher;
  fetch?: typeof fetch;
  clock?: Clock;
  requestTimeoutMs?: number;
  /** Require a `{ "status": "healthy" }` JSON body, not just a 2xx. */
  expectHealthyBody?: boolean;
  /** Additionally require `model_loaded: true` in that body. */
  requireModelLoaded?: boolean;
  logger?: Logger;
}

export interface PollOptions {
  signal?: AbortSignal;
  onLog?: LogCallback;
}

const healthBodySchema = z.object({
  status: z.string(),
  model_loaded: z.boolean().optional(),
});

type ProbeResult = { ok: true; httpStatus: number } | { ok: false; error: string };

export class HealthGate {
  private readonly launcher: ContainerLauncher;

  private readonly fetchImpl: typeof fetch;

  private readonly clock: Clock;

  private readonly requestTimeoutMs: number;

  private readonly expectHealthyBody: boolean;

  private readonly requireModelLoaded: boolean;

  private readonly logger: Logger;

  constructor(options: HealthGateOptions) {
    this.launcher = options.launcher;
    this.fetchImpl = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.clock = options.clock ?? systemClock;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 2000;
    this.expectHealthyBody = options.expectHealthyBody ?? false;
    this.requireModelLoaded = options.requireModelLoaded ?? false;
    this.logger = (options.logger ?? rootLogger).child({ component: 'health-gate' });
  }

  /**
   * Checks a target's liveness endpoint. An ephemeral target is started under
   * its own disposable name and removed again on every exit path.
   */
  async checkLiveness(
    target: HealthTarget,
    path: string,
    timeoutBudgetMs: number,
    pollIntervalMs: number,
    options: PollOptions = {},
  ): Promise<LivenessResult> {
    if (target.kind === 'running') {
      return this.awaitHealthy(target, path, timeoutBudgetMs, pollIntervalMs, options);
    }

    const { kind: _kind, host, ...spec } = target;
    return withResource(
      async () => {
        options.onLog?.(`Starting test container ${spec.name} on port ${spec.hostPort}`);
        return this.launcher.replace(spec);
      },
      async (instance) => {
        await this.launcher.remove(instance.name);
        options.onLog?.(`Removed test container ${instance.name}`);
      },
      async (instance) => {
        const result = await this.awaitHealthy(
          { kind: 'running', host, port: instance.hostPort, containerName: instance.name },
          path,
          timeoutBudgetMs,
          pollIntervalMs,
          options,
        );
        if (result.status === 'unhealthy') {
          await this.reportContainerLogs(instance.name, options.onLog);
        }
        return result;
      },
      (error) => {
        this.logger.error({ error, name: spec.name }, 'Failed to remove test container');
      },
    );
  }

  /** Polls a running instance until it reports healthy or the budget runs out. */
  async awaitHealthy(
    target: RunningTarget,
    path: string,
    timeoutBudgetMs: number,
    pollIntervalMs: number,
    options: PollOptions = {},
  ): Promise<LivenessResult> {
    const url = `http://${target.host}:${target.port}${path}`;
    const startedAt = this.clock.now();
    let attempts = 0;
    let lastError: string | null = null;

    const unhealthy = (reason: 'timeout' | 'exited' | 'aborted'): LivenessResult => {
      const result: LivenessResult = {
        status: 'unhealthy',
        reason,
        attempts,
        elapsedMs: this.clock.now() - startedAt,
        lastError,
      };
      options.onLog?.(`Health check failed (${reason}) after ${attempts} attempt(s): ${lastError ?? 'no response'}`);
      return result;
    };

    while (true) {
      if (options.signal?.aborted) {
        return unhealthy('aborted');
      }

      attempts += 1;

      if (target.containerName) {
        const state = await this.launcher.state(target.containerName);
        if (state !== 'running') {
          lastError = `container ${target.containerName} is ${state}`;
          return unhealthy('exited');
        }
      }

      const probe = await this.probe(url, options.signal);
      if (probe.ok) {
        const elapsedMs = this.clock.now() - startedAt;
        options.onLog?.(`Health check passed (HTTP ${probe.httpStatus} on attempt ${attempts})`);
        return { status: 'healthy', attempts, elapsedMs, httpStatus: probe.httpStatus };
      }
      lastError = probe.error;

      const elapsedMs = this.clock.now() - startedAt;
      if (elapsedMs >= timeoutBudgetMs) {
        return unhealthy('timeout');
      }

      if (attempts === 1 || attempts % 5 === 0) {
        options.onLog?.(`Health check: waiting for ${url}... (attempt ${attempts})`);
      }

      try {
        await this.clock.sleep(Math.min(pollIntervalMs, timeoutBudgetMs - elapsedMs), options.signal);
      } catch (error) {
        if (options.signal?.aborted) {
          return unhealthy('aborted');
        }
        throw error;
      }
    }
  }

  private async probe(url: string, signal?: AbortSignal): Promise<ProbeResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const res = await this.fetchImpl(url, { signal: controller.signal, redirect: 'manual' });
      if (!res.ok) {
        return { ok: false, error: `HTTP ${res.status}` };
      }
      if (!this.expectHealthyBody) {
        await res.body?.cancel();
        return { ok: true, httpStatus: res.status };
      }

      const body = healthBodySchema.safeParse(await res.json());
      if (!body.success || body.data.status !== 'healthy') {
        return { ok: false, error: `HTTP ${res.status} without a healthy status body` };
      }
      if (this.requireModelLoaded && body.data.model_loaded !== true) {
        return { ok: false, error: 'service is up but the model is not loaded' };
      }
      return { ok: true, httpStatus: res.status };
    } catch (error) {
      return { ok: false, error: toErrorMessage(error, 'request failed') };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private async reportContainerLogs(name: string, onLog?: LogCallback): Promise<void> {
    if (!onLog) {
      return;
    }
    const logs = await this.launcher.logs(name, 40).catch(() => '(unable to retrieve container logs)');
    onLog('── Container logs (last 40 lines) ──');
    for (const line of logs.split('\n').filter(Boolean)) {
      onLog(line);
    }
  }
}
