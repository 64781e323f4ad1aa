import type { DeploymentTarget, ImageReference } from '@telco-churn/shared';

import { systemClock, type Clock } from '../core/clock.js';
import { DeployFailedError } from '../core/errors.js';
import { logger as rootLogger, type Logger } from '../core/logger.js';
import type { LogCallback } from '../core/run-command.js';
import type { HealthGate } from '../health/health-gate.js';
import { primaryReference } from '../images/image-reference.js';
import type { ContainerLauncher } from './container-launcher.js';

export interface DeploymentManagerOptions {
  launcher: ContainerLauncher;
  healthGate: HealthGate;
  containerPort: number;
  host?: string;
  healthPath?: string;
  settleMs?: number;
  healthBudgetMs?: number;
  healthIntervalMs?: number;
  env?: Record<string, string>;
  clock?: Clock;
  logger?: Logger;
}

export interface DeployOptions {
  signal?: AbortSignal;
  onLog?: LogCallback;
}

/**
 * Replaces the instance running under a name with one backed by a new image.
 * A failed health check leaves the new instance running for inspection; the
 * previous instance is not restored.
 */
export class DeploymentManager {
  private readonly launcher: ContainerLauncher;

  private readonly healthGate: HealthGate;

  private readonly containerPort: number;

  private readonly host: string;

  private readonly healthPath: string;

  private readonly settleMs: number;

  private readonly healthBudgetMs: number;

  private readonly healthIntervalMs: number;

  private readonly env: Record<string, string>;

  private readonly clock: Clock;

  private readonly logger: Logger;

  constructor(options: DeploymentManagerOptions) {
    this.launcher = options.launcher;
    this.healthGate = options.healthGate;
    this.containerPort = options.containerPort;
    this.host = options.host ?? 'localhost';
    this.healthPath = options.healthPath ?? '/health';
    this.settleMs = options.settleMs ?? 10_000;
    this.healthBudgetMs = options.healthBudgetMs ?? 30_000;
    this.healthIntervalMs = options.healthIntervalMs ?? 2000;
    this.env = options.env ?? {};
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? rootLogger).child({ component: 'deployment-manager' });
  }

  async deploy(name: string, image: ImageReference, port: number, options: DeployOptions = {}): Promise<DeploymentTarget> {
    const imageTag = primaryReference(image);
    const { onLog } = options;

    onLog?.(`Deploying ${imageTag} as ${name} on port ${port}...`);
    const instance = await this.launcher.replace({
      name,
      image: imageTag,
      hostPort: port,
      containerPort: this.containerPort,
      env: this.env,
      restartPolicy: 'unless-stopped',
    });

    if (this.settleMs > 0) {
      onLog?.(`Waiting ${this.settleMs}ms for ${name} to settle`);
      await this.clock.sleep(this.settleMs, options.signal);
    }

    const result = await this.healthGate.awaitHealthy(
      { kind: 'running', host: this.host, port, containerName: name },
      this.healthPath,
      this.healthBudgetMs,
      this.healthIntervalMs,
      options,
    );

    if (result.status === 'unhealthy') {
      this.logger.warn({ name, reason: result.reason, attempts: result.attempts }, 'Deployment health check failed');
      throw new DeployFailedError(
        `Deployment ${name} did not become healthy (${result.reason}): ${result.lastError ?? 'no response'}. ` +
          'The new instance is left running for inspection.',
        name,
      );
    }

    const target: DeploymentTarget = {
      name,
      hostPort: port,
      containerPort: this.containerPort,
      imageTag,
      containerId: instance.containerId,
      url: `http://${this.host}:${port}`,
    };
    this.logger.info({ name, imageTag, url: target.url }, 'Deployment healthy');
    return target;
  }
}
