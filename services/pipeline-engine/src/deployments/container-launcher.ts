import type { ContainerEngine, ContainerState } from '../adapters/docker-adapter.js';
import { logger as rootLogger, type Logger } from '../core/logger.js';
import { withRetry, type RetryOptions } from '../core/retry.js';

export interface InstanceSpec {
  name: string;
  image: string;
  hostPort: number;
  containerPort: number;
  env?: Record<string, string>;
  restartPolicy?: 'no' | 'unless-stopped';
}

export interface RunningInstance {
  name: string;
  containerId: string;
  image: string;
  hostPort: number;
  containerPort: number;
}

/**
 * Named container lifecycle shared by the deployment manager and the health
 * gate. A name is held by at most one container: starting under a taken name
 * always removes the previous holder first.
 */
export class ContainerLauncher {
  private readonly logger: Logger;

  constructor(
    private readonly engine: ContainerEngine,
    private readonly retry: RetryOptions = { retries: 1, delayMs: 1000 },
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child({ component: 'container-launcher' });
  }

  state(name: string): Promise<ContainerState> {
    return this.engine.containerState(name);
  }

  /** Stops and removes `name`. Resolves false when there was nothing to remove. */
  async remove(name: string): Promise<boolean> {
    const state = await this.engine.containerState(name);
    if (state === 'absent') {
      return false;
    }

    if (state === 'running') {
      await this.engine.stopContainer(name);
    }
    await this.engine.removeContainer(name);
    this.logger.debug({ name }, 'Removed container');
    return true;
  }

  async start(spec: InstanceSpec): Promise<RunningInstance> {
    const containerId = await withRetry(async () => {
      try {
        return await this.engine.runContainer({
          name: spec.name,
          image: spec.image,
          hostPort: spec.hostPort,
          containerPort: spec.containerPort,
          ...(spec.env ? { env: spec.env } : {}),
          ...(spec.restartPolicy ? { restartPolicy: spec.restartPolicy } : {}),
        });
      } catch (error) {
        // A half-created container would hold the name on the next attempt.
        await this.remove(spec.name).catch((removeError: unknown) => {
          this.logger.warn({ error: removeError, name: spec.name }, 'Failed to clear container after start failure');
        });
        throw error;
      }
    }, this.retry);

    this.logger.info({ name: spec.name, image: spec.image, hostPort: spec.hostPort }, 'Container started');
    return {
      name: spec.name,
      containerId,
      image: spec.image,
      hostPort: spec.hostPort,
      containerPort: spec.containerPort,
    };
  }

  async replace(spec: InstanceSpec): Promise<RunningInstance> {
    const replaced = await this.remove(spec.name);
    if (replaced) {
      this.logger.info({ name: spec.name }, 'Replaced previous container');
    }
    return this.start(spec);
  }

  logs(name: string, tailLines = 40): Promise<string> {
    return this.engine.containerLogs(name, tailLines);
  }
}
