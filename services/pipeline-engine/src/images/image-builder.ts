import type { ImageReference } from '@telco-churn/shared';

import type { ContainerEngine } from '../adapters/docker-adapter.js';
import { BuildFailedError, toErrorMessage } from '../core/errors.js';
import { logger as rootLogger, type Logger } from '../core/logger.js';
import type { LogCallback } from '../core/run-command.js';
import { qualifiedTag } from './image-reference.js';

export interface BuildContext {
  contextDir: string;
  dockerfile?: string;
  buildArgs?: Record<string, string>;
}

export interface BuildOptions {
  signal?: AbortSignal;
  onLog?: LogCallback;
}

interface AppliedTag {
  reference: string;
  previousImageId: string | null;
}

export class ImageBuilder {
  private readonly logger: Logger;

  constructor(
    private readonly engine: ContainerEngine,
    private readonly registry: string,
    private readonly repository: string,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child({ component: 'image-builder' });
  }

  /**
   * Builds the image, then points every tag at it. The first tag is the
   * run-specific one. Tags move only after the build succeeded, and a
   * tagging failure puts the already moved tags back where they were.
   */
  async build(buildContext: BuildContext, tags: string[], options: BuildOptions = {}): Promise<ImageReference> {
    if (tags.length === 0) {
      throw new BuildFailedError('At least one image tag is required.');
    }

    const target = { registry: this.registry, repository: this.repository };
    options.onLog?.(`Building ${this.repository} from ${buildContext.contextDir}...`);

    let imageId: string;
    try {
      imageId = await this.engine.buildImage({
        contextDir: buildContext.contextDir,
        ...(buildContext.dockerfile ? { dockerfile: buildContext.dockerfile } : {}),
        ...(buildContext.buildArgs ? { buildArgs: buildContext.buildArgs } : {}),
        ...(options.signal ? { signal: options.signal } : {}),
        ...(options.onLog ? { onLog: options.onLog } : {}),
      });
    } catch (error) {
      throw new BuildFailedError(`Image build failed: ${toErrorMessage(error)}`);
    }

    const applied: AppliedTag[] = [];
    try {
      for (const tag of tags) {
        const reference = qualifiedTag(target, tag);
        const previousImageId = await this.engine.resolveImageId(reference);
        await this.engine.tagImage(imageId, reference);
        applied.push({ reference, previousImageId });
        options.onLog?.(`Tagged ${reference}`);
      }
    } catch (error) {
      await this.restoreTags(applied);
      throw new BuildFailedError(`Tagging image ${imageId} failed: ${toErrorMessage(error)}`);
    }

    options.onLog?.('Docker image built successfully');
    return { ...target, tags: [...tags], imageId };
  }

  private async restoreTags(applied: AppliedTag[]): Promise<void> {
    for (const { reference, previousImageId } of [...applied].reverse()) {
      try {
        if (previousImageId) {
          await this.engine.tagImage(previousImageId, reference);
        } else {
          await this.engine.untagImage(reference);
        }
      } catch (error) {
        this.logger.error({ error, reference }, 'Failed to restore image tag after a tagging failure');
      }
    }
  }
}
