import type { ImageReference } from '@telco-churn/shared';

import type { ContainerEngine } from '../adapters/docker-adapter.js';
import { PublishFailedError, toErrorMessage } from '../core/errors.js';
import { logger as rootLogger, type Logger } from '../core/logger.js';
import type { LogCallback } from '../core/run-command.js';
import { withResource } from '../core/scope.js';
import { asUsernamePassword, type Credential } from '../credentials/credential-store.js';
import { qualifiedTag } from './image-reference.js';

export interface PublishReport {
  registry: string;
  pushed: string[];
}

/**
 * Pushes every tag of an image under an authenticated registry session that
 * is always logged out again. Publishing is not atomic: tags pushed before a
 * failure stay in the registry.
 */
export class ImagePublisher {
  private readonly logger: Logger;

  constructor(
    private readonly engine: ContainerEngine,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child({ component: 'image-publisher' });
  }

  async publish(image: ImageReference, credential: Credential, onLog?: LogCallback): Promise<PublishReport> {
    const pushed: string[] = [];

    await withResource(
      () => this.openSession(image.registry, credential, onLog),
      async (registry) => {
        await this.engine.logout(registry);
        onLog?.(`Logged out of ${registry}`);
      },
      async () => {
        for (const tag of image.tags) {
          const reference = qualifiedTag(image, tag);
          onLog?.(`Pushing ${reference}...`);
          try {
            await this.engine.pushImage(reference, onLog);
          } catch (error) {
            throw new PublishFailedError(`Push of ${reference} failed: ${toErrorMessage(error)}`, [...pushed]);
          }
          pushed.push(reference);
        }
      },
      (error) => {
        this.logger.error({ error, registry: image.registry }, 'Registry logout failed');
      },
    );

    return { registry: image.registry, pushed };
  }

  private async openSession(registry: string, credential: Credential, onLog?: LogCallback): Promise<string> {
    try {
      const { username, password } = asUsernamePassword(credential);
      await this.engine.login(registry, username, password);
    } catch (error) {
      throw new PublishFailedError(`Registry login with ${credential.id} failed: ${toErrorMessage(error)}`);
    }
    onLog?.(`Logged in to ${registry} with ${credential.id}`);
    return registry;
  }
}
