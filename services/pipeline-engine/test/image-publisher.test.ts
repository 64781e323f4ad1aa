import { describe, expect, it } from 'vitest';

import type { ImageReference } from '@telco-churn/shared';

import { PublishFailedError } from '../src/core/errors.js';
import type { Credential } from '../src/credentials/credential-store.js';
import { ImagePublisher } from '../src/images/image-publisher.js';
import { FakeContainerEngine } from './support/fake-engine.js';

const image: ImageReference = {
  registry: 'docker.io',
  repository: 'telco-churn-prediction',
  tags: ['42', 'latest'],
  imageId: 'sha256:image1',
};

const credential: Credential = {
  id: 'memory:docker-hub-credentials',
  name: 'docker-hub-credentials',
  secrets: { username: 'ci-bot', password: 'test-secret' },
};

describe('ImagePublisher', () => {
  it('pushes every tag inside one registry session', async () => {
    const engine = new FakeContainerEngine();

    const report = await new ImagePublisher(engine).publish(image, credential);

    expect(report).toEqual({
      registry: 'docker.io',
      pushed: ['telco-churn-prediction:42', 'telco-churn-prediction:latest'],
    });
    expect(engine.calls).toEqual([
      'login docker.io ci-bot',
      'pushImage telco-churn-prediction:42',
      'pushImage telco-churn-prediction:latest',
      'logout docker.io',
    ]);
    expect(engine.loggedIn.size).toBe(0);
  });

  it('logs out and reports the tags already pushed when a push fails', async () => {
    const engine = new FakeContainerEngine();
    engine.failCall('pushImage', 'telco-churn-prediction:latest', new Error('denied: requested access to the resource is denied'));

    const error = await new ImagePublisher(engine).publish(image, credential).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PublishFailedError);
    if (error instanceof PublishFailedError) {
      expect(error.message).toBe(
        'Push of telco-churn-prediction:latest failed: denied: requested access to the resource is denied',
      );
      expect(error.pushedTags).toEqual(['telco-churn-prediction:42']);
    }
    expect(engine.calls.at(-1)).toBe('logout docker.io');
    expect(engine.loggedIn.size).toBe(0);
  });

  it('does not push when login fails', async () => {
    const engine = new FakeContainerEngine();
    engine.failNext('login', new Error('unauthorized: incorrect username or password'));

    await expect(new ImagePublisher(engine).publish(image, credential)).rejects.toThrow(
      'Registry login with memory:docker-hub-credentials failed: unauthorized: incorrect username or password',
    );
    expect(engine.callsOf('pushImage')).toEqual([]);
    expect(engine.callsOf('logout')).toEqual([]);
  });

  it('rejects a credential without a password', async () => {
    const engine = new FakeContainerEngine();

    await expect(
      new ImagePublisher(engine).publish(image, { ...credential, secrets: { username: 'ci-bot' } }),
    ).rejects.toThrow(
      'Registry login with memory:docker-hub-credentials failed: Credential "docker-hub-credentials (username/password)" is not defined.',
    );
    expect(engine.calls).toEqual([]);
  });

  it('keeps the push result when logout fails', async () => {
    const engine = new FakeContainerEngine();
    engine.failNext('logout');

    const report = await new ImagePublisher(engine).publish(image, credential);

    expect(report.pushed).toHaveLength(2);
  });
});
