import { describe, expect, it } from 'vitest';

import { BuildFailedError } from '../src/core/errors.js';
import { ImageBuilder } from '../src/images/image-builder.js';
import { imageName, primaryReference, qualifiedTag } from '../src/images/image-reference.js';
import { FakeContainerEngine } from './support/fake-engine.js';

const REPOSITORY = 'telco-churn-prediction';

describe('image references', () => {
  it('addresses Docker Hub images without the registry host', () => {
    expect(imageName('docker.io', REPOSITORY)).toBe(REPOSITORY);
    expect(imageName('registry.example.test', REPOSITORY)).toBe(`registry.example.test/${REPOSITORY}`);
  });

  it('uses the first tag as the primary reference', () => {
    const image = { registry: 'docker.io', repository: REPOSITORY, tags: ['42', 'latest'], imageId: 'sha256:a' };

    expect(primaryReference(image)).toBe(`${REPOSITORY}:42`);
    expect(qualifiedTag(image, 'latest')).toBe(`${REPOSITORY}:latest`);
    expect(() => primaryReference({ ...image, tags: [] })).toThrow(`Image ${REPOSITORY} carries no tag.`);
  });
});

describe('ImageBuilder', () => {
  it('builds once and points every tag at the new image', async () => {
    const engine = new FakeContainerEngine();
    const lines: string[] = [];

    const image = await new ImageBuilder(engine, 'docker.io', REPOSITORY).build({ contextDir: '/work' }, ['42', 'latest'], {
      onLog: (line) => lines.push(line),
    });

    expect(image).toEqual({ registry: 'docker.io', repository: REPOSITORY, tags: ['42', 'latest'], imageId: 'sha256:image1' });
    expect(engine.callsOf('buildImage')).toEqual(['/work']);
    expect(engine.tags.get(`${REPOSITORY}:42`)).toBe('sha256:image1');
    expect(engine.tags.get(`${REPOSITORY}:latest`)).toBe('sha256:image1');
    expect(lines.at(-1)).toBe('Docker image built successfully');
  });

  it('leaves existing tags untouched when the build fails', async () => {
    const engine = new FakeContainerEngine();
    engine.tags.set(`${REPOSITORY}:latest`, 'sha256:old');
    engine.failNext('buildImage', new Error('COPY failed: file not found'));

    const build = new ImageBuilder(engine, 'docker.io', REPOSITORY).build({ contextDir: '/work' }, ['42', 'latest']);

    await expect(build).rejects.toThrow(new BuildFailedError('Image build failed: COPY failed: file not found'));
    expect(engine.callsOf('tagImage')).toEqual([]);
    expect(engine.tags.get(`${REPOSITORY}:latest`)).toBe('sha256:old');
  });

  it('restores moved tags when a later tag cannot be applied', async () => {
    const engine = new FakeContainerEngine();
    engine.tags.set(`${REPOSITORY}:latest`, 'sha256:old');
    engine.failCall('tagImage', `sha256:image1 ${REPOSITORY}:42`);

    const build = new ImageBuilder(engine, 'docker.io', REPOSITORY).build({ contextDir: '/work' }, [
      'latest',
      'stable',
      '42',
    ]);

    await expect(build).rejects.toThrow('Tagging image sha256:image1 failed: tagImage failed');
    expect(engine.tags.get(`${REPOSITORY}:latest`)).toBe('sha256:old');
    expect(engine.tags.has(`${REPOSITORY}:stable`)).toBe(false);
    expect(engine.tags.has(`${REPOSITORY}:42`)).toBe(false);
    expect(engine.callsOf('untagImage')).toEqual([`${REPOSITORY}:stable`]);
  });

  it('requires at least one tag', async () => {
    const engine = new FakeContainerEngine();

    await expect(new ImageBuilder(engine, 'docker.io', REPOSITORY).build({ contextDir: '/work' }, [])).rejects.toThrow(
      'At least one image tag is required.',
    );
    expect(engine.calls).toEqual([]);
  });
});
