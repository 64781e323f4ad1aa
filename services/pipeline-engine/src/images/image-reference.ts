import type { ImageReference } from '@telco-churn/shared';

const DEFAULT_REGISTRY = 'docker.io';

/** Docker Hub images are addressed without their registry host. */
export const imageName = (registry: string, repository: string): string =>
  registry === DEFAULT_REGISTRY || registry.length === 0 ? repository : `${registry}/${repository}`;

export const qualifiedTag = (image: Pick<ImageReference, 'registry' | 'repository'>, tag: string): string =>
  `${imageName(image.registry, image.repository)}:${tag}`;

/** The run-specific reference, e.g. `telco-churn-prediction:42`. */
export const primaryReference = (image: ImageReference): string => {
  const [runTag] = image.tags;
  if (!runTag) {
    throw new Error(`Image ${image.repository} carries no tag.`);
  }
  return qualifiedTag(image, runTag);
};
