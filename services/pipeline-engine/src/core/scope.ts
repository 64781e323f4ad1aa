/**
 * Acquire a resource, hand it to `use`, and release it on every exit path.
 * A release failure is reported through `onReleaseError` so it never hides
 * the error thrown by `use`.
 */
export const withResource = async <R, T>(
  acquire: () => Promise<R>,
  release: (resource: R) => Promise<void>,
  use: (resource: R) => Promise<T>,
  onReleaseError: (error: unknown) => void,
): Promise<T> => {
  const resource = await acquire();
  try {
    return await use(resource);
  } finally {
    await release(resource).catch(onReleaseError);
  }
};
