import { randomUUID } from 'crypto';

import type { Redis } from 'ioredis';

export interface LockHandle {
  release(): Promise<void>;
}

/** Serialises runs that target the same deployment name. */
export interface DeploymentLock {
  /** Resolves null when another run holds the lock. */
  acquire(name: string, ttlSeconds: number): Promise<LockHandle | null>;
}

export class DeploymentLockedError extends Error {
  constructor(readonly targetName: string) {
    super(`Another run is already deploying ${targetName}.`);
    this.name = 'DeploymentLockedError';
  }
}

// Deletes the key only while it still holds our token, so an expired lock
// taken over by another run is left alone.
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

export class RedisDeploymentLock implements DeploymentLock {
  constructor(
    private readonly redis: Redis,
    private readonly prefix = 'telco-churn:deploy-lock:',
  ) {}

  async acquire(name: string, ttlSeconds: number): Promise<LockHandle | null> {
    const key = `${this.prefix}${name}`;
    const token = randomUUID();
    const acquired = await this.redis.set(key, token, 'EX', ttlSeconds, 'NX');
    if (acquired !== 'OK') {
      return null;
    }

    return {
      release: async () => {
        await this.redis.eval(RELEASE_SCRIPT, 1, key, token);
      },
    };
  }
}

export class InMemoryDeploymentLock implements DeploymentLock {
  private readonly held = new Map<string, { token: string; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async acquire(name: string, ttlSeconds: number): Promise<LockHandle | null> {
    const current = this.held.get(name);
    if (current && current.expiresAt > this.now()) {
      return null;
    }

    const token = randomUUID();
    this.held.set(name, { token, expiresAt: this.now() + ttlSeconds * 1000 });
    return {
      release: async () => {
        if (this.held.get(name)?.token === token) {
          this.held.delete(name);
        }
      },
    };
  }
}

export const runExclusive = async <T>(
  lock: DeploymentLock,
  name: string,
  ttlSeconds: number,
  fn: () => Promise<T>,
): Promise<T> => {
  const handle = await lock.acquire(name, ttlSeconds);
  if (!handle) {
    throw new DeploymentLockedError(name);
  }

  try {
    return await fn();
  } finally {
    await handle.release();
  }
};
