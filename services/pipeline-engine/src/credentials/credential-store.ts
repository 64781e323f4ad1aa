import { readFile } from 'fs/promises';
import { createDecipheriv } from 'crypto';

import { z } from 'zod';

import { CredentialNotFoundError } from '../core/errors.js';

export interface Credential {
  /** Display-safe identifier; never a secret. */
  id: string;
  name: string;
  secrets: Record<string, string>;
}

export interface UsernamePassword {
  username: string;
  password: string;
}

export interface CredentialStore {
  /** Returns null when the store does not know `name`. */
  find(name: string): Promise<Credential | null>;
  resolve(name: string): Promise<Credential>;
}

abstract class BaseCredentialStore implements CredentialStore {
  abstract find(name: string): Promise<Credential | null>;

  async resolve(name: string): Promise<Credential> {
    const credential = await this.find(name);
    if (!credential) {
      throw new CredentialNotFoundError(name);
    }
    return credential;
  }
}

export const asUsernamePassword = (credential: Credential): UsernamePassword => {
  const { username, password } = credential.secrets;
  if (!username || !password) {
    throw new CredentialNotFoundError(`${credential.name} (username/password)`);
  }
  return { username, password };
};

export class InMemoryCredentialStore extends BaseCredentialStore {
  private readonly credentials = new Map<string, Record<string, string>>();

  constructor(entries: Record<string, Record<string, string>> = {}) {
    super();
    for (const [name, secrets] of Object.entries(entries)) {
      this.credentials.set(name, { ...secrets });
    }
  }

  set(name: string, secrets: Record<string, string>): void {
    this.credentials.set(name, { ...secrets });
  }

  async find(name: string): Promise<Credential | null> {
    const secrets = this.credentials.get(name);
    return secrets ? { id: `memory:${name}`, name, secrets: { ...secrets } } : null;
  }
}

const toEnvSegment = (name: string): string => name.toUpperCase().replace(/[^A-Z0-9]+/g, '_');

/**
 * Reads `CREDENTIAL_<NAME>_<FIELD>` variables, so `docker-hub-credentials`
 * resolves from `CREDENTIAL_DOCKER_HUB_CREDENTIALS_USERNAME` and
 * `CREDENTIAL_DOCKER_HUB_CREDENTIALS_PASSWORD`.
 */
export class EnvCredentialStore extends BaseCredentialStore {
  constructor(private readonly source: NodeJS.ProcessEnv = process.env) {
    super();
  }

  async find(name: string): Promise<Credential | null> {
    const prefix = `CREDENTIAL_${toEnvSegment(name)}_`;
    const secrets: Record<string, string> = {};

    for (const [key, value] of Object.entries(this.source)) {
      if (!key.startsWith(prefix) || value === undefined || value.length === 0) {
        continue;
      }
      secrets[key.slice(prefix.length).toLowerCase()] = value;
    }

    return Object.keys(secrets).length > 0 ? { id: `env:${name}`, name, secrets } : null;
  }
}

const encryptedPayloadSchema = z.object({
  encryptedValue: z.string().min(1),
  iv: z.string().min(1),
  authTag: z.string().min(1),
});

const credentialFileSchema = z.object({
  credentials: z.record(z.record(encryptedPayloadSchema)),
});

export type EncryptedPayload = z.infer<typeof encryptedPayloadSchema>;

const algorithm = 'aes-256-gcm';

export const decryptSecret = (payload: EncryptedPayload, key: Buffer): string => {
  const decipher = createDecipheriv(algorithm, key, Buffer.from(payload.iv, 'base64'));
  decipher.setAuthTag(Buffer.from(payload.authTag, 'base64'));

  const decrypted = Buffer.concat([
    decipher.update(Buffer.from(payload.encryptedValue, 'base64')),
    decipher.final(),
  ]);

  return decrypted.toString('utf8');
};

export const encryptionKeyFrom = (value: string): Buffer => {
  const key = Buffer.from(value, 'utf8').subarray(0, 32);
  if (key.length < 32) {
    throw new Error('Credential encryption key must be at least 32 bytes.');
  }
  return key;
};

/**
 * Credentials kept in a JSON file whose fields are AES-256-GCM encrypted:
 * `{ "credentials": { "<name>": { "<field>": { encryptedValue, iv, authTag } } } }`.
 * The file is read once, on first lookup.
 */
export class EncryptedFileCredentialStore extends BaseCredentialStore {
  private loaded: Promise<z.infer<typeof credentialFileSchema>> | null = null;

  constructor(
    private readonly filePath: string,
    private readonly key: Buffer,
  ) {
    super();
  }

  async find(name: string): Promise<Credential | null> {
    const file = await this.load();
    const fields = file.credentials[name];
    if (!fields) {
      return null;
    }

    const secrets: Record<string, string> = {};
    for (const [field, payload] of Object.entries(fields)) {
      secrets[field] = decryptSecret(payload, this.key);
    }

    return { id: `file:${name}`, name, secrets };
  }

  private load(): Promise<z.infer<typeof credentialFileSchema>> {
    if (!this.loaded) {
      this.loaded = readFile(this.filePath, 'utf8').then((raw) => credentialFileSchema.parse(JSON.parse(raw)));
    }
    return this.loaded;
  }
}

export class ChainedCredentialStore extends BaseCredentialStore {
  constructor(private readonly stores: CredentialStore[]) {
    super();
  }

  async find(name: string): Promise<Credential | null> {
    for (const store of this.stores) {
      const credential = await store.find(name);
      if (credential) {
        return credential;
      }
    }
    return null;
  }
}
