import { createCipheriv, randomBytes } from 'crypto';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { afterEach, describe, expect, it } from 'vitest';

import { CredentialNotFoundError } from '../src/core/errors.js';
import {
  asUsernamePassword,
  ChainedCredentialStore,
  EncryptedFileCredentialStore,
  encryptionKeyFrom,
  EnvCredentialStore,
  InMemoryCredentialStore,
  type EncryptedPayload,
} from '../src/credentials/credential-store.js';
import { createRunContext } from './support/run-context.js';

const KEY = encryptionKeyFrom('test-secret-key-0123456789abcdef');

const encrypt = (value: string): EncryptedPayload => {
  const iv = randomBytes(12);
  const cipher = createCipheriv('aes-256-gcm', KEY, iv);
  const encrypted = Buffer.concat([cipher.update(value, 'utf8'), cipher.final()]);
  return {
    encryptedValue: encrypted.toString('base64'),
    iv: iv.toString('base64'),
    authTag: cipher.getAuthTag().toString('base64'),
  };
};

describe('EnvCredentialStore', () => {
  it('collects CREDENTIAL_<NAME>_<FIELD> variables under lower-case field names', async () => {
    const store = new EnvCredentialStore({
      CREDENTIAL_DOCKER_HUB_CREDENTIALS_USERNAME: 'ci-bot',
      CREDENTIAL_DOCKER_HUB_CREDENTIALS_PASSWORD: 'test-secret',
      CREDENTIAL_OTHER_PASSWORD: 'unrelated',
    });

    await expect(store.resolve('docker-hub-credentials')).resolves.toEqual({
      id: 'env:docker-hub-credentials',
      name: 'docker-hub-credentials',
      secrets: { username: 'ci-bot', password: 'test-secret' },
    });
  });

  it('throws CredentialNotFoundError for an undefined credential', async () => {
    const store = new EnvCredentialStore({ CREDENTIAL_DOCKER_HUB_CREDENTIALS_PASSWORD: '' });

    await expect(store.find('docker-hub-credentials')).resolves.toBeNull();
    await expect(store.resolve('docker-hub-credentials')).rejects.toBeInstanceOf(CredentialNotFoundError);
  });
});

describe('EncryptedFileCredentialStore', () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it('decrypts every field of a stored credential', async () => {
    dir = await mkdtemp(join(tmpdir(), 'credentials-'));
    const file = join(dir, 'credentials.json');
    await writeFile(
      file,
      JSON.stringify({
        credentials: {
          'docker-hub-credentials': { username: encrypt('ci-bot'), password: encrypt('test-secret') },
        },
      }),
    );
    const store = new EncryptedFileCredentialStore(file, KEY);

    await expect(store.resolve('docker-hub-credentials')).resolves.toEqual({
      id: 'file:docker-hub-credentials',
      name: 'docker-hub-credentials',
      secrets: { username: 'ci-bot', password: 'test-secret' },
    });
    await expect(store.find('missing')).resolves.toBeNull();
  });

  it('rejects a key shorter than 32 bytes', () => {
    expect(() => encryptionKeyFrom('too-short')).toThrow('Credential encryption key must be at least 32 bytes.');
  });
});

describe('ChainedCredentialStore', () => {
  it('returns the first store that knows the credential', async () => {
    const store = new ChainedCredentialStore([
      new InMemoryCredentialStore({ registry: { username: 'first', password: 'test-secret' } }),
      new InMemoryCredentialStore({ registry: { username: 'second', password: 'test-secret' } }),
    ]);

    const credential = await store.resolve('registry');
    expect(credential.id).toBe('memory:registry');
    expect(asUsernamePassword(credential)).toEqual({ username: 'first', password: 'test-secret' });
  });

  it('throws when no store knows the credential', async () => {
    const store = new ChainedCredentialStore([new InMemoryCredentialStore()]);

    await expect(store.resolve('registry')).rejects.toThrow('Credential "registry" is not defined.');
  });
});

describe('asUsernamePassword', () => {
  it('requires both fields', () => {
    expect(() => asUsernamePassword({ id: 'memory:token', name: 'token', secrets: { token: 'test-secret' } })).toThrow(
      'Credential "token (username/password)" is not defined.',
    );
  });
});

describe('RunContext.resolveCredential', () => {
  it('registers resolved secrets with the run redactor', async () => {
    const context = createRunContext();

    await context.resolveCredential('docker-hub-credentials');

    expect(context.redactor.redact('login ci-bot / test-secret')).toBe('login [REDACTED] / [REDACTED]');
  });

  it('propagates a missing credential', async () => {
    const context = createRunContext();

    await expect(context.resolveCredential('unknown')).rejects.toBeInstanceOf(CredentialNotFoundError);
    expect(context.redactor.size).toBe(0);
  });
});
