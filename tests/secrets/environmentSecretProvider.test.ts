import { describe, expect, it } from 'vitest';

import {
  EnvironmentSecretProvider,
  toEnvironmentKey,
} from '@/secrets/environmentSecretProvider.js';
import { StorageErrorCode } from '@/types-global/errors.js';

describe('toEnvironmentKey', () => {
  it('upper-cases and replaces separators', () => {
    expect(toEnvironmentKey('blob-connection.string')).toBe(
      'BLOB_CONNECTION_STRING',
    );
    expect(toEnvironmentKey('--drive key--')).toBe('DRIVE_KEY');
  });
});

describe('EnvironmentSecretProvider', () => {
  const provider = new EnvironmentSecretProvider({
    'blob-connection': 'exact-value',
    DRIVE_CREDENTIALS: 'test-secret',
    EMPTY_SECRET: '',
  });

  it('prefers the exact variable name', async () => {
    await expect(provider.getSecret('blob-connection')).resolves.toBe(
      'exact-value',
    );
  });

  it('falls back to the UPPER_SNAKE_CASE form', async () => {
    await expect(provider.getSecret('drive-credentials')).resolves.toBe(
      'test-secret',
    );
  });

  it('reports unset and empty variables as not found', async () => {
    await expect(provider.getSecret('missing')).rejects.toMatchObject({
      code: StorageErrorCode.NotFound,
      message: "Secret 'missing' is not set in the environment.",
      data: { secretName: 'missing' },
    });
    await expect(provider.getSecret('empty-secret')).rejects.toHaveProperty(
      'code',
      StorageErrorCode.NotFound,
    );
  });

  it('rejects a blank name', async () => {
    await expect(provider.getSecret('  ')).rejects.toMatchObject({
      code: StorageErrorCode.InvalidArgument,
      message: 'Secret name must be a non-empty string.',
    });
  });
});
