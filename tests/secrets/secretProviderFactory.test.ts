/**
 * @fileoverview Tests for selecting and building the secret provider.
 * @module tests/secrets/secretProviderFactory.test
 */
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { afterAll, describe, expect, it, vi } from 'vitest';

import { AzureKeyVaultSecretProvider } from '@/secrets/azureKeyVaultSecretProvider.js';
import { EnvironmentSecretProvider } from '@/secrets/environmentSecretProvider.js';
import {
  createSecretProvider,
  loadSecretsFileIfConfigured,
} from '@/secrets/secretProviderFactory.js';
import type { SecretsFile } from '@/secrets/secretsConfig.js';
import { StorageErrorCode } from '@/types-global/errors.js';

import { buildTestConfig } from '../helpers/testConfig.js';

const secretsFile: SecretsFile = {
  common: {
    vaultUrl: 'https://example-vault.vault.azure.net',
    tenantId: 'tenant-id',
    clientId: 'client-id',
    clientSecret: 'test-secret',
  },
  storages: {},
};

const createdDirs: string[] = [];

afterAll(async () => {
  await Promise.all(
    createdDirs.map((dir) => rm(dir, { recursive: true, force: true })),
  );
});

describe('createSecretProvider', () => {
  it('defaults to the environment provider', async () => {
    const provider = createSecretProvider(buildTestConfig(), undefined, {
      env: { BLOB_CONNECTION: 'test-secret' },
    });

    expect(provider).toBeInstanceOf(EnvironmentSecretProvider);
    await expect(provider.getSecret('blob-connection')).resolves.toBe(
      'test-secret',
    );
  });

  it('uses an injected Key Vault client with the configured cache lifetime', async () => {
    const keyVaultClient = {
      getSecret: vi.fn(async () => ({ value: 'test-secret' })),
    };

    const provider = createSecretProvider(
      buildTestConfig({
        secrets: { providerType: 'azure-key-vault', cacheTtlMs: 0 },
      }),
      undefined,
      { keyVaultClient },
    );

    expect(provider).toBeInstanceOf(AzureKeyVaultSecretProvider);
    await provider.getSecret('drive');
    await provider.getSecret('drive');
    expect(keyVaultClient.getSecret).toHaveBeenCalledTimes(2);
  });

  it('builds a Key Vault provider from the secrets file settings', () => {
    const provider = createSecretProvider(
      buildTestConfig({ secrets: { providerType: 'azure-key-vault' } }),
      secretsFile,
    );

    expect(provider).toBeInstanceOf(AzureKeyVaultSecretProvider);
  });

  it('fails when Key Vault is selected without settings', () => {
    expect(() =>
      createSecretProvider(
        buildTestConfig({ secrets: { providerType: 'azure-key-vault' } }),
      ),
    ).toThrowError(
      expect.objectContaining({ code: StorageErrorCode.ConfigurationError }),
    );
  });
});

describe('loadSecretsFileIfConfigured', () => {
  it('returns undefined when no path is configured', async () => {
    await expect(
      loadSecretsFileIfConfigured(buildTestConfig()),
    ).resolves.toBeUndefined();
  });

  it('loads the configured file', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'unified-storage-secrets-'));
    createdDirs.push(dir);
    const filePath = path.join(dir, 'secrets.json');
    await writeFile(filePath, JSON.stringify(secretsFile), 'utf-8');

    await expect(
      loadSecretsFileIfConfigured(
        buildTestConfig({ secrets: { configPath: filePath } }),
      ),
    ).resolves.toEqual(secretsFile);
  });
});
