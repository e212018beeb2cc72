/**
 * @fileoverview Tests for the storage provider factory.
 * @module tests/storage/core/storageFactory.test
 */
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { afterAll, describe, expect, it, vi } from 'vitest';

import type { SecretsFile } from '@/secrets/secretsConfig.js';
import { createStorageProvider } from '@/storage/core/storageFactory.js';
import { AzureBlobProvider } from '@/storage/providers/azureBlob/azureBlobProvider.js';
import { GoogleDriveProvider } from '@/storage/providers/googleDrive/googleDriveProvider.js';
import { InMemoryProvider } from '@/storage/providers/inMemory/inMemoryProvider.js';
import { LocalDiskProvider } from '@/storage/providers/localDisk/localDiskProvider.js';
import { StorageError, StorageErrorCode } from '@/types-global/errors.js';
import { requestContextService } from '@/utils/internal/requestContext.js';

import { buildTestConfig } from '../../helpers/testConfig.js';
import { FakeBlobEndpoint } from '../helpers/fakeBlobEndpoint.js';
import { FakeDriveEndpoint } from '../helpers/fakeDriveEndpoint.js';

const createdDirs: string[] = [];

const createTestContext = () =>
  requestContextService.createRequestContext({
    operation: 'storage-factory-test',
  });

const createLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warning: vi.fn(),
  error: vi.fn(),
});

const secretsFile: SecretsFile = {
  common: {
    vaultUrl: 'https://example-vault.vault.azure.net',
    tenantId: 'tenant-id',
    clientId: 'client-id',
    clientSecret: 'test-secret',
  },
  storages: {
    'google-drive': { secretName: 'drive-credentials' },
  },
};

afterAll(async () => {
  await Promise.all(
    createdDirs.map((dir) => rm(dir, { recursive: true, force: true })),
  );
});

describe('createStorageProvider', () => {
  it('creates an in-memory provider and logs the choice', async () => {
    const logger = createLogger();

    const provider = await createStorageProvider(
      buildTestConfig({ storage: { providerType: 'in-memory' } }),
      { logger },
    );

    expect(provider).toBeInstanceOf(InMemoryProvider);
    expect(logger.info).toHaveBeenCalledWith(
      'Creating storage provider of type: in-memory',
      expect.objectContaining({ operation: 'createStorageProvider' }),
    );
  });

  it('confines a local-disk provider to the configured root', async () => {
    const rootDir = await mkdtemp(path.join(tmpdir(), 'unified-storage-'));
    createdDirs.push(rootDir);

    const provider = await createStorageProvider(
      buildTestConfig({
        storage: { providerType: 'local-disk', localDisk: { rootDir } },
      }),
      { logger: createLogger() },
    );

    expect(provider).toBeInstanceOf(LocalDiskProvider);
    await expect(
      provider.add('notes/a.txt', 'hello', createTestContext()),
    ).resolves.toBe(path.join(rootDir, 'notes', 'a.txt'));
  });

  it('builds an Azure Blob provider from an inline connection string', async () => {
    const endpoint = new FakeBlobEndpoint();
    const blobEndpointFactory = { createEndpoint: vi.fn(() => endpoint) };
    const secretProvider = { getSecret: vi.fn(async () => 'unused') };

    const provider = await createStorageProvider(
      buildTestConfig({
        storage: {
          providerType: 'azure-blob',
          azureBlob: { connectionString: 'UseDevelopmentStorage=true' },
        },
      }),
      { blobEndpointFactory, secretProvider, logger: createLogger() },
    );

    expect(provider).toBeInstanceOf(AzureBlobProvider);
    expect(blobEndpointFactory.createEndpoint).toHaveBeenCalledWith(
      'UseDevelopmentStorage=true',
    );
    expect(secretProvider.getSecret).not.toHaveBeenCalled();

    await provider.add('docs/a.txt', 'a', createTestContext());
    expect(endpoint.containers.get('docs')?.has('a.txt')).toBe(true);
  });

  it('fetches the connection string through the secret provider', async () => {
    const blobEndpointFactory = {
      createEndpoint: vi.fn(() => new FakeBlobEndpoint()),
    };
    const secretProvider = {
      getSecret: vi.fn(async () => 'UseDevelopmentStorage=true'),
    };

    await createStorageProvider(
      buildTestConfig({
        storage: {
          providerType: 'azure-blob',
          azureBlob: { secretName: 'blob-connection' },
        },
      }),
      { blobEndpointFactory, secretProvider, logger: createLogger() },
    );

    expect(secretProvider.getSecret).toHaveBeenCalledWith(
      'blob-connection',
      expect.objectContaining({ operation: 'createStorageProvider' }),
    );
    expect(blobEndpointFactory.createEndpoint).toHaveBeenCalledWith(
      'UseDevelopmentStorage=true',
    );
  });

  it('takes the Drive secret name from the secrets file and applies Drive settings', async () => {
    const endpoint = new FakeDriveEndpoint();
    const folderId = endpoint.seedFolder('shared');
    const driveEndpointFactory = { createEndpoint: vi.fn(() => endpoint) };
    const secretProvider = {
      getSecret: vi.fn(async () => '{"type":"service_account"}'),
    };

    const provider = await createStorageProvider(
      buildTestConfig({
        storage: {
          providerType: 'google-drive',
          googleDrive: { rootFolderId: folderId },
        },
      }),
      {
        driveEndpointFactory,
        secretProvider,
        secretsFile,
        logger: createLogger(),
      },
    );

    expect(provider).toBeInstanceOf(GoogleDriveProvider);
    expect(secretProvider.getSecret).toHaveBeenCalledWith(
      'drive-credentials',
      expect.objectContaining({ operation: 'createStorageProvider' }),
    );
    expect(driveEndpointFactory.createEndpoint).toHaveBeenCalledWith(
      '{"type":"service_account"}',
    );

    await provider.add('a.txt', 'a', createTestContext());
    const uploaded = [...endpoint.nodes.values()].find(
      (node) => node.record.name === 'a.txt',
    );
    expect(uploaded?.record.parentId).toBe(folderId);
  });

  it('fails when no credential source is configured', async () => {
    const promise = createStorageProvider(
      buildTestConfig({ storage: { providerType: 'azure-blob' } }),
      { logger: createLogger() },
    );

    await expect(promise).rejects.toBeInstanceOf(StorageError);
    await expect(promise).rejects.toMatchObject({
      code: StorageErrorCode.ConfigurationError,
      message:
        'AZURE_BLOB_CONNECTION_STRING must be set for the azure-blob storage provider, or a secret name configured for it.',
    });
  });

  it('fails when a secret name is configured without a secret provider', async () => {
    await expect(
      createStorageProvider(
        buildTestConfig({
          storage: {
            providerType: 'google-drive',
            googleDrive: { secretName: 'drive-credentials' },
          },
        }),
        { logger: createLogger() },
      ),
    ).rejects.toMatchObject({
      code: StorageErrorCode.ConfigurationError,
      message:
        "A secret provider is required to fetch 'drive-credentials' for the google-drive storage provider.",
    });
  });

  it('propagates secret lookup failures', async () => {
    const secretProvider = {
      getSecret: vi.fn(async () => {
        throw new StorageError(StorageErrorCode.NotFound, 'missing');
      }),
    };

    await expect(
      createStorageProvider(
        buildTestConfig({
          storage: {
            providerType: 'azure-blob',
            azureBlob: { secretName: 'blob-connection' },
          },
        }),
        { secretProvider, logger: createLogger() },
      ),
    ).rejects.toHaveProperty('code', StorageErrorCode.NotFound);
  });
});
