/**
 * @fileoverview Factory function for creating a storage provider based on application configuration.
 * This module decouples the application from concrete storage implementations, allowing the
 * storage backend to be selected via environment variables. Backends that need credentials
 * take them inline from the configuration or fetch them through the secret provider.
 * @module src/storage/core/storageFactory
 */
import type { AppConfig, StorageProviderType } from '@/config/index.js';
import type { ISecretProvider } from '@/secrets/ISecretProvider.js';
import type { SecretsFile } from '@/secrets/secretsConfig.js';
import type {
  IStorageEndpointFactory,
  IStorageProvider,
} from '@/storage/core/IStorageProvider.js';
import type { BlobEndpoint } from '@/storage/providers/azureBlob/azureBlob.types.js';
import { AzureBlobProvider } from '@/storage/providers/azureBlob/azureBlobProvider.js';
import type { DriveEndpoint } from '@/storage/providers/googleDrive/googleDrive.types.js';
import { GoogleDriveProvider } from '@/storage/providers/googleDrive/googleDriveProvider.js';
import { InMemoryProvider } from '@/storage/providers/inMemory/inMemoryProvider.js';
import { LocalDiskProvider } from '@/storage/providers/localDisk/localDiskProvider.js';
import { StorageError, StorageErrorCode } from '@/types-global/errors.js';
import {
  logger as sharedLogger,
  type StorageLogger,
} from '@/utils/internal/logger.js';
import {
  requestContextService,
  type RequestContext,
} from '@/utils/internal/requestContext.js';

export interface StorageFactoryDeps {
  /** Source of backend credentials not configured inline. */
  secretProvider?: ISecretProvider;
  secretsFile?: SecretsFile;
  blobEndpointFactory?: IStorageEndpointFactory<BlobEndpoint>;
  driveEndpointFactory?: IStorageEndpointFactory<DriveEndpoint>;
  logger?: StorageLogger;
}

interface CredentialSource {
  inline: string | undefined;
  secretName: string | undefined;
  envHint: string;
}

async function resolveCredential(
  providerType: StorageProviderType,
  source: CredentialSource,
  deps: StorageFactoryDeps,
  context: RequestContext,
): Promise<string> {
  if (source.inline) {
    return source.inline;
  }

  const secretName =
    source.secretName ?? deps.secretsFile?.storages[providerType]?.secretName;
  if (!secretName) {
    throw new StorageError(
      StorageErrorCode.ConfigurationError,
      `${source.envHint} must be set for the ${providerType} storage provider, or a secret name configured for it.`,
      context,
    );
  }
  if (!deps.secretProvider) {
    throw new StorageError(
      StorageErrorCode.ConfigurationError,
      `A secret provider is required to fetch '${secretName}' for the ${providerType} storage provider.`,
      context,
    );
  }
  return deps.secretProvider.getSecret(secretName, context);
}

/**
 * Creates and returns a storage provider instance based on the provided configuration.
 *
 * @param config - The application configuration object, typically resolved
 *                 from the DI container.
 * @param deps - Pre-resolved dependencies for providers.
 * @returns An instance of a class that implements the IStorageProvider interface.
 * @throws {StorageError} `ConfigurationError` if the configuration is missing
 *         required values for the selected provider.
 */
export async function createStorageProvider(
  config: AppConfig,
  deps: StorageFactoryDeps = {},
): Promise<IStorageProvider> {
  const context = requestContextService.createRequestContext({
    operation: 'createStorageProvider',
  });
  const log = deps.logger ?? sharedLogger;
  const providerType = config.storage.providerType;

  log.info(`Creating storage provider of type: ${providerType}`, context);

  switch (providerType) {
    case 'in-memory':
      return new InMemoryProvider({ logger: log });
    case 'local-disk':
      return new LocalDiskProvider({
        ...(config.storage.localDisk.rootDir
          ? { rootDir: config.storage.localDisk.rootDir }
          : {}),
        logger: log,
      });
    case 'azure-blob': {
      const connectionString = await resolveCredential(
        providerType,
        {
          inline: config.storage.azureBlob.connectionString,
          secretName: config.storage.azureBlob.secretName,
          envHint: 'AZURE_BLOB_CONNECTION_STRING',
        },
        deps,
        context,
      );
      return AzureBlobProvider.fromConnectionString(connectionString, {
        ...(deps.blobEndpointFactory
          ? { endpointFactory: deps.blobEndpointFactory }
          : {}),
        logger: log,
      });
    }
    case 'google-drive': {
      const credentialsJson = await resolveCredential(
        providerType,
        {
          inline: config.storage.googleDrive.credentialsJson,
          secretName: config.storage.googleDrive.secretName,
          envHint: 'GOOGLE_DRIVE_CREDENTIALS',
        },
        deps,
        context,
      );
      return GoogleDriveProvider.fromCredentials(credentialsJson, {
        ...(deps.driveEndpointFactory
          ? { endpointFactory: deps.driveEndpointFactory }
          : {}),
        rootFolderId: config.storage.googleDrive.rootFolderId,
        deleteBatchThreshold: config.storage.googleDrive.deleteBatchThreshold,
        logger: log,
      });
    }
    default: {
      const exhaustiveCheck: never = providerType;
      throw new StorageError(
        StorageErrorCode.ConfigurationError,
        `Unhandled storage provider type: ${String(exhaustiveCheck)}`,
        context,
      );
    }
  }
}
