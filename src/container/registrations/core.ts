/**
 * @fileoverview Registers core application services with the DI container.
 * This module encapsulates the registration of fundamental services such as
 * configuration, logging, secrets, and storage.
 * @module src/container/registrations/core
 */
import { container, Lifecycle } from 'tsyringe';

import { parseConfig } from '@/config/index.js';
import {
  AppConfig,
  Logger,
  SecretProvider,
  SecretsFile,
  StorageProvider,
  StorageService,
} from '@/container/tokens.js';
import type { ISecretProvider } from '@/secrets/ISecretProvider.js';
import {
  createSecretProvider,
  loadSecretsFileIfConfigured,
} from '@/secrets/secretProviderFactory.js';
import type { IStorageProvider } from '@/storage/core/IStorageProvider.js';
import { StorageService as StorageServiceClass } from '@/storage/core/StorageService.js';
import { createStorageProvider } from '@/storage/core/storageFactory.js';
import { logger } from '@/utils/internal/logger.js';

/**
 * Registers core application services and values with the tsyringe container.
 * The storage provider may need a secret fetched over the network before it
 * can be built, so it is created here and registered as a value.
 */
export const registerCoreServices = async (): Promise<void> => {
  // Configuration (parsed and registered as a static value)
  const config = parseConfig();
  container.register(AppConfig, { useValue: config });

  // Logger (as a static value), started at the configured level
  if (!logger.isInitialized()) {
    logger.initialize(config.logLevel);
  }
  container.register(Logger, { useValue: logger });

  const secretsFile = await loadSecretsFileIfConfigured(config);
  container.register(SecretsFile, { useValue: secretsFile });

  const secretProvider = createSecretProvider(config, secretsFile);
  container.register<ISecretProvider>(SecretProvider, {
    useValue: secretProvider,
  });

  const storageProvider = await createStorageProvider(config, {
    secretProvider,
    ...(secretsFile ? { secretsFile } : {}),
  });
  container.register<IStorageProvider>(StorageProvider, {
    useValue: storageProvider,
  });

  // tsyringe injects the StorageProvider dependency.
  container.register(
    StorageService,
    { useClass: StorageServiceClass },
    { lifecycle: Lifecycle.Singleton },
  );

  logger.info('Core services registered with the DI container.');
};
