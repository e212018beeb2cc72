/**
 * @fileoverview Factory for creating the configured secret provider.
 * @module src/secrets/secretProviderFactory
 */
import type { AppConfig } from '@/config/index.js';
import { StorageError, StorageErrorCode } from '@/types-global/errors.js';
import type { StorageLogger } from '@/utils/internal/logger.js';

import {
  AzureKeyVaultSecretProvider,
  type SecretReader,
} from './azureKeyVaultSecretProvider.js';
import { EnvironmentSecretProvider } from './environmentSecretProvider.js';
import type { ISecretProvider } from './ISecretProvider.js';
import { loadSecretsFile, type SecretsFile } from './secretsConfig.js';

export interface SecretProviderDependencies {
  /** Used instead of a real Key Vault client when given. */
  keyVaultClient?: SecretReader;
  env?: Record<string, string | undefined>;
  logger?: StorageLogger;
}

/**
 * Reads the secrets file when `SECRETS_CONFIG_PATH` is set.
 */
export async function loadSecretsFileIfConfigured(
  config: AppConfig,
): Promise<SecretsFile | undefined> {
  return config.secrets.configPath
    ? loadSecretsFile(config.secrets.configPath)
    : undefined;
}

/**
 * Creates the secret provider named by `config.secrets.providerType`.
 * Key Vault settings come from the environment first, then from the secrets
 * file's `common` section.
 * @throws {StorageError} `ConfigurationError` if Key Vault is selected and
 *   neither source supplies its settings.
 */
export function createSecretProvider(
  config: AppConfig,
  secretsFile?: SecretsFile,
  deps: SecretProviderDependencies = {},
): ISecretProvider {
  const { providerType, cacheTtlMs } = config.secrets;

  switch (providerType) {
    case 'environment':
      return new EnvironmentSecretProvider(deps.env);
    case 'azure-key-vault': {
      const options = {
        cacheTtlMs,
        ...(deps.logger ? { logger: deps.logger } : {}),
      };
      if (deps.keyVaultClient) {
        return new AzureKeyVaultSecretProvider(deps.keyVaultClient, options);
      }
      const settings = config.secrets.keyVault ?? secretsFile?.common;
      if (!settings) {
        throw new StorageError(
          StorageErrorCode.ConfigurationError,
          'SECRETS_PROVIDER_TYPE is "azure-key-vault" but no Key Vault settings were found. Set KEY_VAULT_URL and its credentials, or SECRETS_CONFIG_PATH.',
        );
      }
      return AzureKeyVaultSecretProvider.fromSettings(settings, options);
    }
    default: {
      const exhaustiveCheck: never = providerType;
      throw new StorageError(
        StorageErrorCode.ConfigurationError,
        `Unhandled secrets provider type: ${String(exhaustiveCheck)}`,
      );
    }
  }
}
