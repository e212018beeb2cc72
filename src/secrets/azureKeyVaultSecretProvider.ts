/**
 * @fileoverview Secret provider backed by Azure Key Vault.
 * Values are cached for a fixed time after they are fetched; the cache entry
 * is not refreshed on read.
 * @module src/secrets/azureKeyVaultSecretProvider
 */
import { ClientSecretCredential } from '@azure/identity';
import { SecretClient } from '@azure/keyvault-secrets';

import { StorageError, StorageErrorCode } from '@/types-global/errors.js';
import { ErrorHandler } from '@/utils/internal/error-handler/index.js';
import {
  logger as sharedLogger,
  type StorageLogger,
} from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

import type { ISecretProvider } from './ISecretProvider.js';
import type { KeyVaultSettings } from './secretsConfig.js';

export const DEFAULT_SECRET_CACHE_TTL_MS = 3_600_000;

export const KEY_VAULT_RETRY_OPTIONS = {
  maxRetries: 3,
  retryDelayInMs: 2_000,
  maxRetryDelayInMs: 16_000,
};

/**
 * The slice of `SecretClient` this provider uses.
 */
export interface SecretReader {
  getSecret(name: string): Promise<{ value?: string }>;
}

export interface AzureKeyVaultSecretProviderOptions {
  cacheTtlMs?: number;
  logger?: StorageLogger;
  /** Clock used for cache expiry. */
  now?: () => number;
}

interface CachedSecret {
  value: string;
  expiresAt: number;
}

export class AzureKeyVaultSecretProvider implements ISecretProvider {
  private readonly cache = new Map<string, CachedSecret>();
  private readonly cacheTtlMs: number;
  private readonly logger: StorageLogger;
  private readonly now: () => number;

  constructor(
    private readonly client: SecretReader,
    options: AzureKeyVaultSecretProviderOptions = {},
  ) {
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_SECRET_CACHE_TTL_MS;
    this.logger = options.logger ?? sharedLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Builds a provider that authenticates as an Entra ID application.
   */
  static fromSettings(
    settings: KeyVaultSettings,
    options: AzureKeyVaultSecretProviderOptions = {},
  ): AzureKeyVaultSecretProvider {
    const credential = new ClientSecretCredential(
      settings.tenantId,
      settings.clientId,
      settings.clientSecret,
    );
    const client = new SecretClient(settings.vaultUrl, credential, {
      retryOptions: KEY_VAULT_RETRY_OPTIONS,
    });
    return new AzureKeyVaultSecretProvider(client, options);
  }

  async getSecret(name: string, context?: RequestContext): Promise<string> {
    if (name.trim() === '') {
      throw new StorageError(
        StorageErrorCode.InvalidArgument,
        'Secret name must be a non-empty string.',
        { ...context },
      );
    }

    const cached = this.cache.get(name);
    if (cached && cached.expiresAt > this.now()) {
      return cached.value;
    }

    return ErrorHandler.tryCatch(
      async () => {
        this.logger.debug(
          `[AzureKeyVaultSecretProvider] Fetching secret: ${name}`,
          context,
        );
        const secret = await this.client.getSecret(name);
        if (!secret.value) {
          throw new StorageError(
            StorageErrorCode.NotFound,
            `Secret '${name}' has no value.`,
          );
        }
        this.cache.set(name, {
          value: secret.value,
          expiresAt: this.now() + this.cacheTtlMs,
        });
        return secret.value;
      },
      {
        operation: 'AzureKeyVaultSecretProvider.getSecret',
        context: { ...context, secretName: name },
        input: { name },
        fallbackErrorCode: StorageErrorCode.BackendUnavailable,
        logger: this.logger,
      },
    );
  }
}
