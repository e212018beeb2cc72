/**
 * @fileoverview Barrel file for the secrets module.
 * @module src/secrets
 */

export type { ISecretProvider } from './ISecretProvider.js';
export {
  AzureKeyVaultSecretProvider,
  type AzureKeyVaultSecretProviderOptions,
  type SecretReader,
} from './azureKeyVaultSecretProvider.js';
export { EnvironmentSecretProvider } from './environmentSecretProvider.js';
export {
  createSecretProvider,
  loadSecretsFileIfConfigured,
} from './secretProviderFactory.js';
export {
  loadSecretsFile,
  type KeyVaultSettings,
  type SecretsFile,
} from './secretsConfig.js';
