/**
 * @fileoverview Loads and validates the secrets configuration file.
 * The file names the Key Vault to read from and, per storage backend, the
 * secret holding that backend's credentials.
 * @module src/secrets/secretsConfig
 */
import { readFile } from 'fs/promises';
import { z } from 'zod';

import { StorageError, StorageErrorCode } from '@/types-global/errors.js';

export const KeyVaultSettingsSchema = z.object({
  vaultUrl: z.string().url(),
  tenantId: z.string().min(1),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
});

export const SecretsFileSchema = z.object({
  common: KeyVaultSettingsSchema,
  storages: z
    .record(z.string(), z.object({ secretName: z.string().min(1) }))
    .default({}),
});

export type KeyVaultSettings = z.infer<typeof KeyVaultSettingsSchema>;
export type SecretsFile = z.infer<typeof SecretsFileSchema>;

/**
 * Reads the secrets file at `filePath`.
 * @throws {StorageError} `ConfigurationError` if the file is missing, empty,
 *   not JSON, or lacks a required field.
 */
export async function loadSecretsFile(filePath: string): Promise<SecretsFile> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new StorageError(
      StorageErrorCode.ConfigurationError,
      `Secrets configuration file could not be read: ${filePath}`,
      { filePath },
      { cause: error },
    );
  }

  if (text.trim() === '') {
    throw new StorageError(
      StorageErrorCode.ConfigurationError,
      `Secrets configuration file is empty: ${filePath}`,
      { filePath },
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new StorageError(
      StorageErrorCode.ConfigurationError,
      `Secrets configuration file is not valid JSON: ${filePath}`,
      { filePath },
      { cause: error },
    );
  }

  const parsed = SecretsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StorageError(
      StorageErrorCode.ConfigurationError,
      `Secrets configuration file is invalid: ${filePath}`,
      { filePath, validationErrors: parsed.error.flatten().fieldErrors },
    );
  }
  return parsed.data;
}
