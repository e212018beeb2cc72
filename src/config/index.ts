/**
 * @fileoverview Loads, validates, and exports application configuration.
 * This module centralizes configuration management, sourcing values from
 * environment variables. It uses Zod for schema validation so that the storage
 * backend selection, credential sources and logging options are type-safe.
 *
 * @module src/config/index
 */
import { readFileSync } from 'fs';
import { homedir } from 'os';

import dotenv from 'dotenv';
import { z } from 'zod';

import { StorageError, StorageErrorCode } from '../types-global/errors.js';

const PackageManifestSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  description: z.string().optional(),
});

const readPackageManifest = (): z.infer<typeof PackageManifestSchema> => {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'),
    );
    const parsed = PackageManifestSchema.safeParse(raw);
    return parsed.success ? parsed.data : {};
  } catch {
    // Bundled or relocated builds may not ship package.json; env vars cover it.
    return {};
  }
};

const packageManifest = readPackageManifest();

// Suppress dotenv's noisy initial log message as suggested by its output.
dotenv.config({ quiet: true });

// --- Helper Functions ---
const emptyStringAsUndefined = (val: unknown) => {
  if (typeof val === 'string' && val.trim() === '') {
    return undefined;
  }
  return val;
};

/**
 * Builds a preprocessor that lower-cases a string and maps known aliases.
 */
const withAliases =
  (aliasMap: Record<string, string>) =>
  (val: unknown): unknown => {
    const str = emptyStringAsUndefined(val);
    if (typeof str === 'string') {
      const lower = str.trim().toLowerCase();
      return aliasMap[lower] ?? lower;
    }
    return str;
  };

/**
 * Expands tilde (~) in paths to the user's home directory.
 * Returns undefined for empty/undefined inputs.
 *
 * @example
 * expandTildePath('~/storage/') // '/Users/username/storage/'
 * expandTildePath('/absolute/path') // '/absolute/path' (unchanged)
 * expandTildePath('') // undefined
 */
const expandTildePath = (path: unknown): string | undefined => {
  if (typeof path !== 'string' || path.trim() === '') {
    return undefined;
  }

  const trimmed = path.trim();

  if (trimmed.startsWith('~/')) {
    return `${homedir()}${trimmed.slice(1)}`;
  }

  if (trimmed === '~') {
    return homedir();
  }

  return trimmed;
};

// --- Schema Definition ---
const ConfigSchema = z.object({
  pkg: z.object({
    name: z.string(),
    version: z.string(),
    description: z.string().optional(),
  }),
  logLevel: z
    .preprocess(
      withAliases({
        warn: 'warning',
        err: 'error',
        information: 'info',
        fatal: 'emerg',
        critical: 'crit',
      }),
      z.enum([
        'debug',
        'info',
        'notice',
        'warning',
        'error',
        'crit',
        'alert',
        'emerg',
      ]),
    )
    .default('info'),
  logsPath: z.preprocess(expandTildePath, z.string().optional()),
  environment: z
    .preprocess(
      withAliases({
        dev: 'development',
        prod: 'production',
        test: 'testing',
      }),
      z.enum(['development', 'production', 'testing']),
    )
    .default('development'),
  storage: z.object({
    providerType: z
      .preprocess(
        withAliases({
          fs: 'local-disk',
          local: 'local-disk',
          filesystem: 'local-disk',
          azure: 'azure-blob',
          blob: 'azure-blob',
          drive: 'google-drive',
          gdrive: 'google-drive',
          mem: 'in-memory',
        }),
        z.enum(['local-disk', 'azure-blob', 'google-drive', 'in-memory']),
      )
      .default('local-disk'),
    localDisk: z.object({
      rootDir: z.preprocess(expandTildePath, z.string().optional()),
    }),
    azureBlob: z.object({
      connectionString: z.preprocess(
        emptyStringAsUndefined,
        z.string().optional(),
      ),
      secretName: z.preprocess(emptyStringAsUndefined, z.string().optional()),
    }),
    googleDrive: z.object({
      credentialsJson: z.preprocess(
        emptyStringAsUndefined,
        z.string().optional(),
      ),
      secretName: z.preprocess(emptyStringAsUndefined, z.string().optional()),
      rootFolderId: z.preprocess(
        emptyStringAsUndefined,
        z.string().default('root'),
      ),
      deleteBatchThreshold: z.preprocess(
        emptyStringAsUndefined,
        z.coerce.number().int().positive().default(50),
      ),
    }),
  }),
  secrets: z.object({
    providerType: z
      .preprocess(
        withAliases({
          env: 'environment',
          keyvault: 'azure-key-vault',
          'key-vault': 'azure-key-vault',
        }),
        z.enum(['environment', 'azure-key-vault']),
      )
      .default('environment'),
    configPath: z.preprocess(expandTildePath, z.string().optional()),
    keyVault: z
      .object({
        vaultUrl: z.string().url(),
        tenantId: z.string().min(1),
        clientId: z.string().min(1),
        clientSecret: z.string().min(1),
      })
      .optional(),
    cacheTtlMs: z.preprocess(
      emptyStringAsUndefined,
      z.coerce.number().int().nonnegative().default(3_600_000),
    ),
  }),
});

// --- Parsing Logic ---
const parseConfig = () => {
  const env = process.env;

  const rawConfig = {
    pkg: {
      name: env.PACKAGE_NAME ?? packageManifest.name,
      version: env.PACKAGE_VERSION ?? packageManifest.version,
      description: env.PACKAGE_DESCRIPTION ?? packageManifest.description,
    },
    logLevel: env.LOG_LEVEL,
    logsPath: env.LOGS_DIR,
    environment: env.NODE_ENV,
    storage: {
      providerType: env.STORAGE_PROVIDER_TYPE,
      localDisk: {
        rootDir: env.STORAGE_LOCAL_ROOT_DIR,
      },
      azureBlob: {
        connectionString: env.AZURE_BLOB_CONNECTION_STRING,
        secretName: env.AZURE_BLOB_SECRET_NAME,
      },
      googleDrive: {
        credentialsJson: env.GOOGLE_DRIVE_CREDENTIALS,
        secretName: env.GOOGLE_DRIVE_SECRET_NAME,
        rootFolderId: env.GOOGLE_DRIVE_ROOT_FOLDER_ID,
        deleteBatchThreshold: env.GOOGLE_DRIVE_DELETE_BATCH_THRESHOLD,
      },
    },
    secrets: {
      providerType: env.SECRETS_PROVIDER_TYPE,
      configPath: env.SECRETS_CONFIG_PATH,
      keyVault: env.KEY_VAULT_URL
        ? {
            vaultUrl: env.KEY_VAULT_URL,
            tenantId: env.KEY_VAULT_TENANT_ID,
            clientId: env.KEY_VAULT_CLIENT_ID,
            clientSecret: env.KEY_VAULT_CLIENT_SECRET,
          }
        : undefined,
      cacheTtlMs: env.SECRETS_CACHE_TTL_MS,
    },
  };

  const finalRawConfig = {
    ...rawConfig,
    logsPath: rawConfig.logsPath ?? 'logs',
  };

  const parsedConfig = ConfigSchema.safeParse(finalRawConfig);

  if (!parsedConfig.success) {
    // Keep TTY error logging for developer convenience.
    if (process.stdout.isTTY) {
      console.error(
        'Invalid configuration found. Please check your environment variables.',
        parsedConfig.error.flatten().fieldErrors,
      );
    }
    throw new StorageError(
      StorageErrorCode.ConfigurationError,
      'Invalid application configuration.',
      {
        validationErrors: parsedConfig.error.flatten().fieldErrors,
      },
    );
  }

  return parsedConfig.data;
};

const config = parseConfig();

/**
 * Export the runtime configuration, parser, and schema, plus a static AppConfig type.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;
export type StorageProviderType = AppConfig['storage']['providerType'];

export { config, ConfigSchema, parseConfig };
