/**
 * @fileoverview Secret provider backed by process environment variables.
 * @module src/secrets/environmentSecretProvider
 */
import { StorageError, StorageErrorCode } from '@/types-global/errors.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

import type { ISecretProvider } from './ISecretProvider.js';

/**
 * `my-storage.secret` becomes `MY_STORAGE_SECRET`.
 */
export function toEnvironmentKey(name: string): string {
  return name
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toUpperCase();
}

/**
 * Looks a secret up under its exact name first, then under its
 * UPPER_SNAKE_CASE form.
 */
export class EnvironmentSecretProvider implements ISecretProvider {
  constructor(
    private readonly env: Record<string, string | undefined> = process.env,
  ) {}

  async getSecret(name: string, context?: RequestContext): Promise<string> {
    if (name.trim() === '') {
      throw new StorageError(
        StorageErrorCode.InvalidArgument,
        'Secret name must be a non-empty string.',
        { ...context },
      );
    }
    const value = this.env[name] || this.env[toEnvironmentKey(name)];
    if (!value) {
      throw new StorageError(
        StorageErrorCode.NotFound,
        `Secret '${name}' is not set in the environment.`,
        { ...context, secretName: name },
      );
    }
    return value;
  }
}
