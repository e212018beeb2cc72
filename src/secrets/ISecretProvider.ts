/**
 * @fileoverview Defines the interface for a secret store.
 * Storage backends whose credentials are not configured inline fetch their
 * connection string or credentials JSON through this interface.
 * @module src/secrets/ISecretProvider
 */
import type { RequestContext } from '@/utils/internal/requestContext.js';

export interface ISecretProvider {
  /**
   * Retrieves a secret value by name.
   * @throws {StorageError} `InvalidArgument` for an empty name, `NotFound`
   *   when the secret has no value, `BackendUnavailable` when the store fails.
   */
  getSecret(name: string, context?: RequestContext): Promise<string>;
}
