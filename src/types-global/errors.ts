/**
 * @fileoverview Defines the storage error codes and the custom error class
 * shared by every storage backend.
 * @module src/types-global/errors
 */

/**
 * Error kinds surfaced by storage operations and the surrounding infrastructure.
 * The first five are the operation-level kinds every provider reports; the
 * remaining ones come from configuration and unexpected internal failures.
 */
export enum StorageErrorCode {
  InvalidArgument = 'InvalidArgument',
  AlreadyExists = 'AlreadyExists',
  NotFound = 'NotFound',
  BackendUnavailable = 'BackendUnavailable',
  PermissionDenied = 'PermissionDenied',

  ConfigurationError = 'ConfigurationError',
  InternalError = 'InternalError',
}

/**
 * Error class thrown by every storage provider, secret provider and the
 * configuration layer. Carries a {@link StorageErrorCode} and optional structured
 * data (the offending path, the backend, the original error name).
 */
export class StorageError extends Error {
  public code: StorageErrorCode;

  /**
   * Optional structured data about the failure, e.g. `{ path, backend }`.
   */
  public readonly data?: Record<string, unknown>;

  /**
   * @param code - The kind of failure.
   * @param message - A human-readable description of the error.
   * @param data - Optional structured context.
   */
  constructor(
    code: StorageErrorCode,
    message?: string,
    data?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);

    this.code = code;
    if (data) {
      this.data = data;
    }
    this.name = 'StorageError';

    // Maintain a proper prototype chain.
    Object.setPrototypeOf(this, StorageError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StorageError);
    }
  }
}
