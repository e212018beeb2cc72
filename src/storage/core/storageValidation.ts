/**
 * @fileoverview Input validation utilities for storage operations.
 * Ensures every provider rejects malformed paths the same way, before any
 * backend call is made.
 * @module src/storage/core/storageValidation
 */
import { StorageError, StorageErrorCode } from '@/types-global/errors.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

const MAX_PATH_LENGTH = 1024;

/**
 * A logical path split into a container (first segment) and the remainder.
 */
export interface ContainerPath {
  container: string;
  /** Remaining segments joined with `/`; empty when the path names only a container. */
  rest: string;
}

/**
 * Validates a logical path.
 * @throws {StorageError} `InvalidArgument` if the path is not a string, is
 *   empty or whitespace-only, contains a null byte, or is too long.
 */
export function validatePath(path: unknown, context: RequestContext): string {
  if (typeof path !== 'string' || path.trim() === '') {
    throw new StorageError(
      StorageErrorCode.InvalidArgument,
      'Path must be a non-empty string.',
      { ...context, path },
    );
  }

  if (path.length > MAX_PATH_LENGTH) {
    throw new StorageError(
      StorageErrorCode.InvalidArgument,
      `Path exceeds maximum length of ${MAX_PATH_LENGTH} characters.`,
      { ...context, path: path.substring(0, 50) + '...' },
    );
  }

  if (path.includes('\0')) {
    throw new StorageError(
      StorageErrorCode.InvalidArgument,
      'Path must not contain null bytes.',
      { ...context, path },
    );
  }

  return path;
}

/**
 * Validates a logical path and splits it on `/`, dropping empty segments.
 * @throws {StorageError} `InvalidArgument` if no segments remain (e.g. `"/"`).
 */
export function splitPath(path: unknown, context: RequestContext): string[] {
  const valid = validatePath(path, context);
  const segments = valid.split('/').filter((segment) => segment !== '');
  if (segments.length === 0) {
    throw new StorageError(
      StorageErrorCode.InvalidArgument,
      'Path must contain at least one segment.',
      { ...context, path: valid },
    );
  }
  return segments;
}

/**
 * Splits a logical path into the container named by its first segment and the
 * remaining segments. Object stores overload the first segment this way.
 */
export function parseContainerPath(
  path: unknown,
  context: RequestContext,
): ContainerPath {
  const [container = '', ...rest] = splitPath(path, context);
  return { container, rest: rest.join('/') };
}

/**
 * Validates a batch size used for fan-out operations.
 */
export function validateBatchSize(size: number, context: RequestContext): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new StorageError(
      StorageErrorCode.InvalidArgument,
      'Batch size must be a positive integer.',
      { ...context, batchSize: size },
    );
  }
}
