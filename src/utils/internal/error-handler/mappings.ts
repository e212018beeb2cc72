/**
 * @fileoverview Shared error classification constants used by the error handler.
 * @module src/utils/internal/error-handler/mappings
 */

import { StorageErrorCode } from '@/types-global/errors.js';
import type { BaseErrorMapping } from './types.js';

/**
 * Maps Node.js errno codes (`err.code`) raised by the filesystem and socket
 * layers to storage error kinds.
 */
export const ERRNO_MAPPINGS: Readonly<Record<string, StorageErrorCode>> = {
  ENOENT: StorageErrorCode.NotFound,
  ENOTDIR: StorageErrorCode.NotFound,
  EEXIST: StorageErrorCode.AlreadyExists,
  ENOTEMPTY: StorageErrorCode.AlreadyExists,
  EACCES: StorageErrorCode.PermissionDenied,
  EPERM: StorageErrorCode.PermissionDenied,
  EROFS: StorageErrorCode.PermissionDenied,
  EISDIR: StorageErrorCode.InvalidArgument,
  EINVAL: StorageErrorCode.InvalidArgument,
  ENAMETOOLONG: StorageErrorCode.InvalidArgument,
  ECONNRESET: StorageErrorCode.BackendUnavailable,
  ECONNREFUSED: StorageErrorCode.BackendUnavailable,
  ENOTFOUND: StorageErrorCode.BackendUnavailable,
  ETIMEDOUT: StorageErrorCode.BackendUnavailable,
  EAI_AGAIN: StorageErrorCode.BackendUnavailable,
};

/**
 * Maps HTTP status codes reported by cloud SDK errors to storage error kinds.
 * 401 is a credential problem on our side, so the backend is unusable rather
 * than the caller being denied.
 */
export const HTTP_STATUS_MAPPINGS: Readonly<Record<number, StorageErrorCode>> =
  {
    400: StorageErrorCode.InvalidArgument,
    401: StorageErrorCode.BackendUnavailable,
    403: StorageErrorCode.PermissionDenied,
    404: StorageErrorCode.NotFound,
    409: StorageErrorCode.AlreadyExists,
    412: StorageErrorCode.AlreadyExists,
    429: StorageErrorCode.BackendUnavailable,
  };

/**
 * Maps standard JavaScript error constructor names to storage error kinds.
 */
export const ERROR_TYPE_MAPPINGS: Readonly<Record<string, StorageErrorCode>> = {
  SyntaxError: StorageErrorCode.InvalidArgument,
  TypeError: StorageErrorCode.InvalidArgument,
  RangeError: StorageErrorCode.InvalidArgument,
  URIError: StorageErrorCode.InvalidArgument,
  ReferenceError: StorageErrorCode.InternalError,
  EvalError: StorageErrorCode.InternalError,
  ZodError: StorageErrorCode.InvalidArgument,
};

/**
 * Rules classifying errors by message/name patterns.
 * Order matters: more specific patterns precede generic ones.
 */
export const COMMON_ERROR_PATTERNS: ReadonlyArray<Readonly<BaseErrorMapping>> =
  [
    {
      pattern: /permission|forbidden|access.*denied|not.*allowed/i,
      errorCode: StorageErrorCode.PermissionDenied,
    },
    {
      pattern:
        /not found|no such|doesn't exist|does not exist|couldn't find|notfound/i,
      errorCode: StorageErrorCode.NotFound,
    },
    {
      pattern: /already exists|conflict|duplicate|alreadyexists/i,
      errorCode: StorageErrorCode.AlreadyExists,
    },
    {
      pattern:
        /unauthorized|unauthenticated|invalid.*credential|expired.*token/i,
      errorCode: StorageErrorCode.BackendUnavailable,
    },
    {
      pattern: /invalid|malformed|bad request|wrong format|missing required/i,
      errorCode: StorageErrorCode.InvalidArgument,
    },
    {
      pattern:
        /service unavailable|bad gateway|gateway timeout|timed out|timeout|rate limit|too many requests|throttled|socket hang up|network/i,
      errorCode: StorageErrorCode.BackendUnavailable,
    },
  ];
