/**
 * @fileoverview Shared types for the error handler utilities.
 * @module src/utils/internal/error-handler/types
 */

import type { StorageErrorCode } from '@/types-global/errors.js';
import type { StorageLogger } from '@/utils/internal/logger.js';

/**
 * Context attached to a handled error. Usually a `RequestContext` merged with
 * operation-specific fields such as `path`.
 */
export interface ErrorContext {
  /** Unique request or operation identifier */
  requestId?: string;
  [key: string]: unknown;
}

export interface ErrorHandlerOptions {
  /** The context of the operation that caused the error */
  context?: ErrorContext;
  /** The name of the operation being performed */
  operation: string;
  /** The input that caused the error; sanitized before it is logged */
  input?: unknown;
  /** Whether to rethrow the error after handling */
  rethrow?: boolean;
  /**
   * Code used for foreign errors the classifier cannot place.
   * Defaults to `InternalError`.
   */
  fallbackErrorCode?: StorageErrorCode;
  /** Logger receiving the error entry; the shared logger when omitted */
  logger?: StorageLogger;
}

export interface BaseErrorMapping {
  /** Pattern to match in the error message or name */
  pattern: string | RegExp;
  errorCode: StorageErrorCode;
}
