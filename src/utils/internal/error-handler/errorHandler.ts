/**
 * @fileoverview Main ErrorHandler implementation with logging and telemetry integration.
 * @module src/utils/internal/error-handler/errorHandler
 */

import { SpanStatusCode, trace } from '@opentelemetry/api';

import { StorageError, StorageErrorCode } from '@/types-global/errors.js';
import { logger as sharedLogger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';
import { generateUUID } from '@/utils/security/idGenerator.js';
import { sanitizeInputForLogging } from '@/utils/security/sanitization.js';

import {
  COMMON_ERROR_PATTERNS,
  ERRNO_MAPPINGS,
  ERROR_TYPE_MAPPINGS,
  HTTP_STATUS_MAPPINGS,
} from './mappings.js';
import {
  createSafeRegex,
  getErrnoCode,
  getErrorMessage,
  getErrorName,
  getErrorStatus,
} from './helpers.js';
import type { ErrorHandlerOptions } from './types.js';

/**
 * A utility class providing static methods for comprehensive error handling.
 */
export class ErrorHandler {
  /**
   * Determines the {@link StorageErrorCode} for a given error.
   * Checks, in order: `StorageError` instances, Node errno codes, HTTP statuses
   * carried by SDK errors, `ERROR_TYPE_MAPPINGS`, and `COMMON_ERROR_PATTERNS`.
   * @param error - The error instance or value to classify.
   * @param fallback - Code returned when nothing matches.
   */
  public static determineErrorCode(
    error: unknown,
    fallback: StorageErrorCode = StorageErrorCode.InternalError,
  ): StorageErrorCode {
    if (error instanceof StorageError) {
      return error.code;
    }

    const errno = getErrnoCode(error);
    const mappedFromErrno = errno ? ERRNO_MAPPINGS[errno] : undefined;
    if (mappedFromErrno) {
      return mappedFromErrno;
    }

    const status = getErrorStatus(error);
    if (status !== undefined) {
      const mappedFromStatus = HTTP_STATUS_MAPPINGS[status];
      if (mappedFromStatus) {
        return mappedFromStatus;
      }
      if (status >= 500) {
        return StorageErrorCode.BackendUnavailable;
      }
    }

    const errorName = getErrorName(error);
    const errorMessage = getErrorMessage(error);

    const mappedFromType = ERROR_TYPE_MAPPINGS[errorName];
    if (mappedFromType) {
      return mappedFromType;
    }

    for (const mapping of COMMON_ERROR_PATTERNS) {
      const regex = createSafeRegex(mapping.pattern);
      if (regex.test(errorMessage) || regex.test(errorName)) {
        return mapping.errorCode;
      }
    }
    return fallback;
  }

  /**
   * Handles an error with consistent logging.
   * Sanitizes input, determines the error code, logs details, and can rethrow.
   * @param error - The error instance or value that occurred.
   * @param options - Configuration for handling the error.
   * @returns The handled `StorageError`.
   */
  public static handleError(
    error: unknown,
    options: ErrorHandlerOptions,
  ): StorageError {
    // --- OpenTelemetry Integration ---
    const activeSpan = trace.getActiveSpan();
    if (activeSpan) {
      if (error instanceof Error) {
        activeSpan.recordException(error);
      }
      activeSpan.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
    }
    // --- End OpenTelemetry Integration ---

    const {
      context = {},
      operation,
      input,
      rethrow = false,
      fallbackErrorCode,
      logger = sharedLogger,
    } = options;

    const sanitizedInput =
      input !== undefined ? sanitizeInputForLogging(input) : undefined;
    const originalErrorName = getErrorName(error);
    const originalErrorMessage = getErrorMessage(error);
    const originalStack = error instanceof Error ? error.stack : undefined;

    let finalError: StorageError;
    let loggedErrorCode: StorageErrorCode;

    const errorDataSeed =
      error instanceof StorageError &&
      typeof error.data === 'object' &&
      error.data !== null
        ? { ...error.data }
        : {};

    const consolidatedData: Record<string, unknown> = {
      ...errorDataSeed,
      ...context,
      originalErrorName,
      originalMessage: originalErrorMessage,
    };
    if (
      originalStack &&
      !(error instanceof StorageError && error.data?.originalStack)
    ) {
      consolidatedData.originalStack = originalStack;
    }

    const cause = error instanceof Error ? error : undefined;
    const rootCause = (() => {
      let current: unknown = cause;
      let depth = 0;
      while (
        current &&
        current instanceof Error &&
        current.cause &&
        depth < 5
      ) {
        current = current.cause;
        depth += 1;
      }
      return current instanceof Error
        ? { name: current.name, message: current.message }
        : undefined;
    })();
    if (rootCause) {
      consolidatedData['rootCause'] = rootCause;
    }

    if (error instanceof StorageError) {
      loggedErrorCode = error.code;
      finalError = new StorageError(
        error.code,
        error.message,
        consolidatedData,
        { cause },
      );
    } else {
      loggedErrorCode = ErrorHandler.determineErrorCode(
        error,
        fallbackErrorCode,
      );
      const message = `Error in ${operation}: ${originalErrorMessage}`;
      finalError = new StorageError(loggedErrorCode, message, consolidatedData, {
        cause,
      });
    }

    if (!finalError.stack && originalStack) {
      finalError.stack = originalStack;
    }

    const logRequestId =
      typeof context.requestId === 'string' && context.requestId
        ? context.requestId
        : generateUUID();

    const logTimestamp =
      typeof context.timestamp === 'string' && context.timestamp
        ? context.timestamp
        : new Date().toISOString();

    const stack = finalError.stack ?? originalStack;
    const logContext: RequestContext = {
      requestId: logRequestId,
      timestamp: logTimestamp,
      operation,
      input: sanitizedInput,
      errorCode: loggedErrorCode,
      originalErrorType: originalErrorName,
      finalErrorType: getErrorName(finalError),
      ...Object.fromEntries(
        Object.entries(context).filter(
          ([key]) => key !== 'requestId' && key !== 'timestamp',
        ),
      ),
      errorData: finalError.data ?? consolidatedData,
      ...(stack ? { stack } : {}),
    };

    logger.error(`Error in ${operation}: ${originalErrorMessage}`, logContext);

    if (rethrow) {
      throw finalError;
    }
    return finalError;
  }

  /**
   * Safely executes a function (sync or async) and handles errors using `ErrorHandler.handleError`.
   * The error is always rethrown.
   * @template T The expected return type of the function `fn`.
   * @param fn - The function to execute.
   * @param options - Error handling options (excluding `rethrow`).
   * @returns A promise resolving with the result of `fn` if successful.
   * @throws {StorageError} The error processed by `ErrorHandler.handleError`.
   */
  public static async tryCatch<T>(
    fn: () => Promise<T> | T,
    options: Omit<ErrorHandlerOptions, 'rethrow'>,
  ): Promise<T> {
    try {
      return await Promise.resolve(fn());
    } catch (caughtError) {
      // ErrorHandler.handleError will return the error to be thrown.
      throw ErrorHandler.handleError(caughtError, {
        ...options,
        rethrow: true,
      });
    }
  }
}
