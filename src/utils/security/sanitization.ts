/**
 * @fileoverview Provides the `Sanitization` class used for path containment checks
 * and for redacting sensitive information (connection strings, client secrets,
 * service-account keys) from data intended for logging.
 * @module src/utils/security/sanitization
 */
import path from 'path';

import { StorageError, StorageErrorCode } from '@/types-global/errors.js';
import { logger } from '@/utils/internal/logger.js';
import { requestContextService } from '@/utils/internal/requestContext.js';

/**
 * Options controlling how file paths are validated.
 */
export interface PathSanitizeOptions {
  /** Sanitized paths must stay inside this directory. */
  rootDir: string;
}

export interface SanitizedPathInfo {
  /** The normalized path relative to `rootDir`. */
  sanitizedPath: string;
  /** The absolute path the sanitized path refers to. */
  resolvedPath: string;
  originalInput: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export class Sanitization {
  private static instance: Sanitization;

  /**
   * Field names considered sensitive for log redaction.
   * Case-insensitive matching is applied.
   */
  private readonly sensitiveFields: string[] = [
    'password',
    'token',
    'secret',
    'apiKey',
    'credential',
    'credentials',
    'authorization',
    'clientsecret',
    'client_secret',
    'private_key',
    'privatekey',
    'connectionString',
    'accountKey',
    'sas',
  ];

  private constructor() {}

  public static getInstance(): Sanitization {
    if (!Sanitization.instance) {
      Sanitization.instance = new Sanitization();
    }
    return Sanitization.instance;
  }

  /**
   * Gets the sensitive field names in the form pino's `redact.paths` accepts.
   */
  public getSensitivePinoFields(): string[] {
    return this.sensitiveFields.map((field) => field.replace(/[-_]/g, ''));
  }

  /**
   * Normalizes a file path and verifies it stays inside `options.rootDir`.
   * @throws {StorageError} `InvalidArgument` if the path is empty, contains a
   * null byte or escapes the root directory.
   */
  public sanitizePath(
    input: string,
    options: PathSanitizeOptions,
  ): SanitizedPathInfo {
    const originalInput = input;
    const resolvedRootDir = path.resolve(options.rootDir);

    try {
      if (!input || typeof input !== 'string')
        throw new Error('Invalid path input: must be a non-empty string.');
      if (input.includes('\0'))
        throw new Error('Path contains null byte, which is disallowed.');

      const fullPath = path.resolve(resolvedRootDir, path.normalize(input));
      if (
        !fullPath.startsWith(resolvedRootDir + path.sep) &&
        fullPath !== resolvedRootDir
      ) {
        throw new Error(
          'Path traversal detected: attempts to escape the defined root directory.',
        );
      }
      const relative = path.relative(resolvedRootDir, fullPath);
      return {
        sanitizedPath: relative === '' ? '.' : relative,
        resolvedPath: fullPath,
        originalInput,
      };
    } catch (error) {
      logger.warning(
        'Path sanitization error',
        requestContextService.createRequestContext({
          operation: 'Sanitization.sanitizePath.error',
          additionalContext: {
            originalPathInput: originalInput,
            rootDir: resolvedRootDir,
            errorMessage:
              error instanceof Error ? error.message : String(error),
          },
        }),
      );
      throw new StorageError(
        StorageErrorCode.InvalidArgument,
        error instanceof Error
          ? error.message
          : 'Invalid or unsafe path provided.',
        { path: originalInput },
      );
    }
  }

  /**
   * Sanitizes input for logging by redacting sensitive fields.
   * Creates a deep clone and replaces values of fields matching the sensitive
   * field list with "[REDACTED]".
   *
   * @returns A sanitized deep clone, the original value for primitives, or
   *   "[Log Sanitization Failed]" when the input cannot be cloned (streams, functions).
   */
  public sanitizeForLogging(input: unknown): unknown {
    try {
      if (!input || typeof input !== 'object') return input;

      const clonedInput: unknown = structuredClone(input);
      this.redactSensitiveFields(clonedInput);
      return clonedInput;
    } catch (error) {
      logger.error(
        'Error during log sanitization, returning placeholder.',
        requestContextService.createRequestContext({
          operation: 'Sanitization.sanitizeForLogging.error',
          additionalContext: {
            errorMessage:
              error instanceof Error ? error.message : String(error),
          },
        }),
      );
      return '[Log Sanitization Failed]';
    }
  }

  /**
   * Recursively redacts sensitive fields in an object or array in place.
   */
  private redactSensitiveFields(obj: unknown): void {
    if (Array.isArray(obj)) {
      obj.forEach((item) => this.redactSensitiveFields(item));
      return;
    }
    if (!isRecord(obj)) return;

    const normalize = (str: string): string =>
      str.toLowerCase().replace(/[^a-z0-9]/g, '');
    const normalizedSensitiveSet = new Set(
      this.sensitiveFields.map((f) => normalize(f)).filter(Boolean),
    );
    const wordSensitiveSet = new Set(
      this.sensitiveFields.map((f) => f.toLowerCase()).filter(Boolean),
    );

    for (const key of Object.keys(obj)) {
      const value = obj[key];
      // Token-based matching handles camelCase, snake_case and kebab-case keys
      const keyWords = key
        .replace(/([A-Z])/g, ' $1')
        .toLowerCase()
        .split(/[\s_-]+/)
        .filter(Boolean);

      const isSensitive =
        normalizedSensitiveSet.has(normalize(key)) ||
        keyWords.some((w) => wordSensitiveSet.has(w));

      if (isSensitive) {
        obj[key] = '[REDACTED]';
      } else if (value && typeof value === 'object') {
        this.redactSensitiveFields(value);
      }
    }
  }
}

/**
 * Singleton instance of the `Sanitization` class.
 */
export const sanitization = Sanitization.getInstance();

/**
 * Convenience function calling `sanitization.sanitizeForLogging`.
 */
export const sanitizeInputForLogging = (input: unknown): unknown =>
  sanitization.sanitizeForLogging(input);
