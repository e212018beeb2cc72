import path from 'path';
import { describe, expect, it } from 'vitest';

import { StorageErrorCode } from '../../../src/types-global/errors.js';
import {
  sanitization,
  sanitizeInputForLogging,
} from '../../../src/utils/security/sanitization.js';

describe('Sanitization Utility', () => {
  describe('sanitizePath', () => {
    const rootDir = path.resolve('/srv/storage');

    it('should resolve a relative path inside the root directory', () => {
      const result = sanitization.sanitizePath('docs/../docs/report.txt', {
        rootDir,
      });

      expect(result.sanitizedPath).toBe(path.join('docs', 'report.txt'));
      expect(result.resolvedPath).toBe(path.join(rootDir, 'docs', 'report.txt'));
    });

    it('should return "." for the root directory itself', () => {
      const result = sanitization.sanitizePath('.', { rootDir });
      expect(result.sanitizedPath).toBe('.');
      expect(result.resolvedPath).toBe(rootDir);
    });

    it('should reject traversal out of the root directory', () => {
      expect(() =>
        sanitization.sanitizePath('../etc/passwd', { rootDir }),
      ).toThrowError(
        expect.objectContaining({
          code: StorageErrorCode.InvalidArgument,
          message:
            'Path traversal detected: attempts to escape the defined root directory.',
          data: { path: '../etc/passwd' },
        }),
      );
    });

    it('should reject a path containing a null byte', () => {
      expect(() => sanitization.sanitizePath('a\0b', { rootDir })).toThrowError(
        expect.objectContaining({
          code: StorageErrorCode.InvalidArgument,
          message: 'Path contains null byte, which is disallowed.',
        }),
      );
    });

    it('should reject an empty path', () => {
      expect(() => sanitization.sanitizePath('', { rootDir })).toThrowError(
        expect.objectContaining({ code: StorageErrorCode.InvalidArgument }),
      );
    });

    it('should reject an absolute path outside the root directory', () => {
      const outside = path.resolve('/tmp/file.txt');
      expect(() => sanitization.sanitizePath(outside, { rootDir })).toThrowError(
        expect.objectContaining({
          code: StorageErrorCode.InvalidArgument,
          message:
            'Path traversal detected: attempts to escape the defined root directory.',
        }),
      );
    });

    it('should accept an absolute path inside the root directory', () => {
      const inside = path.join(rootDir, 'docs', 'a.txt');
      expect(sanitization.sanitizePath(inside, { rootDir }).sanitizedPath).toBe(
        path.join('docs', 'a.txt'),
      );
    });
  });

  describe('sanitizeForLogging', () => {
    it('should redact credential fields in nested objects', () => {
      const input = {
        provider: 'azure-blob',
        connectionString: 'test-secret',
        settings: {
          clientSecret: 'test-secret',
          vaultUrl: 'https://example.vault.azure.net',
        },
        keys: [{ private_key: 'test-secret' }],
      };

      expect(sanitizeInputForLogging(input)).toEqual({
        provider: 'azure-blob',
        connectionString: '[REDACTED]',
        settings: {
          clientSecret: '[REDACTED]',
          vaultUrl: 'https://example.vault.azure.net',
        },
        keys: [{ private_key: '[REDACTED]' }],
      });
    });

    it('should not mutate the original input', () => {
      const input = { password: 'test-secret' };
      sanitization.sanitizeForLogging(input);
      expect(input.password).toBe('test-secret');
    });

    it('should return primitives unchanged', () => {
      expect(sanitization.sanitizeForLogging('plain')).toBe('plain');
      expect(sanitization.sanitizeForLogging(42)).toBe(42);
      expect(sanitization.sanitizeForLogging(undefined)).toBeUndefined();
    });

    it('should return a placeholder for values that cannot be cloned', () => {
      const input = { callback: () => undefined };
      expect(sanitization.sanitizeForLogging(input)).toBe(
        '[Log Sanitization Failed]',
      );
    });
  });
});
