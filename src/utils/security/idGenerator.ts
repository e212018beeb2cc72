/**
 * @fileoverview Identifier helpers for request contexts and error log entries.
 *
 * Must not import the logger, which imports `requestContextService`, which
 * imports this module.
 * @module src/utils/security/idGenerator
 */
import { randomUUID as cryptoRandomUUID, randomBytes } from 'crypto';

const REQUEST_ID_CHARSET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * Generates a cryptographically secure random string using rejection sampling
 * so every character of `charset` is equally likely.
 */
export function generateSecureRandomString(
  length: number,
  charset: string = REQUEST_ID_CHARSET,
): string {
  let result = '';
  const maxValidByteValue = Math.floor(256 / charset.length) * charset.length;

  while (result.length < length) {
    const byte = randomBytes(1)[0];

    if (byte !== undefined && byte < maxValidByteValue) {
      const char = charset[byte % charset.length];
      if (char) {
        result += char;
      }
    }
  }
  return result;
}

/**
 * Generates a standard Version 4 UUID.
 */
export const generateUUID = (): string => {
  return cryptoRandomUUID();
};

/**
 * Generates a 10-character alphanumeric ID with a hyphen in the middle
 * (e.g. `ABCDE-FGHIJ`), short enough to scan in log lines.
 */
export const generateRequestContextId = (): string => {
  const part1 = generateSecureRandomString(5);
  const part2 = generateSecureRandomString(5);
  return `${part1}-${part2}`;
};
