/**
 * @fileoverview Helper utilities for error inspection and normalization.
 * @module src/utils/internal/error-handler/helpers
 */

/**
 * Creates a "safe" RegExp for testing error messages.
 * Ensures case-insensitivity and removes the global flag.
 * @param pattern - The string or RegExp pattern.
 * @returns A new RegExp instance.
 */
export function createSafeRegex(pattern: string | RegExp): RegExp {
  if (pattern instanceof RegExp) {
    let flags = pattern.flags.replace('g', '');
    if (!flags.includes('i')) {
      flags += 'i';
    }
    return new RegExp(pattern.source, flags);
  }
  return new RegExp(pattern, 'i');
}

/**
 * Retrieves a descriptive name for an error object or value.
 * @param error - The error object or value.
 * @returns A string representing the error's name or type.
 */
export function getErrorName(error: unknown): string {
  if (error instanceof Error) {
    return error.name || 'Error';
  }
  if (error === null) {
    return 'NullValueEncountered';
  }
  if (error === undefined) {
    return 'UndefinedValueEncountered';
  }
  if (
    typeof error === 'object' &&
    error !== null &&
    error.constructor &&
    typeof error.constructor.name === 'string' &&
    error.constructor.name !== 'Object'
  ) {
    return `${error.constructor.name}Encountered`;
  }
  return `${typeof error}Encountered`;
}

/**
 * Extracts a message string from an error object or value.
 * @param error - The error object or value.
 * @returns The error message string.
 */
export function getErrorMessage(error: unknown): string {
  try {
    if (error instanceof Error) {
      // AggregateError should surface combined messages succinctly
      if (error instanceof AggregateError && Array.isArray(error.errors)) {
        const inner = error.errors
          .map((e: unknown) => (e instanceof Error ? e.message : String(e)))
          .filter(Boolean)
          .slice(0, 3)
          .join('; ');
        return inner ? `${error.message}: ${inner}` : error.message;
      }
      return error.message;
    }
    if (error === null) {
      return 'Null value encountered as error';
    }
    if (error === undefined) {
      return 'Undefined value encountered as error';
    }
    if (typeof error === 'string') {
      return error;
    }
    if (typeof error === 'number' || typeof error === 'boolean') {
      return String(error);
    }
    if (typeof error === 'bigint') {
      return error.toString();
    }
    if (typeof error === 'function') {
      return `[function ${error.name || 'anonymous'}]`;
    }
    if (typeof error === 'object') {
      try {
        const json = JSON.stringify(error);
        if (json && json !== '{}') return json;
      } catch {
        // fall through
      }
      const ctor = error.constructor?.name;
      return `Non-Error object encountered (constructor: ${ctor || 'Object'})`;
    }
    if (typeof error === 'symbol') {
      return error.toString();
    }
    // c8 ignore next
    return '[unrepresentable error]';
  } catch (conversionError) {
    return `Error converting error to string: ${conversionError instanceof Error ? conversionError.message : 'Unknown conversion error'}`;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Reads the Node.js errno string (`ENOENT`, `EACCES`, ...) from an error, if any.
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (!isRecord(error)) return undefined;
  const { code } = error;
  return typeof code === 'string' && /^E[A-Z_]+$/.test(code)
    ? code
    : undefined;
}

/**
 * Reads an HTTP status from the shapes cloud SDKs attach to their errors:
 * `statusCode` (Azure REST errors), `status`, `response.status` (gaxios) or a
 * numeric `code` (Google API errors).
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;

  const candidates: unknown[] = [error.statusCode, error.status];
  if (isRecord(error.response)) {
    candidates.push(error.response.status);
  }
  candidates.push(error.code);

  for (const candidate of candidates) {
    if (
      typeof candidate === 'number' &&
      Number.isInteger(candidate) &&
      candidate >= 100 &&
      candidate <= 599
    ) {
      return candidate;
    }
  }
  return undefined;
}
