import { stdSerializers } from 'pino';

export type SanitizedError = ReturnType<typeof stdSerializers.err>;

export function normalizeError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === 'string') {
    return new Error(error);
  }
  if (typeof error === 'symbol' || typeof error === 'function') {
    return new Error(error.toString());
  }
  if (error === null || typeof error !== 'object') {
    return new Error(String(error));
  }

  try {
    return new Error(JSON.stringify(error));
  } catch {
    // circular structures
    return new Error(String(error));
  }
}

/**
 * Turns anything thrown into the plain object pino logs for `err`, keeping `type`, `message`,
 * `stack`, the cause chain and any own enumerable fields of the error.
 */
export function sanitizeError(error: unknown): SanitizedError {
  return stdSerializers.err(normalizeError(error));
}
