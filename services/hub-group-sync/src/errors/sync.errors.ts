import { normalizeError } from '@hub-sync/utils';

export type DirectoryProblemMetadata = Record<string, unknown>;

export abstract class SyncError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Connection failure or timeout of a single request. Fatal for the cycle. */
export class TransportError extends SyncError {
  public readonly timedOut: boolean;

  public constructor(
    public readonly url: string,
    cause: unknown,
  ) {
    const error = normalizeError(cause);
    const timedOut = error.name === 'TimeoutError';
    super(
      timedOut ? `Request to ${url} timed out` : `Request to ${url} failed: ${error.message}`,
      { cause: error },
    );
    this.timedOut = timedOut;
  }
}

export class HttpStatusError extends SyncError {
  public constructor(
    public readonly url: string,
    public readonly statusCode: number,
    responseBody: string,
  ) {
    super(`Error response from ${url}: ${statusCode} ${responseBody.slice(0, 500)}`);
  }
}

/** The body is not JSON, or not JSON of the shape the caller expects. */
export class ParseError extends SyncError {
  public constructor(
    public readonly url: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Could not parse response from ${url}: ${reason}`, cause ? { cause } : undefined);
  }
}

/** A single user record lacks a field the membership strategy needs; the record is skipped. */
export class FieldExtractionError extends SyncError {}

export class DirectoryProblemError extends SyncError {
  public constructor(
    public readonly groupName: string,
    public readonly metadata: DirectoryProblemMetadata,
  ) {
    super(`Directory reported a problem while replacing members of ${groupName}`);
  }
}
