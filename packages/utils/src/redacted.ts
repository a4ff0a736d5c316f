import { inspect } from 'node:util';

const REDACTED_PLACEHOLDER = '[Redacted]';

/**
 * Holds a secret (API token, directory password) so that it never ends up in a log line.
 * Read `.value` only at the point where the secret is put on the wire.
 */
export class Redacted<T = string> {
  public constructor(public readonly value: T) {}

  public toString(): string {
    return REDACTED_PLACEHOLDER;
  }

  public toJSON(): string {
    return REDACTED_PLACEHOLDER;
  }

  public [inspect.custom](): string {
    return REDACTED_PLACEHOLDER;
  }
}
