export const LogsDiagnosticDataPolicy = {
  CONCEAL: 'conceal',
  DISCLOSE: 'disclose',
} as const;

export type LogsDiagnosticDataPolicy =
  (typeof LogsDiagnosticDataPolicy)[keyof typeof LogsDiagnosticDataPolicy];

/**
 * Wraps diagnostic data (user names, login ids, group paths) that helps when debugging a sync
 * but should not show up in full in production logs.
 *
 * Secrets go into `Redacted` instead, which never prints the value.
 *
 * @example
 * const user = createSmeared('alice@example.edu');
 * logger.log(`Skipping ${user}`); // "Skipping *****@*******.edu" when concealing
 */
export class Smeared {
  public constructor(
    public readonly value: string,
    public readonly active: boolean,
  ) {}

  public toString(): string {
    return this.active ? smear(this.value) : this.value;
  }

  public toJSON(): string {
    return this.toString();
  }
}

export function isSmearingActive(): boolean {
  return process.env.LOGS_DIAGNOSTICS_DATA_POLICY !== LogsDiagnosticDataPolicy.DISCLOSE;
}

export function createSmeared(value: string): Smeared {
  return new Smeared(value, isSmearingActive());
}

/**
 * Replaces every letter, digit and underscore with `*`, keeping the last `leaveOver`
 * characters. Prefer wrapping values in `Smeared`; this is exported for tests.
 *
 * @example
 * smear('datahub-users'); // "*******-*sers"
 * smear('ab');            // "[Smeared]"
 * smear(undefined);       // "__erroneous__"
 */
export function smear(text: string | null | undefined, leaveOver = 4): string {
  if (text === undefined || text === null) {
    return '__erroneous__';
  }
  if (text.length - leaveOver < 3) {
    return '[Smeared]';
  }

  const visible = text.slice(text.length - leaveOver);
  const hidden = text.slice(0, text.length - leaveOver).replaceAll(/\w/g, '*');
  return `${hidden}${visible}`;
}
