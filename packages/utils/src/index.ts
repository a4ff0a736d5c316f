export { normalizeError, type SanitizedError, sanitizeError } from './normalize-error';
export { Redacted } from './redacted';
export {
  createSmeared,
  isSmearingActive,
  LogsDiagnosticDataPolicy,
  Smeared,
  smear,
} from './smeared';
export { elapsedMilliseconds, formatDuration } from './timing';
