export type SubjectLookup = { subjectId: string } | { subjectIdentifier: string };

const SUBJECT_ID_PATTERN = /^[A-Za-z0-9]+$/;

/**
 * Purely alphanumeric values are taken as opaque subject ids; anything else (e-mail addresses,
 * group paths) is looked up as a subject identifier.
 *
 * This is a pattern match, not a lookup: an all-letter login name is sent as a `subjectId`.
 */
export function classifySubject(member: string): SubjectLookup {
  return SUBJECT_ID_PATTERN.test(member) ? { subjectId: member } : { subjectIdentifier: member };
}
