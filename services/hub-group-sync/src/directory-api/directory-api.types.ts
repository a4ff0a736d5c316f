import type { DirectoryProblemMetadata } from '../errors/sync.errors';
import type { SubjectLookup } from './subject-lookup';

export interface ReconciliationJob {
  groupName: string;
  members: readonly string[];
  replaceExisting: boolean;
}

export type ReconciliationOutcome =
  | { success: true; response: unknown }
  | { success: false; problem: DirectoryProblemMetadata };

export interface AddMemberRequest {
  WsRestAddMemberRequest: {
    replaceAllExisting: 'T' | 'F';
    subjectLookups: SubjectLookup[];
  };
}
