import type { MembershipStrategyName } from '../../config';
import type { HubUser } from '../../hub-api/hub-api.types';

export type MemberResolution =
  | { kind: 'member'; identifier: string }
  | { kind: 'skipped'; reason: string };

export const MEMBERSHIP_STRATEGY = Symbol('MEMBERSHIP_STRATEGY');

/**
 * Maps one non-admin hub user to the identifier the directory knows them by.
 *
 * A strategy throws `FieldExtractionError` when the record lacks what it needs; the deriver
 * skips that record. Any other error aborts the cycle.
 */
export interface MembershipStrategy {
  readonly name: MembershipStrategyName;
  resolveMember(user: HubUser): Promise<MemberResolution>;
}
