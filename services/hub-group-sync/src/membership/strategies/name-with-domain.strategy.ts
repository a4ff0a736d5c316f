import { MembershipStrategyName } from '../../config';
import { FieldExtractionError } from '../../errors/sync.errors';
import type { HubUser } from '../../hub-api/hub-api.types';
import type { MemberResolution, MembershipStrategy } from './membership-strategy.interface';

/**
 * Uses the hub user name as the directory identifier. Bare names get `@<domain>` appended,
 * names already qualified with the organisation's domain pass through, and names from any
 * other domain are skipped.
 */
export class NameWithDomainStrategy implements MembershipStrategy {
  public readonly name = MembershipStrategyName.NAME_WITH_DOMAIN;

  public constructor(private readonly memberDomain: string) {}

  public async resolveMember(user: HubUser): Promise<MemberResolution> {
    const name = user.name.trim();
    if (!name) {
      throw new FieldExtractionError('User record has an empty name');
    }

    const separator = name.lastIndexOf('@');
    if (separator === -1) {
      return { kind: 'member', identifier: `${name}@${this.memberDomain}` };
    }

    const domain = name.slice(separator + 1).toLowerCase();
    if (domain !== this.memberDomain) {
      return { kind: 'skipped', reason: `foreign domain ${domain}` };
    }
    return { kind: 'member', identifier: name };
  }
}
