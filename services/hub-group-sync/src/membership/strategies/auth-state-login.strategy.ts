import { MembershipStrategyName } from '../../config';
import { FieldExtractionError } from '../../errors/sync.errors';
import { AuthStateLoginSchema, type HubUser } from '../../hub-api/hub-api.types';
import type { MemberResolution, MembershipStrategy } from './membership-strategy.interface';

export interface HubUserLookup {
  getUser(name: string): Promise<unknown>;
}

/**
 * Looks each user up individually (the list endpoint omits auth state) and uses
 * `authState.oauthUser.loginId` as the directory identifier.
 */
export class AuthStateLoginStrategy implements MembershipStrategy {
  public readonly name = MembershipStrategyName.AUTH_STATE_LOGIN;

  public constructor(private readonly hubApi: HubUserLookup) {}

  public async resolveMember(user: HubUser): Promise<MemberResolution> {
    const details = await this.hubApi.getUser(user.name);
    const result = AuthStateLoginSchema.safeParse(details);
    if (!result.success) {
      throw new FieldExtractionError('User has no authState.oauthUser.loginId');
    }
    return { kind: 'member', identifier: result.data.authState.oauthUser.loginId };
  }
}
