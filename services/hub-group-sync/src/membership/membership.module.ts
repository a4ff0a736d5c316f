import assert from 'node:assert';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { type Config, MembershipStrategyName } from '../config';
import { HubApiModule } from '../hub-api/hub-api.module';
import { HubApiService } from '../hub-api/hub-api.service';
import { MembershipDeriverService } from './membership-deriver.service';
import { AuthStateLoginStrategy } from './strategies/auth-state-login.strategy';
import {
  MEMBERSHIP_STRATEGY,
  type MembershipStrategy,
} from './strategies/membership-strategy.interface';
import { NameWithDomainStrategy } from './strategies/name-with-domain.strategy';

export function createMembershipStrategy(
  configService: ConfigService<Config, true>,
  hubApi: HubApiService,
): MembershipStrategy {
  const strategy = configService.get('sync.membershipStrategy', { infer: true });
  switch (strategy) {
    case MembershipStrategyName.NAME_WITH_DOMAIN: {
      const memberDomain = configService.get('sync.memberDomain', { infer: true });
      assert.ok(memberDomain, 'SYNC_MEMBER_DOMAIN is required for the name-with-domain strategy');
      return new NameWithDomainStrategy(memberDomain);
    }
    case MembershipStrategyName.AUTH_STATE_LOGIN:
      return new AuthStateLoginStrategy(hubApi);
  }
}

@Module({
  imports: [HubApiModule],
  providers: [
    {
      provide: MEMBERSHIP_STRATEGY,
      useFactory: createMembershipStrategy,
      inject: [ConfigService, HubApiService],
    },
    MembershipDeriverService,
  ],
  exports: [MembershipDeriverService],
})
export class MembershipModule {}
