import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { DEFAULT_SYNC_INTERVAL_SECONDS } from '../constants/defaults.constants';
import { coercedTimerSecondsSchema, optionalStringSchema } from '../utils/zod.util';

export const MembershipStrategyName = {
  NAME_WITH_DOMAIN: 'name-with-domain',
  AUTH_STATE_LOGIN: 'auth-state-login',
} as const;

export type MembershipStrategyName =
  (typeof MembershipStrategyName)[keyof typeof MembershipStrategyName];

export const SyncConfigSchema = z
  .object({
    intervalSeconds: coercedTimerSecondsSchema
      .prefault(DEFAULT_SYNC_INTERVAL_SECONDS)
      .describe('Seconds between two reconciliation cycles'),
    membershipStrategy: z
      .enum(MembershipStrategyName)
      .prefault(MembershipStrategyName.NAME_WITH_DOMAIN)
      .describe(
        'How a hub user maps to a directory subject. ' +
          'name-with-domain: the hub user name, qualified with the member domain, ' +
          'auth-state-login: the login id stored in the user auth state',
      ),
    memberDomain: optionalStringSchema
      .transform((val) => val?.replace(/^@/, '').toLowerCase())
      .describe('Organisational e-mail domain appended to bare hub user names'),
    replaceExisting: z
      .stringbool()
      .prefault('true')
      .describe('Replace the whole membership (true) or only add missing members (false)'),
  })
  .refine(
    (c) =>
      c.membershipStrategy !== MembershipStrategyName.NAME_WITH_DOMAIN ||
      c.memberDomain !== undefined,
    {
      message: 'SYNC_MEMBER_DOMAIN is required for the name-with-domain membership strategy',
      path: ['memberDomain'],
    },
  );

export type SyncConfig = z.infer<typeof SyncConfigSchema>;
export type SyncConfigNamespaced = { sync: SyncConfig };

export const syncConfig = registerAs(
  'sync',
  (): SyncConfig =>
    SyncConfigSchema.parse({
      intervalSeconds: process.env.SYNC_INTERVAL_SECONDS,
      membershipStrategy: process.env.SYNC_MEMBERSHIP_STRATEGY,
      memberDomain: process.env.SYNC_MEMBER_DOMAIN,
      replaceExisting: process.env.SYNC_REPLACE_EXISTING,
    }),
);
