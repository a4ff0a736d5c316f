import { createSmeared, elapsedMilliseconds } from '@hub-sync/utils';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { unique } from 'remeda';
import type { Config } from '../config';
import { DirectoryApiClient } from '../directory-api/directory-api.client';
import { DirectoryProblemError } from '../errors/sync.errors';
import { HubApiService } from '../hub-api/hub-api.service';
import { MembershipDeriverService } from '../membership/membership-deriver.service';
import type { SyncCycleResult } from './sync.types';
import { resolveTargetGroup } from './target-group';

@Injectable()
export class GroupSyncService {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(
    private readonly hubApi: HubApiService,
    private readonly membershipDeriver: MembershipDeriverService,
    private readonly directoryApi: DirectoryApiClient,
    private readonly configService: ConfigService<Config, true>,
  ) {}

  /**
   * Runs one full reconciliation: every hub user is fetched again and the directory group is
   * set to exactly the derived members. Nothing is carried over between cycles.
   */
  public async synchronize(): Promise<SyncCycleResult> {
    const startedAt = Date.now();
    const target = resolveTargetGroup(
      this.configService.get('hub.apiUrl', { infer: true }),
      this.configService.get('directory', { infer: true }),
    );
    if (target.kind === 'skip') {
      this.logger.log(`Not syncing: ${target.reason}`);
      return { status: 'skipped', reason: target.reason, durationMs: elapsedMilliseconds(startedAt) };
    }

    const counter = { users: 0 };
    const derived = await this.membershipDeriver.derive(
      this.countRecords(this.hubApi.listUsers(), counter),
    );
    const members = unique(derived);
    if (members.length < derived.length) {
      this.logger.log(`Dropped ${derived.length - members.length} duplicate members`);
    }

    const groupName = target.groupName;
    const outcome = await this.directoryApi.replaceMembers({
      groupName,
      members,
      replaceExisting: this.configService.get('sync.replaceExisting', { infer: true }),
    });
    if (!outcome.success) {
      throw new DirectoryProblemError(groupName, outcome.problem);
    }

    this.logger.log(
      `Reconciled ${createSmeared(groupName)}: ${members.length} members from ${counter.users} hub users`,
    );
    return {
      status: 'reconciled',
      groupName,
      fetchedUsers: counter.users,
      members: members.length,
      durationMs: elapsedMilliseconds(startedAt),
    };
  }

  private async *countRecords<T>(
    records: AsyncIterable<T>,
    counter: { users: number },
  ): AsyncGenerator<T, void, undefined> {
    for await (const record of records) {
      counter.users++;
      yield record;
    }
  }
}
