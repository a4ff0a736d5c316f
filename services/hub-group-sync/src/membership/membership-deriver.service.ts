import { createSmeared, sanitizeError } from '@hub-sync/utils';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { FieldExtractionError } from '../errors/sync.errors';
import { type HubUser, HubUserSchema } from '../hub-api/hub-api.types';
import {
  MEMBERSHIP_STRATEGY,
  type MembershipStrategy,
} from './strategies/membership-strategy.interface';

type RecordOutcome =
  | { kind: 'member'; identifier: string }
  | { kind: 'skipped' }
  | { kind: 'failed'; error: unknown };

@Injectable()
export class MembershipDeriverService {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(
    @Inject(MEMBERSHIP_STRATEGY) private readonly strategy: MembershipStrategy,
  ) {}

  /**
   * Returns the identifiers of all non-admin users, in record order. Records the strategy
   * cannot handle are logged and left out; duplicates are kept.
   */
  public async derive(records: AsyncIterable<unknown> | Iterable<unknown>): Promise<string[]> {
    // resolutions start while later pages are still being fetched
    const pending: Promise<RecordOutcome>[] = [];
    for await (const record of records) {
      pending.push(this.resolveRecord(record));
    }

    const outcomes = await Promise.all(pending);
    const failure = outcomes.find(
      (outcome): outcome is Extract<RecordOutcome, { kind: 'failed' }> => outcome.kind === 'failed',
    );
    if (failure) {
      throw failure.error;
    }

    const identifiers = outcomes.flatMap((outcome) =>
      outcome.kind === 'member' ? [outcome.identifier] : [],
    );
    this.logger.log(
      `Derived ${identifiers.length} members from ${outcomes.length} users using ${this.strategy.name}`,
    );
    return identifiers;
  }

  private async resolveRecord(record: unknown): Promise<RecordOutcome> {
    try {
      const user = this.parseUser(record);
      if (user.admin) {
        this.logger.debug(`Leaving out admin ${createSmeared(user.name)}`);
        return { kind: 'skipped' };
      }

      const resolution = await this.strategy.resolveMember(user);
      if (resolution.kind === 'skipped') {
        this.logger.log(`Skipping user ${createSmeared(user.name)}: ${resolution.reason}`);
        return { kind: 'skipped' };
      }
      return resolution;
    } catch (error) {
      if (error instanceof FieldExtractionError) {
        this.logger.warn({ msg: 'Skipping user record', error: sanitizeError(error) });
        return { kind: 'skipped' };
      }
      return { kind: 'failed', error };
    }
  }

  private parseUser(record: unknown): HubUser {
    const result = HubUserSchema.safeParse(record);
    if (!result.success) {
      throw new FieldExtractionError(
        `User record is missing a name or admin flag: ${result.error.issues
          .map((issue) => issue.path.join('.'))
          .join(', ')}`,
      );
    }
    return result.data;
  }
}
