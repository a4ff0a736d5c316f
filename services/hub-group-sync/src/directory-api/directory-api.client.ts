import { createSmeared } from '@hub-sync/utils';
import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isPlainObject } from 'remeda';
import { Agent, type Dispatcher, interceptors } from 'undici';
import { z } from 'zod';
import type { Config } from '../config';
import {
  ADD_MEMBER_REQUEST_KEY,
  DIRECTORY_CONTENT_TYPE,
  RESULT_PROBLEM_KEY,
} from '../constants/directory-api.constants';
import { HttpStatusError, ParseError } from '../errors/sync.errors';
import {
  assertSuccessStatus,
  type HttpResponse,
  isSuccessStatus,
  parseJsonBody,
  sendRequest,
} from '../utils/http-util';
import type {
  AddMemberRequest,
  ReconciliationJob,
  ReconciliationOutcome,
} from './directory-api.types';
import { classifySubject } from './subject-lookup';

const ResultProblemSchema = z.object({
  resultMetadata: z.record(z.string(), z.unknown()),
});

export function buildAddMemberRequest(job: ReconciliationJob): AddMemberRequest {
  return {
    [ADD_MEMBER_REQUEST_KEY]: {
      replaceAllExisting: job.replaceExisting ? 'T' : 'F',
      subjectLookups: job.members.map(classifySubject),
    },
  };
}

/**
 * Membership endpoint of the group directory web service. One call replaces (or extends) the
 * membership of one group; the directory applies it as a whole or not at all.
 */
@Injectable()
export class DirectoryApiClient implements OnModuleDestroy {
  private readonly logger = new Logger(this.constructor.name);
  private readonly dispatcher: Dispatcher;

  public constructor(private readonly configService: ConfigService<Config, true>) {
    this.dispatcher = new Agent().compose(interceptors.redirect({ maxRedirections: 3 }));
  }

  public async onModuleDestroy(): Promise<void> {
    await this.dispatcher.close();
  }

  public async replaceMembers(job: ReconciliationJob): Promise<ReconciliationOutcome> {
    const { baseUrl, username, password, requestTimeoutSeconds } = this.configService.get(
      'directory',
      { infer: true },
    );
    const url = `${baseUrl}/groups/${encodeURIComponent(job.groupName)}/members`;
    const credentials = Buffer.from(`${username}:${password.value}`).toString('base64');

    this.logger.log(
      `Sending ${job.members.length} subjects to ${createSmeared(job.groupName)} (replace existing: ${job.replaceExisting})`,
    );

    const response = await sendRequest(url, {
      method: 'PUT',
      headers: {
        'Content-Type': DIRECTORY_CONTENT_TYPE,
        Authorization: `Basic ${credentials}`,
      },
      body: JSON.stringify(buildAddMemberRequest(job)),
      dispatcher: this.dispatcher,
      timeoutMs: requestTimeoutSeconds * 1000,
    });

    // the directory reports problems with a 4xx/5xx status and a JSON body describing them
    const payload = this.parsePayload(response);
    if (isPlainObject(payload) && RESULT_PROBLEM_KEY in payload) {
      const problem = ResultProblemSchema.safeParse(payload[RESULT_PROBLEM_KEY]);
      return { success: false, problem: problem.success ? problem.data.resultMetadata : {} };
    }

    assertSuccessStatus(response);
    return { success: true, response: payload };
  }

  private parsePayload(response: HttpResponse): unknown {
    try {
      return parseJsonBody(response);
    } catch (error) {
      if (error instanceof ParseError && !isSuccessStatus(response.statusCode)) {
        throw new HttpStatusError(response.url, response.statusCode, response.body);
      }
      throw error;
    }
  }
}
