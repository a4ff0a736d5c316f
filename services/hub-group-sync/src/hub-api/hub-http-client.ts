import { sanitizeError } from '@hub-sync/utils';
import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Bottleneck from 'bottleneck';
import { Agent, type Dispatcher, interceptors } from 'undici';
import type { Config } from '../config';
import { assertSuccessStatus, type HttpResponse, sendRequest } from '../utils/http-util';
import type { HubRequest } from './hub-api.types';

/**
 * GET client for the hub API. Every request takes a slot from a shared limiter before it is
 * sent and gives it back once the body has been read or the request has failed, so no more
 * than `hub.concurrency` requests are ever outstanding (0 lifts the cap).
 *
 * Requests are never retried; a timeout, a transport failure or a non-2xx status rejects.
 */
@Injectable()
export class HubHttpClient implements OnModuleDestroy {
  private readonly logger = new Logger(this.constructor.name);
  private readonly limiter: Bottleneck;
  private readonly dispatcher: Dispatcher;
  private readonly defaultTimeoutMs: number;

  public constructor(private readonly configService: ConfigService<Config, true>) {
    const concurrency = this.configService.get('hub.concurrency', { infer: true });
    this.defaultTimeoutMs =
      this.configService.get('hub.requestTimeoutSeconds', { infer: true }) * 1000;

    this.dispatcher = new Agent().compose(interceptors.redirect({ maxRedirections: 3 }));
    this.limiter = new Bottleneck({ maxConcurrent: concurrency > 0 ? concurrency : null });
    this.setupLimiterMonitoring();
  }

  public async onModuleDestroy(): Promise<void> {
    await this.dispatcher.close();
  }

  public async fetch(hubRequest: HubRequest): Promise<HttpResponse> {
    return await this.limiter.schedule(async () => {
      const response = await sendRequest(hubRequest.url, {
        method: 'GET',
        headers: hubRequest.headers,
        dispatcher: this.dispatcher,
        timeoutMs: hubRequest.timeoutMs ?? this.defaultTimeoutMs,
      });
      assertSuccessStatus(response);
      return response;
    });
  }

  private setupLimiterMonitoring(): void {
    this.limiter.on('queued', () => {
      const queued = this.limiter.counts().QUEUED;
      if (queued > 1) {
        this.logger.debug(`Hub request queue size reached ${queued}`);
      }
    });

    this.limiter.on('dropped', () => {
      this.logger.error('Hub request dropped due to limiter queue overflow');
    });

    this.limiter.on('error', (error) => {
      this.logger.error({ msg: 'Hub request limiter error', error: sanitizeError(error) });
    });
  }
}
