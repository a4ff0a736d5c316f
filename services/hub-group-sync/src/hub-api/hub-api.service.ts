import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Config } from '../config';
import { parseJsonBody } from '../utils/http-util';
import { fetchPaginated } from './fetch-paginated';
import { HubHttpClient } from './hub-http-client';

@Injectable()
export class HubApiService {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(
    private readonly httpClient: HubHttpClient,
    private readonly configService: ConfigService<Config, true>,
  ) {}

  /** Lazily walks `GET /users`, one raw user record at a time. */
  public listUsers(): AsyncGenerator<unknown, void, undefined> {
    const url = new URL(`${this.apiUrl}/users`);
    const pageSize = this.configService.get('hub.pageSize', { infer: true });
    if (pageSize > 0) {
      url.searchParams.set('limit', String(pageSize));
    }

    return fetchPaginated(
      this.httpClient,
      { url: url.toString(), headers: this.authHeaders() },
      this.logger,
    );
  }

  public async getUser(name: string): Promise<unknown> {
    const response = await this.httpClient.fetch({
      url: `${this.apiUrl}/users/${encodeURIComponent(name)}`,
      headers: this.authHeaders(),
    });
    return parseJsonBody(response);
  }

  private get apiUrl(): string {
    return this.configService.get('hub.apiUrl', { infer: true });
  }

  private authHeaders(): Record<string, string> {
    const token = this.configService.get('hub.apiToken', { infer: true });
    return { Authorization: `token ${token.value}` };
  }
}
