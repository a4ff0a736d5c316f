import { sanitizeError } from '@hub-sync/utils';
import type { Logger } from '@nestjs/common';
import { z } from 'zod';
import { HUB_PAGINATION_MEDIA_TYPE } from '../constants/hub-api.constants';
import { ParseError } from '../errors/sync.errors';
import { type HttpResponse, parseJsonBody } from '../utils/http-util';
import { type HubRequest, ListResponseSchema } from './hub-api.types';

export interface PageFetcher {
  fetch(request: HubRequest): Promise<HttpResponse>;
}

interface ParsedPage {
  items: unknown[];
  nextUrl: string | undefined;
}

function parsePage(response: HttpResponse): ParsedPage {
  const result = ListResponseSchema.safeParse(parseJsonBody(response));
  if (!result.success) {
    throw new ParseError(
      response.url,
      `expected a list or a paginated object\n${z.prettifyError(result.error)}`,
    );
  }

  if (Array.isArray(result.data)) {
    return { items: result.data, nextUrl: undefined };
  }
  return { items: result.data.items, nextUrl: result.data._pagination?.next?.url };
}

/**
 * Yields every item of a hub list endpoint, following `_pagination.next` until it runs out.
 *
 * The request for page n+1 goes out before the items of page n are handed to the consumer.
 * Items still come out in page order, and in response order within a page.
 */
export async function* fetchPaginated(
  fetcher: PageFetcher,
  seedRequest: HubRequest,
  logger: Logger,
): AsyncGenerator<unknown, void, undefined> {
  const request: HubRequest = {
    ...seedRequest,
    headers: { ...seedRequest.headers, Accept: HUB_PAGINATION_MEDIA_TYPE },
  };

  let pending: Promise<HttpResponse> | undefined = fetcher.fetch(request);
  let pageCount = 0;
  let itemCount = 0;

  try {
    while (pending) {
      const current: Promise<HttpResponse> = pending;
      pending = undefined;
      const response = await current;
      pageCount++;

      const { items, nextUrl } = parsePage(response);
      if (nextUrl) {
        logger.log(`Fetching page ${pageCount + 1} ${nextUrl}`);
        pending = fetcher.fetch({ ...request, url: nextUrl });
      }

      for (const item of items) {
        itemCount++;
        yield item;
      }
    }
  } finally {
    // consumer stopped early while the next page was in flight
    void pending?.catch((error: unknown) => {
      logger.debug({ msg: 'Discarded prefetched page failed', error: sanitizeError(error) });
    });
  }

  logger.debug(`Fetched ${itemCount} items from ${seedRequest.url} in ${pageCount} pages`);
}
