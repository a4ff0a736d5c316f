import { Logger } from '@nestjs/common';
import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { HUB_PAGINATION_MEDIA_TYPE } from '../../constants/hub-api.constants';
import { ParseError, TransportError } from '../../errors/sync.errors';
import { jsonResponse } from '../../test-utils/http-response';
import type { HttpResponse } from '../../utils/http-util';
import { fetchPaginated, type PageFetcher } from '../fetch-paginated';
import type { HubRequest } from '../hub-api.types';

const USERS_URL = 'https://hub.test/hub/api/users';
const SEED: HubRequest = { url: USERS_URL, headers: { Authorization: 'token test-token' } };

function page(items: unknown[], next?: string): unknown {
  return {
    items,
    _pagination: { offset: 0, limit: items.length, total: 6, next: next ? { url: next } : null },
  };
}

async function collect(iterable: AsyncIterable<unknown>): Promise<unknown[]> {
  const items: unknown[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe('fetchPaginated', () => {
  const logger = new Logger('fetchPaginated');
  let fetch: Mock<(request: HubRequest) => Promise<HttpResponse>>;
  let fetcher: PageFetcher;

  beforeEach(() => {
    fetch = vi.fn<(request: HubRequest) => Promise<HttpResponse>>();
    fetcher = { fetch };
  });

  it('yields the elements of a plain list response in order', async () => {
    fetch.mockResolvedValueOnce(jsonResponse(USERS_URL, [{ name: 'a' }, { name: 'b' }]));

    const items = await collect(fetchPaginated(fetcher, SEED, logger));

    expect(items).toEqual([{ name: 'a' }, { name: 'b' }]);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch).toHaveBeenCalledWith({
      url: USERS_URL,
      headers: { Authorization: 'token test-token', Accept: HUB_PAGINATION_MEDIA_TYPE },
    });
  });

  it('follows next links until the last page', async () => {
    const page2 = `${USERS_URL}?offset=2&limit=2`;
    const page3 = `${USERS_URL}?offset=3&limit=2`;
    fetch
      .mockResolvedValueOnce(jsonResponse(USERS_URL, page([1, 2], page2)))
      .mockResolvedValueOnce(jsonResponse(page2, page([3], page3)))
      .mockResolvedValueOnce(jsonResponse(page3, page([4, 5, 6])));

    const items = await collect(fetchPaginated(fetcher, SEED, logger));

    expect(items).toEqual([1, 2, 3, 4, 5, 6]);
    expect(fetch.mock.calls.map(([request]) => request.url)).toEqual([USERS_URL, page2, page3]);
    expect(fetch.mock.calls[2]?.[0].headers).toEqual({
      Authorization: 'token test-token',
      Accept: HUB_PAGINATION_MEDIA_TYPE,
    });
  });

  it('treats a paginated object without pagination info as the last page', async () => {
    fetch.mockResolvedValueOnce(jsonResponse(USERS_URL, { items: ['only'] }));

    const items = await collect(fetchPaginated(fetcher, SEED, logger));

    expect(items).toEqual(['only']);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('requests the next page before handing out the current items', async () => {
    const page2 = `${USERS_URL}?offset=1`;
    fetch
      .mockResolvedValueOnce(jsonResponse(USERS_URL, page(['first'], page2)))
      .mockResolvedValueOnce(jsonResponse(page2, page(['second'])));

    const iterator = fetchPaginated(fetcher, SEED, logger);
    const first = await iterator.next();

    expect(first).toEqual({ done: false, value: 'first' });
    expect(fetch).toHaveBeenCalledTimes(2);

    expect(await iterator.next()).toEqual({ done: false, value: 'second' });
    expect(await iterator.next()).toEqual({ done: true, value: undefined });
  });

  it('rejects with ParseError when the body is not JSON', async () => {
    fetch.mockResolvedValueOnce({ url: USERS_URL, statusCode: 200, body: '<html>' });

    const promise = collect(fetchPaginated(fetcher, SEED, logger));

    await expect(promise).rejects.toBeInstanceOf(ParseError);
    await expect(promise).rejects.toThrow(
      `Could not parse response from ${USERS_URL}: response body is not valid JSON`,
    );
  });

  it('rejects with ParseError when the JSON is neither a list nor a page', async () => {
    fetch.mockResolvedValueOnce(jsonResponse(USERS_URL, { users: [] }));

    await expect(collect(fetchPaginated(fetcher, SEED, logger))).rejects.toBeInstanceOf(
      ParseError,
    );
  });

  it('rejects when a later page fails after yielding earlier items', async () => {
    const page2 = `${USERS_URL}?offset=1`;
    fetch
      .mockResolvedValueOnce(jsonResponse(USERS_URL, page(['first'], page2)))
      .mockRejectedValueOnce(new TransportError(page2, new Error('socket hang up')));

    const seen: unknown[] = [];
    const consume = async () => {
      for await (const item of fetchPaginated(fetcher, SEED, logger)) {
        seen.push(item);
      }
    };

    await expect(consume()).rejects.toBeInstanceOf(TransportError);
    expect(seen).toEqual(['first']);
  });

  it('absorbs the failure of a prefetched page the consumer never reads', async () => {
    const page2 = `${USERS_URL}?offset=1`;
    fetch
      .mockResolvedValueOnce(jsonResponse(USERS_URL, page(['first'], page2)))
      .mockImplementationOnce(
        () =>
          new Promise((_resolve, reject) => {
            setTimeout(() => reject(new TransportError(page2, new Error('reset'))), 5);
          }),
      );

    const iterator = fetchPaginated(fetcher, SEED, logger);
    await iterator.next();
    const result = await iterator.return(undefined);
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(result).toEqual({ done: true, value: undefined });
  });
});
