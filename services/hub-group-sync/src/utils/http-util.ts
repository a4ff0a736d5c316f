import { type Dispatcher, request } from 'undici';
import { HttpStatusError, ParseError, TransportError } from '../errors/sync.errors';

export type HttpRequestOptions = Omit<Dispatcher.RequestOptions, 'origin' | 'path' | 'signal'> & {
  dispatcher: Dispatcher;
  timeoutMs: number;
};

export interface HttpResponse {
  url: string;
  statusCode: number;
  body: string;
}

/**
 * Sends one request and reads the whole body. Anything that goes wrong before the body is
 * read, including the timeout, becomes a `TransportError`.
 */
export async function sendRequest(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
  const { timeoutMs, ...requestOptions } = options;
  try {
    const response = await request(url, {
      ...requestOptions,
      signal: AbortSignal.timeout(timeoutMs),
    });
    const body = await response.body.text();
    return { url, statusCode: response.statusCode, body };
  } catch (error) {
    throw new TransportError(url, error);
  }
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

export function assertSuccessStatus(response: HttpResponse): void {
  if (!isSuccessStatus(response.statusCode)) {
    throw new HttpStatusError(response.url, response.statusCode, response.body);
  }
}

export function parseJsonBody(response: HttpResponse): unknown {
  try {
    return JSON.parse(response.body);
  } catch (error) {
    throw new ParseError(response.url, 'response body is not valid JSON', error);
  }
}
