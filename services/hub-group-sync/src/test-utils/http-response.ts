import type { Dispatcher } from 'undici';
import { vi } from 'vitest';
import type { HttpResponse } from '../utils/http-util';

export function undiciResponse(statusCode: number, body: unknown): Dispatcher.ResponseData {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return {
    statusCode,
    headers: {},
    body: {
      text: vi.fn().mockResolvedValue(text),
    },
  } as unknown as Dispatcher.ResponseData;
}

export function jsonResponse(url: string, body: unknown, statusCode = 200): HttpResponse {
  return { url, statusCode, body: JSON.stringify(body) };
}
