import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import {
  DEFAULT_HUB_CONCURRENCY,
  DEFAULT_HUB_PAGE_SIZE,
  DEFAULT_REQUEST_TIMEOUT_SECONDS,
} from '../constants/defaults.constants';
import {
  coercedNonNegativeIntSchema,
  coercedTimerSecondsSchema,
  redactedStringSchema,
  urlWithoutTrailingSlashSchema,
} from '../utils/zod.util';

export const HubConfigSchema = z.object({
  apiUrl: urlWithoutTrailingSlashSchema(
    'Base URL of the hub REST API, e.g. https://hub.example.edu/hub/api',
    'HUB_API_URL must not end with a trailing slash',
  ),
  apiToken: redactedStringSchema.describe('API token sent as `Authorization: token <value>`'),
  concurrency: coercedNonNegativeIntSchema
    .prefault(DEFAULT_HUB_CONCURRENCY)
    .describe('Maximum number of hub API requests in flight at once, 0 for no limit'),
  pageSize: coercedNonNegativeIntSchema
    .prefault(DEFAULT_HUB_PAGE_SIZE)
    .describe('Users requested per page, 0 to use the server-side default'),
  requestTimeoutSeconds: coercedTimerSecondsSchema
    .prefault(DEFAULT_REQUEST_TIMEOUT_SECONDS)
    .describe('Time limit for a single hub API request'),
});

export type HubConfig = z.infer<typeof HubConfigSchema>;
export type HubConfigNamespaced = { hub: HubConfig };

export const hubConfig = registerAs(
  'hub',
  (): HubConfig =>
    HubConfigSchema.parse({
      apiUrl: process.env.HUB_API_URL,
      apiToken: process.env.HUB_API_TOKEN,
      concurrency: process.env.HUB_CONCURRENCY,
      pageSize: process.env.HUB_PAGE_SIZE,
      requestTimeoutSeconds: process.env.HUB_REQUEST_TIMEOUT_SECONDS,
    }),
);
