import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import {
  DEFAULT_EXCLUDED_NAMESPACES,
  DEFAULT_REQUEST_TIMEOUT_SECONDS,
} from '../constants/defaults.constants';
import {
  commaSeparatedListSchema,
  coercedTimerSecondsSchema,
  optionalStringSchema,
  redactedStringSchema,
  requiredStringSchema,
  urlWithoutTrailingSlashSchema,
} from '../utils/zod.util';

export const DirectoryConfigSchema = z
  .object({
    baseUrl: urlWithoutTrailingSlashSchema(
      'Base URL of the directory web service, e.g. https://groups.example.edu/grouper-ws/servicesRest/v2_4_000',
      'DIRECTORY_BASE_URL must not end with a trailing slash',
    ),
    username: requiredStringSchema.describe('Directory service account used for basic auth'),
    password: redactedStringSchema.describe('Password of the directory service account'),
    groupName: optionalStringSchema.describe(
      'Full name of the group to reconcile; derived from the hub host when unset',
    ),
    groupStem: optionalStringSchema.describe(
      'Stem under which `<namespace>-users` groups live, used when no group name is set',
    ),
    excludedNamespaces: commaSeparatedListSchema
      .prefault(DEFAULT_EXCLUDED_NAMESPACES)
      .describe('Hub namespaces (first host label) that are never synced when deriving the group'),
    requestTimeoutSeconds: coercedTimerSecondsSchema
      .prefault(DEFAULT_REQUEST_TIMEOUT_SECONDS)
      .describe('Time limit for the membership update request'),
  })
  .refine((c) => c.groupName !== undefined || c.groupStem !== undefined, {
    message: 'Either DIRECTORY_GROUP_NAME or DIRECTORY_GROUP_STEM must be set',
    path: ['groupName'],
  });

export type DirectoryConfig = z.infer<typeof DirectoryConfigSchema>;
export type DirectoryConfigNamespaced = { directory: DirectoryConfig };

export const directoryConfig = registerAs(
  'directory',
  (): DirectoryConfig =>
    DirectoryConfigSchema.parse({
      baseUrl: process.env.DIRECTORY_BASE_URL,
      username: process.env.DIRECTORY_USERNAME,
      password: process.env.DIRECTORY_PASSWORD,
      groupName: process.env.DIRECTORY_GROUP_NAME,
      groupStem: process.env.DIRECTORY_GROUP_STEM,
      excludedNamespaces: process.env.DIRECTORY_EXCLUDED_NAMESPACES,
      requestTimeoutSeconds: process.env.DIRECTORY_REQUEST_TIMEOUT_SECONDS,
    }),
);
