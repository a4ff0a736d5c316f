import { z } from 'zod';

export interface HubRequest {
  url: string;
  headers: Record<string, string>;
  timeoutMs?: number;
}

export const HubUserSchema = z
  .object({
    name: z.string(),
    admin: z.boolean(),
    authState: z.unknown().optional(),
  })
  .loose();

export type HubUser = z.infer<typeof HubUserSchema>;

export const AuthStateLoginSchema = z.object({
  authState: z.object({
    oauthUser: z.object({
      loginId: z.string().trim().nonempty(),
    }),
  }),
});

const NextPageSchema = z.object({ url: z.string().nonempty() }).loose();

export const PaginatedListSchema = z
  .object({
    items: z.array(z.unknown()),
    _pagination: z
      .object({
        next: NextPageSchema.nullish(),
      })
      .loose()
      .optional(),
  })
  .loose();

/** Hubs without pagination support answer list endpoints with a bare array. */
export const ListResponseSchema = z.union([z.array(z.unknown()), PaginatedListSchema]);
