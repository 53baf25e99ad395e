import { z } from 'zod';

// Subset of the Mastodon REST entities this service reads

export const MastodonAccountSchema = z.object({
  id: z.string(),
  username: z.string().default(''),
  acct: z.string().default(''),
  display_name: z.string().optional(),
  url: z.string().optional()
});

const MastodonStatusBaseSchema = z.object({
  id: z.string(),
  uri: z.string().optional(),
  url: z.string().nullish(),
  created_at: z.string(),
  account: MastodonAccountSchema,
  content: z.string().default(''),
  in_reply_to_id: z.string().nullish(),
  in_reply_to_account_id: z.string().nullish(),
  favourites_count: z.number().default(0),
  reblogs_count: z.number().default(0),
  replies_count: z.number().default(0),
  favourited: z.boolean().nullish(),
  reblogged: z.boolean().nullish(),
  quote: z
    .object({
      quoted_status: z.object({ id: z.string() }).nullish()
    })
    .nullish()
});

export type MastodonAccount = z.infer<typeof MastodonAccountSchema>;

export type MastodonStatus = z.infer<typeof MastodonStatusBaseSchema> & {
  reblog?: MastodonStatus | null;
};

export const MastodonStatusSchema: z.ZodType<MastodonStatus, z.ZodTypeDef, unknown> =
  MastodonStatusBaseSchema.extend({
    reblog: z.lazy(() => MastodonStatusSchema).nullish()
  });

export const MastodonContextSchema = z.object({
  ancestors: z.array(MastodonStatusSchema),
  descendants: z.array(MastodonStatusSchema)
});

export type MastodonContext = z.infer<typeof MastodonContextSchema>;

export const MastodonStatusListSchema = z.array(MastodonStatusSchema);
export const MastodonAccountListSchema = z.array(MastodonAccountSchema);
