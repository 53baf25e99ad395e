import { z } from 'zod';

// Subset of the app.bsky lexicon views this service reads

export const BlueskyActorSchema = z.object({
  did: z.string().default(''),
  handle: z.string().default(''),
  displayName: z.string().optional()
});

export type BlueskyActor = z.infer<typeof BlueskyActorSchema>;

const StrongRefSchema = z.object({
  uri: z.string(),
  cid: z.string().optional()
});

export const BlueskyPostRecordSchema = z
  .object({
    text: z.string().default(''),
    createdAt: z.string().optional(),
    reply: z
      .object({
        root: StrongRefSchema,
        parent: StrongRefSchema
      })
      .optional()
  })
  .passthrough();

export const BlueskyPostViewSchema = z.object({
  uri: z.string(),
  cid: z.string().optional(),
  author: BlueskyActorSchema,
  record: BlueskyPostRecordSchema,
  embed: z
    .object({
      $type: z.string().optional(),
      record: z.object({ uri: z.string().optional() }).passthrough().optional()
    })
    .passthrough()
    .optional(),
  replyCount: z.number().default(0),
  repostCount: z.number().default(0),
  likeCount: z.number().default(0),
  indexedAt: z.string(),
  viewer: z
    .object({
      like: z.string().optional(),
      repost: z.string().optional()
    })
    .optional()
});

export type BlueskyPostView = z.infer<typeof BlueskyPostViewSchema>;

// Reply refs in a feed item may be full post views or not-found/blocked stubs
const ReplyRefViewSchema = z.union([
  BlueskyPostViewSchema,
  z.object({ uri: z.string(), notFound: z.literal(true) }),
  z.object({ uri: z.string(), blocked: z.literal(true), author: z.object({ did: z.string() }).optional() })
]);

export const BlueskyFeedItemSchema = z.object({
  post: BlueskyPostViewSchema,
  reply: z
    .object({
      root: ReplyRefViewSchema,
      parent: ReplyRefViewSchema
    })
    .optional(),
  reason: z
    .object({
      $type: z.string(),
      by: BlueskyActorSchema.optional(),
      indexedAt: z.string().optional()
    })
    .optional()
});

export type BlueskyFeedItem = z.infer<typeof BlueskyFeedItemSchema>;

export const BlueskyTimelineSchema = z.object({
  feed: z.array(BlueskyFeedItemSchema),
  cursor: z.string().optional()
});

export const BlueskyFollowsSchema = z.object({
  follows: z.array(BlueskyActorSchema),
  cursor: z.string().optional()
});

export interface BlueskyNotFoundPost {
  $type?: string;
  uri: string;
  notFound: true;
}

export interface BlueskyBlockedPost {
  $type?: string;
  uri: string;
  blocked: true;
  author?: { did: string };
}

export interface BlueskyThreadViewPost {
  $type?: string;
  post: BlueskyPostView;
  parent?: BlueskyThreadNode;
  replies?: BlueskyThreadNode[];
}

export type BlueskyThreadNode = BlueskyThreadViewPost | BlueskyNotFoundPost | BlueskyBlockedPost;

export const BlueskyThreadNodeSchema: z.ZodType<BlueskyThreadNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.object({
      $type: z.string().optional(),
      post: BlueskyPostViewSchema,
      parent: BlueskyThreadNodeSchema.optional(),
      replies: z.array(BlueskyThreadNodeSchema).optional()
    }),
    z.object({ $type: z.string().optional(), uri: z.string(), notFound: z.literal(true) }),
    z.object({
      $type: z.string().optional(),
      uri: z.string(),
      blocked: z.literal(true),
      author: z.object({ did: z.string() }).optional()
    })
  ])
);

export const BlueskyThreadResponseSchema = z.object({
  thread: BlueskyThreadNodeSchema
});

export const REPOST_REASON = 'app.bsky.feed.defs#reasonRepost';
export const RECORD_EMBED_VIEW = 'app.bsky.embed.record#view';
