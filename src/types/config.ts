import { z } from 'zod';

// Env placeholders arrive as strings
const envBoolean = z.preprocess(
  value => (value === 'true' ? true : value === 'false' ? false : value),
  z.boolean()
);

export const PlatformSchema = z.enum(['mastodon', 'bluesky']);

export const LinkedAccountSchema = z.object({
  id: z.string().min(1),
  platform: PlatformSchema,
  server: z.string().url(), // Mastodon instance or Bluesky PDS base URL
  userId: z.string().min(1), // Mastodon account id or Bluesky DID
  handle: z.string().min(1),
  accessToken: z.string().min(1)
});

export const ConfigSchema = z.object({
  server: z.object({
    host: z.string(),
    port: z.coerce.number().min(0).max(65535),
    cors: z.object({
      origin: z.union([z.string(), z.array(z.string())]),
      credentials: envBoolean
    })
  }),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info')
  }),
  accounts: z.array(LinkedAccountSchema).default([]),
  filter: z.object({
    replyFilteringEnabled: envBoolean.default(true),
    minFollowedParticipants: z.coerce.number().min(1).max(50).default(2),
    participantTtlSeconds: z.coerce.number().min(1).max(3600).default(300),
    resolutionTimeoutMs: z.coerce.number().min(100).max(60000).default(8000),
    maxConcurrentResolutions: z.coerce.number().min(1).max(100).default(8)
  }),
  following: z.object({
    ttlSeconds: z.coerce.number().min(1).max(86400).default(600), // Finite: follow graphs change
    fetchTimeoutMs: z.coerce.number().min(100).max(120000).default(10000),
    maxPages: z.coerce.number().min(1).max(500).default(20)
  }),
  cache: z.object({
    sweepIntervalSeconds: z.coerce.number().min(1).max(3600).default(60),
    maxEntries: z.coerce.number().min(10).max(1000000).optional()
  }),
  timeline: z.object({
    pageSize: z.coerce.number().min(1).max(100).default(40),
    timeoutMs: z.coerce.number().min(100).max(120000).default(10000)
  })
});

export type Config = z.infer<typeof ConfigSchema>;
export type LinkedAccount = z.infer<typeof LinkedAccountSchema>;
