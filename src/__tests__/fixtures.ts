import { createIdentity, Platform, UserIdentity } from '@/types/identity';
import type { ReplyReference, UnifiedPost } from '@/types/post';
import { MastodonStatus, MastodonStatusSchema } from '@/types/mastodon';
import { BlueskyFeedItem, BlueskyFeedItemSchema } from '@/types/bluesky';

export const mastodonUser = (acct: string): UserIdentity => createIdentity(acct, 'mastodon');
export const blueskyUser = (did: string): UserIdentity => createIdentity(did, 'bluesky');

interface PostOverrides {
  id?: string;
  platform?: Platform;
  sourceAccountId?: string;
  author?: UserIdentity;
  createdAt?: string;
  replyTo?: ReplyReference;
}

/**
 * Minimal UnifiedPost for filter and timeline tests
 */
export function makePost(overrides: PostOverrides = {}): UnifiedPost {
  const platform = overrides.platform ?? 'mastodon';
  const platformSpecificId = overrides.id ?? '1';
  return {
    id: `${platform}:${platformSpecificId}`,
    platform,
    sourceAccountId: overrides.sourceAccountId ?? 'acc-1',
    author: overrides.author ?? mastodonUser('alice@example.social'),
    content: `post ${platformSpecificId}`,
    createdAt: overrides.createdAt ?? '2024-05-01T12:00:00.000Z',
    counts: { like: 0, repost: 0, reply: 0 },
    isLiked: false,
    isReposted: false,
    platformSpecificId,
    replyTo: overrides.replyTo
  };
}

export function mastodonStatus(raw: Record<string, unknown>): MastodonStatus {
  return MastodonStatusSchema.parse({
    created_at: '2024-05-01T12:00:00.000Z',
    ...raw
  });
}

export function mastodonAccountJson(id: string, acct: string, url?: string): Record<string, unknown> {
  return { id, username: acct.split('@')[0], acct, url };
}

export function blueskyPostJson(uri: string, did: string, record: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    uri,
    author: { did, handle: `${did.replace('did:plc:', '')}.bsky.social` },
    record: { text: 'hello', createdAt: '2024-05-01T12:00:00.000Z', ...record },
    indexedAt: '2024-05-01T12:00:01.000Z'
  };
}

export function blueskyFeedItem(raw: Record<string, unknown>): BlueskyFeedItem {
  return BlueskyFeedItemSchema.parse(raw);
}
