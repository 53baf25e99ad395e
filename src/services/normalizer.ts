import { normalizeIdentity, identityFromAtUri } from './identity';
import type { MastodonStatus } from '@/types/mastodon';
import {
  BlueskyFeedItem,
  BlueskyPostView,
  REPOST_REASON,
  RECORD_EMBED_VIEW
} from '@/types/bluesky';
import type { ReplyReference, UnifiedPost } from '@/types/post';
import type { UserIdentity } from '@/types/identity';

/**
 * Convert a Mastodon status (or boost) into a frozen UnifiedPost.
 *
 * Status ids are only unique per instance, so the id carries the host of
 * the instance the status was read from.
 */
export function normalizeMastodonStatus(
  status: MastodonStatus,
  sourceAccountId: string,
  instanceHost: string
): UnifiedPost {
  const author = normalizeIdentity(status.account, 'mastodon');
  const originalPost = status.reblog
    ? normalizeMastodonStatus(status.reblog, sourceAccountId, instanceHost)
    : undefined;

  let replyTo: ReplyReference | undefined;
  if (status.in_reply_to_id) {
    // Only the parent author is known here; the conversation root comes
    // from thread resolution.
    replyTo = {
      postId: status.in_reply_to_id,
      parentAuthor: status.in_reply_to_account_id === status.account.id ? author : undefined
    };
  }

  return freezePost({
    id: `mastodon:${instanceHost}:${status.id}`,
    platform: 'mastodon',
    sourceAccountId,
    author,
    authorDisplayName: status.account.display_name || undefined,
    content: status.content,
    createdAt: status.created_at,
    counts: {
      like: status.favourites_count,
      repost: status.reblogs_count,
      reply: status.replies_count
    },
    isLiked: status.favourited ?? false,
    isReposted: status.reblogged ?? false,
    originalPost,
    platformSpecificId: status.id,
    quotedPostRef: status.quote?.quoted_status?.id,
    replyTo
  });
}

/**
 * Convert a Bluesky feed item (post, reply or repost) into a frozen UnifiedPost.
 */
export function normalizeBlueskyFeedItem(item: BlueskyFeedItem, sourceAccountId: string): UnifiedPost {
  const post = normalizeBlueskyPost(item.post, sourceAccountId, item.reply);

  if (item.reason?.$type === REPOST_REASON && item.reason.by) {
    const reposter = normalizeIdentity(item.reason.by, 'bluesky');
    return freezePost({
      ...post,
      id: `bluesky:repost:${reposter.value}:${item.post.uri}`,
      author: reposter,
      authorDisplayName: item.reason.by.displayName || undefined,
      createdAt: item.reason.indexedAt ?? post.createdAt,
      originalPost: post,
      replyTo: undefined
    });
  }

  return post;
}

function normalizeBlueskyPost(
  view: BlueskyPostView,
  sourceAccountId: string,
  replyViews?: BlueskyFeedItem['reply']
): UnifiedPost {
  const record = view.record;
  let replyTo: ReplyReference | undefined;

  if (record.reply) {
    replyTo = {
      postId: record.reply.parent.uri,
      rootPostId: record.reply.root.uri,
      parentAuthor: authorOfRef(replyViews?.parent, record.reply.parent.uri),
      rootAuthor: authorOfRef(replyViews?.root, record.reply.root.uri)
    };
  }

  const quotedPostRef =
    view.embed?.$type === RECORD_EMBED_VIEW ? view.embed.record?.uri : undefined;

  return freezePost({
    id: `bluesky:${view.uri}`,
    platform: 'bluesky',
    sourceAccountId,
    author: normalizeIdentity(view.author, 'bluesky'),
    authorDisplayName: view.author.displayName || undefined,
    content: record.text,
    createdAt: validTimestamp(record.createdAt) ?? view.indexedAt,
    counts: {
      like: view.likeCount,
      repost: view.repostCount,
      reply: view.replyCount
    },
    isLiked: view.viewer?.like !== undefined,
    isReposted: view.viewer?.repost !== undefined,
    platformSpecificId: view.uri,
    quotedPostRef,
    replyTo
  });
}

type ReplyRefView = NonNullable<BlueskyFeedItem['reply']>['root'];

function authorOfRef(view: ReplyRefView | undefined, uri: string): UserIdentity | undefined {
  if (view && 'author' in view && view.author && 'handle' in view.author) {
    return normalizeIdentity(view.author, 'bluesky');
  }
  // The repository owner of the URI is the author
  return identityFromAtUri(uri);
}

// Record timestamps are client-written and may not parse
function validTimestamp(value: string | undefined): string | undefined {
  return value !== undefined && !Number.isNaN(Date.parse(value)) ? value : undefined;
}

function freezePost(post: UnifiedPost): UnifiedPost {
  return Object.freeze({
    ...post,
    counts: Object.freeze({ ...post.counts }),
    replyTo: post.replyTo ? Object.freeze({ ...post.replyTo }) : undefined
  });
}
