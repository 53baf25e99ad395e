import { Platform, UserIdentity } from './identity';

export interface PostCounts {
  like: number;
  repost: number;
  reply: number;
}

/**
 * Reply linkage as reported by the platform. Absent on top-level posts.
 */
export interface ReplyReference {
  postId: string; // Platform id of the direct parent
  rootPostId?: string;
  parentAuthor?: UserIdentity;
  rootAuthor?: UserIdentity;
}

/**
 * Platform-neutral post. Built once per API response and frozen;
 * originalPost points one way at an already-built post.
 */
export interface UnifiedPost {
  readonly id: string; // Unique within one timeline snapshot
  readonly platform: Platform;
  readonly sourceAccountId: string; // Linked account whose API returned it
  readonly author: UserIdentity;
  readonly authorDisplayName?: string;
  readonly content: string;
  readonly createdAt: string; // ISO timestamp
  readonly counts: Readonly<PostCounts>;
  readonly isLiked: boolean;
  readonly isReposted: boolean;
  readonly originalPost?: UnifiedPost; // Boost/repost target
  readonly platformSpecificId: string; // Status id or at:// URI
  readonly quotedPostRef?: string;
  readonly replyTo?: Readonly<ReplyReference>;
}

export type FilterReason =
  | 'top_level'
  | 'self_reply_from_followed'
  | 'thread_has_enough_followed_participants'
  | 'filtered_out'
  | 'error_fail_open';

export interface FilterDecision {
  include: boolean;
  reason: FilterReason;
  threadKey?: string;
  followedParticipants?: number;
  elapsedMs?: number; // Resolution time, when a resolution was needed
  error?: string;
}

export interface TimelineSnapshot {
  id: string;
  generatedAt: string;
  posts: UnifiedPost[];
  failedAccounts: string[];
}
