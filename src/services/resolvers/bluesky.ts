import { ThreadParticipants, ThreadResolver } from './types';
import { IdentitySet } from '@/core/identity-set';
import { NotFoundError } from '@/core/errors';
import { normalizeIdentity } from '@/services/identity';
import type { BlueskyThreadNode, BlueskyThreadViewPost } from '@/types/bluesky';
import type { UnifiedPost } from '@/types/post';

export interface BlueskyThreadApi {
  getPostThread(accountId: string, uri: string, signal?: AbortSignal): Promise<BlueskyThreadNode>;
}

/**
 * Fetches the thread from its root (falling back to the post itself) and
 * collects every author along the parent chain and all reply branches.
 */
export class BlueskyThreadResolver implements ThreadResolver {
  readonly platform = 'bluesky' as const;

  constructor(private readonly api: BlueskyThreadApi) {}

  async resolveParticipants(post: UnifiedPost, signal?: AbortSignal): Promise<ThreadParticipants> {
    const uri = post.replyTo?.rootPostId ?? post.platformSpecificId;
    if (!uri) {
      throw new NotFoundError(`Post ${post.id} has no at:// URI`);
    }

    const thread = await this.api.getPostThread(post.sourceAccountId, uri, signal);
    if (!('post' in thread)) {
      throw new NotFoundError(`Thread root ${uri} is unavailable`);
    }

    const participants = new IdentitySet([post.author]);
    collectAuthors(thread, participants);

    return {
      participants,
      rootAuthor: normalizeIdentity(topOf(thread).post.author, 'bluesky')
    };
  }
}

// Highest post still visible along the parent chain
function topOf(node: BlueskyThreadViewPost): BlueskyThreadViewPost {
  let top = node;
  while (top.parent && 'post' in top.parent) {
    top = top.parent;
  }
  return top;
}

function collectAuthors(root: BlueskyThreadNode, participants: IdentitySet): void {
  // Iterative walk: threads can be deep enough to matter for recursion
  const pending: BlueskyThreadNode[] = [root];
  const seen = new Set<string>();

  while (pending.length > 0) {
    const node = pending.pop();
    if (!node || !('post' in node)) continue; // not found / blocked
    if (seen.has(node.post.uri)) continue;
    seen.add(node.post.uri);

    participants.add(normalizeIdentity(node.post.author, 'bluesky'));

    if (node.parent) pending.push(node.parent);
    if (node.replies) pending.push(...node.replies);
  }
}
