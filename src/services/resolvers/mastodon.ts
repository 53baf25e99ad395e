import { ThreadParticipants, ThreadResolver } from './types';
import { IdentitySet } from '@/core/identity-set';
import { NotFoundError } from '@/core/errors';
import { normalizeIdentity } from '@/services/identity';
import type { MastodonContext } from '@/types/mastodon';
import type { UnifiedPost } from '@/types/post';

export interface MastodonContextApi {
  getStatusContext(accountId: string, statusId: string, signal?: AbortSignal): Promise<MastodonContext>;
}

/**
 * One call to the status context endpoint (for the thread root when it is
 * known); participants are the post's author plus the authors of every
 * ancestor and descendant. The first ancestor is the conversation root.
 */
export class MastodonThreadResolver implements ThreadResolver {
  readonly platform = 'mastodon' as const;

  constructor(private readonly api: MastodonContextApi) {}

  async resolveParticipants(post: UnifiedPost, signal?: AbortSignal): Promise<ThreadParticipants> {
    const statusId = post.replyTo?.rootPostId ?? post.platformSpecificId;
    if (!statusId) {
      throw new NotFoundError(`Post ${post.id} has no Mastodon status id`);
    }

    const context = await this.api.getStatusContext(post.sourceAccountId, statusId, signal);

    const participants = new IdentitySet([post.author]);
    for (const status of [...context.ancestors, ...context.descendants]) {
      participants.add(normalizeIdentity(status.account, 'mastodon'));
    }

    const [root] = context.ancestors;
    return {
      participants,
      rootAuthor: root ? normalizeIdentity(root.account, 'mastodon') : undefined
    };
  }
}
