import type { IdentitySet } from '@/core/identity-set';
import type { Platform, UserIdentity } from '@/types/identity';
import type { UnifiedPost } from '@/types/post';

/**
 * Everyone who took part in a thread, plus who started it when the
 * platform exposes the root post.
 */
export interface ThreadParticipants {
  participants: IdentitySet;
  rootAuthor?: UserIdentity;
}

/**
 * Resolves the unique authors of a post's whole thread on one platform.
 *
 * Rejects with a ResolutionError (network, not_found, decode) when the
 * platform can't be read. Implementations are stateless and never cache;
 * caching belongs to the caller.
 */
export interface ThreadResolver {
  readonly platform: Platform;
  resolveParticipants(post: UnifiedPost, signal?: AbortSignal): Promise<ThreadParticipants>;
}
