import { ThreadResolver } from './types';
import type { Platform } from '@/types/identity';

export type { ThreadResolver, ThreadParticipants } from './types';
export { MastodonThreadResolver } from './mastodon';
export { BlueskyThreadResolver } from './bluesky';

/**
 * Picks the resolver matching a post's platform tag
 */
export class ThreadResolverRegistry {
  private readonly resolvers = new Map<Platform, ThreadResolver>();

  constructor(resolvers: ThreadResolver[] = []) {
    for (const resolver of resolvers) {
      this.register(resolver);
    }
  }

  register(resolver: ThreadResolver): void {
    this.resolvers.set(resolver.platform, resolver);
  }

  get(platform: Platform): ThreadResolver | undefined {
    return this.resolvers.get(platform);
  }

  platforms(): Platform[] {
    return [...this.resolvers.keys()];
  }
}
