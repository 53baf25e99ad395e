import { FeedFilterCoordinator, FeedFilterOptions, threadKeyFor } from '../feed-filter';
import { ThreadResolverRegistry, ThreadResolver, ThreadParticipants } from '../resolvers';
import { ExpiringCache } from '@/core/expiring-cache';
import { IdentitySet } from '@/core/identity-set';
import { CancelledError, NetworkError } from '@/core/errors';
import type { UserIdentity } from '@/types/identity';
import type { UnifiedPost } from '@/types/post';
import { blueskyUser, makePost, mastodonUser } from '@/__tests__/fixtures';

describe('FeedFilterCoordinator', () => {
  const alice = mastodonUser('alice@example.social');
  const bob = mastodonUser('bob@remote.example');
  const carol = mastodonUser('carol@other.example');
  const stranger = mastodonUser('stranger@elsewhere.example');

  const followed = new IdentitySet([alice, bob, carol]);

  const defaultOptions: FeedFilterOptions = {
    enabled: true,
    minFollowedParticipants: 2,
    participantTtlMs: 60000,
    resolutionTimeoutMs: 1000,
    maxConcurrentResolutions: 4
  };

  let resolveParticipants: jest.Mock<Promise<ThreadParticipants>, [UnifiedPost, AbortSignal?]>;
  let cache: ExpiringCache<ThreadParticipants>;
  let filter: FeedFilterCoordinator;

  const createFilter = (options: Partial<FeedFilterOptions> = {}) => {
    const resolver: ThreadResolver = { platform: 'mastodon', resolveParticipants };
    return new FeedFilterCoordinator(
      new ThreadResolverRegistry([resolver]),
      cache,
      { ...defaultOptions, ...options }
    );
  };

  const thread = (participants: UserIdentity[], rootAuthor?: UserIdentity): ThreadParticipants => ({
    participants: new IdentitySet(participants),
    rootAuthor
  });

  const topLevel = makePost({ id: '1', author: alice });
  const strangerReply = makePost({ id: '5', author: stranger, replyTo: { postId: '1' } });
  const selfReply = makePost({ id: '6', author: alice, replyTo: { postId: '1', rootAuthor: alice } });

  beforeEach(() => {
    resolveParticipants = jest.fn();
    cache = new ExpiringCache<ThreadParticipants>({ defaultTtlMs: 60000 });
    filter = createFilter();
  });

  describe('shouldInclude', () => {
    it('should include a top-level post without resolving', async () => {
      resolveParticipants.mockRejectedValue(new NetworkError('down'));

      const decision = await filter.shouldInclude(topLevel, followed);

      expect(decision).toEqual({ include: true, reason: 'top_level' });
      expect(resolveParticipants).not.toHaveBeenCalled();
    });

    it('should include a self-reply from a followed author without resolving', async () => {
      const decision = await filter.shouldInclude(selfReply, followed);

      expect(decision).toEqual({ include: true, reason: 'self_reply_from_followed' });
      expect(resolveParticipants).not.toHaveBeenCalled();
    });

    it('should resolve a self-reply from an author who is not followed', async () => {
      resolveParticipants.mockResolvedValue(thread([stranger]));
      const post = makePost({ id: '7', author: stranger, replyTo: { postId: '1', rootAuthor: stranger } });

      const decision = await filter.shouldInclude(post, followed);

      expect(decision.reason).toBe('filtered_out');
      expect(resolveParticipants).toHaveBeenCalledTimes(1);
    });

    it('should include a self-thread continuation once the resolved root is by the author', async () => {
      resolveParticipants.mockResolvedValue(thread([alice, stranger], alice));
      const post = makePost({ id: '8', author: alice, replyTo: { postId: '6', parentAuthor: alice } });

      const decision = await filter.shouldInclude(post, followed);

      expect(decision).toMatchObject({
        include: true,
        reason: 'self_reply_from_followed',
        threadKey: 'mastodon:acc-1:8'
      });
      expect(resolveParticipants).toHaveBeenCalledTimes(1);
    });

    it('should judge a reply to oneself inside someone else\'s thread by its participants', async () => {
      resolveParticipants.mockResolvedValue(thread([bob, alice], bob));
      const post = makePost({ id: '3', author: alice, replyTo: { postId: '2', parentAuthor: alice } });

      const decision = await filter.shouldInclude(post, new IdentitySet([alice, carol]));

      expect(decision).toMatchObject({
        include: false,
        reason: 'filtered_out',
        followedParticipants: 1
      });
      expect(resolveParticipants).toHaveBeenCalledTimes(1);
    });

    it('should include a reply whose thread has enough followed participants', async () => {
      resolveParticipants.mockResolvedValue(thread([stranger, alice, bob]));

      const decision = await filter.shouldInclude(strangerReply, followed);

      expect(decision).toMatchObject({
        include: true,
        reason: 'thread_has_enough_followed_participants',
        threadKey: 'mastodon:acc-1:5',
        followedParticipants: 2
      });
      expect(cache.has('mastodon:acc-1:5')).toBe(true);
    });

    it('should exclude a reply with too few followed participants', async () => {
      resolveParticipants.mockResolvedValue(thread([stranger, alice]));

      const decision = await filter.shouldInclude(strangerReply, followed);

      expect(decision).toMatchObject({
        include: false,
        reason: 'filtered_out',
        followedParticipants: 1
      });
    });

    it('should count each followed participant once', async () => {
      resolveParticipants.mockResolvedValue(
        thread([alice, mastodonUser('alice@example.social'), stranger])
      );

      const decision = await filter.shouldInclude(strangerReply, followed);

      expect(decision.followedParticipants).toBe(1);
      expect(decision.include).toBe(false);
    });

    it('should fail open when the resolver errors and not cache the failure', async () => {
      resolveParticipants.mockRejectedValue(new NetworkError('HTTP 502', 502));

      const decision = await filter.shouldInclude(strangerReply, followed);

      expect(decision).toMatchObject({
        include: true,
        reason: 'error_fail_open',
        threadKey: 'mastodon:acc-1:5',
        error: 'HTTP 502'
      });
      expect(cache.has('mastodon:acc-1:5')).toBe(false);
      expect(filter.stats().failedOpen).toBe(1);
    });

    it('should fail open when the resolver exceeds the timeout', async () => {
      filter = createFilter({ resolutionTimeoutMs: 20 });
      resolveParticipants.mockImplementation(() => new Promise<ThreadParticipants>(() => undefined));

      const decision = await filter.shouldInclude(strangerReply, followed);

      expect(decision).toMatchObject({
        include: true,
        reason: 'error_fail_open',
        error: 'Operation timed out after 20ms'
      });
      expect(cache.has('mastodon:acc-1:5')).toBe(false);
    });

    it('should fail open when no resolver handles the platform', async () => {
      const post = makePost({
        platform: 'bluesky',
        id: 'at://did:plc:x/app.bsky.feed.post/2',
        author: blueskyUser('did:plc:x'),
        replyTo: { postId: 'at://did:plc:y/app.bsky.feed.post/1', rootPostId: 'at://did:plc:y/app.bsky.feed.post/1' }
      });

      const decision = await filter.shouldInclude(post, followed);

      expect(decision).toMatchObject({
        include: true,
        reason: 'error_fail_open',
        threadKey: 'bluesky:at://did:plc:y/app.bsky.feed.post/1',
        error: 'No thread resolver registered for bluesky'
      });
    });

    it('should reuse cached participants within the ttl', async () => {
      resolveParticipants.mockResolvedValue(thread([alice, bob]));

      await filter.shouldInclude(strangerReply, followed);
      const second = await filter.shouldInclude(strangerReply, followed);

      expect(second.reason).toBe('thread_has_enough_followed_participants');
      expect(resolveParticipants).toHaveBeenCalledTimes(1);
      expect(filter.stats().cacheHits).toBe(1);
    });

    it('should resolve again after the cache is cleared', async () => {
      resolveParticipants.mockResolvedValue(thread([alice, bob]));

      await filter.shouldInclude(strangerReply, followed);
      filter.clearCache();
      await filter.shouldInclude(strangerReply, followed);

      expect(resolveParticipants).toHaveBeenCalledTimes(2);
      expect(filter.stats().resolutions).toBe(2);
    });

    it('should pass everything through while filtering is disabled', async () => {
      resolveParticipants.mockResolvedValue(thread([stranger]));
      filter.setReplyFilteringEnabled(false);

      const decision = await filter.shouldInclude(strangerReply, followed);

      expect(decision).toEqual({ include: true, reason: 'top_level' });
      expect(resolveParticipants).not.toHaveBeenCalled();

      filter.setReplyFilteringEnabled(true);
      expect((await filter.shouldInclude(strangerReply, followed)).include).toBe(false);
    });
  });

  describe('concurrency', () => {
    it('should share one resolution between concurrent evaluations of a thread', async () => {
      resolveParticipants.mockImplementation(
        () => new Promise(resolve => setTimeout(() => resolve(thread([alice, bob])), 10))
      );

      const decisions = await Promise.all(
        Array.from({ length: 50 }, () => filter.shouldInclude(strangerReply, followed))
      );

      expect(resolveParticipants).toHaveBeenCalledTimes(1);
      for (const decision of decisions) {
        expect(decision).toMatchObject({
          include: true,
          reason: 'thread_has_enough_followed_participants',
          followedParticipants: 2
        });
      }
      expect(filter.stats().inflight).toBe(0);
    });

    it('should reject with CancelledError and leave the cache untouched on cancel', async () => {
      resolveParticipants.mockImplementation(() => new Promise<ThreadParticipants>(() => undefined));
      const controller = new AbortController();

      const pending = filter.shouldInclude(strangerReply, followed, controller.signal);
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
      expect(cache.has('mastodon:acc-1:5')).toBe(false);
      expect(resolveParticipants.mock.calls[0][1]?.aborted).toBe(true);
      expect(filter.stats().inflight).toBe(0);
    });

    it('should keep a shared resolution alive while another caller still waits', async () => {
      let finish: (resolution: ThreadParticipants) => void = () => undefined;
      resolveParticipants.mockImplementation(() => {
        return new Promise<ThreadParticipants>(resolve => {
          finish = resolve;
        });
      });
      const controller = new AbortController();

      const cancelled = filter.shouldInclude(strangerReply, followed, controller.signal);
      const kept = filter.shouldInclude(strangerReply, followed);
      controller.abort();
      await expect(cancelled).rejects.toBeInstanceOf(CancelledError);

      expect(resolveParticipants.mock.calls[0][1]?.aborted).toBe(false);
      finish(thread([alice, carol]));

      await expect(kept).resolves.toMatchObject({ include: true, followedParticipants: 2 });
      expect(resolveParticipants).toHaveBeenCalledTimes(1);
    });
  });

  describe('filterTimeline', () => {
    it('should drop filtered replies and keep input order', async () => {
      resolveParticipants.mockResolvedValue(thread([stranger, alice]));

      const result = await filter.filterTimeline([topLevel, strangerReply, selfReply], followed);

      expect(result).toEqual([topLevel, selfReply]);
    });

    it('should evaluate timelines larger than one batch', async () => {
      resolveParticipants.mockResolvedValue(thread([alice, bob]));
      const posts = Array.from({ length: 10 }, (_, i) =>
        makePost({ id: `r${i}`, author: stranger, replyTo: { postId: '1' } })
      );

      const result = await filter.filterTimeline(posts, followed);

      expect(result.map(post => post.id)).toEqual(posts.map(post => post.id));
      expect(resolveParticipants).toHaveBeenCalledTimes(10);
    });
  });

  describe('threadKeyFor', () => {
    it('should scope mastodon keys by source account and prefer the root', () => {
      expect(threadKeyFor(makePost({ id: '9', sourceAccountId: 'acc-2', replyTo: { postId: '8', rootPostId: '3' } })))
        .toBe('mastodon:acc-2:3');
    });

    it('should key bluesky threads by root uri', () => {
      const rootUri = 'at://did:plc:y/app.bsky.feed.post/1';
      expect(threadKeyFor(makePost({ platform: 'bluesky', id: 'at://did:plc:x/app.bsky.feed.post/2', replyTo: { postId: rootUri, rootPostId: rootUri } })))
        .toBe(`bluesky:${rootUri}`);
    });
  });
});
