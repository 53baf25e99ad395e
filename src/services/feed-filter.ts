import { ThreadParticipants, ThreadResolverRegistry } from './resolvers';
import { FeedMetricsSink, ResolutionOutcome, noopMetrics } from './metrics';
import { IdentitySet } from '@/core/identity-set';
import { ExpiringCache } from '@/core/expiring-cache';
import { CancelledError, NotFoundError, errorMessage, isResolutionError } from '@/core/errors';
import { sameIdentity } from '@/types/identity';
import type { FilterDecision, UnifiedPost } from '@/types/post';
import logger from '@/utils/logger';
import { raceWithSignal, withTimeout } from '@/utils/time';

export interface FeedFilterOptions {
  enabled: boolean;
  minFollowedParticipants: number;
  participantTtlMs: number;
  resolutionTimeoutMs: number;
  maxConcurrentResolutions: number;
}

export interface FeedFilterStats {
  evaluated: number;
  included: number;
  filteredOut: number;
  failedOpen: number;
  cacheHits: number;
  resolutions: number;
  inflight: number;
}

interface InflightResolution {
  promise: Promise<ThreadParticipants>;
  controller: AbortController;
  waiters: number;
  settled: boolean;
}

/**
 * Cache key for a post's thread. Bluesky URIs are global; Mastodon status
 * ids are only unique per instance, so the source account is part of it.
 */
export function threadKeyFor(post: UnifiedPost): string {
  const threadId = post.replyTo?.rootPostId ?? post.platformSpecificId;
  if (post.platform === 'mastodon') {
    return `mastodon:${post.sourceAccountId}:${threadId}`;
  }
  return `bluesky:${threadId}`;
}

/**
 * Decides which replies reach the unified timeline.
 *
 * Top-level posts and self-thread continuations from followed authors pass
 * through. A continuation whose root author the timeline didn't carry is
 * recognised once its thread is resolved. Any other reply is shown only when its thread has at
 * least minFollowedParticipants followed participants. Resolution failures
 * of any kind include the post (fail-open); only caller cancellation
 * propagates, as CancelledError.
 */
export class FeedFilterCoordinator {
  private enabled: boolean;
  private readonly inflight = new Map<string, InflightResolution>();
  private readonly counters = {
    evaluated: 0,
    included: 0,
    filteredOut: 0,
    failedOpen: 0,
    cacheHits: 0,
    resolutions: 0
  };

  constructor(
    private readonly resolvers: ThreadResolverRegistry,
    private readonly cache: ExpiringCache<ThreadParticipants>,
    private readonly options: FeedFilterOptions,
    private readonly metrics: FeedMetricsSink = noopMetrics
  ) {
    this.enabled = options.enabled;
  }

  get replyFilteringEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Takes effect for every subsequent decision
   */
  setReplyFilteringEnabled(enabled: boolean): void {
    if (this.enabled !== enabled) {
      logger.info('Reply filtering toggled', { enabled });
    }
    this.enabled = enabled;
  }

  async shouldInclude(
    post: UnifiedPost,
    followed: IdentitySet,
    signal?: AbortSignal
  ): Promise<FilterDecision> {
    const decision = await this.decide(post, followed, signal);
    this.report(post, decision);
    return decision;
  }

  /**
   * Included posts in their input order. Decisions run concurrently in
   * batches of maxConcurrentResolutions.
   */
  async filterTimeline(
    posts: UnifiedPost[],
    followed: IdentitySet,
    signal?: AbortSignal
  ): Promise<UnifiedPost[]> {
    const decisions: FilterDecision[] = [];
    const batchSize = this.options.maxConcurrentResolutions;

    for (let i = 0; i < posts.length; i += batchSize) {
      const batch = posts.slice(i, i + batchSize);
      const batchDecisions = await Promise.all(
        batch.map(post => this.shouldInclude(post, followed, signal))
      );
      decisions.push(...batchDecisions);
    }

    const included = posts.filter((_, index) => decisions[index].include);

    logger.debug('Timeline filtered', {
      input: posts.length,
      included: included.length
    });

    return included;
  }

  clearCache(): void {
    this.cache.clear();
  }

  stats(): FeedFilterStats {
    return { ...this.counters, inflight: this.inflight.size };
  }

  private async decide(
    post: UnifiedPost,
    followed: IdentitySet,
    signal?: AbortSignal
  ): Promise<FilterDecision> {
    // Escape hatch: everything passes while filtering is off
    if (!this.enabled) {
      return { include: true, reason: 'top_level' };
    }

    // Top-level posts are judged upstream, not here
    if (!post.replyTo) {
      return { include: true, reason: 'top_level' };
    }

    // Thread continuation by a followed author
    const authorFollowed = followed.has(post.author);
    if (authorFollowed && sameIdentity(post.replyTo.rootAuthor, post.author)) {
      return { include: true, reason: 'self_reply_from_followed' };
    }

    const threadKey = threadKeyFor(post);
    const startedAt = Date.now();

    try {
      const { participants, rootAuthor } = await this.participantsFor(post, threadKey, signal);
      const elapsedMs = Date.now() - startedAt;

      if (authorFollowed && sameIdentity(rootAuthor, post.author)) {
        return { include: true, reason: 'self_reply_from_followed', threadKey, elapsedMs };
      }

      const followedParticipants = participants.countIn(followed);

      if (followedParticipants >= this.options.minFollowedParticipants) {
        return {
          include: true,
          reason: 'thread_has_enough_followed_participants',
          threadKey,
          followedParticipants,
          elapsedMs
        };
      }
      return { include: false, reason: 'filtered_out', threadKey, followedParticipants, elapsedMs };
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError(`Filtering of ${post.id} cancelled`);
      }
      return {
        include: true,
        reason: 'error_fail_open',
        threadKey,
        elapsedMs: Date.now() - startedAt,
        error: errorMessage(error)
      };
    }
  }

  private participantsFor(
    post: UnifiedPost,
    threadKey: string,
    signal?: AbortSignal
  ): Promise<ThreadParticipants> {
    const cached = this.cache.get(threadKey);
    if (cached) {
      this.counters.cacheHits++;
      this.metrics.recordParticipantCache('hit');
      return Promise.resolve(cached);
    }
    this.metrics.recordParticipantCache('miss');

    // Concurrent evaluations of one thread share a single resolution
    const entry = this.inflight.get(threadKey) ?? this.startResolution(post, threadKey);
    entry.waiters++;
    return this.awaitResolution(entry, threadKey, signal);
  }

  private async awaitResolution(
    entry: InflightResolution,
    threadKey: string,
    signal?: AbortSignal
  ): Promise<ThreadParticipants> {
    try {
      return await raceWithSignal(entry.promise, signal);
    } finally {
      entry.waiters--;
      // Abort the shared call only once nobody is waiting for it
      if (!entry.settled && entry.waiters === 0) {
        entry.controller.abort(new CancelledError());
        if (this.inflight.get(threadKey) === entry) {
          this.inflight.delete(threadKey);
        }
      }
    }
  }

  private startResolution(post: UnifiedPost, threadKey: string): InflightResolution {
    const controller = new AbortController();
    const promise = this.resolve(post, threadKey, controller.signal);
    const entry: InflightResolution = { promise, controller, waiters: 0, settled: false };

    const settle = () => {
      entry.settled = true;
      if (this.inflight.get(threadKey) === entry) {
        this.inflight.delete(threadKey);
      }
    };
    promise.then(settle, settle);

    this.inflight.set(threadKey, entry);
    return entry;
  }

  private async resolve(post: UnifiedPost, threadKey: string, signal: AbortSignal): Promise<ThreadParticipants> {
    const resolver = this.resolvers.get(post.platform);
    if (!resolver) {
      this.metrics.recordResolution(post.platform, 'no_resolver', 0);
      throw new NotFoundError(`No thread resolver registered for ${post.platform}`);
    }

    const startedAt = Date.now();
    try {
      const resolution = await withTimeout(
        resolverSignal => resolver.resolveParticipants(post, resolverSignal),
        this.options.resolutionTimeoutMs,
        signal
      );

      // A cancelled resolution never reaches the cache
      if (signal.aborted) {
        throw new CancelledError();
      }

      this.cache.put(threadKey, resolution, this.options.participantTtlMs);
      this.counters.resolutions++;
      this.metrics.recordResolution(post.platform, 'success', (Date.now() - startedAt) / 1000);
      return resolution;
    } catch (error) {
      this.metrics.recordResolution(post.platform, outcomeOf(error), (Date.now() - startedAt) / 1000);
      logger.debug('Thread resolution failed', {
        threadKey,
        postId: post.id,
        error: errorMessage(error)
      });
      throw error;
    }
  }

  private report(post: UnifiedPost, decision: FilterDecision): void {
    this.counters.evaluated++;
    if (decision.reason === 'filtered_out') this.counters.filteredOut++;
    else this.counters.included++;
    if (decision.reason === 'error_fail_open') this.counters.failedOpen++;

    this.metrics.recordDecision(decision.reason, post.platform);

    const meta = {
      postId: post.id,
      reason: decision.reason,
      threadKey: decision.threadKey,
      followedParticipants: decision.followedParticipants,
      elapsedMs: decision.elapsedMs
    };

    if (decision.reason === 'error_fail_open') {
      logger.warn('Thread resolution failed, including reply (fail open)', { ...meta, error: decision.error });
    } else {
      logger.debug('Filter decision', meta);
    }
  }
}

function outcomeOf(error: unknown): ResolutionOutcome {
  if (error instanceof CancelledError) return 'cancelled';
  if (isResolutionError(error)) return error.kind;
  return 'network';
}
