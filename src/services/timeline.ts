import { FollowingAggregator, FollowingAccountRef } from './following';
import { FeedFilterCoordinator } from './feed-filter';
import { CancelledError, errorMessage } from '@/core/errors';
import type { Platform } from '@/types/identity';
import type { TimelineSnapshot, UnifiedPost } from '@/types/post';
import logger from '@/utils/logger';
import { generateRefreshId } from '@/utils/ids';
import { getCurrentTimestamp, withTimeout } from '@/utils/time';

/**
 * Supplies one linked account's home timeline, already normalized
 */
export interface TimelineSource {
  readonly platform: Platform;
  fetchHomeTimeline(accountId: string, limit: number, signal?: AbortSignal): Promise<UnifiedPost[]>;
}

export interface TimelineAssemblerOptions {
  pageSize: number;
  timeoutMs: number;
}

/**
 * Merge per-account pages: the first occurrence of an id wins, newest first.
 */
export function mergeTimelines(pages: UnifiedPost[][]): UnifiedPost[] {
  const seen = new Set<string>();
  const merged: UnifiedPost[] = [];

  for (const page of pages) {
    for (const post of page) {
      if (seen.has(post.id)) continue;
      seen.add(post.id);
      merged.push(post);
    }
  }

  return merged.sort((a, b) => timeOf(b) - timeOf(a));
}

// Unparseable timestamps sort as oldest
function timeOf(post: UnifiedPost): number {
  const time = Date.parse(post.createdAt);
  return Number.isNaN(time) ? 0 : time;
}

/**
 * Builds the unified, filtered timeline across all linked accounts.
 *
 * Starting a refresh supersedes the one in flight: its fetches and thread
 * resolutions are aborted and it resolves to null instead of a snapshot.
 */
export class TimelineAssembler {
  private readonly sources = new Map<Platform, TimelineSource>();
  private current: AbortController | null = null;
  private latest: TimelineSnapshot | null = null;

  constructor(
    private readonly accounts: FollowingAccountRef[],
    sources: TimelineSource[],
    private readonly following: FollowingAggregator,
    private readonly filter: FeedFilterCoordinator,
    private readonly options: TimelineAssemblerOptions
  ) {
    for (const source of sources) {
      this.sources.set(source.platform, source);
    }
  }

  async refresh(signal?: AbortSignal): Promise<TimelineSnapshot | null> {
    this.current?.abort(new CancelledError('Superseded by a newer refresh'));
    const controller = new AbortController();
    this.current = controller;

    const onAbort = () => controller.abort(new CancelledError());
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const refreshId = generateRefreshId();
    logger.debug('Timeline refresh started', { refreshId, accounts: this.accounts.length });

    try {
      const [pages, followingResult] = await Promise.all([
        this.fetchPages(controller.signal),
        this.following.collect(this.accounts, controller.signal)
      ]);

      const merged = mergeTimelines(pages.posts);
      const posts = await this.filter.filterTimeline(merged, followingResult.followed, controller.signal);

      if (controller.signal.aborted) {
        throw new CancelledError();
      }

      const snapshot: TimelineSnapshot = {
        id: refreshId,
        generatedAt: getCurrentTimestamp(),
        posts,
        failedAccounts: [...new Set([...pages.failedAccounts, ...followingResult.failedAccounts])]
      };
      this.latest = snapshot;

      logger.info('Timeline refreshed', {
        refreshId,
        fetched: merged.length,
        shown: posts.length,
        failedAccounts: snapshot.failedAccounts
      });

      return snapshot;
    } catch (error) {
      if (error instanceof CancelledError || controller.signal.aborted) {
        logger.info('Timeline refresh superseded', { refreshId });
        return null;
      }
      throw error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (this.current === controller) {
        this.current = null;
      }
    }
  }

  latestSnapshot(): TimelineSnapshot | null {
    return this.latest;
  }

  private async fetchPages(signal: AbortSignal): Promise<{ posts: UnifiedPost[][]; failedAccounts: string[] }> {
    const results = await Promise.allSettled(
      this.accounts.map(account => {
        const source = this.sources.get(account.platform);
        if (!source) {
          return Promise.reject(new Error(`No timeline source for platform ${account.platform}`));
        }
        return withTimeout(
          pageSignal => source.fetchHomeTimeline(account.id, this.options.pageSize, pageSignal),
          this.options.timeoutMs,
          signal
        );
      })
    );

    if (signal.aborted) {
      throw new CancelledError();
    }

    const posts: UnifiedPost[][] = [];
    const failedAccounts: string[] = [];

    results.forEach((result, index) => {
      const account = this.accounts[index];
      if (result.status === 'fulfilled') {
        posts.push(result.value);
      } else {
        failedAccounts.push(account.id);
        logger.warn('Timeline fetch failed for account', {
          accountId: account.id,
          platform: account.platform,
          error: errorMessage(result.reason)
        });
      }
    });

    return { posts, failedAccounts };
  }
}
