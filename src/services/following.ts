import { IdentitySet } from '@/core/identity-set';
import { ExpiringCache } from '@/core/expiring-cache';
import { CancelledError, PartialFollowingFailure } from '@/core/errors';
import { FeedMetricsSink, noopMetrics } from './metrics';
import type { LinkedAccount } from '@/types/config';
import type { Platform, UserIdentity } from '@/types/identity';
import logger from '@/utils/logger';
import { raceWithSignal, withTimeout } from '@/utils/time';

/**
 * Fetches the accounts one linked account follows on its platform
 */
export interface FollowingSource {
  readonly platform: Platform;
  fetchFollowing(accountId: string, signal?: AbortSignal): Promise<UserIdentity[]>;
}

export type FollowingAccountRef = Pick<LinkedAccount, 'id' | 'platform'>;

export interface FollowingAggregatorOptions {
  ttlMs: number;
  fetchTimeoutMs: number;
}

export interface FollowingResult {
  followed: IdentitySet;
  failedAccounts: string[];
}

/**
 * Builds the union of everything the user follows across linked accounts.
 *
 * Accounts are fetched concurrently and independently. A failed account
 * contributes nothing (PartialFollowingFailure is logged) while the rest
 * still count. Per-account sets are cached with a finite TTL, and
 * concurrent callers for one account share a single in-flight fetch.
 */
export class FollowingAggregator {
  private readonly sources = new Map<Platform, FollowingSource>();
  private readonly inflight = new Map<string, Promise<IdentitySet>>();

  constructor(
    sources: FollowingSource[],
    private readonly cache: ExpiringCache<IdentitySet>,
    private readonly options: FollowingAggregatorOptions,
    private readonly metrics: FeedMetricsSink = noopMetrics
  ) {
    for (const source of sources) {
      this.sources.set(source.platform, source);
    }
  }

  async getFollowedAccounts(linkedAccounts: FollowingAccountRef[], signal?: AbortSignal): Promise<IdentitySet> {
    const { followed } = await this.collect(linkedAccounts, signal);
    return followed;
  }

  async collect(linkedAccounts: FollowingAccountRef[], signal?: AbortSignal): Promise<FollowingResult> {
    if (signal?.aborted) {
      throw new CancelledError('Following aggregation cancelled');
    }

    const results = await Promise.allSettled(
      linkedAccounts.map(account => raceWithSignal(this.followingFor(account), signal))
    );

    if (signal?.aborted) {
      throw new CancelledError('Following aggregation cancelled');
    }

    let followed = new IdentitySet();
    const failedAccounts: string[] = [];

    results.forEach((result, index) => {
      const account = linkedAccounts[index];
      if (result.status === 'fulfilled') {
        followed = followed.union(result.value);
        return;
      }

      const failure = new PartialFollowingFailure(account.id, account.platform, result.reason);
      failedAccounts.push(account.id);
      this.metrics.recordFollowingFetch(account.platform, 'failed');
      logger.warn(failure.message, {
        accountId: account.id,
        platform: account.platform
      });
    });

    logger.debug('Following set aggregated', {
      accounts: linkedAccounts.length,
      failed: failedAccounts.length,
      followed: followed.size
    });

    return { followed, failedAccounts };
  }

  /**
   * Drop cached following sets (one account, or all)
   */
  invalidate(accountId?: string): void {
    if (accountId) {
      this.cache.delete(accountId);
    } else {
      this.cache.clear();
    }
  }

  private followingFor(account: FollowingAccountRef): Promise<IdentitySet> {
    const cached = this.cache.get(account.id);
    if (cached) {
      this.metrics.recordFollowingFetch(account.platform, 'cached');
      return Promise.resolve(cached);
    }

    const existing = this.inflight.get(account.id);
    if (existing) {
      return existing;
    }

    const pending = this.fetchAndCache(account).finally(() => {
      this.inflight.delete(account.id);
    });
    this.inflight.set(account.id, pending);
    return pending;
  }

  private async fetchAndCache(account: FollowingAccountRef): Promise<IdentitySet> {
    const source = this.sources.get(account.platform);
    if (!source) {
      throw new Error(`No following source for platform ${account.platform}`);
    }

    const identities = await withTimeout(
      signal => source.fetchFollowing(account.id, signal),
      this.options.fetchTimeoutMs
    );

    const following = new IdentitySet(identities);
    this.cache.put(account.id, following, this.options.ttlMs);
    this.metrics.recordFollowingFetch(account.platform, 'fetched');

    logger.debug('Fetched following set', {
      accountId: account.id,
      platform: account.platform,
      count: following.size
    });

    return following;
  }
}
