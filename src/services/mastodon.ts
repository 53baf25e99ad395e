import { requestJson, parseNextLink, JsonResponse, RequestOptions } from './http';
import { normalizeIdentity } from './identity';
import { normalizeMastodonStatus } from './normalizer';
import {
  MastodonAccount,
  MastodonAccountListSchema,
  MastodonContext,
  MastodonContextSchema,
  MastodonStatusListSchema
} from '@/types/mastodon';
import type { LinkedAccount } from '@/types/config';
import type { UserIdentity } from '@/types/identity';
import type { UnifiedPost } from '@/types/post';
import { NotFoundError } from '@/core/errors';
import logger from '@/utils/logger';

export interface MastodonClientOptions {
  timeoutMs: number;
  maxFollowingPages: number;
}

/**
 * Thin Mastodon REST client for the calls the feed pipeline needs.
 * One client serves every linked Mastodon account; calls name the account.
 */
export class MastodonClient {
  private readonly accounts = new Map<string, LinkedAccount>();

  constructor(accounts: LinkedAccount[], private readonly options: MastodonClientOptions) {
    for (const account of accounts) {
      if (account.platform === 'mastodon') {
        this.accounts.set(account.id, account);
      }
    }
  }

  async getHomeTimeline(accountId: string, limit: number, signal?: AbortSignal): Promise<UnifiedPost[]> {
    const account = this.requireAccount(accountId);
    const url = new URL('/api/v1/timelines/home', account.server);
    url.searchParams.set('limit', Math.min(limit, 40).toString());

    const { data } = await requestJson(url, MastodonStatusListSchema, this.requestOptions(account, signal));
    const instanceHost = new URL(account.server).host;
    return data.map(status => normalizeMastodonStatus(status, account.id, instanceHost));
  }

  async getStatusContext(accountId: string, statusId: string, signal?: AbortSignal): Promise<MastodonContext> {
    const account = this.requireAccount(accountId);
    const url = new URL(`/api/v1/statuses/${encodeURIComponent(statusId)}/context`, account.server);

    const { data } = await requestJson(url, MastodonContextSchema, this.requestOptions(account, signal));
    return data;
  }

  /**
   * Every account the linked account follows, following Link pagination
   * up to maxFollowingPages pages.
   */
  async getFollowing(accountId: string, signal?: AbortSignal): Promise<UserIdentity[]> {
    const account = this.requireAccount(accountId);
    let next: URL | undefined = new URL(
      `/api/v1/accounts/${encodeURIComponent(account.userId)}/following`,
      account.server
    );
    next.searchParams.set('limit', '80');

    const following: UserIdentity[] = [];
    let page = 0;

    while (next && page < this.options.maxFollowingPages) {
      const { data, headers }: JsonResponse<MastodonAccount[]> = await requestJson(
        next,
        MastodonAccountListSchema,
        this.requestOptions(account, signal)
      );
      following.push(...data.map(entry => normalizeIdentity(entry, 'mastodon')));
      next = parseNextLink(headers.get('link'));
      page++;
    }

    if (next) {
      logger.warn('Following list truncated at page limit', {
        accountId,
        pages: this.options.maxFollowingPages
      });
    }

    return following;
  }

  private requestOptions(account: LinkedAccount, signal?: AbortSignal): RequestOptions {
    return {
      accessToken: account.accessToken,
      timeoutMs: this.options.timeoutMs,
      signal
    };
  }

  private requireAccount(accountId: string): LinkedAccount {
    const account = this.accounts.get(accountId);
    if (!account) {
      throw new NotFoundError(`No linked Mastodon account ${accountId}`);
    }
    return account;
  }
}
