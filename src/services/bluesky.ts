import { requestJson, RequestOptions } from './http';
import { normalizeIdentity } from './identity';
import { normalizeBlueskyFeedItem } from './normalizer';
import {
  BlueskyFollowsSchema,
  BlueskyThreadNode,
  BlueskyThreadResponseSchema,
  BlueskyTimelineSchema
} from '@/types/bluesky';
import type { LinkedAccount } from '@/types/config';
import type { UserIdentity } from '@/types/identity';
import type { UnifiedPost } from '@/types/post';
import { NotFoundError } from '@/core/errors';
import logger from '@/utils/logger';

export interface BlueskyClientOptions {
  timeoutMs: number;
  maxFollowingPages: number;
  threadDepth?: number;
}

// XRPC signals a missing record with 400 + { error: "NotFound" }
function isXrpcNotFound(status: number, body: unknown): boolean {
  return (
    status === 400 &&
    typeof body === 'object' &&
    body !== null &&
    'error' in body &&
    body.error === 'NotFound'
  );
}

/**
 * XRPC client for the app.bsky endpoints the feed pipeline needs.
 */
export class BlueskyClient {
  private readonly accounts = new Map<string, LinkedAccount>();

  constructor(accounts: LinkedAccount[], private readonly options: BlueskyClientOptions) {
    for (const account of accounts) {
      if (account.platform === 'bluesky') {
        this.accounts.set(account.id, account);
      }
    }
  }

  async getTimeline(accountId: string, limit: number, signal?: AbortSignal): Promise<UnifiedPost[]> {
    const account = this.requireAccount(accountId);
    const url = this.xrpcUrl(account, 'app.bsky.feed.getTimeline');
    url.searchParams.set('limit', Math.min(limit, 100).toString());

    const { data } = await requestJson(url, BlueskyTimelineSchema, this.requestOptions(account, signal));
    return data.feed.map(item => normalizeBlueskyFeedItem(item, account.id));
  }

  /**
   * Full thread around a post: the parent chain and every reply branch
   */
  async getPostThread(accountId: string, uri: string, signal?: AbortSignal): Promise<BlueskyThreadNode> {
    const account = this.requireAccount(accountId);
    const depth = (this.options.threadDepth ?? 1000).toString();
    const url = this.xrpcUrl(account, 'app.bsky.feed.getPostThread');
    url.searchParams.set('uri', uri);
    url.searchParams.set('depth', depth);
    url.searchParams.set('parentHeight', depth);

    const { data } = await requestJson(url, BlueskyThreadResponseSchema, this.requestOptions(account, signal));
    return data.thread;
  }

  async getFollows(accountId: string, signal?: AbortSignal): Promise<UserIdentity[]> {
    const account = this.requireAccount(accountId);
    const follows: UserIdentity[] = [];
    let cursor: string | undefined;
    let page = 0;

    do {
      const url = this.xrpcUrl(account, 'app.bsky.graph.getFollows');
      url.searchParams.set('actor', account.userId);
      url.searchParams.set('limit', '100');
      if (cursor) {
        url.searchParams.set('cursor', cursor);
      }

      const response = await requestJson(url, BlueskyFollowsSchema, this.requestOptions(account, signal));
      follows.push(...response.data.follows.map(actor => normalizeIdentity(actor, 'bluesky')));
      cursor = response.data.cursor;
      page++;
    } while (cursor && page < this.options.maxFollowingPages);

    if (cursor) {
      logger.warn('Follows list truncated at page limit', {
        accountId,
        pages: this.options.maxFollowingPages
      });
    }

    return follows;
  }

  private xrpcUrl(account: LinkedAccount, method: string): URL {
    return new URL(`/xrpc/${method}`, account.server);
  }

  private requestOptions(account: LinkedAccount, signal?: AbortSignal): RequestOptions {
    return {
      accessToken: account.accessToken,
      timeoutMs: this.options.timeoutMs,
      signal,
      isNotFound: isXrpcNotFound
    };
  }

  private requireAccount(accountId: string): LinkedAccount {
    const account = this.accounts.get(accountId);
    if (!account) {
      throw new NotFoundError(`No linked Bluesky account ${accountId}`);
    }
    return account;
  }
}
