import { Platform, UserIdentity, createIdentity } from '@/types/identity';
import type { MastodonAccount } from '@/types/mastodon';
import type { BlueskyActor } from '@/types/bluesky';

/**
 * Map a platform-native account to a UserIdentity.
 *
 * Never throws: missing handles fall back to the platform id so that a
 * normalization gap cannot stall the filtering pipeline.
 */
export function normalizeIdentity(account: MastodonAccount, platform: 'mastodon'): UserIdentity;
export function normalizeIdentity(account: BlueskyActor, platform: 'bluesky'): UserIdentity;
export function normalizeIdentity(
  account: MastodonAccount | BlueskyActor,
  platform: Platform
): UserIdentity {
  if (platform === 'mastodon' && 'acct' in account) {
    return createIdentity(mastodonValue(account), 'mastodon');
  }
  if (platform === 'bluesky' && 'did' in account) {
    return createIdentity(blueskyValue(account), 'bluesky');
  }
  // Mismatched input: best effort from whatever id the object carries
  const fallback = 'did' in account ? account.did : account.id;
  return createIdentity(fallback.trim() || 'unknown', platform);
}

function mastodonValue(account: MastodonAccount): string {
  const acct = account.acct.trim().replace(/^@/, '').toLowerCase();
  const local = acct || account.username.trim().toLowerCase();

  if (!local) {
    return account.id;
  }
  if (local.includes('@')) {
    return local;
  }

  // Local accounts report acct without a domain; the profile URL carries it
  const host = hostOf(account.url);
  return host ? `${local}@${host}` : local;
}

function blueskyValue(actor: BlueskyActor): string {
  const did = actor.did.trim();
  if (did) return did;
  const handle = actor.handle.trim().replace(/^@/, '').toLowerCase();
  return handle || 'unknown';
}

function hostOf(url: string | undefined): string | undefined {
  if (!url) return undefined;
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return undefined;
  }
}

/**
 * Identity of the repository owner of an at:// URI (at://did:plc:abc/app.bsky.feed.post/xyz)
 */
export function identityFromAtUri(uri: string): UserIdentity | undefined {
  const match = /^at:\/\/([^/]+)/.exec(uri);
  if (!match) return undefined;
  return createIdentity(match[1], 'bluesky');
}
