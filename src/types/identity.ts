export type Platform = 'mastodon' | 'bluesky';

/**
 * Platform-qualified "who is this person". Equality is by (value, platform);
 * the same human on two platforms is two identities.
 */
export interface UserIdentity {
  readonly value: string; // Fully-qualified acct (Mastodon) or DID (Bluesky)
  readonly platform: Platform;
}

export function identityKey(identity: UserIdentity): string {
  return `${identity.platform}:${identity.value}`;
}

export function sameIdentity(a: UserIdentity | undefined, b: UserIdentity | undefined): boolean {
  if (!a || !b) return false;
  return a.platform === b.platform && a.value === b.value;
}

export function createIdentity(value: string, platform: Platform): UserIdentity {
  return Object.freeze({ value, platform });
}
