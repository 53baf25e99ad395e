import { UserIdentity, identityKey } from '@/types/identity';

/**
 * Set of identities with value equality. A plain Set<UserIdentity> would
 * compare by reference, so entries are keyed by identityKey().
 */
export class IdentitySet implements Iterable<UserIdentity> {
  private readonly entries = new Map<string, UserIdentity>();

  constructor(identities: Iterable<UserIdentity> = []) {
    for (const identity of identities) {
      this.add(identity);
    }
  }

  add(identity: UserIdentity): this {
    const key = identityKey(identity);
    if (!this.entries.has(key)) {
      this.entries.set(key, identity);
    }
    return this;
  }

  has(identity: UserIdentity): boolean {
    return this.entries.has(identityKey(identity));
  }

  get size(): number {
    return this.entries.size;
  }

  values(): IterableIterator<UserIdentity> {
    return this.entries.values();
  }

  [Symbol.iterator](): IterableIterator<UserIdentity> {
    return this.values();
  }

  union(other: Iterable<UserIdentity>): IdentitySet {
    const result = new IdentitySet(this);
    for (const identity of other) {
      result.add(identity);
    }
    return result;
  }

  /**
   * Number of unique identities present in both sets
   */
  countIn(other: IdentitySet): number {
    let count = 0;
    for (const key of this.entries.keys()) {
      if (other.entries.has(key)) count++;
    }
    return count;
  }

  toArray(): UserIdentity[] {
    return [...this.entries.values()];
  }
}
