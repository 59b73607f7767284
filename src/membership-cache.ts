import type { GitHubClient } from './github.js';
import type { Ctx } from './types.js';

/** How long a membership lookup result is reused: one hour */
export const DEFAULT_MEMBERSHIP_TTL_MS = 60 * 60 * 1000;

export type MembershipLookup = (ctx: Ctx, org: string, username: string) => Promise<boolean>;

interface CacheEntry {
  expiresAt: number;
  value: Promise<boolean>;
}

export interface MembershipCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

/**
 * Time-bounded cache of organization membership lookups keyed by (org, username).
 *
 * The pending promise is stored as soon as a lookup starts, so concurrent
 * callers asking for the same key share one upstream request. Failed lookups
 * are evicted and retried by the next caller.
 */
export class MembershipCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly lookup: MembershipLookup;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(lookup: MembershipLookup, options: MembershipCacheOptions = {}) {
    this.lookup = lookup;
    this.ttlMs = options.ttlMs ?? DEFAULT_MEMBERSHIP_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  isMember(ctx: Ctx, org: string, username: string): Promise<boolean> {
    const key = `${org}/${username}`;
    const now = this.now();

    const entry = this.entries.get(key);
    if (entry && entry.expiresAt > now) {
      return entry.value;
    }

    this.evictExpired(now);

    const value: Promise<boolean> = this.lookup(ctx, org, username).catch((error: unknown) => {
      if (this.entries.get(key)?.value === value) {
        this.entries.delete(key);
      }
      throw error;
    });
    this.entries.set(key, { expiresAt: now + this.ttlMs, value });
    return value;
  }

  get size(): number {
    return this.entries.size;
  }

  private evictExpired(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }
}

/**
 * Wrap a client so its organization membership lookups go through a cache.
 */
export function withMembershipCache(client: GitHubClient, options: MembershipCacheOptions = {}): GitHubClient {
  const cache = new MembershipCache((ctx, org, username) => client.isOrganizationMember(ctx, org, username), options);

  return {
    compareCommits: (ctx, baseSha, headSha) => client.compareCommits(ctx, baseSha, headSha),
    getConfig: (ctx) => client.getConfig(ctx),
    isOrganizationMember: (ctx, org, username) => cache.isMember(ctx, org, username),
    createCheckRun: (ctx, checkRun) => client.createCheckRun(ctx, checkRun),
  };
}
