/**
 * TTL cache of compiled rule sets, keyed by scope.
 *
 * Entries are frozen and only ever replaced whole, so a reader holding a
 * RuleSet never sees it change. An entry is stale once `now - compiledAt >=
 * ttlMs`; it is recompiled on the next lookup, not before.
 */

import type { CompiledRule } from "./compiler.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Compiled allow and block lists of one scope. */
export interface RuleSet {
  readonly includeOnly: readonly CompiledRule[];
  readonly exclude: readonly CompiledRule[];
}

export interface CacheEntry {
  readonly value: RuleSet;
  /** Epoch milliseconds */
  readonly compiledAt: number;
  readonly ttlMs: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  /** Misses caused by an expired entry */
  expired: number;
  size: number;
}

export interface RuleSetCacheOptions {
  ttlMs: number;
  /** Clock, injectable for tests (default: Date.now) */
  now?: () => number;
}

/** Cache key for the global scope. Tenant keys are prefixed, so no tenant can collide with it. */
export const GLOBAL_SCOPE_KEY = "global";

export function tenantScopeKey(tenant: string): string {
  return `tenant:${tenant}`;
}

// ---------------------------------------------------------------------------
// RuleSetCache
// ---------------------------------------------------------------------------

export class RuleSetCache {
  private readonly entries: Map<string, CacheEntry> = new Map();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private expired = 0;

  constructor(options: RuleSetCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Return the cached RuleSet for `key`, compiling (and publishing) a new
   * one when the entry is missing or stale.
   */
  getOrCompile(key: string, compile: () => RuleSet): RuleSet {
    const now = this.now();
    const entry = this.entries.get(key);

    if (entry && !this.isStale(entry, now)) {
      this.hits++;
      return entry.value;
    }

    this.misses++;
    if (entry) {
      this.expired++;
    }

    const value = Object.freeze({ ...compile() });
    this.entries.set(key, Object.freeze({ value, compiledAt: now, ttlMs: this.ttlMs }));
    return value;
  }

  /** Current entry for `key`, stale or not, without touching the counters. */
  peek(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }

  isStale(entry: CacheEntry, now: number = this.now()): boolean {
    return now - entry.compiledAt >= entry.ttlMs;
  }

  /** Drop one scope. Returns whether an entry was present. */
  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  invalidateAll(): void {
    this.entries.clear();
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      expired: this.expired,
      size: this.entries.size,
    };
  }
}
