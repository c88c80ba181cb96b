import { randomUUID } from 'node:crypto';

/**
 * Dedup cache contract used by the intake gate.
 *
 * `claim()` is the atomic check-and-insert: it resolves a claim token for
 * exactly one caller per live window and `null` for everyone else until the
 * entry expires or is released.
 *
 * `release()` only removes the entry written by the claim that produced the
 * token. Once that entry has expired and a later claim has taken the
 * fingerprint, the stale token no longer matches and the call does nothing.
 */
export interface DedupCache {
  readonly backend: 'memory' | 'redis';
  claim(fingerprint: string, ttlMs: number): Promise<string | null>;
  release(fingerprint: string, token: string): Promise<void>;
}

interface DedupEntry {
  expiresAt: number;
  token: string;
}

/**
 * Per-process dedup cache backed by a Map of fingerprint → entry.
 *
 * The lookup and the insert in `claim()` run synchronously before the
 * returned promise is created. Node never interleaves another call inside
 * that span, so concurrent submits for one fingerprint cannot both win.
 *
 * Expired entries are ignored on lookup; `sweep()` drops them for memory
 * bounding. Injectable `nowFn` allows deterministic testing.
 */
export class InMemoryDedupCache implements DedupCache {
  readonly backend = 'memory';
  private readonly entries: Map<string, DedupEntry> = new Map();
  private readonly nowFn: () => number;

  constructor(nowFn: () => number = Date.now) {
    this.nowFn = nowFn;
  }

  async claim(fingerprint: string, ttlMs: number): Promise<string | null> {
    return this.claimSync(fingerprint, ttlMs);
  }

  async release(fingerprint: string, token: string): Promise<void> {
    if (this.entries.get(fingerprint)?.token === token) {
      this.entries.delete(fingerprint);
    }
  }

  /** Whether a live entry exists for the fingerprint. */
  isLive(fingerprint: string): boolean {
    const entry = this.entries.get(fingerprint);
    return entry !== undefined && this.nowFn() < entry.expiresAt;
  }

  /** Drops every expired entry. Returns how many were removed. */
  sweep(): number {
    const now = this.nowFn();
    let removed = 0;
    for (const [fingerprint, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(fingerprint);
        removed++;
      }
    }
    return removed;
  }

  /** Entries held, live or not. */
  get size(): number {
    return this.entries.size;
  }

  private claimSync(fingerprint: string, ttlMs: number): string | null {
    if (this.isLive(fingerprint)) return null;
    const token = randomUUID();
    this.entries.set(fingerprint, { expiresAt: this.nowFn() + ttlMs, token });
    return token;
  }
}
