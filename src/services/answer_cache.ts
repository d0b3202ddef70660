/**
 * Answer Cache
 *
 * Memoizes (document identity, normalized question, config identity) → answer.
 * Bounded by capacity (least recently used goes first) and an optional TTL;
 * whichever triggers first wins. Holds document identities as plain strings
 * only, so evicting an index never touches cached answers and vice versa.
 *
 * `get`/`put`/`invalidate` are synchronous and therefore atomic with respect
 * to each other. `getOrCompute` serializes work per key, so two in-flight
 * questions with the same key produce a single computation.
 */

import { KeyedMutex } from "../utils/keyed_mutex.js";
import { stableHash } from "../utils/hash.js";

export interface ChunkReference {
  index: number;
  startOffset: number;
  endOffset: number;
  score: number;
}

export interface CacheKeyParts {
  documentId: string;
  question: string;
  configIdentity: string;
}

export interface CacheEntry {
  key: string;
  documentId: string;
  normalizedQuestion: string;
  configIdentity: string;
  answer: string;
  chunks: ChunkReference[];
  createdAt: number;
  expiresAt?: number;
}

export type CacheEntryInput = Omit<CacheEntry, "key" | "createdAt" | "expiresAt">;

export interface AnswerCacheOptions {
  capacity: number;
  /** 0 or undefined disables expiry. */
  ttlMs?: number;
  now?: () => number;
}

export interface CacheLookup {
  entry: CacheEntry;
  hit: boolean;
}

/** Computes running for one document, and how often it was invalidated meanwhile. */
interface PendingComputes {
  count: number;
  generation: number;
}

/** Trim, NFKC, case-fold and collapse whitespace. Punctuation is kept. */
export function normalizeQuestion(question: string): string {
  return question.normalize("NFKC").trim().toLowerCase().replace(/\s+/g, " ");
}

export function cacheKey(parts: CacheKeyParts): string {
  return stableHash([parts.documentId, normalizeQuestion(parts.question), parts.configIdentity]);
}

export class AnswerCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly byDocument = new Map<string, Set<string>>();
  // only documents with a compute in flight have an entry
  private readonly pending = new Map<string, PendingComputes>();
  private readonly locks = new KeyedMutex();
  private readonly capacity: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: AnswerCacheOptions) {
    this.capacity = Math.max(1, options.capacity);
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  get(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      this.remove(key);
      return undefined;
    }
    // refresh recency
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  put(key: string, input: CacheEntryInput): CacheEntry {
    const createdAt = this.now();
    const entry: CacheEntry = {
      ...input,
      key,
      createdAt,
      expiresAt: this.ttlMs > 0 ? createdAt + this.ttlMs : undefined,
    };

    this.entries.delete(key);
    this.entries.set(key, entry);

    let keys = this.byDocument.get(entry.documentId);
    if (!keys) {
      keys = new Set();
      this.byDocument.set(entry.documentId, keys);
    }
    keys.add(key);

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.remove(oldest.value);
    }
    return entry;
  }

  /**
   * Cached entry for `key`, or the result of `compute` stored under it.
   * Callers with the same key queue behind the first; later ones see its entry.
   * Failures are not cached.
   */
  getOrCompute(
    key: string,
    documentId: string,
    compute: () => Promise<CacheEntryInput>
  ): Promise<CacheLookup> {
    // taken at call time: an invalidate issued while queued also counts
    const pending = this.track(documentId);
    const generation = pending.generation;

    return this.locks
      .runExclusive(key, async (): Promise<CacheLookup> => {
        const existing = this.get(key);
        if (existing) return { entry: existing, hit: true };

        const input = await compute();
        if (pending.generation !== generation) {
          // document invalidated mid-flight: answer goes back to the caller only
          return { entry: this.detached(key, input), hit: false };
        }
        return { entry: this.put(key, input), hit: false };
      })
      .finally(() => this.untrack(documentId, pending));
  }

  /** Removes every entry for a document. Returns how many were dropped. */
  invalidate(documentId: string): number {
    const pending = this.pending.get(documentId);
    if (pending) pending.generation++;
    const keys = this.byDocument.get(documentId);
    if (!keys) return 0;

    let removed = 0;
    for (const key of [...keys]) {
      if (this.entries.delete(key)) removed++;
    }
    this.byDocument.delete(documentId);
    return removed;
  }

  /** Drops expired entries; returns how many went. */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== undefined && entry.expiresAt <= now) {
        this.remove(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    for (const pending of this.pending.values()) pending.generation++;
    this.entries.clear();
    this.byDocument.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private remove(key: string): void {
    const entry = this.entries.get(key);
    if (!entry) return;
    this.entries.delete(key);
    const keys = this.byDocument.get(entry.documentId);
    keys?.delete(key);
    if (keys && keys.size === 0) this.byDocument.delete(entry.documentId);
  }

  private track(documentId: string): PendingComputes {
    let pending = this.pending.get(documentId);
    if (!pending) {
      pending = { count: 0, generation: 0 };
      this.pending.set(documentId, pending);
    }
    pending.count++;
    return pending;
  }

  private untrack(documentId: string, pending: PendingComputes): void {
    pending.count--;
    if (pending.count === 0 && this.pending.get(documentId) === pending) this.pending.delete(documentId);
  }

  private detached(key: string, input: CacheEntryInput): CacheEntry {
    return { ...input, key, createdAt: this.now() };
  }
}
