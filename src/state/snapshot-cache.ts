import { randomBytes } from "node:crypto";
import type { SerializedTree } from "../types.js";

export const DEFAULT_TTL_SECONDS = 300;

export interface CacheEntry {
  key: string;
  sourceUrl: string;
  snapshot: SerializedTree;
  createdAt: number;
  lastAccessedAt: number;
  ttlSeconds: number;
}

export interface SnapshotCacheOptions {
  defaultTtlSeconds?: number;
  now?: () => number;
  generateKey?: () => string;
}

function randomKey(): string {
  return `snap_${randomBytes(8).toString("hex")}`;
}

/**
 * Parsed snapshots kept for pagination across calls, with sliding expiry:
 * an entry lives `ttlSeconds` past its last successful `get`.
 *
 * Expired entries are swept on every `create`/`get`; there is no timer, so an
 * untouched cache keeps its entries until the process ends. All operations
 * are synchronous and run on the event loop, so no locking is needed.
 */
export class SnapshotCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly defaultTtlSeconds: number;
  private readonly now: () => number;
  private readonly generateKey: () => string;

  constructor(options: SnapshotCacheOptions = {}) {
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? DEFAULT_TTL_SECONDS;
    this.now = options.now ?? Date.now;
    this.generateKey = options.generateKey ?? randomKey;
  }

  get size(): number {
    this.sweep();
    return this.entries.size;
  }

  create(sourceUrl: string, snapshot: SerializedTree, ttlSeconds?: number): string {
    this.sweep();
    let key = this.generateKey();
    while (this.entries.has(key)) key = this.generateKey();

    const now = this.now();
    this.entries.set(key, {
      key,
      sourceUrl,
      snapshot,
      createdAt: now,
      lastAccessedAt: now,
      ttlSeconds: ttlSeconds ?? this.defaultTtlSeconds,
    });
    return key;
  }

  get(key: string): CacheEntry | undefined {
    this.sweep();
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    entry.lastAccessedAt = this.now();
    return entry;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.lastAccessedAt > entry.ttlSeconds * 1000;
  }

  private sweep(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) this.entries.delete(key);
    }
  }
}
