import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import * as path from 'node:path';
import { CacheEntrySchema, CacheFileSchema, type CacheFileEntry } from './schemas.js';
import { CacheWriteError } from './errors.js';
import type { CachedPullRequests } from './types.js';

/** Prefix for keys of review-request queries, e.g. `requested:octocat` */
export const REQUESTED_KEY_PREFIX = 'requested:';

/** Default cache retention: 10 days */
export const DEFAULT_RETENTION_MS = 10 * 24 * 60 * 60 * 1000;

const TIMESTAMP_REGEX = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/** Cache key for a review-request query */
export function requestedKey(name: string): string {
  return `${REQUESTED_KEY_PREFIX}${name}`;
}

/** Drop the milliseconds: cache timestamps have second precision */
export function truncateToSeconds(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

/** Format a date as `YYYY-MM-DD HH:MM:SS` in UTC */
export function formatCacheTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

/** Parse a `YYYY-MM-DD HH:MM:SS` UTC timestamp. Returns null for anything else. */
export function parseCacheTimestamp(value: string): Date | null {
  const match = value.match(TIMESTAMP_REGEX);
  if (!match) return null;

  const [, y, mo, d, h, mi, s] = match.map(Number);
  const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Read the cache file. A missing, unreadable or unparseable file is an empty cache;
 * entries that don't match the schema are dropped individually.
 */
function readCacheFile(filePath: string): Map<string, CacheFileEntry> {
  const entries = new Map<string, CacheFileEntry>();

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch {
    // No cache yet, or a corrupt one -- start over
    return entries;
  }

  const file = CacheFileSchema.safeParse(parsed);
  if (!file.success) return entries;

  for (const [key, value] of Object.entries(file.data)) {
    const entry = CacheEntrySchema.safeParse(value);
    if (entry.success && parseCacheTimestamp(entry.data.timestamp)) {
      entries.set(key, entry.data);
    }
  }
  return entries;
}

/**
 * JSON file cache of raw search results, keyed by subject.
 *
 * The whole map lives in memory and is rewritten on every change. Writes go to a
 * temp file that is renamed over the cache, so readers see the old or the new
 * file, never half of one.
 */
export class PRCache {
  private readonly entries: Map<string, CacheFileEntry>;

  constructor(readonly filePath: string) {
    this.entries = readCacheFile(filePath);
  }

  /** Cached payloads and fetch time for `key`, or null when nothing is cached */
  load(key: string): CachedPullRequests | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    const timestamp = parseCacheTimestamp(entry.timestamp);
    if (!timestamp) return null;

    return { timestamp, prs: entry.prs };
  }

  /**
   * Replace the entry for `key` and persist. The timestamp is stored to the
   * second; pass {@link truncateToSeconds} output to get it back unchanged.
   * Throws CacheWriteError on I/O failure.
   */
  save(key: string, prs: unknown[], timestamp: Date): void {
    this.entries.set(key, {
      timestamp: formatCacheTimestamp(timestamp),
      prs,
    });
    this.persist();
  }

  /**
   * Remove entries fetched more than `retentionMs` before `now` and persist.
   * Ages are whole seconds, so an entry exactly `retentionMs` old is kept
   * whatever the milliseconds of `now`.
   *
   * @returns The removed keys
   */
  cleanup(retentionMs: number = DEFAULT_RETENTION_MS, now: Date = new Date()): string[] {
    const removed: string[] = [];
    const nowMs = truncateToSeconds(now).getTime();
    for (const [key, entry] of this.entries) {
      const timestamp = parseCacheTimestamp(entry.timestamp);
      if (!timestamp || nowMs - timestamp.getTime() > retentionMs) {
        removed.push(key);
      }
    }
    for (const key of removed) {
      this.entries.delete(key);
    }
    this.persist();
    return removed;
  }

  /** Keys currently held, in insertion order */
  keys(): string[] {
    return [...this.entries.keys()];
  }

  private persist(): void {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      mkdirSync(path.dirname(this.filePath), { recursive: true });
      writeFileSync(tempPath, JSON.stringify(Object.fromEntries(this.entries), null, 4), 'utf-8');
      renameSync(tempPath, this.filePath);
    } catch (error: unknown) {
      try { rmSync(tempPath, { force: true }); } catch { /* best-effort */ }
      throw new CacheWriteError(this.filePath, error);
    }
  }
}
