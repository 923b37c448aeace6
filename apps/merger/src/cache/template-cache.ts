/**
 * Template Cache
 *
 * In-memory LRU cache of template bytes, keyed by resolved path. An entry is
 * served only while the file's size and modification time still match the
 * fingerprint taken when it was read, so edited templates are picked up on
 * the next merge. Only raw bytes are cached; every merge parses its own copy.
 *
 * - LRU eviction when capacity is reached
 * - Per-entry TTL (default 30 minutes)
 * - Global memory limit (default 100 MB)
 */

import { readFile, stat } from 'fs/promises';
import { resolve } from 'path';
import { TemplateError } from '@report-merge/shared';
import { logger } from '../logger';
import { incTemplateCacheHits, incTemplateCacheMisses } from '../metrics/merge-metrics';

export interface TemplateCacheConfig {
  maxCapacity: number;
  defaultTtlMs: number;
  memoryLimitBytes: number;
}

interface CacheEntry {
  bytes: Buffer;
  fingerprint: string;
  expiresAt: number;
  lastAccessedAt: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  hitRatio: number;
  entryCount: number;
  totalSizeBytes: number;
  memoryLimitBytes: number;
  maxCapacity: number;
}

const DEFAULT_CONFIG: TemplateCacheConfig = {
  maxCapacity: 20,
  defaultTtlMs: 30 * 60 * 1000, // 30 minutes
  memoryLimitBytes: 100 * 1024 * 1024, // 100 MB
};

export class TemplateCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly config: TemplateCacheConfig;
  private hits = 0;
  private misses = 0;
  private totalSizeBytes = 0;

  constructor(config?: Partial<TemplateCacheConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Bytes of the template at `path`, from cache when the file is unchanged.
   * @throws TemplateError when the file cannot be read.
   */
  async load(path: string): Promise<Buffer> {
    const key = resolve(path);
    let fingerprint: string;
    try {
      const info = await stat(key);
      fingerprint = `${info.size}:${info.mtimeMs}`;
    } catch (err) {
      throw new TemplateError(path, 'cannot read template', { cause: err });
    }

    const cached = this.lookup(key, fingerprint);
    if (cached) {
      return cached;
    }

    let bytes: Buffer;
    try {
      bytes = await readFile(key);
    } catch (err) {
      throw new TemplateError(path, 'cannot read template', { cause: err });
    }
    this.store(key, fingerprint, bytes);
    return bytes;
  }

  invalidate(path: string): boolean {
    const key = resolve(path);
    if (!this.entries.has(key)) {
      return false;
    }
    this.removeEntry(key);
    return true;
  }

  clear(): void {
    this.entries.clear();
    this.totalSizeBytes = 0;
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    const totalRequests = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRatio: totalRequests > 0 ? this.hits / totalRequests : 0,
      entryCount: this.entries.size,
      totalSizeBytes: this.totalSizeBytes,
      memoryLimitBytes: this.config.memoryLimitBytes,
      maxCapacity: this.config.maxCapacity,
    };
  }

  // ── Internal helpers ──────────────────────────────────────────────

  private lookup(key: string, fingerprint: string): Buffer | null {
    const entry = this.entries.get(key);
    const fresh = entry !== undefined && entry.fingerprint === fingerprint && Date.now() <= entry.expiresAt;

    if (!entry || !fresh) {
      if (entry) this.removeEntry(key);
      this.misses++;
      incTemplateCacheMisses();
      return null;
    }

    entry.lastAccessedAt = Date.now();
    this.hits++;
    incTemplateCacheHits();
    return entry.bytes;
  }

  private store(key: string, fingerprint: string, bytes: Buffer): void {
    if (bytes.length > this.config.memoryLimitBytes) {
      logger.debug({ path: key, size: bytes.length }, 'Template larger than cache limit, not cached');
      return;
    }
    this.evictIfNeeded(bytes.length);

    const now = Date.now();
    this.entries.set(key, {
      bytes,
      fingerprint,
      expiresAt: now + this.config.defaultTtlMs,
      lastAccessedAt: now,
    });
    this.totalSizeBytes += bytes.length;
    logger.debug({ path: key, size: bytes.length, cacheSize: this.entries.size }, 'Template cached');
  }

  private removeEntry(key: string): void {
    const entry = this.entries.get(key);
    if (entry) {
      this.totalSizeBytes -= entry.bytes.length;
      this.entries.delete(key);
    }
  }

  /** Expired entries go first, then least recently used ones. */
  private evictIfNeeded(incomingSize: number): void {
    const now = Date.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt < now) {
        this.removeEntry(key);
      }
    }

    while (this.entries.size >= this.config.maxCapacity) {
      this.evictLru();
    }

    while (this.totalSizeBytes + incomingSize > this.config.memoryLimitBytes && this.entries.size > 0) {
      this.evictLru();
    }
  }

  private evictLru(): void {
    let lruKey: string | null = null;
    let lruTime = Infinity;

    for (const [key, entry] of this.entries) {
      if (entry.lastAccessedAt < lruTime) {
        lruTime = entry.lastAccessedAt;
        lruKey = key;
      }
    }

    if (lruKey) {
      logger.debug({ path: lruKey }, 'Evicting LRU template from cache');
      this.removeEntry(lruKey);
    }
  }
}
