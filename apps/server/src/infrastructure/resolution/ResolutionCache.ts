/**
 * ResolutionCache: persisted (source, quality mode) → locator mapping
 */

import {
  LocatorCodec,
  QualityModeUtils,
  type MediaLocator,
  type PlatformTag,
  type QualityMode
} from '@stream-keeper/shared';
import type { CacheEntry, KeyValueStore } from '../../domain/resolution';
import { isRecord } from './json';

/**
 * Cache statistics for monitoring and debugging
 */
export interface CacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly size: number;
  readonly hitRate: number;
}

export interface CachedResolution {
  readonly locator: MediaLocator;
  readonly platform: PlatformTag;
  readonly quality: string;
}

const PLATFORM_TAGS: readonly PlatformTag[] = ['none', 'primary', 'secondary'];

function cacheKey(sourceUrl: string, qualityMode: QualityMode): string {
  return `${qualityMode}|${sourceUrl}`;
}

/**
 * Shape check for entries read back from disk
 */
export function isCacheEntry(value: unknown): value is CacheEntry {
  if (!isRecord(value)) return false;
  const entry = value;
  return typeof entry.originalSource === 'string'
    && typeof entry.locator === 'string'
    && PLATFORM_TAGS.some(tag => tag === entry.platform)
    && QualityModeUtils.isQualityMode(entry.qualityMode)
    && typeof entry.quality === 'string'
    && typeof entry.savedAt === 'number';
}

export class ResolutionCache {
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly store: KeyValueStore<CacheEntry>,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Cached resolution for the source, only when it was made for the same quality mode
   */
  get(sourceUrl: string, qualityMode: QualityMode): CacheEntry | null {
    const entry = this.store.get(cacheKey(sourceUrl, qualityMode));
    if (!entry || entry.originalSource !== sourceUrl || entry.qualityMode !== qualityMode) {
      this.misses++;
      return null;
    }
    this.hits++;
    return entry;
  }

  /**
   * Newest resolution for the source whatever its quality mode. Offline fallback.
   */
  getAny(sourceUrl: string): CacheEntry | null {
    let newest: CacheEntry | null = null;
    for (const [, entry] of this.entriesFor(sourceUrl)) {
      if (!newest || entry.savedAt >= newest.savedAt) {
        newest = entry;
      }
    }
    return newest;
  }

  set(sourceUrl: string, qualityMode: QualityMode, resolution: CachedResolution): CacheEntry {
    const entry: CacheEntry = {
      originalSource: sourceUrl,
      locator: LocatorCodec.encode(resolution.locator),
      platform: resolution.platform,
      qualityMode,
      quality: resolution.quality,
      savedAt: this.now()
    };
    this.store.put(cacheKey(sourceUrl, qualityMode), entry);
    return entry;
  }

  /**
   * Remove a source's entries in every quality mode, or every entry when no source is given
   */
  invalidate(sourceUrl?: string): void {
    if (sourceUrl === undefined) {
      this.store.clear();
      this.hits = 0;
      this.misses = 0;
      return;
    }
    for (const [key] of this.entriesFor(sourceUrl)) {
      this.store.delete(key);
    }
  }

  size(): number {
    return this.store.keys().length;
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.size(),
      hitRate: total > 0 ? this.hits / total : 0
    };
  }

  private entriesFor(sourceUrl: string): Array<[string, CacheEntry]> {
    const found: Array<[string, CacheEntry]> = [];
    for (const key of this.store.keys()) {
      const entry = this.store.get(key);
      if (entry && entry.originalSource === sourceUrl) {
        found.push([key, entry]);
      }
    }
    return found;
  }
}
