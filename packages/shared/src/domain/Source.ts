/**
 * Source reference value object and the URL heuristics that classify it
 */

/**
 * Result type for operations that can fail
 */
export type Result<T, E> =
  | { success: true; value: T }
  | { success: false; error: E };

/**
 * Which extractor family a source belongs to.
 * 'none' means the URL is played as given.
 */
export type PlatformTag = 'none' | 'primary' | 'secondary';

export const QUALITY_MODES = [
  '360_progressive',
  '480_video_only',
  '720_video_only',
  '1080_video_only',
  '1440_video_only',
  '2160_video_only'
] as const;

export type QualityMode = typeof QUALITY_MODES[number];

export const DEFAULT_QUALITY_MODE: QualityMode = '360_progressive';

/**
 * A source as requested by the caller. Immutable once extraction begins.
 */
export interface SourceReference {
  readonly url: string;
  readonly platform: PlatformTag;
  readonly qualityMode: QualityMode;
}

export interface SourceCreateData {
  url: string;
  qualityMode?: string;
}

export type SourceError =
  | 'INVALID_URL'
  | 'INVALID_QUALITY_MODE';

const PRIMARY_MARKERS = ['youtube.com', 'youtu.be'];
const SECONDARY_MARKERS = ['rutube.ru'];

const PRIMARY_VIDEO_ID_PATTERN =
  /(?:youtube\.com\/watch\?v=|youtu\.be\/|youtube\.com\/embed\/|m\.youtube\.com\/watch\?v=)([a-zA-Z0-9_-]{11})/;
const PRIMARY_VIDEO_ID_FALLBACK = /v=([a-zA-Z0-9_-]{11})/;
const SECONDARY_VIDEO_ID_PATTERN = /rutube\.ru\/video\/([a-f0-9]+)/i;

/**
 * Quality mode helpers
 */
export class QualityModeUtils {
  static isQualityMode(value: unknown): value is QualityMode {
    return typeof value === 'string' && QUALITY_MODES.some(mode => mode === value);
  }

  static targetHeight(mode: QualityMode): number {
    return parseInt(mode.split('_')[0], 10);
  }

  static isProgressive(mode: QualityMode): boolean {
    return mode.endsWith('_progressive');
  }
}

/**
 * Utility functions for source URL handling
 */
export class SourceUrlUtils {
  static detectPlatform(url: string): PlatformTag {
    if (PRIMARY_MARKERS.some(marker => url.includes(marker))) {
      return 'primary';
    }
    if (SECONDARY_MARKERS.some(marker => url.includes(marker))) {
      return 'secondary';
    }
    return 'none';
  }

  /**
   * Direct manifests and URLs on unknown hosts are played as given.
   */
  static needsExtraction(url: string): boolean {
    return !url.includes('.m3u8') && this.detectPlatform(url) !== 'none';
  }

  static extractPrimaryVideoId(url: string): string | null {
    const match = url.match(PRIMARY_VIDEO_ID_PATTERN) ?? url.match(PRIMARY_VIDEO_ID_FALLBACK);
    return match ? match[1] : null;
  }

  static extractSecondaryVideoId(url: string): string | null {
    const match = url.match(SECONDARY_VIDEO_ID_PATTERN);
    return match ? match[1] : null;
  }

  static isHttpUrl(value: string): boolean {
    try {
      const parsed = new URL(value);
      return parsed.protocol === 'http:' || parsed.protocol === 'https:';
    } catch {
      return false;
    }
  }
}

/**
 * Source validation and creation
 */
export class SourceValidator {
  static create(data: SourceCreateData, fallbackMode: QualityMode = DEFAULT_QUALITY_MODE): Result<SourceReference, SourceError> {
    const url = typeof data.url === 'string' ? data.url.trim() : '';
    if (!SourceUrlUtils.isHttpUrl(url)) {
      return { success: false, error: 'INVALID_URL' };
    }

    let qualityMode = fallbackMode;
    if (data.qualityMode !== undefined) {
      if (!QualityModeUtils.isQualityMode(data.qualityMode)) {
        return { success: false, error: 'INVALID_QUALITY_MODE' };
      }
      qualityMode = data.qualityMode;
    }

    return {
      success: true,
      value: {
        url,
        platform: SourceUrlUtils.detectPlatform(url),
        qualityMode
      }
    };
  }
}
