/**
 * Core types for source resolution
 */

import type {
  MediaLocator,
  PlatformTag,
  QualityMode,
  ResolutionErrorKind
} from '@stream-keeper/shared';

/**
 * Why a resolution attempt failed
 */
export interface ResolutionFailure {
  readonly kind: ResolutionErrorKind;
  readonly reason: string;
  readonly status?: number;
}

/**
 * Outcome of one resolution attempt. Transient: only the cache keeps
 * anything from it.
 */
export type ExtractionResult =
  | {
      readonly success: true;
      readonly locator: MediaLocator;
      readonly quality: string;
      readonly platform: PlatformTag;
      readonly strategy: string;
      readonly fromCache?: boolean;
    }
  | {
      readonly success: false;
      readonly error: ResolutionFailure;
    };

/**
 * Persisted resolution. Valid for a request only when the quality mode matches.
 */
export interface CacheEntry {
  readonly originalSource: string;
  readonly locator: string; // wire form, see LocatorCodec
  readonly platform: PlatformTag;
  readonly qualityMode: QualityMode;
  readonly quality: string;
  readonly savedAt: number;
}

export type CipherOperation =
  | { readonly op: 'reverse' }
  | { readonly op: 'splice'; readonly n: number }
  | { readonly op: 'swap'; readonly n: number };

/**
 * Descrambling program derived from one player script
 */
export interface CipherTransformProgram {
  readonly playerUrl: string;
  readonly operations: readonly CipherOperation[];
  readonly derivedAt: number;
}

/**
 * Signature cipher fields carried by a withheld format
 */
export interface SignatureCipher {
  readonly encryptedSignature: string;
  readonly parameterName: string;
  readonly url: string;
}

export type CipherError =
  | 'INVALID_CIPHER'
  | 'PLAYER_URL_NOT_FOUND'
  | 'PLAYER_DOWNLOAD_FAILED'
  | 'EXTRACTOR_OUTDATED';

/**
 * Subset of a platform format entry the selection policy reads
 */
export interface StreamingFormat {
  readonly itag?: number;
  readonly url?: string;
  readonly signatureCipher?: string;
  readonly mimeType: string;
  readonly width?: number;
  readonly height?: number;
  readonly bitrate?: number;
  readonly audioQuality?: string;
  readonly qualityLabel?: string;
}

export interface StreamingData {
  readonly formats: readonly StreamingFormat[];
  readonly adaptiveFormats: readonly StreamingFormat[];
  readonly hlsManifestUrl?: string;
}

/**
 * One variant line of an adaptive master playlist
 */
export interface ManifestVariant {
  readonly url: string;
  readonly width?: number;
  readonly height?: number;
  readonly bandwidth?: number;
}
