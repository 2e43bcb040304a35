/**
 * Error kinds for source resolution and playback recovery
 */

import type { SourceError } from './Source';

export type { SourceError };

/**
 * Resolution error kinds
 */
export type ResolutionErrorKind =
  | 'INVALID_SOURCE'
  | 'NETWORK_UNAVAILABLE'
  | 'HTTP_FAILURE'
  | 'EMPTY_OR_MALFORMED_RESPONSE'
  | 'NOT_PLAYABLE'
  | 'NO_MATCHING_FORMAT'
  | 'CIPHER_DECRYPT_FAILED'
  | 'ALL_EXTRACTORS_EXHAUSTED'
  | 'RESOLUTION_TIMEOUT'
  | 'RESOLUTION_CANCELLED';

/**
 * Playback recovery error kinds
 */
export type RecoveryErrorKind =
  | 'STALL_TIMEOUT'
  | 'ENGINE_ERROR'
  | 'RETRY_LIMIT_REACHED';

/**
 * Error details with context information
 */
export interface ErrorDetails {
  code: string;
  message: string;
  context?: Record<string, unknown> | undefined;
  suggestion?: string | undefined;
}

/**
 * Error factory for creating consistent error responses
 */
export class ErrorFactory {
  static createSourceError(error: SourceError, context?: Record<string, unknown> | undefined): ErrorDetails {
    const messages: Record<SourceError, string> = {
      INVALID_URL: 'Source must be an absolute http(s) URL',
      INVALID_QUALITY_MODE: 'Unknown quality mode'
    };

    return {
      code: error,
      message: messages[error],
      context: context || undefined,
      suggestion: error === 'INVALID_QUALITY_MODE'
        ? 'Use one of 360_progressive, 480_video_only, 720_video_only, 1080_video_only, 1440_video_only, 2160_video_only'
        : 'Please check the source URL and try again'
    };
  }

  static createResolutionError(error: ResolutionErrorKind, context?: Record<string, unknown> | undefined): ErrorDetails {
    const messages: Record<ResolutionErrorKind, string> = {
      INVALID_SOURCE: 'The source could not be parsed into a video id',
      NETWORK_UNAVAILABLE: 'No network is available and nothing is cached for this source',
      HTTP_FAILURE: 'The platform answered with an HTTP error',
      EMPTY_OR_MALFORMED_RESPONSE: 'The platform returned an empty or malformed response',
      NOT_PLAYABLE: 'The platform reports the video as not playable',
      NO_MATCHING_FORMAT: 'No format matches the requested quality mode',
      CIPHER_DECRYPT_FAILED: 'Stream signatures could not be descrambled',
      ALL_EXTRACTORS_EXHAUSTED: 'Every extraction strategy failed',
      RESOLUTION_TIMEOUT: 'Source resolution timed out',
      RESOLUTION_CANCELLED: 'Source resolution was cancelled'
    };

    const suggestions: Record<ResolutionErrorKind, string> = {
      INVALID_SOURCE: 'Check that the URL points at a single video',
      NETWORK_UNAVAILABLE: 'Playback will resume once the network is back',
      HTTP_FAILURE: 'The request will be retried on the next attempt',
      EMPTY_OR_MALFORMED_RESPONSE: 'The platform API may have changed',
      NOT_PLAYABLE: 'The video may be private, age-restricted or region-blocked',
      NO_MATCHING_FORMAT: 'Try a different quality mode',
      CIPHER_DECRYPT_FAILED: 'The extractor may be outdated for the current player',
      ALL_EXTRACTORS_EXHAUSTED: 'Default content will play instead',
      RESOLUTION_TIMEOUT: 'Default content will play instead',
      RESOLUTION_CANCELLED: 'A newer request replaced this one'
    };

    return {
      code: error,
      message: messages[error],
      context: context || undefined,
      suggestion: suggestions[error]
    };
  }

  static createRecoveryError(error: RecoveryErrorKind, context?: Record<string, unknown> | undefined): ErrorDetails {
    const messages: Record<RecoveryErrorKind, string> = {
      STALL_TIMEOUT: 'Playback stalled for longer than the stall timeout',
      ENGINE_ERROR: 'The playback engine reported an error',
      RETRY_LIMIT_REACHED: 'Automatic recovery gave up after the retry limit'
    };

    return {
      code: error,
      message: messages[error],
      context: context || undefined,
      suggestion: error === 'RETRY_LIMIT_REACHED'
        ? 'Reload the source to start recovery again'
        : 'Playback will be restarted automatically'
    };
  }
}
