/**
 * Failure constructors for the resolution pipeline
 */

import type { CipherError, ExtractionResult, ResolutionFailure } from './types';

export class ResolutionFailures {
  static fail(failure: ResolutionFailure): ExtractionResult {
    return { success: false, error: failure };
  }

  static httpFailure(status: number, what: string): ResolutionFailure {
    return { kind: 'HTTP_FAILURE', status, reason: `${what} answered HTTP ${status}` };
  }

  static malformed(reason: string): ResolutionFailure {
    return { kind: 'EMPTY_OR_MALFORMED_RESPONSE', reason };
  }

  static notPlayable(reason: string): ResolutionFailure {
    return { kind: 'NOT_PLAYABLE', reason: `not playable: ${reason}` };
  }

  static noMatchingFormat(qualityMode: string): ResolutionFailure {
    return { kind: 'NO_MATCHING_FORMAT', reason: `no matching format for ${qualityMode}` };
  }

  static cipherFailed(error: CipherError): ResolutionFailure {
    const reasons: Record<CipherError, string> = {
      INVALID_CIPHER: 'signature cipher is missing required fields',
      PLAYER_URL_NOT_FOUND: 'player script URL not found on the embed page',
      PLAYER_DOWNLOAD_FAILED: 'player script could not be downloaded',
      EXTRACTOR_OUTDATED: 'extractor outdated: descrambling function not found in player script'
    };
    return { kind: 'CIPHER_DECRYPT_FAILED', reason: reasons[error] };
  }

  static exhausted(last: ResolutionFailure | null): ResolutionFailure {
    return {
      kind: 'ALL_EXTRACTORS_EXHAUSTED',
      reason: last ? last.reason : 'no extraction strategy available for this platform',
      ...(last?.status !== undefined && { status: last.status })
    };
  }

  static timeout(timeoutMs: number): ResolutionFailure {
    return { kind: 'RESOLUTION_TIMEOUT', reason: `resolution exceeded ${timeoutMs}ms` };
  }

  static cancelled(): ResolutionFailure {
    return { kind: 'RESOLUTION_CANCELLED', reason: 'superseded by a newer resolution' };
  }
}
