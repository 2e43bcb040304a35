/**
 * Secondary platform extractor
 *
 * Reads the manifest location from the play-options API, then narrows the
 * master playlist to the rendition closest to the requested height when the
 * playlist can be read.
 */

import type { Logger } from 'pino';
import {
  LocatorCodec,
  QualityModeUtils,
  SourceUrlUtils,
  type Result,
  type SourceReference
} from '@stream-keeper/shared';
import {
  ResolutionFailures,
  type ExtractionResult,
  type IExtractionStrategy,
  type ResolutionFailure
} from '../../../domain/resolution';
import { describeTransportError, fetchWithTimeout, isCancellation } from '../http';
import { isRecord, parseJson, readString, type JsonRecord } from '../json';
import { parseMasterPlaylist, pickClosestVariant } from './hlsManifest';

const REQUEST_HEADERS = {
  Referer: 'https://rutube.ru',
  'User-Agent': 'Mozilla/5.0 (Linux; Android 10) AppleWebKit/537.36'
};

export interface RutubeExtractorOptions {
  readonly logger: Logger;
  readonly timeoutMs: number;
}

export function playOptionsUrl(videoId: string): string {
  return `https://rutube.ru/api/play/options/${videoId}/?no_404=true&referer=https%3A%2F%2Frutube.ru`;
}

function fromBalancer(balancer: JsonRecord): string | undefined {
  return readString(balancer, 'm3u8') || readString(balancer, 'default') || undefined;
}

/**
 * Manifest URL from a play-options document. `video_balancer` may arrive as
 * an object, as an object serialized into a string, or as a bare URL.
 */
export function findManifestUrl(options: JsonRecord): string | null {
  const balancer = options.video_balancer;

  if (typeof balancer === 'string' && balancer.length > 0) {
    if (balancer.startsWith('{')) {
      const parsed = parseJson(balancer);
      const url = isRecord(parsed) ? fromBalancer(parsed) : undefined;
      if (url) return url;
    } else {
      return balancer;
    }
  } else if (isRecord(balancer)) {
    const url = fromBalancer(balancer);
    if (url) return url;
  }

  return readString(options, 'm3u8') || readString(options, 'hls') || null;
}

export class RutubeExtractor implements IExtractionStrategy {
  readonly name = 'rutube';
  readonly platform = 'secondary' as const;

  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(options: RutubeExtractorOptions) {
    this.logger = options.logger.child({ component: 'RutubeExtractor' });
    this.timeoutMs = options.timeoutMs;
  }

  async attempt(source: SourceReference, signal: AbortSignal): Promise<ExtractionResult> {
    const videoId = SourceUrlUtils.extractSecondaryVideoId(source.url);
    if (!videoId) {
      return ResolutionFailures.fail({ kind: 'INVALID_SOURCE', reason: 'no video id in source URL' });
    }

    const fetched = await this.getText(playOptionsUrl(videoId), 'play options request', signal);
    if (!fetched.success) {
      return ResolutionFailures.fail(fetched.error);
    }

    const options = parseJson(fetched.value);
    if (!isRecord(options)) {
      return ResolutionFailures.fail(ResolutionFailures.malformed('play options are not a JSON object'));
    }

    const masterUrl = findManifestUrl(options);
    if (!masterUrl) {
      return ResolutionFailures.fail(ResolutionFailures.malformed('play options carried no manifest URL'));
    }

    return this.pickRendition(masterUrl, QualityModeUtils.targetHeight(source.qualityMode), signal);
  }

  /**
   * The master playlist is the answer when it cannot be narrowed
   */
  private async pickRendition(masterUrl: string, targetHeight: number, signal: AbortSignal): Promise<ExtractionResult> {
    const master: ExtractionResult = {
      success: true,
      locator: LocatorCodec.direct(masterUrl),
      quality: 'HLS manifest',
      platform: 'secondary',
      strategy: this.name
    };

    const playlist = await this.getText(masterUrl, 'master playlist request', signal);
    if (!playlist.success) {
      this.logger.debug({ failure: playlist.error }, 'Master playlist unavailable, using it unread');
      return master;
    }

    const variant = pickClosestVariant(parseMasterPlaylist(playlist.value, masterUrl), targetHeight);
    if (!variant) {
      return master;
    }

    return {
      success: true,
      locator: LocatorCodec.direct(variant.url),
      quality: `${variant.height}p HLS`,
      platform: 'secondary',
      strategy: this.name
    };
  }

  private async getText(url: string, what: string, signal: AbortSignal): Promise<Result<string, ResolutionFailure>> {
    try {
      const response = await fetchWithTimeout(url, { headers: REQUEST_HEADERS, timeoutMs: this.timeoutMs, signal });
      if (!response.ok) {
        return { success: false, error: ResolutionFailures.httpFailure(response.status, what) };
      }
      return { success: true, value: await response.text() };
    } catch (error) {
      if (isCancellation(error, signal)) {
        throw error;
      }
      return { success: false, error: { kind: 'HTTP_FAILURE', reason: describeTransportError(error) } };
    }
  }
}
