/**
 * Primary platform extractor
 *
 * Asks the platform's internal player endpoint for streaming data as each
 * client persona in turn. The first persona whose response yields an
 * acceptable format wins.
 */

import type { Logger } from 'pino';
import { LocatorCodec, SourceUrlUtils, type SourceReference } from '@stream-keeper/shared';
import {
  ResolutionFailures,
  type ExtractionResult,
  type IExtractionStrategy,
  type ISignatureDescrambler,
  type ResolutionFailure,
  type StreamingData
} from '../../../domain/resolution';
import type { InnerTubeKeys } from '../../config';
import { describeTransportError, fetchWithTimeout, isCancellation } from '../http';
import { isRecord, parseJson, readRecord, readString } from '../json';
import { candidateFormats, parseStreamingData } from './formatSelection';
import { buildPlayerRequest, PERSONAS, type ClientPersona } from './personas';

export interface InnerTubeExtractorOptions {
  readonly descrambler: ISignatureDescrambler;
  readonly logger: Logger;
  readonly timeoutMs: number;
  readonly keys?: InnerTubeKeys;
  readonly personas?: readonly ClientPersona[];
}

export class InnerTubeExtractor implements IExtractionStrategy {
  readonly name = 'innertube';
  readonly platform = 'primary' as const;

  private readonly descrambler: ISignatureDescrambler;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly keys: InnerTubeKeys;
  private readonly personas: readonly ClientPersona[];

  constructor(options: InnerTubeExtractorOptions) {
    this.descrambler = options.descrambler;
    this.logger = options.logger.child({ component: 'InnerTubeExtractor' });
    this.timeoutMs = options.timeoutMs;
    this.keys = options.keys ?? {};
    this.personas = options.personas ?? PERSONAS;
  }

  async attempt(source: SourceReference, signal: AbortSignal): Promise<ExtractionResult> {
    const videoId = SourceUrlUtils.extractPrimaryVideoId(source.url);
    if (!videoId) {
      return ResolutionFailures.fail({ kind: 'INVALID_SOURCE', reason: 'no video id in source URL' });
    }

    let last: ResolutionFailure = ResolutionFailures.noMatchingFormat(source.qualityMode);
    for (const persona of this.personas) {
      const outcome = await this.tryPersona(persona, videoId, source, signal);
      if (outcome.success) {
        this.logger.info({ persona: persona.id, quality: outcome.quality }, 'Persona produced a stream');
        return outcome;
      }
      this.logger.debug({ persona: persona.id, failure: outcome.error }, 'Persona failed');
      last = outcome.error;
    }

    return ResolutionFailures.fail(last);
  }

  private async tryPersona(
    persona: ClientPersona,
    videoId: string,
    source: SourceReference,
    signal: AbortSignal
  ): Promise<ExtractionResult> {
    const request = buildPlayerRequest(persona, videoId, this.keys);

    let response: Response;
    let text: string;
    try {
      response = await fetchWithTimeout(request.url, {
        method: 'POST',
        headers: request.headers,
        body: request.body,
        timeoutMs: this.timeoutMs,
        signal
      });
      text = await response.text();
    } catch (error) {
      if (isCancellation(error, signal)) {
        throw error;
      }
      return ResolutionFailures.fail({ kind: 'HTTP_FAILURE', reason: describeTransportError(error) });
    }

    if (!response.ok) {
      return ResolutionFailures.fail(ResolutionFailures.httpFailure(response.status, `${persona.id} player request`));
    }

    const json = parseJson(text);
    if (!isRecord(json)) {
      return ResolutionFailures.fail(ResolutionFailures.malformed('player response is not a JSON object'));
    }

    const playability = readRecord(json, 'playabilityStatus');
    const status = playability ? readString(playability, 'status') : undefined;
    if (status !== 'OK') {
      const reason = (playability && readString(playability, 'reason')) ?? status ?? 'no playability status';
      return ResolutionFailures.fail(ResolutionFailures.notPlayable(reason));
    }

    const streamingData = parseStreamingData(json);
    if (!streamingData) {
      return ResolutionFailures.fail(ResolutionFailures.malformed('player response carried no streaming data'));
    }

    return this.select(streamingData, videoId, source, signal);
  }

  /**
   * Walk the candidates best first. A descrambling failure rules out that
   * format only.
   */
  private async select(
    data: StreamingData,
    videoId: string,
    source: SourceReference,
    signal: AbortSignal
  ): Promise<ExtractionResult> {
    let cipherFailure: ResolutionFailure | null = null;

    for (const candidate of candidateFormats(data, source.qualityMode)) {
      let url = candidate.format.url;
      if (!url && candidate.format.signatureCipher) {
        const descrambled = await this.descrambler.descramble(candidate.format.signatureCipher, videoId, signal);
        if (!descrambled.success) {
          cipherFailure = ResolutionFailures.cipherFailed(descrambled.error);
          if (descrambled.error === 'EXTRACTOR_OUTDATED') {
            this.logger.warn({ itag: candidate.format.itag }, 'Signature descrambling is outdated');
          }
          continue;
        }
        url = descrambled.value;
      }
      if (!url) continue;

      return {
        success: true,
        locator: candidate.videoOnly ? LocatorCodec.videoOnly(url) : LocatorCodec.direct(url),
        quality: candidate.label,
        platform: 'primary',
        strategy: this.name
      };
    }

    if (data.hlsManifestUrl) {
      return {
        success: true,
        locator: LocatorCodec.direct(data.hlsManifestUrl),
        quality: 'HLS manifest',
        platform: 'primary',
        strategy: this.name
      };
    }

    return ResolutionFailures.fail(cipherFailure ?? ResolutionFailures.noMatchingFormat(source.qualityMode));
  }
}
