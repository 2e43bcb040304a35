/**
 * Last-resort extractor for the primary platform: delegates to yt-dlp
 */

import type { Logger } from 'pino';
import {
  LocatorCodec,
  QualityModeUtils,
  type QualityMode,
  type SourceReference
} from '@stream-keeper/shared';
import { ResolutionFailures, type ExtractionResult, type IExtractionStrategy } from '../../../domain/resolution';
import { PlaybackErrorFactory, type IProcessManager } from '../../../domain/playback';

export interface YtDlpExtractorOptions {
  readonly processManager: IProcessManager;
  readonly logger: Logger;
  readonly timeoutMs: number;
}

/**
 * Format selector per quality mode. Heights match exactly, so the label
 * always names the height that plays.
 */
export function formatSelector(mode: QualityMode): string {
  const height = QualityModeUtils.targetHeight(mode);
  if (QualityModeUtils.isProgressive(mode)) {
    return `18/best[height=${height}][vcodec!=none][acodec!=none]`;
  }
  return `bestvideo[height=${height}][vcodec^=avc1]/bestvideo[height=${height}][vcodec!^=av01]`;
}

export class YtDlpExtractor implements IExtractionStrategy {
  readonly name = 'yt-dlp';
  readonly platform = 'primary' as const;

  private readonly processManager: IProcessManager;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(options: YtDlpExtractorOptions) {
    this.processManager = options.processManager;
    this.logger = options.logger.child({ component: 'YtDlpExtractor' });
    this.timeoutMs = options.timeoutMs;
  }

  async attempt(source: SourceReference, signal: AbortSignal): Promise<ExtractionResult> {
    const result = await this.processManager.runYtDlp(source.url, {
      format: formatSelector(source.qualityMode),
      timeoutMs: this.timeoutMs,
      signal
    });

    if (!result.success) {
      const details = PlaybackErrorFactory.createProcessError(result.error);
      this.logger.warn({ code: details.code }, details.message);
      return ResolutionFailures.fail({ kind: 'EMPTY_OR_MALFORMED_RESPONSE', reason: `yt-dlp: ${details.message}` });
    }

    const height = QualityModeUtils.targetHeight(source.qualityMode);
    const progressive = QualityModeUtils.isProgressive(source.qualityMode);
    return {
      success: true,
      locator: progressive ? LocatorCodec.direct(result.value) : LocatorCodec.videoOnly(result.value),
      quality: progressive ? `${height}p progressive` : `${height}p video-only`,
      platform: 'primary',
      strategy: this.name
    };
  }
}
