/**
 * Quality policy over the primary platform's streaming data
 */

import { QualityModeUtils, type QualityMode } from '@stream-keeper/shared';
import type { StreamingData, StreamingFormat } from '../../../domain/resolution';
import { isRecord, readArray, readNumber, readRecord, readString, type JsonRecord } from '../json';

export interface FormatCandidate {
  readonly format: StreamingFormat;
  readonly label: string;
  readonly videoOnly: boolean;
}

export function isVideo(format: StreamingFormat): boolean {
  return format.mimeType.startsWith('video/');
}

export function hasAudio(format: StreamingFormat): boolean {
  return format.audioQuality !== undefined || format.mimeType.includes('mp4a') || format.mimeType.includes('opus');
}

/**
 * Lower is preferred; null means never used
 */
function codecRank(mimeType: string): number | null {
  if (mimeType.includes('av01')) return null;
  if (mimeType.includes('avc1')) return 0;
  if (mimeType.includes('vp9') || mimeType.includes('vp09')) return 1;
  return 2;
}

/**
 * Formats acceptable for the mode, best first. Heights are matched
 * exactly; no other height stands in.
 */
export function candidateFormats(data: StreamingData, mode: QualityMode): FormatCandidate[] {
  const height = QualityModeUtils.targetHeight(mode);

  if (QualityModeUtils.isProgressive(mode)) {
    return data.formats
      .filter(format => format.height === height && isVideo(format) && hasAudio(format))
      .map(format => ({ format, label: `${height}p progressive`, videoOnly: false }));
  }

  const ranked: { format: StreamingFormat; rank: number }[] = [];
  for (const format of data.adaptiveFormats) {
    if (format.height !== height || !isVideo(format) || hasAudio(format)) continue;
    const rank = codecRank(format.mimeType);
    if (rank !== null) {
      ranked.push({ format, rank });
    }
  }

  return ranked
    .sort((a, b) => a.rank - b.rank)
    .map(({ format }) => ({ format, label: `${height}p video-only`, videoOnly: true }));
}

function toFormat(value: unknown): StreamingFormat | null {
  if (!isRecord(value)) return null;
  const mimeType = readString(value, 'mimeType');
  if (mimeType === undefined) return null;

  return {
    mimeType,
    itag: readNumber(value, 'itag'),
    url: readString(value, 'url'),
    signatureCipher: readString(value, 'signatureCipher') ?? readString(value, 'cipher'),
    width: readNumber(value, 'width'),
    height: readNumber(value, 'height'),
    bitrate: readNumber(value, 'bitrate'),
    audioQuality: readString(value, 'audioQuality'),
    qualityLabel: readString(value, 'qualityLabel')
  };
}

function toFormats(values: unknown[]): StreamingFormat[] {
  const formats: StreamingFormat[] = [];
  for (const value of values) {
    const format = toFormat(value);
    if (format) formats.push(format);
  }
  return formats;
}

/**
 * Streaming data of a player response, or null when the response has none
 */
export function parseStreamingData(response: JsonRecord): StreamingData | null {
  const streamingData = readRecord(response, 'streamingData');
  if (!streamingData) return null;

  return {
    formats: toFormats(readArray(streamingData, 'formats')),
    adaptiveFormats: toFormats(readArray(streamingData, 'adaptiveFormats')),
    hlsManifestUrl: readString(streamingData, 'hlsManifestUrl')
  };
}
