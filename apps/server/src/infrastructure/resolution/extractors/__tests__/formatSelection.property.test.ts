/**
 * Property tests for the quality policy
 */

import * as fc from 'fast-check';
import { QUALITY_MODES, QualityModeUtils } from '@stream-keeper/shared';
import { candidateFormats, hasAudio } from '../formatSelection';
import type { StreamingFormat } from '../../../../domain/resolution';

const HEIGHTS = [144, 240, 360, 480, 720, 1080, 1440, 2160];
const MIME_TYPES = [
  'video/mp4; codecs="avc1.4d401f"',
  'video/webm; codecs="vp9"',
  'video/mp4; codecs="vp09.00.40.08"',
  'video/mp4; codecs="av01.0.08M.08"',
  'video/mp4; codecs="avc1.42001E, mp4a.40.2"',
  'video/webm; codecs="vp8, vorbis"',
  'audio/webm; codecs="opus"'
];

const formatArb: fc.Arbitrary<StreamingFormat> = fc.record({
  url: fc.webUrl(),
  mimeType: fc.constantFrom(...MIME_TYPES),
  height: fc.constantFrom(...HEIGHTS),
  audioQuality: fc.option(fc.constant('AUDIO_QUALITY_LOW'), { nil: undefined })
});

const streamingDataArb = fc.record({
  formats: fc.array(formatArb, { maxLength: 8 }),
  adaptiveFormats: fc.array(formatArb, { maxLength: 12 })
});

describe('candidateFormats properties', () => {
  it('should only offer formats at exactly the target height', () => {
    fc.assert(
      fc.property(streamingDataArb, fc.constantFrom(...QUALITY_MODES), (data, mode) => {
        const height = QualityModeUtils.targetHeight(mode);
        return candidateFormats(data, mode).every(candidate => candidate.format.height === height);
      })
    );
  });

  it('should offer progressive formats with audio and video-only formats without it', () => {
    fc.assert(
      fc.property(streamingDataArb, fc.constantFrom(...QUALITY_MODES), (data, mode) => {
        const progressive = QualityModeUtils.isProgressive(mode);
        return candidateFormats(data, mode).every(candidate =>
          candidate.videoOnly === !progressive
          && hasAudio(candidate.format) === progressive
          && candidate.format.mimeType.startsWith('video/')
        );
      })
    );
  });

  it('should never offer av01 and should rank avc1 ahead of every other codec', () => {
    fc.assert(
      fc.property(streamingDataArb, fc.constantFrom(...QUALITY_MODES.filter(mode => mode !== '360_progressive')), (data, mode) => {
        const mimeTypes = candidateFormats(data, mode).map(candidate => candidate.format.mimeType);
        const firstOther = mimeTypes.findIndex(mimeType => !mimeType.includes('avc1'));
        const lastAvc = mimeTypes.map(mimeType => mimeType.includes('avc1')).lastIndexOf(true);
        return mimeTypes.every(mimeType => !mimeType.includes('av01'))
          && (firstOther === -1 || lastAvc < firstOther);
      })
    );
  });
});
