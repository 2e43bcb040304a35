/**
 * Source reference classification and validation
 */

import {
  SourceUrlUtils,
  SourceValidator,
  QualityModeUtils,
  QUALITY_MODES
} from '../index';

describe('SourceUrlUtils', () => {
  test('classifies platforms by host marker', () => {
    expect(SourceUrlUtils.detectPlatform('https://www.youtube.com/watch?v=abcdefghijk')).toBe('primary');
    expect(SourceUrlUtils.detectPlatform('https://youtu.be/abcdefghijk')).toBe('primary');
    expect(SourceUrlUtils.detectPlatform('https://rutube.ru/video/0123456789abcdef0123456789abcdef/')).toBe('secondary');
    expect(SourceUrlUtils.detectPlatform('https://cdn.example.com/live/index.m3u8')).toBe('none');
  });

  test('direct manifests and unknown hosts need no extraction', () => {
    expect(SourceUrlUtils.needsExtraction('https://cdn.example.com/live/index.m3u8')).toBe(false);
    expect(SourceUrlUtils.needsExtraction('https://cdn.example.com/video.mp4')).toBe(false);
    expect(SourceUrlUtils.needsExtraction('https://rutube.ru/live/master.m3u8')).toBe(false);
    expect(SourceUrlUtils.needsExtraction('https://www.youtube.com/watch?v=abcdefghijk')).toBe(true);
  });

  test('extracts primary video ids from the common URL shapes', () => {
    expect(SourceUrlUtils.extractPrimaryVideoId('https://www.youtube.com/watch?v=ABCD12345XY')).toBe('ABCD12345XY');
    expect(SourceUrlUtils.extractPrimaryVideoId('https://youtu.be/ABCD12345XY?t=10')).toBe('ABCD12345XY');
    expect(SourceUrlUtils.extractPrimaryVideoId('https://www.youtube.com/embed/ABCD12345XY')).toBe('ABCD12345XY');
    expect(SourceUrlUtils.extractPrimaryVideoId('https://www.youtube.com/watch?feature=share&v=ABCD12345XY')).toBe('ABCD12345XY');
    expect(SourceUrlUtils.extractPrimaryVideoId('https://www.youtube.com/channel/xyz')).toBeNull();
  });

  test('extracts secondary video ids', () => {
    expect(SourceUrlUtils.extractSecondaryVideoId('https://rutube.ru/video/0123456789abcdef0123456789abcdef/'))
      .toBe('0123456789abcdef0123456789abcdef');
    expect(SourceUrlUtils.extractSecondaryVideoId('https://rutube.ru/channel/42/')).toBeNull();
  });
});

describe('QualityModeUtils', () => {
  test('maps every mode to its target height', () => {
    expect(QUALITY_MODES.map(mode => QualityModeUtils.targetHeight(mode))).toEqual([360, 480, 720, 1080, 1440, 2160]);
  });

  test('only the 360 mode is progressive', () => {
    expect(QUALITY_MODES.filter(mode => QualityModeUtils.isProgressive(mode))).toEqual(['360_progressive']);
  });
});

describe('SourceValidator', () => {
  test('creates a reference with the default quality mode', () => {
    const result = SourceValidator.create({ url: '  https://youtu.be/ABCD12345XY ' });

    expect(result).toEqual({
      success: true,
      value: { url: 'https://youtu.be/ABCD12345XY', platform: 'primary', qualityMode: '360_progressive' }
    });
  });

  test('rejects non-http URLs and unknown quality modes', () => {
    expect(SourceValidator.create({ url: 'ftp://example.com/a.m3u8' })).toEqual({ success: false, error: 'INVALID_URL' });
    expect(SourceValidator.create({ url: 'https://youtu.be/ABCD12345XY', qualityMode: '4k' }))
      .toEqual({ success: false, error: 'INVALID_QUALITY_MODE' });
  });
});
