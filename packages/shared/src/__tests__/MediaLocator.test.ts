/**
 * Media locator wire form and base locator comparison
 */

import { LocatorCodec, LocatorUtils, ErrorFactory } from '../index';

describe('LocatorCodec', () => {
  test('tags video-only locators in their wire form', () => {
    const locator = LocatorCodec.videoOnly('https://media.example/v.mp4');

    expect(LocatorCodec.encode(locator)).toBe('VIDEO_ONLY|||https://media.example/v.mp4');
    expect(LocatorCodec.decode('VIDEO_ONLY|||https://media.example/v.mp4')).toEqual(locator);
  });

  test('leaves direct locators untouched', () => {
    expect(LocatorCodec.encode(LocatorCodec.direct('https://media.example/a.m3u8'))).toBe('https://media.example/a.m3u8');
    expect(LocatorCodec.decode('https://media.example/a.m3u8')).toEqual({ kind: 'direct', url: 'https://media.example/a.m3u8' });
  });

  test('exposes the URL the engine should open', () => {
    expect(LocatorCodec.playableUrl(LocatorCodec.videoOnly('https://media.example/v.mp4'))).toBe('https://media.example/v.mp4');
  });
});

describe('LocatorUtils.baseLocator', () => {
  test('drops the sign suffix and session parameters', () => {
    expect(LocatorUtils.baseLocator('https://cdn.example/live/stream.m3u8?token=abc&sign=xyz&expire=1'))
      .toBe('https://cdn.example/live/stream.m3u8');
  });

  test('keeps content-identifying parameters', () => {
    expect(LocatorUtils.baseLocator('https://www.youtube.com/watch?v=ABCD12345XY&sig=zzz'))
      .toBe('https://www.youtube.com/watch?v=ABCD12345XY');
  });

  test('returns unparseable input without the sign suffix', () => {
    expect(LocatorUtils.baseLocator('not a url&sign=1')).toBe('not a url');
  });
});

describe('ErrorFactory', () => {
  test('describes resolution failures with a suggestion', () => {
    const details = ErrorFactory.createResolutionError('NO_MATCHING_FORMAT', { qualityMode: '720_video_only' });

    expect(details).toEqual({
      code: 'NO_MATCHING_FORMAT',
      message: 'No format matches the requested quality mode',
      context: { qualityMode: '720_video_only' },
      suggestion: 'Try a different quality mode'
    });
  });
});
