/**
 * RutubeExtractor and master playlist tests
 */

import type { SourceReference } from '@stream-keeper/shared';
import { RutubeExtractor, findManifestUrl, playOptionsUrl } from '../RutubeExtractor';
import { parseMasterPlaylist, pickClosestVariant } from '../hlsManifest';
import { createSilentLogger } from '../../../logging';
import { jsonResponse, mockFetch, textResponse } from '../../../../__tests__/helpers/http';

const SOURCE: SourceReference = {
  url: 'https://rutube.ru/video/abc123def456/',
  platform: 'secondary',
  qualityMode: '480_video_only'
};
const MASTER_URL = 'https://cdn.rutube.example/hls/master.m3u8';
const MASTER_PLAYLIST = [
  '#EXTM3U',
  '#EXT-X-STREAM-INF:BANDWIDTH=800000,RESOLUTION=640x360,CODECS="avc1.4d401e,mp4a.40.2"',
  '360/index.m3u8',
  '#EXT-X-STREAM-INF:BANDWIDTH=2500000,RESOLUTION=1280x720',
  'https://other.example/720/index.m3u8'
].join('\n');

describe('findManifestUrl', () => {
  it('should read the balancer object, preferring m3u8', () => {
    expect(findManifestUrl({ video_balancer: { m3u8: 'https://a.example/m.m3u8', default: 'https://a.example/d' } }))
      .toBe('https://a.example/m.m3u8');
    expect(findManifestUrl({ video_balancer: { m3u8: '', default: 'https://a.example/d' } })).toBe('https://a.example/d');
  });

  it('should read a balancer serialized into a string', () => {
    expect(findManifestUrl({ video_balancer: '{"default":"https://b.example/d"}' })).toBe('https://b.example/d');
  });

  it('should take a bare balancer string as the URL', () => {
    expect(findManifestUrl({ video_balancer: 'https://c.example/m.m3u8' })).toBe('https://c.example/m.m3u8');
  });

  it('should fall back to top-level fields', () => {
    expect(findManifestUrl({ video_balancer: {}, hls: 'https://d.example/h.m3u8' })).toBe('https://d.example/h.m3u8');
    expect(findManifestUrl({ title: 'nothing here' })).toBeNull();
  });
});

describe('master playlist', () => {
  it('should resolve variant URIs against the playlist URL', () => {
    expect(parseMasterPlaylist(MASTER_PLAYLIST, MASTER_URL)).toEqual([
      { url: 'https://cdn.rutube.example/hls/360/index.m3u8', width: 640, height: 360, bandwidth: 800000 },
      { url: 'https://other.example/720/index.m3u8', width: 1280, height: 720, bandwidth: 2500000 }
    ]);
  });

  it('should pick the closest height and keep the first listed on a tie', () => {
    const variants = [
      { url: 'https://v.example/a', height: 360 },
      { url: 'https://v.example/b', height: 600 },
      { url: 'https://v.example/c' }
    ];
    expect(pickClosestVariant(variants, 480)).toEqual({ url: 'https://v.example/a', height: 360 });
    expect(pickClosestVariant([{ url: 'https://v.example/c' }], 480)).toBeNull();
  });
});

describe('RutubeExtractor', () => {
  let fetchSpy: ReturnType<typeof mockFetch>;
  const signal = new AbortController().signal;
  const extractor = new RutubeExtractor({ logger: createSilentLogger(), timeoutMs: 5000 });

  beforeEach(() => {
    fetchSpy = mockFetch();
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should narrow the master playlist to the closest rendition', async () => {
    fetchSpy
      .mockResolvedValueOnce(jsonResponse({ video_balancer: { m3u8: MASTER_URL } }))
      .mockResolvedValueOnce(textResponse(MASTER_PLAYLIST));

    const result = await extractor.attempt(SOURCE, signal);

    expect(fetchSpy.mock.calls[0][0]).toBe(playOptionsUrl('abc123def456'));
    expect(fetchSpy.mock.calls[0][0]).toBe(
      'https://rutube.ru/api/play/options/abc123def456/?no_404=true&referer=https%3A%2F%2Frutube.ru'
    );
    expect(result).toEqual({
      success: true,
      locator: { kind: 'direct', url: 'https://cdn.rutube.example/hls/360/index.m3u8' },
      quality: '360p HLS',
      platform: 'secondary',
      strategy: 'rutube'
    });
  });

  it('should play the master playlist when it cannot be read', async () => {
    fetchSpy
      .mockResolvedValueOnce(jsonResponse({ video_balancer: { m3u8: MASTER_URL } }))
      .mockResolvedValueOnce(textResponse('gone', 404));

    const result = await extractor.attempt(SOURCE, signal);

    expect(result).toEqual(expect.objectContaining({
      success: true,
      locator: { kind: 'direct', url: MASTER_URL },
      quality: 'HLS manifest'
    }));
  });

  it('should report an HTTP failure of the play options request', async () => {
    fetchSpy.mockResolvedValueOnce(textResponse('unavailable', 503));

    expect(await extractor.attempt(SOURCE, signal)).toEqual({
      success: false,
      error: { kind: 'HTTP_FAILURE', status: 503, reason: 'play options request answered HTTP 503' }
    });
  });

  it('should report play options without a manifest as malformed', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ detail: 'private' }));

    expect(await extractor.attempt(SOURCE, signal)).toEqual({
      success: false,
      error: { kind: 'EMPTY_OR_MALFORMED_RESPONSE', reason: 'play options carried no manifest URL' }
    });
  });

  it('should report a transport failure as an HTTP failure', async () => {
    fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));

    expect(await extractor.attempt(SOURCE, signal)).toEqual({
      success: false,
      error: { kind: 'HTTP_FAILURE', reason: 'Request failed: fetch failed' }
    });
  });
});
