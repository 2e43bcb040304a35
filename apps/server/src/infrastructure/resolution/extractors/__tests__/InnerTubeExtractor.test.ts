/**
 * InnerTubeExtractor tests: persona fallback and the quality policy
 */

import type { SourceReference } from '@stream-keeper/shared';
import { InnerTubeExtractor } from '../InnerTubeExtractor';
import { PERSONAS, PLAYER_ENDPOINT } from '../personas';
import { createSilentLogger } from '../../../logging';
import { brokenBodyResponse, jsonResponse, mockFetch, requestBody } from '../../../../__tests__/helpers/http';
import type { ISignatureDescrambler } from '../../../../domain/resolution';

const SOURCE: SourceReference = {
  url: 'https://www.youtube.com/watch?v=ABCD12345XY',
  platform: 'primary',
  qualityMode: '360_progressive'
};

const MUXED_360 = {
  itag: 18,
  url: 'https://media.example/v18',
  mimeType: 'video/mp4; codecs="avc1.42001E, mp4a.40.2"',
  height: 360,
  audioQuality: 'AUDIO_QUALITY_LOW'
};

function playable(streamingData: Record<string, unknown>) {
  return { playabilityStatus: { status: 'OK' }, streamingData };
}

describe('InnerTubeExtractor', () => {
  let fetchSpy: ReturnType<typeof mockFetch>;
  let descrambler: jest.Mocked<ISignatureDescrambler>;
  let signal: AbortSignal;

  const createExtractor = (overrides: Partial<ConstructorParameters<typeof InnerTubeExtractor>[0]> = {}) =>
    new InnerTubeExtractor({ descrambler, logger: createSilentLogger(), timeoutMs: 5000, ...overrides });

  beforeEach(() => {
    fetchSpy = mockFetch();
    descrambler = { descramble: jest.fn(), invalidate: jest.fn() };
    signal = new AbortController().signal;
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should fall through to the next persona when a video is not playable', async () => {
    fetchSpy
      .mockResolvedValueOnce(jsonResponse({ playabilityStatus: { status: 'UNPLAYABLE', reason: 'Video unavailable' } }))
      .mockResolvedValueOnce(jsonResponse(playable({ formats: [MUXED_360] })));

    const result = await createExtractor().attempt(SOURCE, signal);

    expect(result).toEqual({
      success: true,
      locator: { kind: 'direct', url: 'https://media.example/v18' },
      quality: '360p progressive',
      platform: 'primary',
      strategy: 'innertube'
    });
    expect(fetchSpy).toHaveBeenCalledTimes(2);
    const androidInit = fetchSpy.mock.calls[1][1];
    expect(androidInit?.headers).toEqual(expect.objectContaining({ 'X-YouTube-Client-Name': '3' }));
    expect(requestBody(androidInit)).toEqual(expect.objectContaining({
      videoId: 'ABCD12345XY',
      context: { client: expect.objectContaining({ clientName: 'ANDROID', androidSdkVersion: 11 }) }
    }));
  });

  it('should try the next persona when a response body breaks off', async () => {
    fetchSpy
      .mockResolvedValueOnce(brokenBodyResponse())
      .mockResolvedValueOnce(jsonResponse(playable({ formats: [MUXED_360] })));

    const result = await createExtractor().attempt(SOURCE, signal);

    expect(result).toEqual(expect.objectContaining({ success: true, quality: '360p progressive' }));
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('should ask as the embedded TV client first', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse(playable({ formats: [MUXED_360] })));

    await createExtractor().attempt(SOURCE, signal);

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe(PLAYER_ENDPOINT);
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual(expect.objectContaining({
      Origin: 'https://www.youtube.com',
      Referer: 'https://www.youtube.com/watch?v=ABCD12345XY'
    }));
    expect(requestBody(init)).toEqual(expect.objectContaining({
      context: {
        client: expect.objectContaining({ clientName: 'TVHTML5_SIMPLY_EMBEDDED_PLAYER', clientScreen: 'EMBED' }),
        thirdParty: { embedUrl: 'https://www.youtube.com/watch?v=ABCD12345XY' }
      }
    }));
  });

  it('should append a configured persona key to the endpoint', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse(playable({ formats: [MUXED_360] })));

    await createExtractor({ keys: { tv: 'test-key' } }).attempt(SOURCE, signal);

    expect(fetchSpy.mock.calls[0][0]).toBe(`${PLAYER_ENDPOINT}?key=test-key`);
  });

  it('should prefer avc1 over vp9 and never take av01 or another height', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse(playable({
      formats: [MUXED_360],
      adaptiveFormats: [
        { itag: 399, url: 'https://media.example/av01-1080', mimeType: 'video/mp4; codecs="av01.0.08M.08"', height: 1080 },
        { itag: 398, url: 'https://media.example/av01-720', mimeType: 'video/mp4; codecs="av01.0.05M.08"', height: 720 },
        { itag: 247, url: 'https://media.example/vp9-720', mimeType: 'video/webm; codecs="vp9"', height: 720 },
        { itag: 136, url: 'https://media.example/avc1-720', mimeType: 'video/mp4; codecs="avc1.4d401f"', height: 720 },
        { itag: 140, url: 'https://media.example/audio', mimeType: 'audio/mp4; codecs="mp4a.40.2"', audioQuality: 'AUDIO_QUALITY_MEDIUM' }
      ]
    })));

    const result = await createExtractor().attempt({ ...SOURCE, qualityMode: '720_video_only' }, signal);

    expect(result).toEqual({
      success: true,
      locator: { kind: 'video_only', videoUrl: 'https://media.example/avc1-720' },
      quality: '720p video-only',
      platform: 'primary',
      strategy: 'innertube'
    });
  });

  it('should fall back to the HLS manifest when no format matches', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse(playable({
      formats: [{ ...MUXED_360, height: 480 }],
      hlsManifestUrl: 'https://media.example/master.m3u8'
    })));

    const result = await createExtractor().attempt(SOURCE, signal);

    expect(result).toEqual(expect.objectContaining({
      success: true,
      locator: { kind: 'direct', url: 'https://media.example/master.m3u8' },
      quality: 'HLS manifest'
    }));
  });

  it('should descramble a withheld format', async () => {
    const cipher = 's=ABC&url=https%3A%2F%2Fmedia.example%2Fv18';
    descrambler.descramble.mockResolvedValue({ success: true, value: 'https://media.example/v18&sig=CBA' });
    fetchSpy.mockResolvedValueOnce(jsonResponse(playable({
      formats: [{ itag: 18, signatureCipher: cipher, mimeType: MUXED_360.mimeType, height: 360, audioQuality: 'AUDIO_QUALITY_LOW' }]
    })));

    const result = await createExtractor().attempt(SOURCE, signal);

    expect(descrambler.descramble).toHaveBeenCalledWith(cipher, 'ABCD12345XY', signal);
    expect(result).toEqual(expect.objectContaining({
      success: true,
      locator: { kind: 'direct', url: 'https://media.example/v18&sig=CBA' }
    }));
  });

  it('should rule out only the format whose signature cannot be descrambled', async () => {
    descrambler.descramble.mockResolvedValue({ success: false, error: 'EXTRACTOR_OUTDATED' });
    fetchSpy.mockResolvedValueOnce(jsonResponse(playable({
      formats: [
        { itag: 18, signatureCipher: 's=ABC&url=https%3A%2F%2Fmedia.example%2Fa', mimeType: MUXED_360.mimeType, height: 360, audioQuality: 'AUDIO_QUALITY_LOW' },
        { ...MUXED_360, itag: 43, url: 'https://media.example/plain' }
      ]
    })));

    const result = await createExtractor().attempt(SOURCE, signal);

    expect(result).toEqual(expect.objectContaining({
      success: true,
      locator: { kind: 'direct', url: 'https://media.example/plain' }
    }));
  });

  it('should report an outdated extractor when descrambling rules out every format', async () => {
    descrambler.descramble.mockResolvedValue({ success: false, error: 'EXTRACTOR_OUTDATED' });
    fetchSpy.mockResolvedValueOnce(jsonResponse(playable({
      formats: [{ itag: 18, signatureCipher: 's=ABC&url=https%3A%2F%2Fmedia.example%2Fa', mimeType: MUXED_360.mimeType, height: 360, audioQuality: 'AUDIO_QUALITY_LOW' }]
    })));

    const result = await createExtractor({ personas: [PERSONAS[0]] }).attempt(SOURCE, signal);

    expect(result).toEqual({
      success: false,
      error: {
        kind: 'CIPHER_DECRYPT_FAILED',
        reason: 'extractor outdated: descrambling function not found in player script'
      }
    });
  });

  it('should return the last persona failure when all fail', async () => {
    fetchSpy
      .mockResolvedValueOnce(jsonResponse({ error: 'boom' }, 500))
      .mockResolvedValueOnce(jsonResponse({ playabilityStatus: { status: 'LOGIN_REQUIRED', reason: 'Sign in' } }))
      .mockResolvedValueOnce(jsonResponse(playable({ formats: [{ ...MUXED_360, height: 480 }] })));

    const result = await createExtractor().attempt(SOURCE, signal);

    expect(result).toEqual({
      success: false,
      error: { kind: 'NO_MATCHING_FORMAT', reason: 'no matching format for 360_progressive' }
    });
    expect(fetchSpy).toHaveBeenCalledTimes(3);
  });

  it('should carry the HTTP status of a failed request', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({}, 403));

    const result = await createExtractor({ personas: [PERSONAS[2]] }).attempt(SOURCE, signal);

    expect(result).toEqual({
      success: false,
      error: { kind: 'HTTP_FAILURE', status: 403, reason: 'web player request answered HTTP 403' }
    });
  });

  it('should report a response without streaming data as malformed', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ playabilityStatus: { status: 'OK' } }));

    const result = await createExtractor({ personas: [PERSONAS[0]] }).attempt(SOURCE, signal);

    expect(result).toEqual({
      success: false,
      error: { kind: 'EMPTY_OR_MALFORMED_RESPONSE', reason: 'player response carried no streaming data' }
    });
  });

  it('should reject a URL without a video id before any request', async () => {
    const result = await createExtractor().attempt({ ...SOURCE, url: 'https://www.youtube.com/channel/somebody' }, signal);

    expect(result).toEqual({ success: false, error: { kind: 'INVALID_SOURCE', reason: 'no video id in source URL' } });
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});
