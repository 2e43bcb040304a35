/**
 * SignatureDescrambler tests against a synthetic player script
 */

import pino from 'pino';
import { SignatureDescrambler, CIPHER_CACHE_TTL_MS } from '../SignatureDescrambler';
import { applyOperations, parseSignatureCipher } from '../CipherProgram';
import { deriveOperations, findPlayerUrl } from '../playerScript';
import { MemoryStore } from '../../../storage';
import { createSilentLogger } from '../../../logging';
import { brokenBodyResponse, mockFetch, textResponse } from '../../../../__tests__/helpers/http';
import type { CipherTransformProgram } from '../../../../domain/resolution';

const EMBED_PAGE = '<html><script>var cfg={"jsUrl":"/s/player/abc123/base.js","other":1};</script></html>';
const PLAYER_URL = 'https://www.youtube.com/s/player/abc123/base.js';
const PLAYER_SCRIPT = [
  'var Qx={ab:function(a){a.reverse()},cd:function(a,b){a.splice(0,b)},',
  'ef:function(a,b){var c=a[0];a[0]=a[b%a.length];a[b%a.length]=c}};',
  'Mz=function(a){a=a.split("");Qx.cd(a,2);Qx.ab(a,7);Qx.ef(a,3);return a.join("")};'
].join('');
const CIPHER = 's=ABCDEFGH&sp=sig&url=https%3A%2F%2Fmedia.example%2Fvideoplayback%3Fitag%3D18';
const VIDEO_ID = 'ABCD12345XY';

describe('player script matching', () => {
  it('should find the player URL on the embed page', () => {
    expect(findPlayerUrl(EMBED_PAGE)).toBe(PLAYER_URL);
    expect(findPlayerUrl('<html></html>')).toBeNull();
  });

  it('should map helper calls to operations', () => {
    expect(deriveOperations(PLAYER_SCRIPT)).toEqual([
      { op: 'splice', n: 2 },
      { op: 'reverse' },
      { op: 'swap', n: 3 }
    ]);
  });

  it('should give up when the function shape is unknown', () => {
    expect(deriveOperations('function unrelated(){return 1}')).toBeNull();
  });
});

describe('applyOperations', () => {
  it('should swap the first character with index n modulo length', () => {
    expect(applyOperations('abc', [{ op: 'swap', n: 4 }])).toEqual({ success: true, value: 'bac' });
  });

  it('should leave the signature alone when a splice would consume it', () => {
    expect(applyOperations('abc', [{ op: 'splice', n: 3 }])).toEqual({ success: true, value: 'abc' });
  });

  it('should refuse an empty program', () => {
    expect(applyOperations('abc', [])).toEqual({ success: false, error: 'APPLY_FAILED' });
  });
});

describe('parseSignatureCipher', () => {
  it('should default the parameter name to sig', () => {
    const parsed = parseSignatureCipher('s=XYZ&url=https%3A%2F%2Fmedia.example%2Fv');
    expect(parsed).toEqual({
      success: true,
      value: { url: 'https://media.example/v', encryptedSignature: 'XYZ', parameterName: 'sig' }
    });
  });
});

describe('SignatureDescrambler', () => {
  let store: MemoryStore<CipherTransformProgram>;
  let now: number;
  let descrambler: SignatureDescrambler;
  let fetchSpy: ReturnType<typeof mockFetch>;

  beforeEach(() => {
    store = new MemoryStore<CipherTransformProgram>();
    now = 1_000_000;
    descrambler = new SignatureDescrambler({
      store,
      logger: createSilentLogger(),
      timeoutMs: 5000,
      now: () => now
    });
    fetchSpy = mockFetch();
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should derive the program, sign the URL and cache the program', async () => {
    fetchSpy
      .mockResolvedValueOnce(textResponse(EMBED_PAGE))
      .mockResolvedValueOnce(textResponse(PLAYER_SCRIPT));

    const result = await descrambler.descramble(CIPHER, VIDEO_ID);

    expect(result).toEqual({ success: true, value: 'https://media.example/videoplayback?itag=18&sig=EGFHDC' });
    expect(fetchSpy.mock.calls[0][0]).toBe('https://www.youtube.com/embed/ABCD12345XY');
    expect(fetchSpy.mock.calls[1][0]).toBe(PLAYER_URL);
    expect(store.get('program')).toEqual({
      playerUrl: PLAYER_URL,
      operations: [{ op: 'splice', n: 2 }, { op: 'reverse' }, { op: 'swap', n: 3 }],
      derivedAt: 1_000_000
    });
  });

  it('should reuse a cached program younger than a day', async () => {
    store.put('program', { playerUrl: PLAYER_URL, operations: [{ op: 'reverse' }], derivedAt: now });
    now += CIPHER_CACHE_TTL_MS - 1;

    const result = await descrambler.descramble(CIPHER, VIDEO_ID);

    expect(result).toEqual({ success: true, value: 'https://media.example/videoplayback?itag=18&sig=HGFEDCBA' });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should re-derive once the cached program expires', async () => {
    store.put('program', { playerUrl: PLAYER_URL, operations: [{ op: 'reverse' }], derivedAt: now });
    now += CIPHER_CACHE_TTL_MS + 1;
    fetchSpy
      .mockResolvedValueOnce(textResponse(EMBED_PAGE))
      .mockResolvedValueOnce(textResponse(PLAYER_SCRIPT));

    const result = await descrambler.descramble(CIPHER, VIDEO_ID);

    expect(result).toEqual({ success: true, value: 'https://media.example/videoplayback?itag=18&sig=EGFHDC' });
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('should discard a cached program that fails to apply and re-derive', async () => {
    store.put('program', { playerUrl: PLAYER_URL, operations: [], derivedAt: now });
    fetchSpy
      .mockResolvedValueOnce(textResponse(EMBED_PAGE))
      .mockResolvedValueOnce(textResponse(PLAYER_SCRIPT));

    const result = await descrambler.descramble(CIPHER, VIDEO_ID);

    expect(result.success).toBe(true);
    expect(store.get('program')?.operations).toHaveLength(3);
  });

  it('should report an outdated extractor when the script has changed shape', async () => {
    fetchSpy
      .mockResolvedValueOnce(textResponse(EMBED_PAGE))
      .mockResolvedValueOnce(textResponse('var nothing=1;'));

    const result = await descrambler.descramble(CIPHER, VIDEO_ID);

    expect(result).toEqual({ success: false, error: 'EXTRACTOR_OUTDATED' });
    expect(store.get('program')).toBeUndefined();
  });

  it('should report a missing player URL', async () => {
    fetchSpy.mockResolvedValueOnce(textResponse('<html></html>'));

    expect(await descrambler.descramble(CIPHER, VIDEO_ID)).toEqual({ success: false, error: 'PLAYER_URL_NOT_FOUND' });
  });

  it('should report a failed player download', async () => {
    fetchSpy
      .mockResolvedValueOnce(textResponse(EMBED_PAGE))
      .mockResolvedValueOnce(textResponse('gone', 404));

    expect(await descrambler.descramble(CIPHER, VIDEO_ID)).toEqual({ success: false, error: 'PLAYER_DOWNLOAD_FAILED' });
  });

  it('should report a player download cut off mid-body', async () => {
    fetchSpy
      .mockResolvedValueOnce(textResponse(EMBED_PAGE))
      .mockResolvedValueOnce(brokenBodyResponse());

    await expect(descrambler.descramble(CIPHER, VIDEO_ID)).resolves.toEqual({ success: false, error: 'PLAYER_DOWNLOAD_FAILED' });
    expect(store.get('program')).toBeUndefined();
  });

  it('should reject a cipher without a URL', async () => {
    expect(await descrambler.descramble('s=ABC', VIDEO_ID)).toEqual({ success: false, error: 'INVALID_CIPHER' });
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});

describe('SignatureDescrambler override script', () => {
  function capturingLogger(lines: string[]) {
    return pino({ level: 'info' }, { write: (line: string) => { lines.push(line); } });
  }

  function messages(lines: string[]): unknown[] {
    return lines.map(line => JSON.parse(line).msg);
  }

  it('should report a present override once and never run it', async () => {
    const lines: string[] = [];
    const descrambler = new SignatureDescrambler({
      store: new MemoryStore<CipherTransformProgram>(),
      logger: capturingLogger(lines),
      timeoutMs: 5000,
      overrideScriptPath: __filename
    });

    await descrambler.descramble('s=ABC', VIDEO_ID);
    await descrambler.descramble('s=DEF', VIDEO_ID);

    expect(descrambler.hasOverrideScript()).toBe(true);
    expect(messages(lines)).toEqual(['Cipher override script present; not executed']);
  });

  it('should warn when the configured override is missing', () => {
    const lines: string[] = [];
    const descrambler = new SignatureDescrambler({
      store: new MemoryStore<CipherTransformProgram>(),
      logger: capturingLogger(lines),
      timeoutMs: 5000,
      overrideScriptPath: '/nonexistent/cipher-override.js'
    });

    expect(descrambler.hasOverrideScript()).toBe(false);
    expect(messages(lines)).toEqual(['Cipher override script not found']);
  });

  it('should say nothing without an override', () => {
    const lines: string[] = [];
    const descrambler = new SignatureDescrambler({
      store: new MemoryStore<CipherTransformProgram>(),
      logger: capturingLogger(lines),
      timeoutMs: 5000
    });

    expect(descrambler.hasOverrideScript()).toBe(false);
    expect(lines).toEqual([]);
  });
});
