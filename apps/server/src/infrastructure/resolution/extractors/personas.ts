/**
 * Client personas for the primary platform's player endpoint
 */

import type { InnerTubeKeys } from '../../config';

export const PLAYER_ENDPOINT = 'https://www.youtube.com/youtubei/v1/player';
const SIGNATURE_TIMESTAMP = 20458;

export type PersonaId = 'tv_embedded' | 'android' | 'web';

export interface ClientPersona {
  readonly id: PersonaId;
  readonly clientName: string;
  readonly clientVersion: string;
  readonly userAgent: string;
  readonly clientNameHeader: string;
  readonly keyName: keyof InnerTubeKeys;
  /** Adds embed screen and third-party embed URL */
  readonly embedded: boolean;
  /** Sends Origin and Referer like a browser would */
  readonly browserLike: boolean;
  readonly extraClientFields?: Readonly<Record<string, string | number>>;
}

/**
 * Tried in this order. The embedded TV client is least likely to get
 * withheld formats.
 */
export const PERSONAS: readonly ClientPersona[] = [
  {
    id: 'tv_embedded',
    clientName: 'TVHTML5_SIMPLY_EMBEDDED_PLAYER',
    clientVersion: '2.0',
    userAgent: 'Mozilla/5.0 (ChromiumStylePlatform) Cobalt/Version,gzip(gfe)',
    clientNameHeader: '85',
    keyName: 'tv',
    embedded: true,
    browserLike: true
  },
  {
    id: 'android',
    clientName: 'ANDROID',
    clientVersion: '20.10.38',
    userAgent: 'com.google.android.youtube/20.10.38 (Linux; U; Android 11) gzip',
    clientNameHeader: '3',
    keyName: 'android',
    embedded: false,
    browserLike: false,
    extraClientFields: { androidSdkVersion: 11, osName: 'Android', osVersion: '11' }
  },
  {
    id: 'web',
    clientName: 'WEB',
    clientVersion: '2.20240304.00.00',
    userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
    clientNameHeader: '1',
    keyName: 'web',
    embedded: false,
    browserLike: true
  }
];

export interface PlayerRequest {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: string;
}

export function buildPlayerRequest(persona: ClientPersona, videoId: string, keys: InnerTubeKeys): PlayerRequest {
  const watchUrl = `https://www.youtube.com/watch?v=${videoId}`;
  const apiKey = keys[persona.keyName];

  const client: Record<string, string | number> = {
    clientName: persona.clientName,
    clientVersion: persona.clientVersion,
    hl: 'en',
    gl: 'US',
    utcOffsetMinutes: 0,
    ...persona.extraClientFields
  };
  if (persona.embedded) {
    client.clientScreen = 'EMBED';
  }

  const body = {
    videoId,
    context: {
      client,
      ...(persona.embedded && { thirdParty: { embedUrl: watchUrl } })
    },
    contentCheckOk: true,
    racyCheckOk: true,
    playbackContext: {
      contentPlaybackContext: {
        html5Preference: 'HTML5_PREF_WANTS',
        signatureTimestamp: SIGNATURE_TIMESTAMP
      }
    }
  };

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': persona.userAgent,
    'X-YouTube-Client-Name': persona.clientNameHeader,
    'X-YouTube-Client-Version': persona.clientVersion
  };
  if (persona.browserLike) {
    headers.Origin = 'https://www.youtube.com';
    headers.Referer = watchUrl;
  }

  return {
    url: apiKey ? `${PLAYER_ENDPOINT}?key=${encodeURIComponent(apiKey)}` : PLAYER_ENDPOINT,
    headers,
    body: JSON.stringify(body)
  };
}
