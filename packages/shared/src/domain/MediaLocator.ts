/**
 * Resolved media locators.
 *
 * A video-only stream travels as a composite locator so the playback layer
 * knows to mute it and mux audio separately.
 */

export type MediaLocator =
  | { readonly kind: 'direct'; readonly url: string }
  | { readonly kind: 'video_only'; readonly videoUrl: string };

export const VIDEO_ONLY_TAG = 'VIDEO_ONLY|||';

export class LocatorCodec {
  static direct(url: string): MediaLocator {
    return { kind: 'direct', url };
  }

  static videoOnly(videoUrl: string): MediaLocator {
    return { kind: 'video_only', videoUrl };
  }

  /**
   * Wire form used by the stores and the HTTP surface
   */
  static encode(locator: MediaLocator): string {
    return locator.kind === 'video_only' ? `${VIDEO_ONLY_TAG}${locator.videoUrl}` : locator.url;
  }

  static decode(value: string): MediaLocator {
    if (value.startsWith(VIDEO_ONLY_TAG)) {
      return { kind: 'video_only', videoUrl: value.slice(VIDEO_ONLY_TAG.length) };
    }
    return { kind: 'direct', url: value };
  }

  static playableUrl(locator: MediaLocator): string {
    return locator.kind === 'video_only' ? locator.videoUrl : locator.url;
  }
}

// Query parameters that change between sessions for the same content
const SESSION_PARAMS = ['sign', 'sig', 'signature', 'token', 'expire', 'expires'];

export class LocatorUtils {
  /**
   * Strips session-bound signature and query suffixes so two resolutions
   * of the same content compare equal.
   */
  static baseLocator(url: string): string {
    const head = url.split('&sign=')[0];
    try {
      const parsed = new URL(head);
      for (const param of SESSION_PARAMS) {
        parsed.searchParams.delete(param);
      }
      return parsed.toString();
    } catch {
      return head;
    }
  }
}
