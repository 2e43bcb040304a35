/**
 * Ports for the resolution pipeline
 */

import type { PlatformTag, Result, SourceReference } from '@stream-keeper/shared';
import type { CacheEntry, CipherError, ExtractionResult } from './types';

/**
 * Key-value persistence. The storage mechanism sits behind this port.
 */
export interface KeyValueStore<T> {
  get(key: string): T | undefined;
  put(key: string, value: T): void;
  delete(key: string): void;
  clear(): void;
  keys(): string[];
}

/**
 * One way of turning a source into a playable locator
 */
export interface IExtractionStrategy {
  readonly name: string;
  readonly platform: PlatformTag;

  /**
   * Attempt extraction. Failures come back as results, never as throws;
   * an aborted signal may reject.
   */
  attempt(source: SourceReference, signal: AbortSignal): Promise<ExtractionResult>;
}

/**
 * Reverses the platform's signature obfuscation for withheld formats
 */
export interface ISignatureDescrambler {
  /**
   * Turn a signatureCipher string into a playable URL. The video id selects
   * the embed page the player script is discovered from.
   */
  descramble(signatureCipher: string, videoId: string, signal?: AbortSignal): Promise<Result<string, CipherError>>;

  /**
   * Forget the cached program so the next call re-derives it
   */
  invalidate(): void;
}

/**
 * Cheap synchronous reachability check
 */
export interface INetworkMonitor {
  isOnline(): boolean;
}

export interface ResolveOptions {
  readonly timeoutMs?: number;
}

/**
 * Source resolver: cache first, then the ordered strategy chain
 */
export interface ISourceResolver {
  needsExtraction(url: string): boolean;

  /**
   * Resolve a source. Starting a new resolution cancels the one in flight.
   */
  resolve(source: SourceReference, options?: ResolveOptions): Promise<ExtractionResult>;

  /**
   * Abort the in-flight resolution, if any
   */
  cancel(): void;

  /**
   * Drop cached resolutions for one source, or all of them
   */
  invalidate(sourceUrl?: string): void;

  getCachedEntry(sourceUrl: string): CacheEntry | null;
}
