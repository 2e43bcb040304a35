/**
 * SourceResolver: cache first, then the platform's strategies in order
 *
 * Only one resolution runs at a time. Starting another aborts the one in
 * flight, which then reports RESOLUTION_CANCELLED and writes nothing.
 */

import type { Logger } from 'pino';
import { LocatorCodec, SourceUrlUtils, type SourceReference } from '@stream-keeper/shared';
import {
  ResolutionFailures,
  type CacheEntry,
  type ExtractionResult,
  type IExtractionStrategy,
  type INetworkMonitor,
  type ISourceResolver,
  type ResolutionFailure,
  type ResolveOptions
} from '../../domain/resolution';
import type { ResolutionCache } from './ResolutionCache';

export const DEFAULT_RESOLUTION_TIMEOUT_MS = 25_000;

export interface SourceResolverOptions {
  readonly strategies: readonly IExtractionStrategy[];
  readonly cache: ResolutionCache;
  readonly network: INetworkMonitor;
  readonly logger: Logger;
  readonly timeoutMs?: number;
}

function fromCache(entry: CacheEntry): ExtractionResult {
  return {
    success: true,
    locator: LocatorCodec.decode(entry.locator),
    quality: entry.quality,
    platform: entry.platform,
    strategy: 'cache',
    fromCache: true
  };
}

export class SourceResolver implements ISourceResolver {
  private readonly strategies: readonly IExtractionStrategy[];
  private readonly cache: ResolutionCache;
  private readonly network: INetworkMonitor;
  private readonly logger: Logger;
  private readonly defaultTimeoutMs: number;
  private inFlight: AbortController | null = null;

  constructor(options: SourceResolverOptions) {
    this.strategies = options.strategies;
    this.cache = options.cache;
    this.network = options.network;
    this.logger = options.logger.child({ component: 'SourceResolver' });
    this.defaultTimeoutMs = options.timeoutMs ?? DEFAULT_RESOLUTION_TIMEOUT_MS;
  }

  needsExtraction(url: string): boolean {
    return SourceUrlUtils.needsExtraction(url);
  }

  async resolve(source: SourceReference, options: ResolveOptions = {}): Promise<ExtractionResult> {
    if (!this.needsExtraction(source.url)) {
      return {
        success: true,
        locator: LocatorCodec.direct(source.url),
        quality: 'direct',
        platform: 'none',
        strategy: 'direct'
      };
    }

    this.cancel();
    const controller = new AbortController();
    this.inFlight = controller;

    try {
      if (!this.network.isOnline()) {
        const last = this.cache.getAny(source.url);
        if (last) {
          this.logger.info({ source: source.url }, 'Offline, using last cached resolution');
          return fromCache(last);
        }
        return ResolutionFailures.fail({ kind: 'NETWORK_UNAVAILABLE', reason: 'no network and nothing cached' });
      }

      const hit = this.cache.get(source.url, source.qualityMode);
      if (hit) {
        this.logger.debug({ source: source.url }, 'Resolution cache hit');
        return fromCache(hit);
      }

      return await this.runWithTimeout(source, controller, options.timeoutMs ?? this.defaultTimeoutMs);
    } finally {
      if (this.inFlight === controller) {
        this.inFlight = null;
      }
    }
  }

  cancel(): void {
    if (this.inFlight) {
      this.inFlight.abort();
      this.inFlight = null;
    }
  }

  invalidate(sourceUrl?: string): void {
    this.cache.invalidate(sourceUrl);
    this.logger.info({ source: sourceUrl ?? 'all' }, 'Resolution cache invalidated');
  }

  getCachedEntry(sourceUrl: string): CacheEntry | null {
    return this.cache.getAny(sourceUrl);
  }

  private async runWithTimeout(
    source: SourceReference,
    controller: AbortController,
    timeoutMs: number
  ): Promise<ExtractionResult> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<ExtractionResult>(resolve => {
      controller.signal.addEventListener(
        'abort',
        () => resolve(ResolutionFailures.fail(ResolutionFailures.cancelled())),
        { once: true }
      );
      timer = setTimeout(() => {
        this.logger.warn({ source: source.url, timeoutMs }, 'Resolution timed out');
        // Settle first; aborting runs the cancel listener synchronously
        resolve(ResolutionFailures.fail(ResolutionFailures.timeout(timeoutMs)));
        controller.abort();
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.runChain(source, controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async runChain(source: SourceReference, signal: AbortSignal): Promise<ExtractionResult> {
    const strategies = this.strategies.filter(strategy => strategy.platform === source.platform);
    let last: ResolutionFailure | null = null;

    for (const strategy of strategies) {
      if (signal.aborted) {
        return ResolutionFailures.fail(ResolutionFailures.cancelled());
      }

      let result: ExtractionResult;
      try {
        result = await strategy.attempt(source, signal);
      } catch (error) {
        if (signal.aborted) {
          return ResolutionFailures.fail(ResolutionFailures.cancelled());
        }
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error({ err: error, strategy: strategy.name }, 'Extraction strategy threw');
        last = ResolutionFailures.malformed(`${strategy.name}: ${message}`);
        continue;
      }

      if (signal.aborted) {
        return ResolutionFailures.fail(ResolutionFailures.cancelled());
      }

      if (result.success) {
        this.cache.set(source.url, source.qualityMode, result);
        this.logger.info(
          { source: source.url, strategy: strategy.name, quality: result.quality },
          'Source resolved'
        );
        return result;
      }

      this.logger.warn({ strategy: strategy.name, failure: result.error }, 'Extraction strategy failed');
      last = result.error;
    }

    return ResolutionFailures.fail(ResolutionFailures.exhausted(last));
  }
}
