/**
 * PlaybackSession - keeps the scheduled source on screen
 *
 * Picks today's source, resolves it, and hands the locator to the resilience
 * controller. Resolution failure and exhausted recovery both fall back to
 * the default content. On the first ready of a fresh load the session
 * positions playback: a resume offer wins over the initial seek policy.
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import {
  ErrorFactory,
  LocatorCodec,
  SourceValidator,
  type MediaLocator,
  type QualityMode,
  type RecoveryErrorKind,
  type ResolutionErrorKind,
  type SourceReference
} from '@stream-keeper/shared';
import type {
  EngineEvent,
  IPlaybackEngine,
  PlaybackEvent,
  PlaybackEventListener,
  PlaybackEventType,
  ResilienceState
} from '../domain/playback';
import type { ISourceResolver, KeyValueStore } from '../domain/resolution';
import type { InitialSeekPolicy } from './InitialSeekPolicy';
import {
  PlaybackResilienceController,
  type ILocatorRefresher,
  type ResilienceOptions
} from './PlaybackResilienceController';
import type { IResumeStore } from './ResumeStore';
import { DEFAULT_SOURCE_URL, type ISourceScheduler } from './SourceScheduler';
import { systemTimers, type Timers } from './timers';

const LAST_SOURCE_KEY = 'lastSource';

export type SessionStatus = 'stopped' | 'resolving' | 'playing';

/**
 * Why the session is showing default content
 */
export interface SessionFailure {
  readonly kind: ResolutionErrorKind | RecoveryErrorKind;
  readonly reason: string;
}

export interface SessionState {
  readonly status: SessionStatus;
  readonly source: SourceReference | null;
  readonly locator: MediaLocator | null;
  readonly quality: string | null;
  readonly strategy: string | null;
  readonly usingDefaultContent: boolean;
  readonly lastFailure: SessionFailure | null;
}

export interface SessionSnapshot {
  readonly session: SessionState;
  readonly resilience: ResilienceState;
}

export interface SessionSettings {
  readonly qualityMode: QualityMode;
  readonly resumeEnabled: boolean;
  readonly randomSeekEnabled: boolean;
}

export interface PlaybackSessionOptions {
  readonly scheduler: ISourceScheduler;
  readonly resolver: ISourceResolver;
  readonly engine: IPlaybackEngine;
  readonly resumeStore: IResumeStore;
  readonly seekPolicy: InitialSeekPolicy;
  readonly sessionStore: KeyValueStore<string>;
  readonly settings: SessionSettings;
  readonly logger: Logger;
  readonly timers?: Timers;
  readonly resilience?: ResilienceOptions;
  readonly defaultSourceUrl?: string;
}

export interface IPlaybackSession {
  start(): Promise<void>;
  reload(): Promise<void>;
  stop(): Promise<void>;
  invalidateCache(): void;
  getSnapshot(): SessionSnapshot;
  addEventListener(listener: PlaybackEventListener): void;
  removeEventListener(listener: PlaybackEventListener): void;
}

const STOPPED: SessionState = {
  status: 'stopped',
  source: null,
  locator: null,
  quality: null,
  strategy: null,
  usingDefaultContent: false,
  lastFailure: null
};

export class PlaybackSession extends EventEmitter implements IPlaybackSession, ILocatorRefresher {
  private readonly scheduler: ISourceScheduler;
  private readonly resolver: ISourceResolver;
  private readonly engine: IPlaybackEngine;
  private readonly resumeStore: IResumeStore;
  private readonly seekPolicy: InitialSeekPolicy;
  private readonly sessionStore: KeyValueStore<string>;
  private readonly settings: SessionSettings;
  private readonly logger: Logger;
  private readonly timers: Timers;
  private readonly defaultSourceUrl: string;
  private readonly controller: PlaybackResilienceController;

  private state: SessionState = STOPPED;
  private awaitingFirstReady = false;
  // Bumped on every start, reload and stop; stale resolutions are dropped
  private generation = 0;

  private readonly onEngineEvent = (event: EngineEvent): void => this.handleEngineEvent(event);
  private readonly onControllerEvent = (event: PlaybackEvent): void => this.handleControllerEvent(event);

  constructor(options: PlaybackSessionOptions) {
    super();
    this.scheduler = options.scheduler;
    this.resolver = options.resolver;
    this.engine = options.engine;
    this.resumeStore = options.resumeStore;
    this.seekPolicy = options.seekPolicy;
    this.sessionStore = options.sessionStore;
    this.settings = options.settings;
    this.logger = options.logger.child({ component: 'PlaybackSession' });
    this.timers = options.timers ?? systemTimers;
    this.defaultSourceUrl = options.defaultSourceUrl ?? DEFAULT_SOURCE_URL;

    this.controller = new PlaybackResilienceController(
      this.engine,
      this,
      options.logger,
      this.timers,
      options.resilience
    );
    this.controller.addEventListener(this.onControllerEvent);
    this.engine.addEventListener(this.onEngineEvent);
  }

  /**
   * Begin playing the scheduled source
   */
  async start(): Promise<void> {
    await this.play();
  }

  /**
   * Re-pick the scheduled source, cancelling whatever is in progress
   */
  async reload(): Promise<void> {
    this.logger.info('Reloading playback');
    await this.play();
  }

  /**
   * Orderly stop. The current position is kept for the next start.
   */
  async stop(): Promise<void> {
    this.generation++;
    this.resolver.cancel();

    const locator = this.controller.getState().locator ?? this.state.locator;
    if (locator && this.state.status === 'playing') {
      const positionMs = await this.engine.getPositionMs();
      if (positionMs !== null) {
        this.resumeStore.save(locator, positionMs);
        this.logger.info({ positionMs }, 'Saved position for resume');
      }
    }

    this.controller.reset();
    this.awaitingFirstReady = false;
    await this.engine.stop();
    this.update(STOPPED);
  }

  invalidateCache(): void {
    this.resolver.invalidate();
  }

  getSnapshot(): SessionSnapshot {
    return { session: this.state, resilience: this.controller.getState() };
  }

  /**
   * Fresh locator for the current source, bypassing the cache. Used by the
   * controller on its first retry.
   */
  async refreshLocator(): Promise<MediaLocator | null> {
    const source = this.state.source;
    if (!source || this.state.usingDefaultContent) {
      return null;
    }

    this.resolver.invalidate(source.url);
    const result = await this.resolver.resolve(source);
    if (!result.success) {
      this.logger.warn({ failure: result.error }, 'Could not refresh the locator');
      return null;
    }

    this.update({ locator: result.locator, quality: result.quality, strategy: result.strategy });
    return result.locator;
  }

  addEventListener(listener: PlaybackEventListener): void {
    this.on('playback_event', listener);
  }

  removeEventListener(listener: PlaybackEventListener): void {
    this.off('playback_event', listener);
  }

  dispose(): void {
    this.generation++;
    this.resolver.cancel();
    this.engine.removeEventListener(this.onEngineEvent);
    this.controller.dispose();
    this.removeAllListeners();
  }

  private async play(): Promise<void> {
    const generation = ++this.generation;
    this.resolver.cancel();
    this.controller.reset();
    this.awaitingFirstReady = false;

    const url = this.scheduler.pick();
    this.noteSourceChange(url);

    const created = SourceValidator.create({ url }, this.settings.qualityMode);
    if (!created.success) {
      const details = ErrorFactory.createSourceError(created.error, { url });
      this.logger.error({ code: details.code, url }, details.message);
      await this.playDefaultContent(generation, { kind: 'INVALID_SOURCE', reason: details.message });
      return;
    }

    const source = created.value;
    this.update({ ...STOPPED, status: 'resolving', source });
    this.emitEvent('resolution_started', { source: source.url });

    const result = await this.resolver.resolve(source);
    // Superseded by a reload or stop
    if (generation !== this.generation) return;

    if (!result.success) {
      const details = ErrorFactory.createResolutionError(result.error.kind, { url: source.url });
      this.logger.warn({ code: details.code, reason: result.error.reason }, details.message);
      this.emitEvent('resolution_failed', { source: source.url, error: result.error.kind, reason: result.error.reason });
      await this.playDefaultContent(generation, { kind: result.error.kind, reason: result.error.reason });
      return;
    }

    this.logger.info(
      { source: source.url, quality: result.quality, strategy: result.strategy, fromCache: result.fromCache === true },
      'Source resolved'
    );
    this.emitEvent('resolution_succeeded', { source: source.url, quality: result.quality });
    this.update({
      status: 'playing',
      locator: result.locator,
      quality: result.quality,
      strategy: result.strategy,
      usingDefaultContent: false,
      lastFailure: null
    });
    await this.load(result.locator);
  }

  /**
   * The cache belongs to one source at a time
   */
  private noteSourceChange(url: string): void {
    const previous = this.sessionStore.get(LAST_SOURCE_KEY);
    if (previous !== undefined && previous !== url) {
      this.logger.info({ previous, current: url }, 'Scheduled source changed, clearing resolution cache');
      this.resolver.invalidate();
      this.emitEvent('source_changed', { source: url });
    }
    this.sessionStore.put(LAST_SOURCE_KEY, url);
  }

  private async playDefaultContent(generation: number, failure: SessionFailure): Promise<void> {
    if (generation !== this.generation) return;

    const locator = LocatorCodec.direct(this.defaultSourceUrl);
    this.logger.warn({ reason: failure.reason }, 'Falling back to default content');
    this.update({
      status: 'playing',
      locator,
      quality: 'direct',
      strategy: 'default',
      usingDefaultContent: true,
      lastFailure: failure
    });
    this.emitEvent('default_content', { source: this.defaultSourceUrl, reason: failure.reason });
    await this.load(locator);
  }

  private async load(locator: MediaLocator): Promise<void> {
    this.awaitingFirstReady = true;
    await this.controller.load(locator);
  }

  private handleEngineEvent(event: EngineEvent): void {
    if (event.type !== 'ready' || !this.awaitingFirstReady) return;
    this.awaitingFirstReady = false;

    this.applyStartPosition(event.durationMs).catch(error => {
      this.logger.error({ err: error }, 'Could not position playback');
    });
  }

  private async applyStartPosition(durationMs: number | null): Promise<void> {
    const locator = this.state.locator;
    if (!locator) return;

    const resumed = this.resumeStore.offer(locator, {
      resumeEnabled: this.settings.resumeEnabled,
      randomSeekEnabled: this.settings.randomSeekEnabled
    });
    if (resumed.success) {
      this.logger.info({ positionMs: resumed.value }, 'Resuming from saved position');
      await this.engine.seek(resumed.value);
      this.emitEvent('resume_applied', { positionMs: resumed.value });
      return;
    }
    this.logger.debug({ reason: resumed.error }, 'No resume');

    const decision = this.seekPolicy.decide(durationMs);
    if (!decision) return;
    if (decision.positionMs > 0) {
      await this.engine.seek(decision.positionMs);
    }
    this.emitEvent('initial_seek_applied', { positionMs: decision.positionMs, reason: decision.reason });
  }

  private handleControllerEvent(event: PlaybackEvent): void {
    this.emit('playback_event', event);

    if (event.type === 'recovery_failed' && !this.state.usingDefaultContent && this.state.status === 'playing') {
      const failure: SessionFailure = { kind: 'RETRY_LIMIT_REACHED', reason: event.data.reason ?? 'recovery failed' };
      const generation = this.generation;
      // Let the controller finish reporting before it is reloaded
      this.timers.setTimeout(() => {
        this.playDefaultContent(generation, failure).catch(error => {
          this.logger.error({ err: error }, 'Could not start default content');
        });
      }, 0);
    }
  }

  private update(patch: Partial<SessionState>): void {
    this.state = { ...this.state, ...patch };
  }

  private emitEvent(type: PlaybackEventType, data: Omit<PlaybackEvent['data'], 'state'>): void {
    const event: PlaybackEvent = {
      type,
      timestamp: new Date(this.timers.now()),
      data: { ...data, state: this.controller.getState() }
    };
    this.emit('playback_event', event);
  }
}
