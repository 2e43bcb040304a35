/**
 * PlaybackResilienceController - keeps one source playing through stalls
 *
 * idle → loading → ready → stalled → retrying → (loading | failed)
 *
 * A periodic check turns a long stretch without a playing signal into a
 * stall. Each stall or engine error takes the retry path: bounded by the
 * retry cap, with exponential backoff, and with a fresh resolution on the
 * first retry only.
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { ErrorFactory, type MediaLocator } from '@stream-keeper/shared';
import type {
  EngineEvent,
  IPlaybackEngine,
  PlaybackEvent,
  PlaybackEventListener,
  PlaybackEventType,
  ResilienceState
} from '../domain/playback';
import { systemTimers, type Timers } from './timers';

export const STALL_TIMEOUT_MS = 10_000;
export const STALL_CHECK_INTERVAL_MS = 1_000;
export const MAX_RETRIES = 3;

/**
 * Supplies a fresh locator for the current source, bypassing the cache.
 * Null keeps the last known locator.
 */
export interface ILocatorRefresher {
  refreshLocator(): Promise<MediaLocator | null>;
}

export interface ResilienceOptions {
  readonly stallTimeoutMs?: number;
  readonly checkIntervalMs?: number;
  readonly maxRetries?: number;
}

export interface IPlaybackResilienceController {
  load(locator: MediaLocator): Promise<void>;
  reset(): void;
  getState(): ResilienceState;
  addEventListener(listener: PlaybackEventListener): void;
  removeEventListener(listener: PlaybackEventListener): void;
  dispose(): void;
}

const IDLE_STATE: ResilienceState = {
  status: 'idle',
  retryCount: 0,
  stallStartTime: null,
  isRetrying: false,
  locator: null,
  lastError: null
};

export class PlaybackResilienceController extends EventEmitter implements IPlaybackResilienceController {
  private state: ResilienceState = IDLE_STATE;
  private stallCheck: NodeJS.Timeout | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private pendingRefresh: Promise<MediaLocator | null> | null = null;
  // Bumped on every reset; async work from an older generation is dropped
  private generation = 0;

  private readonly stallTimeoutMs: number;
  private readonly checkIntervalMs: number;
  private readonly maxRetries: number;
  private readonly logger: Logger;
  private readonly onEngineEvent = (event: EngineEvent): void => this.handleEngineEvent(event);

  constructor(
    private readonly engine: IPlaybackEngine,
    private readonly refresher: ILocatorRefresher,
    logger: Logger,
    private readonly timers: Timers = systemTimers,
    options: ResilienceOptions = {}
  ) {
    super();
    this.logger = logger.child({ component: 'PlaybackResilienceController' });
    this.stallTimeoutMs = options.stallTimeoutMs ?? STALL_TIMEOUT_MS;
    this.checkIntervalMs = options.checkIntervalMs ?? STALL_CHECK_INTERVAL_MS;
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.engine.addEventListener(this.onEngineEvent);
  }

  /**
   * Play a new locator with fresh resilience state
   */
  async load(locator: MediaLocator): Promise<void> {
    this.reset();
    this.update({ status: 'loading', locator });
    this.startStallCheck();
    await this.engine.load(locator);
  }

  /**
   * Cancel pending retries and return to idle
   */
  reset(): void {
    this.generation++;
    this.clearRetryTimer();
    this.stopStallCheck();
    this.pendingRefresh = null;
    this.update(IDLE_STATE);
  }

  getState(): ResilienceState {
    return this.state;
  }

  addEventListener(listener: PlaybackEventListener): void {
    this.on('playback_event', listener);
  }

  removeEventListener(listener: PlaybackEventListener): void {
    this.off('playback_event', listener);
  }

  dispose(): void {
    this.reset();
    this.engine.removeEventListener(this.onEngineEvent);
    this.removeAllListeners();
  }

  private handleEngineEvent(event: EngineEvent): void {
    switch (event.type) {
      case 'ready':
        if (this.state.status === 'loading' || this.state.status === 'stalled') {
          this.update({ status: 'ready', retryCount: 0, stallStartTime: null, lastError: null });
        }
        break;
      case 'playing':
        if (this.state.status === 'stalled') {
          this.update({ status: 'ready', stallStartTime: null });
        } else if (this.state.stallStartTime !== null) {
          this.update({ stallStartTime: null });
        }
        break;
      case 'stalled':
      case 'ended':
        if (this.isWatched() && this.state.stallStartTime === null) {
          this.update({ stallStartTime: this.timers.now() });
        }
        break;
      case 'error':
        if (this.state.status === 'idle') break;
        this.logger.warn({ message: event.message }, 'Engine reported an error');
        this.update({ lastError: 'ENGINE_ERROR' });
        this.handleFailure(event.message);
        break;
    }
  }

  private startStallCheck(): void {
    if (this.stallCheck) return;
    this.stallCheck = this.timers.setInterval(() => this.checkForStall(), this.checkIntervalMs);
  }

  private stopStallCheck(): void {
    if (this.stallCheck) {
      this.timers.clearInterval(this.stallCheck);
      this.stallCheck = null;
    }
  }

  private isWatched(): boolean {
    const { status } = this.state;
    return status === 'loading' || status === 'ready' || status === 'stalled';
  }

  private checkForStall(): void {
    if (!this.isWatched()) return;

    if (this.engine.isPlaying()) {
      if (this.state.stallStartTime !== null) {
        this.update({ stallStartTime: null });
      }
      return;
    }

    const now = this.timers.now();
    if (this.state.stallStartTime === null) {
      this.update({ stallStartTime: now });
      return;
    }

    if (now - this.state.stallStartTime > this.stallTimeoutMs) {
      this.logger.warn({ stalledForMs: now - this.state.stallStartTime }, 'Playback stalled');
      this.update({ status: 'stalled', lastError: 'STALL_TIMEOUT' });
      this.emitEvent('stall_detected', { reason: 'STALL_TIMEOUT' });
      this.handleFailure('stall timeout');
    }
  }

  /**
   * Retry path shared by stalls and engine errors
   */
  private handleFailure(reason: string): void {
    if (this.state.isRetrying || this.state.status === 'failed') return;

    if (this.state.retryCount >= this.maxRetries) {
      this.stopStallCheck();
      this.update({ status: 'failed', lastError: 'RETRY_LIMIT_REACHED' });
      const details = ErrorFactory.createRecoveryError('RETRY_LIMIT_REACHED', { retries: this.maxRetries, reason });
      this.logger.error({ code: details.code, retries: this.maxRetries }, details.message);
      this.emitEvent('recovery_failed', { error: details.code, reason: details.message });
      return;
    }

    const retryCount = this.state.retryCount + 1;
    const delayMs = Math.pow(2, retryCount - 1) * 1000;
    this.update({ status: 'retrying', retryCount, isRetrying: true });

    if (retryCount === 1) {
      this.pendingRefresh = this.refresh();
    }

    this.logger.warn({ attempt: retryCount, maxRetries: this.maxRetries, delayMs, reason }, 'Scheduling playback retry');
    this.emitEvent('retry_scheduled', { delayMs, reason });

    const generation = this.generation;
    this.retryTimer = this.timers.setTimeout(() => {
      this.retryTimer = null;
      this.restart(generation).catch(error => {
        this.logger.error({ err: error }, 'Playback restart failed');
      });
    }, delayMs);
  }

  private async refresh(): Promise<MediaLocator | null> {
    try {
      return await this.refresher.refreshLocator();
    } catch (error) {
      this.logger.warn({ err: error }, 'Locator refresh failed, keeping the last locator');
      return null;
    }
  }

  private async restart(generation: number): Promise<void> {
    const refreshed = this.pendingRefresh ? await this.pendingRefresh : null;
    this.pendingRefresh = null;
    if (generation !== this.generation) return;

    const locator = refreshed ?? this.state.locator;
    this.update({ status: 'loading', isRetrying: false, stallStartTime: null, locator });
    if (!locator) return;

    await this.engine.reinitialize();
    if (generation !== this.generation) return;
    await this.engine.load(locator);
  }

  private clearRetryTimer(): void {
    if (this.retryTimer) {
      this.timers.clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }

  private update(patch: Partial<ResilienceState>): void {
    const previous = this.state.status;
    this.state = { ...this.state, ...patch };
    if (this.state.status !== previous) {
      this.emitEvent('state_changed', {});
    }
  }

  private emitEvent(type: PlaybackEventType, data: Omit<PlaybackEvent['data'], 'state'>): void {
    const event: PlaybackEvent = { type, timestamp: new Date(this.timers.now()), data: { ...data, state: this.state } };
    this.emit('playback_event', event);
  }
}
