/**
 * Core types for playback and its recovery
 */

import type { MediaLocator, RecoveryErrorKind } from '@stream-keeper/shared';

/**
 * Resilience controller states
 */
export type ResilienceStatus = 'idle' | 'loading' | 'ready' | 'stalled' | 'retrying' | 'failed';

export interface ResilienceState {
  readonly status: ResilienceStatus;
  readonly retryCount: number;
  readonly stallStartTime: number | null;
  readonly isRetrying: boolean;
  readonly locator: MediaLocator | null;
  readonly lastError: RecoveryErrorKind | null;
}

/**
 * Last known position for a source. Single-use.
 */
export interface ResumeRecord {
  readonly baseLocator: string;
  readonly positionMs: number;
  readonly savedAt: number;
}

export type ResumeRejection = 'DISABLED' | 'NO_RECORD' | 'DIFFERENT_SOURCE' | 'WINDOW_EXPIRED';

/**
 * What the engine reports back. The controller reacts; it never asks the
 * engine to throw.
 */
export type EngineEvent =
  | { readonly type: 'ready'; readonly durationMs: number | null }
  | { readonly type: 'playing' }
  | { readonly type: 'stalled' }
  | { readonly type: 'ended' }
  | { readonly type: 'error'; readonly message: string };

export type EngineEventListener = (event: EngineEvent) => void;

/**
 * mpv launch configuration
 */
export interface MpvOptions {
  readonly socketPath: string;
  readonly extraArgs?: readonly string[];
}

/**
 * yt-dlp invocation for a single URL lookup
 */
export interface YtDlpOptions {
  readonly format: string;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
}

/**
 * MPV IPC command structure
 */
export interface MPVCommand {
  readonly command: ReadonlyArray<string | number>;
  readonly request_id?: number;
}

/**
 * MPV IPC response structure
 */
export interface MPVResponse {
  readonly data?: unknown;
  readonly error: string;
  readonly request_id: number;
}

/**
 * Unsolicited IPC message, e.g. `{"event":"playback-restart"}`
 */
export interface MPVEvent {
  readonly event: string;
  readonly name?: string;
  readonly data?: unknown;
  readonly reason?: string;
}

export type IPCEventListener = (event: MPVEvent) => void;

/**
 * Events published to status listeners
 */
export type PlaybackEventType =
  | 'state_changed'
  | 'resolution_started'
  | 'resolution_succeeded'
  | 'resolution_failed'
  | 'stall_detected'
  | 'retry_scheduled'
  | 'recovery_failed'
  | 'resume_applied'
  | 'initial_seek_applied'
  | 'source_changed'
  | 'default_content';

export interface PlaybackEvent {
  readonly type: PlaybackEventType;
  readonly timestamp: Date;
  readonly data: {
    readonly state?: ResilienceState;
    readonly source?: string;
    readonly quality?: string;
    readonly positionMs?: number;
    readonly delayMs?: number;
    readonly reason?: string;
    readonly error?: string;
  };
}

export type PlaybackEventListener = (event: PlaybackEvent) => void;
