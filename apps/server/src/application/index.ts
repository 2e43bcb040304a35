/**
 * Application layer exports
 * Playback session, recovery and the policies around them
 */

export { PlaybackSession } from './PlaybackSession';
export type {
  IPlaybackSession,
  PlaybackSessionOptions,
  SessionFailure,
  SessionSettings,
  SessionSnapshot,
  SessionState,
  SessionStatus
} from './PlaybackSession';
export {
  PlaybackResilienceController,
  STALL_TIMEOUT_MS,
  STALL_CHECK_INTERVAL_MS,
  MAX_RETRIES
} from './PlaybackResilienceController';
export type { ILocatorRefresher, IPlaybackResilienceController, ResilienceOptions } from './PlaybackResilienceController';
export { ResumeStore, RESUME_WINDOW_MS, isResumeRecord } from './ResumeStore';
export type { IResumeStore, ResumePolicy } from './ResumeStore';
export { SourceScheduler, DEFAULT_SOURCE_URL, weekdayOf } from './SourceScheduler';
export type { ISourceScheduler } from './SourceScheduler';
export { InitialSeekPolicy } from './InitialSeekPolicy';
export type { SeekDecision, SeekReason, SeekSettings } from './InitialSeekPolicy';
export { systemTimers } from './timers';
export type { Timers } from './timers';
