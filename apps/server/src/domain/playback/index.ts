/**
 * Playback domain exports
 */

export type {
  ResilienceStatus,
  ResilienceState,
  ResumeRecord,
  ResumeRejection,
  EngineEvent,
  EngineEventListener,
  MpvOptions,
  YtDlpOptions,
  MPVCommand,
  MPVResponse,
  MPVEvent,
  IPCEventListener,
  PlaybackEventType,
  PlaybackEvent,
  PlaybackEventListener
} from './types';

export type {
  ProcessError,
  EngineError,
  PlaybackErrorDetails
} from './errors';

export { PlaybackErrorFactory } from './errors';

export type {
  IPlaybackEngine,
  IIPCClient,
  IProcessManager
} from './interfaces';
