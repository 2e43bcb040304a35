/**
 * Ports for playback: the engine, and the process and IPC layers behind mpv
 */

import type { ChildProcess } from 'child_process';
import type { MediaLocator, Result } from '@stream-keeper/shared';
import type {
  EngineEventListener,
  IPCEventListener,
  MPVCommand,
  MPVResponse,
  MpvOptions,
  YtDlpOptions
} from './types';
import type { ProcessError } from './errors';

/**
 * Media playback engine. Consumed only through these calls and the events
 * it emits.
 */
export interface IPlaybackEngine {
  /**
   * Open a locator. Readiness arrives later as a `ready` event.
   */
  load(locator: MediaLocator): Promise<void>;

  seek(positionMs: number): Promise<void>;

  /**
   * Tear down and recreate the engine against its render surface
   */
  reinitialize(): Promise<void>;

  getPositionMs(): Promise<number | null>;

  /**
   * Last known playing flag. Synchronous so the stall check can poll it.
   */
  isPlaying(): boolean;

  stop(): Promise<void>;

  addEventListener(listener: EngineEventListener): void;

  removeEventListener(listener: EngineEventListener): void;
}

/**
 * IPC client interface for MPV communication
 */
export interface IIPCClient {
  connect(socketPath: string): Promise<void>;

  disconnect(): Promise<void>;

  /**
   * Send command to MPV and wait for the matching response
   */
  sendCommand(command: MPVCommand): Promise<MPVResponse>;

  isConnected(): boolean;

  addEventListener(listener: IPCEventListener): void;

  removeEventListener(listener: IPCEventListener): void;
}

/**
 * Process manager interface for external process lifecycle
 */
export interface IProcessManager {
  startMpv(options: MpvOptions): Promise<Result<ChildProcess, ProcessError>>;

  stopMpv(): Promise<Result<void, ProcessError>>;

  restartMpv(): Promise<Result<ChildProcess, ProcessError>>;

  /**
   * Ask yt-dlp for the direct URL of one format
   */
  runYtDlp(url: string, options: YtDlpOptions): Promise<Result<string, ProcessError>>;

  isMpvRunning(): boolean;

  /**
   * Notified when a started mpv exits on its own
   */
  onMpvExit(listener: (code: number | null) => void): void;

  cleanup(): Promise<void>;
}
