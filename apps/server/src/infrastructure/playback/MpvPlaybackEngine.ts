/**
 * Playback engine backed by mpv, driven over its JSON IPC socket
 *
 * mpv events are translated into engine events:
 * - file-loaded → ready (with duration when mpv knows it)
 * - playback-restart, paused-for-cache=false → playing
 * - paused-for-cache=true → stalled
 * - end-file eof → ended, end-file error → error
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { LocatorCodec, type MediaLocator, type Result } from '@stream-keeper/shared';
import {
  PlaybackErrorFactory,
  type EngineError,
  type EngineEvent,
  type EngineEventListener,
  type IIPCClient,
  type IPlaybackEngine,
  type IProcessManager,
  type MPVCommand,
  type MPVEvent,
  type MPVResponse
} from '../../domain/playback';

const CACHE_OBSERVER_ID = 1;

export interface MpvPlaybackEngineOptions {
  readonly ipcClient: IIPCClient;
  readonly processManager: IProcessManager;
  readonly logger: Logger;
  readonly socketPath: string;
  readonly extraArgs?: readonly string[];
}

export class MpvPlaybackEngine extends EventEmitter implements IPlaybackEngine {
  private readonly ipcClient: IIPCClient;
  private readonly processManager: IProcessManager;
  private readonly logger: Logger;
  private readonly socketPath: string;
  private readonly extraArgs: readonly string[];
  private playing = false;

  constructor(options: MpvPlaybackEngineOptions) {
    super();
    this.ipcClient = options.ipcClient;
    this.processManager = options.processManager;
    this.logger = options.logger.child({ component: 'MpvPlaybackEngine' });
    this.socketPath = options.socketPath;
    this.extraArgs = options.extraArgs ?? [];

    this.ipcClient.addEventListener(event => this.handleMpvEvent(event));
    this.processManager.onMpvExit(code => {
      this.playing = false;
      this.emitEngineEvent({ type: 'error', message: `mpv exited with code ${code ?? 'unknown'}` });
    });
  }

  /**
   * Open a locator. A video-only locator plays muted.
   */
  async load(locator: MediaLocator): Promise<void> {
    this.playing = false;

    const ready = await this.ensureReady();
    if (!ready.success) {
      this.reportEngineError(ready.error);
      return;
    }

    await this.command(['set_property', 'mute', locator.kind === 'video_only' ? 'yes' : 'no']);

    const loaded = await this.command(['loadfile', LocatorCodec.playableUrl(locator), 'replace']);
    if (!loaded.success) {
      this.reportEngineError(loaded.error);
      return;
    }
    if (loaded.value.error !== 'success') {
      this.logger.warn({ error: loaded.value.error }, 'mpv refused loadfile');
      this.reportEngineError('LOAD_FAILED');
    }
  }

  async seek(positionMs: number): Promise<void> {
    const result = await this.command(['seek', positionMs / 1000, 'absolute']);
    if (!result.success || result.value.error !== 'success') {
      this.logger.warn({ positionMs }, 'Seek was not accepted');
    }
  }

  /**
   * Restart mpv and reconnect. Failures surface as an error event.
   */
  async reinitialize(): Promise<void> {
    this.playing = false;
    if (this.ipcClient.isConnected()) {
      await this.ipcClient.disconnect();
    }

    const restarted = this.processManager.isMpvRunning()
      ? await this.processManager.restartMpv()
      : await this.processManager.startMpv({ socketPath: this.socketPath, extraArgs: this.extraArgs });
    if (!restarted.success) {
      const details = PlaybackErrorFactory.createProcessError(restarted.error);
      this.logger.error({ code: details.code }, details.message);
      this.emitEngineEvent({ type: 'error', message: details.message });
      return;
    }

    const connected = await this.connect();
    if (!connected.success) {
      this.reportEngineError(connected.error);
    }
  }

  async getPositionMs(): Promise<number | null> {
    const result = await this.command(['get_property', 'time-pos']);
    if (result.success && result.value.error === 'success' && typeof result.value.data === 'number') {
      return Math.round(result.value.data * 1000);
    }
    return null;
  }

  isPlaying(): boolean {
    return this.playing;
  }

  async stop(): Promise<void> {
    this.playing = false;
    if (!this.ipcClient.isConnected()) {
      return;
    }
    await this.command(['stop']);
  }

  addEventListener(listener: EngineEventListener): void {
    this.on('engine_event', listener);
  }

  removeEventListener(listener: EngineEventListener): void {
    this.off('engine_event', listener);
  }

  private async ensureReady(): Promise<Result<void, EngineError>> {
    if (this.ipcClient.isConnected()) {
      return { success: true, value: undefined };
    }

    if (!this.processManager.isMpvRunning()) {
      const started = await this.processManager.startMpv({ socketPath: this.socketPath, extraArgs: this.extraArgs });
      if (!started.success) {
        const details = PlaybackErrorFactory.createProcessError(started.error);
        this.logger.error({ code: details.code }, details.message);
        return { success: false, error: 'ENGINE_NOT_RUNNING' };
      }
    }

    return this.connect();
  }

  private async connect(): Promise<Result<void, EngineError>> {
    try {
      await this.ipcClient.connect(this.socketPath);
    } catch (error) {
      this.logger.error({ err: error }, 'Could not connect to mpv');
      return { success: false, error: 'IPC_COMMUNICATION_FAILED' };
    }

    await this.command(['observe_property', CACHE_OBSERVER_ID, 'paused-for-cache']);
    return { success: true, value: undefined };
  }

  private async command(command: MPVCommand['command']): Promise<Result<MPVResponse, EngineError>> {
    try {
      return { success: true, value: await this.ipcClient.sendCommand({ command }) };
    } catch (error) {
      this.logger.warn({ err: error, command: command[0] }, 'mpv command failed');
      return { success: false, error: 'IPC_COMMUNICATION_FAILED' };
    }
  }

  private handleMpvEvent(event: MPVEvent): void {
    switch (event.event) {
      case 'file-loaded':
        this.announceReady().catch(error => {
          this.logger.error({ err: error }, 'Failed to read duration');
        });
        break;
      case 'playback-restart':
        this.markPlaying();
        break;
      case 'property-change':
        if (event.name === 'paused-for-cache') {
          if (event.data === true) {
            this.playing = false;
            this.emitEngineEvent({ type: 'stalled' });
          } else if (event.data === false) {
            this.markPlaying();
          }
        }
        break;
      case 'end-file':
        this.playing = false;
        if (event.reason === 'eof') {
          this.emitEngineEvent({ type: 'ended' });
        } else if (event.reason === 'error') {
          this.emitEngineEvent({ type: 'error', message: 'mpv could not play the stream' });
        }
        break;
      default:
        break;
    }
  }

  private async announceReady(): Promise<void> {
    const result = await this.command(['get_property', 'duration']);
    const seconds = result.success && typeof result.value.data === 'number' ? result.value.data : null;
    this.emitEngineEvent({ type: 'ready', durationMs: seconds === null ? null : Math.round(seconds * 1000) });
  }

  private markPlaying(): void {
    if (this.playing) return;
    this.playing = true;
    this.emitEngineEvent({ type: 'playing' });
  }

  private reportEngineError(error: EngineError): void {
    const details = PlaybackErrorFactory.createEngineError(error);
    this.logger.error({ code: details.code }, details.message);
    this.emitEngineEvent({ type: 'error', message: details.message });
  }

  private emitEngineEvent(event: EngineEvent): void {
    this.emit('engine_event', event);
  }
}
