/**
 * ProcessManager for external process lifecycle management
 * Handles mpv and yt-dlp process spawning, monitoring, and cleanup
 */

import { spawn, type ChildProcess } from 'child_process';
import type { Logger } from 'pino';
import type { Result } from '@stream-keeper/shared';
import type { IProcessManager, MpvOptions, ProcessError, YtDlpOptions } from '../../domain/playback';

export type Spawner = (command: string, args: readonly string[]) => ChildProcess;

export type MpvExitListener = (code: number | null) => void;

export interface ProcessManagerOptions {
  readonly logger: Logger;
  readonly spawner?: Spawner;
  /** How long mpv must stay up before it counts as started */
  readonly mpvStartupMs?: number;
  readonly stopGraceMs?: number;
}

const defaultSpawner: Spawner = (command, args) =>
  spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'], detached: false });

export class ProcessManager implements IProcessManager {
  private mpvProcess: ChildProcess | null = null;
  private mpvOptions: MpvOptions | null = null;
  private readonly runningYtDlpProcesses = new Set<ChildProcess>();
  private readonly exitListeners = new Set<MpvExitListener>();

  private readonly logger: Logger;
  private readonly spawner: Spawner;
  private readonly mpvStartupMs: number;
  private readonly stopGraceMs: number;

  constructor(options: ProcessManagerOptions) {
    this.logger = options.logger.child({ component: 'ProcessManager' });
    this.spawner = options.spawner ?? defaultSpawner;
    this.mpvStartupMs = options.mpvStartupMs ?? 1000;
    this.stopGraceMs = options.stopGraceMs ?? 5000;
  }

  /**
   * Start mpv idle, listening on its IPC socket. Only one instance runs.
   */
  async startMpv(options: MpvOptions): Promise<Result<ChildProcess, ProcessError>> {
    if (this.mpvProcess) {
      await this.stopMpv();
    }

    const args = [
      '--idle=yes',
      '--no-terminal',
      '--really-quiet',
      '--fullscreen',
      '--keep-open=no',
      `--input-ipc-server=${options.socketPath}`,
      ...(options.extraArgs ?? [])
    ];

    const mpvProcess = this.spawner('mpv', args);

    return new Promise(resolve => {
      let settled = false;

      const settle = (result: Result<ChildProcess, ProcessError>): void => {
        if (settled) return;
        settled = true;
        clearTimeout(startupTimer);
        resolve(result);
      };

      mpvProcess.once('error', (error: NodeJS.ErrnoException) => {
        this.logger.error({ err: error }, 'mpv failed to start');
        settle({ success: false, error: error.code === 'ENOENT' ? 'DEPENDENCY_MISSING' : 'PROCESS_START_FAILED' });
      });

      mpvProcess.once('exit', code => {
        if (!settled) {
          this.logger.error({ code }, 'mpv exited during startup');
          settle({ success: false, error: 'PROCESS_START_FAILED' });
        }
      });

      const startupTimer = setTimeout(() => {
        if (mpvProcess.exitCode !== null || mpvProcess.killed) {
          settle({ success: false, error: 'PROCESS_START_FAILED' });
          return;
        }
        this.mpvProcess = mpvProcess;
        this.mpvOptions = options;
        this.watchMpv(mpvProcess);
        settle({ success: true, value: mpvProcess });
      }, this.mpvStartupMs);
    });
  }

  async stopMpv(): Promise<Result<void, ProcessError>> {
    const mpvProcess = this.mpvProcess;
    if (!mpvProcess) {
      return { success: true, value: undefined };
    }
    this.mpvProcess = null;

    if (mpvProcess.exitCode !== null) {
      return { success: true, value: undefined };
    }

    return new Promise(resolve => {
      const forceKill = setTimeout(() => {
        if (mpvProcess.exitCode === null) {
          mpvProcess.kill('SIGKILL');
        }
      }, this.stopGraceMs);

      mpvProcess.once('exit', () => {
        clearTimeout(forceKill);
        resolve({ success: true, value: undefined });
      });
      mpvProcess.kill('SIGTERM');
    });
  }

  async restartMpv(): Promise<Result<ChildProcess, ProcessError>> {
    const options = this.mpvOptions;
    if (!options) {
      return { success: false, error: 'PROCESS_START_FAILED' };
    }
    await this.stopMpv();
    return this.startMpv(options);
  }

  isMpvRunning(): boolean {
    return this.mpvProcess !== null && this.mpvProcess.exitCode === null;
  }

  /**
   * Notified when a started mpv exits on its own
   */
  onMpvExit(listener: MpvExitListener): void {
    this.exitListeners.add(listener);
  }

  /**
   * Ask yt-dlp for the direct URL of one format
   */
  async runYtDlp(url: string, options: YtDlpOptions): Promise<Result<string, ProcessError>> {
    if (options.signal?.aborted) {
      return { success: false, error: 'PROCESS_ABORTED' };
    }

    const args = ['-g', '-f', options.format, '--no-playlist', '--no-warnings', url];
    const ytDlpProcess = this.spawner('yt-dlp', args);
    this.runningYtDlpProcesses.add(ytDlpProcess);

    return new Promise(resolve => {
      let settled = false;
      let stdout = '';
      let stderr = '';

      const onAbort = (): void => {
        ytDlpProcess.kill('SIGKILL');
        settle({ success: false, error: 'PROCESS_ABORTED' });
      };

      const timeout = setTimeout(() => {
        ytDlpProcess.kill('SIGKILL');
        settle({ success: false, error: 'PROCESS_TIMEOUT' });
      }, options.timeoutMs);

      const settle = (result: Result<string, ProcessError>): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        options.signal?.removeEventListener('abort', onAbort);
        this.runningYtDlpProcesses.delete(ytDlpProcess);
        resolve(result);
      };

      options.signal?.addEventListener('abort', onAbort, { once: true });

      ytDlpProcess.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      ytDlpProcess.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      ytDlpProcess.once('error', (error: NodeJS.ErrnoException) => {
        this.logger.warn({ err: error }, 'yt-dlp failed to start');
        settle({ success: false, error: error.code === 'ENOENT' ? 'DEPENDENCY_MISSING' : 'PROCESS_START_FAILED' });
      });

      ytDlpProcess.once('close', code => {
        const streamUrl = stdout.split('\n').map(line => line.trim()).find(line => line.startsWith('http'));
        if (code === 0 && streamUrl) {
          settle({ success: true, value: streamUrl });
          return;
        }
        this.logger.warn({ code, stderr: stderr.trim().slice(0, 500) }, 'yt-dlp produced no URL');
        settle({ success: false, error: 'PROCESS_CRASHED' });
      });
    });
  }

  /**
   * Stop mpv and kill any yt-dlp still running
   */
  async cleanup(): Promise<void> {
    for (const child of this.runningYtDlpProcesses) {
      if (child.exitCode === null) {
        child.kill('SIGKILL');
      }
    }
    this.runningYtDlpProcesses.clear();
    this.exitListeners.clear();
    await this.stopMpv();
  }

  private watchMpv(mpvProcess: ChildProcess): void {
    mpvProcess.stderr?.on('data', (chunk: Buffer) => {
      this.logger.debug({ stderr: chunk.toString().trim() }, 'mpv stderr');
    });

    mpvProcess.once('exit', (code, signal) => {
      this.logger.info({ code, signal }, 'mpv exited');
      if (this.mpvProcess !== mpvProcess) return;
      this.mpvProcess = null;
      for (const listener of this.exitListeners) {
        listener(code);
      }
    });
  }
}
