/**
 * IPC Client for MPV Unix socket communication
 * Implements JSON command/response protocol with mpv
 */

import { Socket } from 'net';
import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import type { IIPCClient, IPCEventListener, MPVCommand, MPVEvent, MPVResponse } from '../../domain/playback';

export interface IPCClientOptions {
  readonly logger: Logger;
  readonly requestTimeoutMs?: number;
  /** mpv creates its socket a moment after it starts */
  readonly connectAttempts?: number;
  readonly retryDelayMs?: number;
}

interface PendingRequest {
  readonly resolve: (response: MPVResponse) => void;
  readonly reject: (error: Error) => void;
  readonly timeout: NodeJS.Timeout;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function toEvent(message: Record<string, unknown>): MPVEvent | null {
  if (typeof message.event !== 'string') return null;
  return {
    event: message.event,
    name: typeof message.name === 'string' ? message.name : undefined,
    data: message.data,
    reason: typeof message.reason === 'string' ? message.reason : undefined
  };
}

function toResponse(message: Record<string, unknown>): MPVResponse | null {
  if (typeof message.request_id !== 'number') return null;
  return {
    data: message.data,
    error: typeof message.error === 'string' ? message.error : 'unknown',
    request_id: message.request_id
  };
}

export class IPCClient extends EventEmitter implements IIPCClient {
  private socket: Socket | null = null;
  private connected = false;
  private requestId = 0;
  private buffer = '';
  private readonly pendingRequests = new Map<number, PendingRequest>();

  private readonly logger: Logger;
  private readonly requestTimeoutMs: number;
  private readonly connectAttempts: number;
  private readonly retryDelayMs: number;

  constructor(options: IPCClientOptions) {
    super();
    this.logger = options.logger.child({ component: 'IPCClient' });
    this.requestTimeoutMs = options.requestTimeoutMs ?? 5000;
    this.connectAttempts = options.connectAttempts ?? 5;
    this.retryDelayMs = options.retryDelayMs ?? 200;
  }

  /**
   * Connect to MPV via Unix socket, retrying while the socket appears
   */
  async connect(socketPath: string): Promise<void> {
    if (this.connected) {
      return;
    }

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.connectAttempts; attempt++) {
      try {
        await this.openSocket(socketPath);
        return;
      } catch (error) {
        lastError = error;
        this.logger.debug({ attempt, err: error }, 'IPC connect attempt failed');
        if (attempt < this.connectAttempts) {
          await new Promise(resolve => setTimeout(resolve, this.retryDelayMs * Math.pow(2, attempt - 1)));
        }
      }
    }

    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    throw new Error(`Could not connect to mpv socket ${socketPath}: ${reason}`);
  }

  async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }

    this.connected = false;
    this.socket = null;
    this.rejectPendingRequests(new Error('Disconnecting'));

    return new Promise(resolve => {
      socket.end(() => resolve());
    });
  }

  /**
   * Send command to MPV and get response
   */
  async sendCommand(command: MPVCommand): Promise<MPVResponse> {
    const socket = this.socket;
    if (!this.connected || !socket) {
      throw new Error('Not connected to MPV');
    }

    const requestId = command.request_id ?? ++this.requestId;
    const payload = JSON.stringify({ command: command.command, request_id: requestId }) + '\n';

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pendingRequests.delete(requestId);
        reject(new Error(`Request timeout for command: ${command.command.join(' ')}`));
      }, this.requestTimeoutMs);

      this.pendingRequests.set(requestId, { resolve, reject, timeout });

      socket.write(payload, error => {
        if (error) {
          clearTimeout(timeout);
          this.pendingRequests.delete(requestId);
          reject(error);
        }
      });
    });
  }

  isConnected(): boolean {
    return this.connected && this.socket !== null && !this.socket.destroyed;
  }

  /**
   * Listen for unsolicited mpv events
   */
  addEventListener(listener: IPCEventListener): void {
    this.on('mpv_event', listener);
  }

  removeEventListener(listener: IPCEventListener): void {
    this.off('mpv_event', listener);
  }

  private openSocket(socketPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new Socket();
      let opened = false;

      const connectionTimeout = setTimeout(() => {
        socket.destroy();
        reject(new Error(`Connection timeout to socket: ${socketPath}`));
      }, this.requestTimeoutMs);

      socket.connect(socketPath, () => {
        clearTimeout(connectionTimeout);
        opened = true;
        this.socket = socket;
        this.connected = true;
        this.buffer = '';
        resolve();
      });

      socket.on('error', error => {
        clearTimeout(connectionTimeout);
        if (!opened) {
          reject(error);
          return;
        }
        this.logger.warn({ err: error }, 'mpv socket error');
      });

      socket.on('close', () => {
        if (this.socket !== socket) return;
        this.connected = false;
        this.socket = null;
        this.rejectPendingRequests(new Error('Socket closed'));
        this.emit('disconnected');
      });

      socket.on('data', (data: Buffer) => {
        this.handleIncomingData(data);
      });
    });
  }

  /**
   * Split the stream into JSON lines; keep a trailing partial line for later
   */
  private handleIncomingData(data: Buffer): void {
    this.buffer += data.toString();
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    for (const line of lines) {
      if (!line.trim()) continue;

      let message: unknown;
      try {
        message = JSON.parse(line);
      } catch {
        this.logger.warn({ line: line.slice(0, 200) }, 'Invalid JSON from mpv');
        continue;
      }
      if (!isObject(message)) continue;

      const event = toEvent(message);
      if (event) {
        this.emit('mpv_event', event);
        continue;
      }

      const response = toResponse(message);
      const pending = response ? this.pendingRequests.get(response.request_id) : undefined;
      if (response && pending) {
        clearTimeout(pending.timeout);
        this.pendingRequests.delete(response.request_id);
        pending.resolve(response);
      }
    }
  }

  private rejectPendingRequests(error: Error): void {
    for (const pending of this.pendingRequests.values()) {
      clearTimeout(pending.timeout);
      pending.reject(error);
    }
    this.pendingRequests.clear();
  }
}
