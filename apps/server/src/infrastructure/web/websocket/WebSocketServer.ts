/**
 * WebSocket Server Infrastructure
 *
 * Pushes session and recovery events to clients on `/ws`. A new client
 * first receives the current snapshot, then every event as it happens.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { SocketStream } from '@fastify/websocket';
import type { Logger } from 'pino';
import type { IPlaybackSession } from '../../../application';
import { systemTimers, type Timers } from '../../../application/timers';
import type { PlaybackEvent } from '../../../domain/playback';
import {
  DEFAULT_WEBSOCKET_CONFIG,
  type FeedClient,
  type FeedConnection,
  type FeedMessage,
  type WebSocketServerConfig
} from './types';

// ws readyState
const OPEN = 1;

export class WebSocketServer {
  private readonly connections = new Map<string, FeedConnection>();
  private readonly logger: Logger;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private sequence = 0;
  private nextClientId = 0;
  private readonly onPlaybackEvent = (event: PlaybackEvent): void => this.broadcastEvent(event);

  constructor(
    private readonly session: IPlaybackSession,
    logger: Logger,
    private readonly config: WebSocketServerConfig = DEFAULT_WEBSOCKET_CONFIG,
    private readonly timers: Timers = systemTimers
  ) {
    this.logger = logger.child({ component: 'WebSocketServer' });
  }

  /**
   * Register `/ws` and start following the session.
   * The websocket plugin must already be registered.
   */
  async initialize(fastify: FastifyInstance): Promise<void> {
    await fastify.register(async (instance) => {
      instance.get('/ws', { websocket: true }, (connection: SocketStream, request: FastifyRequest) => {
        this.handleConnection(connection, request);
      });
    });
    this.start();
  }

  start(): void {
    if (this.heartbeatTimer) return;
    this.session.addEventListener(this.onPlaybackEvent);
    this.heartbeatTimer = this.timers.setInterval(() => this.performHeartbeatCheck(), this.config.heartbeatIntervalMs);
  }

  /**
   * Track a client and send it the current snapshot. Null when full.
   */
  attach(client: FeedClient): string | null {
    if (this.connections.size >= this.config.maxConnections) {
      this.logger.warn({ maxConnections: this.config.maxConnections }, 'Feed connection rejected');
      return null;
    }

    const id = `client_${++this.nextClientId}`;
    this.connections.set(id, { id, client, connectedAt: new Date(this.timers.now()), isAlive: true });
    this.send(id, {
      type: 'initial_state',
      sequence: this.sequence,
      timestamp: new Date(this.timers.now()).toISOString(),
      data: this.session.getSnapshot()
    });
    return id;
  }

  detach(id: string): void {
    this.connections.delete(id);
  }

  /**
   * A pong arrived
   */
  markAlive(id: string): void {
    const connection = this.connections.get(id);
    if (connection) {
      connection.isAlive = true;
    }
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  broadcast(message: FeedMessage): void {
    for (const id of this.connections.keys()) {
      this.send(id, message);
    }
  }

  async shutdown(): Promise<void> {
    if (this.heartbeatTimer) {
      this.timers.clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    this.session.removeEventListener(this.onPlaybackEvent);
    for (const connection of this.connections.values()) {
      connection.client.terminate();
    }
    this.connections.clear();
  }

  private handleConnection(connection: SocketStream, request: FastifyRequest): void {
    const socket = connection.socket;
    const id = this.attach({
      send: message => socket.send(message),
      ping: () => socket.ping(),
      terminate: () => socket.terminate(),
      isOpen: () => socket.readyState === OPEN
    });

    if (id === null) {
      socket.close(1013, 'Server overloaded');
      return;
    }

    this.logger.info({ clientId: id, ip: request.ip }, 'Feed client connected');
    socket.on('pong', () => this.markAlive(id));
    socket.on('close', () => {
      this.logger.info({ clientId: id }, 'Feed client disconnected');
      this.detach(id);
    });
    socket.on('error', error => {
      this.logger.warn({ clientId: id, err: error }, 'Feed socket error');
      this.detach(id);
    });
  }

  private broadcastEvent(event: PlaybackEvent): void {
    this.broadcast({
      type: event.type,
      sequence: ++this.sequence,
      timestamp: event.timestamp.toISOString(),
      data: event.data
    });
  }

  private send(id: string, message: FeedMessage): void {
    const connection = this.connections.get(id);
    if (!connection || !connection.client.isOpen()) return;

    try {
      connection.client.send(JSON.stringify(message));
    } catch (error) {
      this.logger.warn({ clientId: id, err: error }, 'Failed to send to feed client');
      this.connections.delete(id);
    }
  }

  /**
   * Clients that missed the previous ping are dropped
   */
  private performHeartbeatCheck(): void {
    for (const connection of [...this.connections.values()]) {
      if (!connection.isAlive) {
        this.logger.info({ clientId: connection.id }, 'Terminating unresponsive feed client');
        connection.client.terminate();
        this.connections.delete(connection.id);
        continue;
      }
      connection.isAlive = false;
      connection.client.ping();
    }
  }
}
