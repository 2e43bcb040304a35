/**
 * HTTP Server Infrastructure
 *
 * Fastify server carrying the control API, the `/ws` status feed and a
 * health check. Shares the service's pino logger.
 */

import type { IncomingMessage, Server, ServerResponse } from 'http';
import { networkInterfaces } from 'os';
import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import websocket from '@fastify/websocket';
import type { Logger } from 'pino';
import { registerAPIRoutes, type APIDependencies } from './api';
import { WebSocketServer, type WebSocketServerConfig } from './websocket';

export interface ServerInfo {
  port: number;
  host: string;
  addresses: string[];
  uptime: number;
}

export interface HTTPServerConfig {
  port: number;
  host: string;
  websocket?: WebSocketServerConfig;
}

export type HTTPServerDependencies = Omit<APIDependencies, 'logger'>;

// Clients only answer pings on the feed
const MAX_WS_PAYLOAD = 64 * 1024;

export class HTTPServer {
  private readonly fastify: FastifyInstance;
  private readonly logger: Logger;
  private webSocketServer: WebSocketServer | null = null;
  private startTime: Date | null = null;
  private stopped = false;

  constructor(private readonly config: HTTPServerConfig, logger: Logger) {
    this.logger = logger.child({ component: 'HTTPServer' });
    this.fastify = Fastify<Server, IncomingMessage, ServerResponse, FastifyBaseLogger>({
      logger,
      trustProxy: false
    });
  }

  /**
   * Register plugins, the API, the status feed and the health check
   */
  async initialize(dependencies: HTTPServerDependencies): Promise<void> {
    await this.fastify.register(cors, {
      origin: true,
      credentials: false
    });

    await this.fastify.register(websocket, {
      options: { maxPayload: MAX_WS_PAYLOAD }
    });

    await registerAPIRoutes(this.fastify, { ...dependencies, logger: this.logger });

    this.webSocketServer = new WebSocketServer(dependencies.session, this.logger, this.config.websocket);
    await this.webSocketServer.initialize(this.fastify);

    this.fastify.get('/health', async () => ({
      status: 'healthy',
      server: this.getServerInfo(),
      timestamp: new Date().toISOString()
    }));

    this.fastify.setNotFoundHandler(async (request, reply) => {
      reply.code(404);
      return {
        success: false,
        error: { code: 'NOT_FOUND', message: `Route ${request.method} ${request.url} not found` },
        timestamp: new Date().toISOString()
      };
    });

    this.logger.debug('HTTP server initialized');
  }

  async start(): Promise<void> {
    await this.fastify.listen({ port: this.config.port, host: this.config.host });
    this.startTime = new Date();
    this.logger.info({ host: this.config.host, port: this.config.port }, 'HTTP server listening');
  }

  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    if (this.webSocketServer) {
      await this.webSocketServer.shutdown();
    }
    await this.fastify.close();
    this.logger.info('HTTP server stopped');
  }

  getServerInfo(): ServerInfo {
    return {
      port: this.config.port,
      host: this.config.host,
      addresses: this.getNetworkAddresses(),
      uptime: this.startTime ? Date.now() - this.startTime.getTime() : 0
    };
  }

  getFastifyInstance(): FastifyInstance {
    return this.fastify;
  }

  private getNetworkAddresses(): string[] {
    const addresses: string[] = [];
    for (const entries of Object.values(networkInterfaces())) {
      for (const entry of entries ?? []) {
        if (!entry.internal && entry.family === 'IPv4') {
          addresses.push(entry.address);
        }
      }
    }
    return addresses;
  }
}
