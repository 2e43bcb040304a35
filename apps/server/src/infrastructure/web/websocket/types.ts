/**
 * WebSocket Types and Interfaces
 *
 * Messages pushed on the `/ws` status feed
 */

import type { PlaybackEvent, PlaybackEventType } from '../../../domain/playback';
import type { SessionSnapshot } from '../../../application';

/**
 * A connected feed client, independent of the socket library
 */
export interface FeedClient {
  send(message: string): void;
  ping(): void;
  terminate(): void;
  isOpen(): boolean;
}

export interface FeedConnection {
  readonly id: string;
  readonly client: FeedClient;
  readonly connectedAt: Date;
  isAlive: boolean;
}

export type FeedMessage =
  | {
      readonly type: 'initial_state';
      readonly sequence: number;
      readonly timestamp: string;
      readonly data: SessionSnapshot;
    }
  | {
      readonly type: PlaybackEventType;
      readonly sequence: number;
      readonly timestamp: string;
      readonly data: PlaybackEvent['data'];
    };

export interface WebSocketServerConfig {
  readonly heartbeatIntervalMs: number;
  readonly maxConnections: number;
}

export const DEFAULT_WEBSOCKET_CONFIG: WebSocketServerConfig = {
  heartbeatIntervalMs: 30_000,
  maxConnections: 32
};
