/**
 * WebSocket Infrastructure Exports
 */

export { WebSocketServer } from './WebSocketServer';
export { DEFAULT_WEBSOCKET_CONFIG } from './types';
export type { FeedClient, FeedConnection, FeedMessage, WebSocketServerConfig } from './types';
