/**
 * Web Infrastructure Exports
 */

export { HTTPServer } from './HTTPServer';
export type { HTTPServerConfig, HTTPServerDependencies, ServerInfo } from './HTTPServer';

export * from './websocket';
export * from './api';
