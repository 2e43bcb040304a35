/**
 * Playback infrastructure exports
 */

export { IPCClient } from './IPCClient';
export type { IPCClientOptions } from './IPCClient';
export { ProcessManager } from './ProcessManager';
export type { ProcessManagerOptions, Spawner, MpvExitListener } from './ProcessManager';
export { MpvPlaybackEngine } from './MpvPlaybackEngine';
export type { MpvPlaybackEngineOptions } from './MpvPlaybackEngine';
