/**
 * Error types for playback engines and their external processes
 */

export type ProcessError =
  | 'PROCESS_START_FAILED'
  | 'PROCESS_TIMEOUT'
  | 'PROCESS_ABORTED'
  | 'DEPENDENCY_MISSING'
  | 'PROCESS_CRASHED';

export type EngineError =
  | 'ENGINE_NOT_RUNNING'
  | 'IPC_COMMUNICATION_FAILED'
  | 'LOAD_FAILED';

export interface PlaybackErrorDetails {
  readonly code: string;
  readonly message: string;
  readonly context?: Record<string, unknown>;
  readonly suggestion?: string;
}

/**
 * Error factory following the shared package's pattern
 */
export class PlaybackErrorFactory {
  static createProcessError(error: ProcessError, context?: Record<string, unknown>): PlaybackErrorDetails {
    const messages: Record<ProcessError, string> = {
      PROCESS_START_FAILED: 'Failed to start external process',
      PROCESS_TIMEOUT: 'External process timed out',
      PROCESS_ABORTED: 'External process was cancelled',
      DEPENDENCY_MISSING: 'Required external dependency is missing',
      PROCESS_CRASHED: 'External process exited unexpectedly'
    };

    const suggestions: Record<ProcessError, string> = {
      PROCESS_START_FAILED: 'Check system resources and try again',
      PROCESS_TIMEOUT: 'The operation will be retried automatically',
      PROCESS_ABORTED: 'A newer request superseded this one',
      DEPENDENCY_MISSING: 'Install the required dependencies (mpv, yt-dlp)',
      PROCESS_CRASHED: 'The process will be restarted automatically'
    };

    return { code: error, message: messages[error], context, suggestion: suggestions[error] };
  }

  static createEngineError(error: EngineError, context?: Record<string, unknown>): PlaybackErrorDetails {
    const messages: Record<EngineError, string> = {
      ENGINE_NOT_RUNNING: 'The media player is not running',
      IPC_COMMUNICATION_FAILED: 'Failed to communicate with the media player',
      LOAD_FAILED: 'The media player could not open the stream'
    };

    const suggestions: Record<EngineError, string> = {
      ENGINE_NOT_RUNNING: 'The media player will be restarted automatically',
      IPC_COMMUNICATION_FAILED: 'The media player will be restarted automatically',
      LOAD_FAILED: 'The stream will be re-resolved and retried'
    };

    return { code: error, message: messages[error], context, suggestion: suggestions[error] };
  }
}
