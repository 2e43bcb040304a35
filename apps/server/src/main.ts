/**
 * Stream Keeper Server Entry Point
 *
 * Loads configuration, validates external dependencies and wires the
 * resolution pipeline, the mpv engine and the playback session behind the
 * HTTP API.
 */

import { join } from 'path';
import type { Logger } from 'pino';
import { PlaybackSession, ResumeStore, SourceScheduler, InitialSeekPolicy, isResumeRecord } from './application';
import type { IExtractionStrategy } from './domain/resolution';
import { ConfigError, loadConfig, type AppConfig } from './infrastructure/config';
import { createLogger } from './infrastructure/logging';
import { IPCClient, MpvPlaybackEngine, ProcessManager } from './infrastructure/playback';
import {
  InnerTubeExtractor,
  NetworkMonitor,
  ResolutionCache,
  RutubeExtractor,
  SignatureDescrambler,
  SourceResolver,
  YtDlpExtractor,
  isCacheEntry
} from './infrastructure/resolution';
import { isCipherProgram } from './infrastructure/resolution/cipher';
import { JsonFileStore } from './infrastructure/storage';
import { DependencyValidator } from './infrastructure/validation/dependency-validator';
import { HTTPServer } from './infrastructure/web';

// Global service instances
let logger: Logger | null = null;
let session: PlaybackSession | null = null;
let processManager: ProcessManager | null = null;
let httpServer: HTTPServer | null = null;

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * Initialize the server with dependency validation
 */
async function initializeServer(config?: AppConfig): Promise<void> {
  let warnings: readonly string[] = [];
  if (!config) {
    const loaded = loadConfig();
    config = loaded.config;
    warnings = loaded.warnings;
  }

  const log = createLogger({ level: config.logLevel });
  logger = log;
  for (const warning of warnings) {
    log.warn(warning);
  }
  log.info('Stream Keeper - starting up');

  try {
    const dependencies = await DependencyValidator.validateAtStartup(log);
    if (!dependencies.success) {
      throw new Error('mpv is not installed');
    }

    const dataDir = config.dataDir;
    const cache = new ResolutionCache(new JsonFileStore(join(dataDir, 'resolution-cache.json'), isCacheEntry, log));
    const cipherStore = new JsonFileStore(join(dataDir, 'cipher.json'), isCipherProgram, log);
    const resumeStore = new ResumeStore(new JsonFileStore(join(dataDir, 'resume.json'), isResumeRecord, log), log);
    const sessionStore = new JsonFileStore(join(dataDir, 'session.json'), isString, log);

    processManager = new ProcessManager({ logger: log });
    const engine = new MpvPlaybackEngine({
      ipcClient: new IPCClient({ logger: log }),
      processManager,
      logger: log,
      socketPath: config.mpvSocketPath
    });

    const descrambler = new SignatureDescrambler({
      store: cipherStore,
      logger: log,
      timeoutMs: config.httpTimeoutMs,
      overrideScriptPath: config.cipherOverridePath
    });
    const strategies: IExtractionStrategy[] = [
      new InnerTubeExtractor({ descrambler, logger: log, timeoutMs: config.httpTimeoutMs, keys: config.innerTubeKeys }),
      new RutubeExtractor({ logger: log, timeoutMs: config.httpTimeoutMs })
    ];
    if (config.ytDlpEnabled && dependencies.value.ytDlp) {
      strategies.push(new YtDlpExtractor({ processManager, logger: log, timeoutMs: config.resolutionTimeoutMs }));
    }

    // Playback and one-off API resolutions share the cache but never cancel each other
    const resolverOptions = {
      strategies,
      cache,
      network: new NetworkMonitor(),
      logger: log,
      timeoutMs: config.resolutionTimeoutMs
    };
    const sessionResolver = new SourceResolver(resolverOptions);
    const apiResolver = new SourceResolver(resolverOptions);

    session = new PlaybackSession({
      scheduler: new SourceScheduler(config.schedule),
      resolver: sessionResolver,
      engine,
      resumeStore,
      seekPolicy: new InitialSeekPolicy({
        skipBeginningMs: config.skipBeginningSeconds * 1000,
        randomSeekEnabled: config.randomSeekEnabled,
        introEnabled: config.introEnabled,
        introDurationMs: config.introDurationSeconds * 1000
      }),
      sessionStore,
      settings: {
        qualityMode: config.qualityMode,
        resumeEnabled: config.resumeEnabled,
        randomSeekEnabled: config.randomSeekEnabled
      },
      logger: log
    });

    httpServer = new HTTPServer({ port: config.port, host: config.host }, log);
    await httpServer.initialize({
      session,
      resolver: apiResolver,
      defaultQualityMode: config.qualityMode
    });
    await httpServer.start();

    setupGracefulShutdown(log);

    await session.start();
    log.info({ strategies: strategies.map(strategy => strategy.name) }, 'Stream Keeper ready');
  } catch (error) {
    log.fatal({ err: error }, 'Server startup failed');
    await cleanup();
    throw error;
  }
}

/**
 * Set up graceful shutdown handlers
 */
function setupGracefulShutdown(log: Logger): void {
  const shutdownHandler = (signal: string): void => {
    log.info({ signal }, 'Shutting down gracefully');
    exitAfterCleanup(0);
  };

  process.on('SIGINT', () => shutdownHandler('SIGINT'));
  process.on('SIGTERM', () => shutdownHandler('SIGTERM'));

  process.on('uncaughtException', error => {
    log.fatal({ err: error }, 'Uncaught exception');
    exitAfterCleanup(1);
  });

  process.on('unhandledRejection', reason => {
    log.fatal({ err: reason }, 'Unhandled rejection');
    exitAfterCleanup(1);
  });
}

function exitAfterCleanup(code: number): void {
  cleanup().then(
    () => process.exit(code),
    () => process.exit(1)
  );
}

/**
 * Stop playback (saving the resume position), external processes and the server
 */
async function cleanup(): Promise<void> {
  try {
    if (session) {
      await session.stop();
      session.dispose();
      session = null;
    }

    if (processManager) {
      await processManager.cleanup();
      processManager = null;
    }

    if (httpServer) {
      await httpServer.stop();
      httpServer = null;
    }

    logger?.info('Cleanup completed');
  } catch (error) {
    logger?.error({ err: error }, 'Cleanup failed');
  }
}

function getHTTPServer(): HTTPServer | null {
  return httpServer;
}

function getPlaybackSession(): PlaybackSession | null {
  return session;
}

// Start the server if this file is run directly
if (require.main === module) {
  initializeServer().catch(error => {
    if (error instanceof ConfigError) {
      process.stderr.write(`Invalid configuration: ${error.message}\n`);
    }
    process.exit(1);
  });
}

export {
  initializeServer,
  cleanup,
  getHTTPServer,
  getPlaybackSession
};
