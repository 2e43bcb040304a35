export { createLogger, createSilentLogger } from './logger';
export type { Logger, LoggerOptions } from './logger';
