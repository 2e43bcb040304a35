/**
 * Configuration Management
 *
 * Reads service configuration from environment variables. Malformed values
 * throw ConfigError; well-formed values outside their range are clamped and
 * reported as warnings for the caller to log once a logger exists.
 */

import type { LevelWithSilent } from 'pino';
import { DEFAULT_QUALITY_MODE, QualityModeUtils, type QualityMode } from '@stream-keeper/shared';
import { WEEKDAYS, type ScheduleConfig, type ScheduledSource, type Weekday } from '../../domain/schedule';

export { WEEKDAYS };
export type { ScheduleConfig, ScheduledSource, Weekday };

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface InnerTubeKeys {
  readonly tv?: string;
  readonly android?: string;
  readonly web?: string;
}

export interface AppConfig {
  readonly port: number;
  readonly host: string;
  readonly logLevel: LevelWithSilent;
  readonly dataDir: string;
  readonly schedule: ScheduleConfig;
  readonly qualityMode: QualityMode;
  readonly resumeEnabled: boolean;
  readonly randomSeekEnabled: boolean;
  readonly introEnabled: boolean;
  readonly introDurationSeconds: number;
  readonly skipBeginningSeconds: number;
  readonly resolutionTimeoutMs: number;
  readonly httpTimeoutMs: number;
  readonly innerTubeKeys: InnerTubeKeys;
  readonly ytDlpEnabled: boolean;
  readonly mpvSocketPath: string;
  readonly cipherOverridePath?: string;
}

export interface LoadedConfig {
  readonly config: AppConfig;
  readonly warnings: readonly string[];
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): LoadedConfig {
  const warnings: string[] = [];
  const reader = new EnvReader(env, warnings);

  const qualityMode = reader.string('QUALITY_MODE', DEFAULT_QUALITY_MODE);
  if (!QualityModeUtils.isQualityMode(qualityMode)) {
    throw new ConfigError(`QUALITY_MODE "${qualityMode}" is not a known quality mode`);
  }

  const config: AppConfig = {
    port: reader.integer('PORT', 3000, 1, 65535),
    host: reader.string('HOST', '0.0.0.0'),
    logLevel: reader.logLevel('LOG_LEVEL', 'info'),
    dataDir: reader.string('DATA_DIR', './data'),
    schedule: {
      enabled: reader.boolean('SCHEDULE_ENABLED', false),
      random: reader.boolean('SCHEDULE_RANDOM', false),
      main: reader.source('SOURCE_URL'),
      weekdays: {
        monday: reader.source('SOURCE_URL_MONDAY'),
        tuesday: reader.source('SOURCE_URL_TUESDAY'),
        wednesday: reader.source('SOURCE_URL_WEDNESDAY'),
        thursday: reader.source('SOURCE_URL_THURSDAY'),
        friday: reader.source('SOURCE_URL_FRIDAY'),
        saturday: reader.source('SOURCE_URL_SATURDAY'),
        sunday: reader.source('SOURCE_URL_SUNDAY')
      }
    },
    qualityMode,
    resumeEnabled: reader.boolean('RESUME_ENABLED', true),
    randomSeekEnabled: reader.boolean('RANDOM_SEEK_ENABLED', false),
    introEnabled: reader.boolean('INTRO_ENABLED', true),
    introDurationSeconds: reader.integer('INTRO_DURATION_SECONDS', 7, 0, 600),
    skipBeginningSeconds: reader.integer('SKIP_BEGINNING_SECONDS', 0, 0, 3600),
    resolutionTimeoutMs: reader.integer('RESOLUTION_TIMEOUT_MS', 25000, 1000, 120000),
    httpTimeoutMs: reader.integer('HTTP_TIMEOUT_MS', 10000, 1000, 60000),
    innerTubeKeys: {
      tv: reader.optional('INNERTUBE_TV_KEY'),
      android: reader.optional('INNERTUBE_ANDROID_KEY'),
      web: reader.optional('INNERTUBE_WEB_KEY')
    },
    ytDlpEnabled: reader.boolean('YTDLP_ENABLED', true),
    mpvSocketPath: reader.string('MPV_SOCKET_PATH', '/tmp/stream-keeper-mpv.sock'),
    cipherOverridePath: reader.optional('CIPHER_OVERRIDE_PATH')
  };

  return { config, warnings };
}

class EnvReader {
  constructor(private readonly env: Env, private readonly warnings: string[]) {}

  optional(name: string): string | undefined {
    const raw = this.env[name]?.trim();
    return raw ? raw : undefined;
  }

  string(name: string, fallback: string): string {
    return this.optional(name) ?? fallback;
  }

  source(name: string): ScheduledSource {
    return {
      url: this.string(name, ''),
      disabled: this.boolean(`${name}_DISABLED`, false)
    };
  }

  boolean(name: string, fallback: boolean): boolean {
    const raw = this.optional(name);
    if (raw === undefined) return fallback;

    switch (raw.toLowerCase()) {
      case 'true':
      case '1':
      case 'yes':
        return true;
      case 'false':
      case '0':
      case 'no':
        return false;
      default:
        throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
    }
  }

  integer(name: string, fallback: number, min: number, max: number): number {
    const raw = this.optional(name);
    if (raw === undefined) return fallback;

    if (!/^-?\d+$/.test(raw)) {
      throw new ConfigError(`${name} must be an integer, got "${raw}"`);
    }

    const value = parseInt(raw, 10);
    if (value < min || value > max) {
      const clamped = Math.min(Math.max(value, min), max);
      this.warnings.push(`${name} ${value} is outside the valid range (${min}-${max}). Using ${clamped}.`);
      return clamped;
    }
    return value;
  }

  logLevel(name: string, fallback: LevelWithSilent): LevelWithSilent {
    const raw = this.optional(name);
    if (raw === undefined) return fallback;

    const level = LOG_LEVELS.find(candidate => candidate === raw.toLowerCase());
    if (!level) {
      throw new ConfigError(`${name} must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
    }
    return level;
  }
}
