export { loadConfig, ConfigError, WEEKDAYS } from './config';
export type {
  AppConfig,
  LoadedConfig,
  ScheduleConfig,
  ScheduledSource,
  InnerTubeKeys,
  Weekday
} from './config';
