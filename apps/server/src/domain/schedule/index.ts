/**
 * Schedule domain exports
 */

export { WEEKDAYS } from './types';

export type {
  Weekday,
  ScheduledSource,
  ScheduleConfig
} from './types';
