/**
 * Weekly source schedule
 */

export const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'] as const;
export type Weekday = typeof WEEKDAYS[number];

export interface ScheduledSource {
  readonly url: string;
  readonly disabled: boolean;
}

export interface ScheduleConfig {
  readonly enabled: boolean;
  readonly random: boolean;
  readonly main: ScheduledSource;
  readonly weekdays: Readonly<Record<Weekday, ScheduledSource>>;
}
