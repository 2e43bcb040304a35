/**
 * SourceScheduler - which configured source plays right now
 */

import { WEEKDAYS, type ScheduleConfig, type ScheduledSource, type Weekday } from '../domain/schedule';

export const DEFAULT_SOURCE_URL = 'https://test-streams.mux.dev/x36xhzz/x36xhzz.m3u8';

export interface ISourceScheduler {
  pick(): string;
}

function usable(source: ScheduledSource): boolean {
  return source.url.length > 0 && !source.disabled;
}

/**
 * Weekday of a date, Monday first
 */
export function weekdayOf(date: Date): Weekday {
  return WEEKDAYS[(date.getDay() + 6) % 7];
}

export class SourceScheduler implements ISourceScheduler {
  constructor(
    private readonly schedule: ScheduleConfig,
    private readonly random: () => number = Math.random,
    private readonly today: () => Date = () => new Date(),
    private readonly defaultUrl: string = DEFAULT_SOURCE_URL
  ) {}

  pick(): string {
    if (!this.schedule.enabled) {
      return this.mainUrl();
    }
    return this.schedule.random ? this.randomUrl() : this.todayUrl();
  }

  private mainUrl(): string {
    return usable(this.schedule.main) ? this.schedule.main.url : this.defaultUrl;
  }

  private randomUrl(): string {
    const candidates = [this.schedule.main, ...WEEKDAYS.map(day => this.schedule.weekdays[day])]
      .filter(usable)
      .map(source => source.url);
    if (candidates.length === 0) {
      return this.mainUrl();
    }
    const index = Math.min(candidates.length - 1, Math.floor(this.random() * candidates.length));
    return candidates[index];
  }

  private todayUrl(): string {
    const source = this.schedule.weekdays[weekdayOf(this.today())];
    return usable(source) ? source.url : this.mainUrl();
  }
}
