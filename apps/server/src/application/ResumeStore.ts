/**
 * ResumeStore - last position of the last source, offered once on the next start
 */

import type { Logger } from 'pino';
import { LocatorCodec, LocatorUtils, type MediaLocator, type Result } from '@stream-keeper/shared';
import type { KeyValueStore } from '../domain/resolution';
import type { ResumeRecord, ResumeRejection } from '../domain/playback';

export const RESUME_WINDOW_MS = 5 * 60 * 1000;
const RECORD_KEY = 'last';

export interface ResumePolicy {
  readonly resumeEnabled: boolean;
  readonly randomSeekEnabled: boolean;
}

export interface IResumeStore {
  save(locator: MediaLocator, positionMs: number): ResumeRecord;
  offer(locator: MediaLocator, policy: ResumePolicy): Result<number, ResumeRejection>;
  peek(): ResumeRecord | null;
}

export function isResumeRecord(value: unknown): value is ResumeRecord {
  if (typeof value !== 'object' || value === null) return false;
  return 'baseLocator' in value && typeof value.baseLocator === 'string'
    && 'positionMs' in value && typeof value.positionMs === 'number'
    && 'savedAt' in value && typeof value.savedAt === 'number';
}

export class ResumeStore implements IResumeStore {
  private readonly logger: Logger;

  constructor(
    private readonly store: KeyValueStore<ResumeRecord>,
    logger: Logger,
    private readonly now: () => number = Date.now
  ) {
    this.logger = logger.child({ component: 'ResumeStore' });
  }

  /**
   * Overwrites any earlier record
   */
  save(locator: MediaLocator, positionMs: number): ResumeRecord {
    const record: ResumeRecord = {
      baseLocator: LocatorUtils.baseLocator(LocatorCodec.playableUrl(locator)),
      positionMs: Math.max(0, Math.round(positionMs)),
      savedAt: this.now()
    };
    this.store.put(RECORD_KEY, record);
    this.logger.debug({ positionMs: record.positionMs }, 'Saved resume position');
    return record;
  }

  /**
   * Position to resume at. Consumed on success. A record that only fails
   * the freshness window is dropped as stale; other rejections keep it.
   */
  offer(locator: MediaLocator, policy: ResumePolicy): Result<number, ResumeRejection> {
    if (!policy.resumeEnabled) {
      return { success: false, error: 'DISABLED' };
    }

    const record = this.store.get(RECORD_KEY);
    if (!record) {
      return { success: false, error: 'NO_RECORD' };
    }

    if (record.baseLocator !== LocatorUtils.baseLocator(LocatorCodec.playableUrl(locator))) {
      return { success: false, error: 'DIFFERENT_SOURCE' };
    }

    if (policy.randomSeekEnabled && this.now() - record.savedAt > RESUME_WINDOW_MS) {
      this.store.delete(RECORD_KEY);
      return { success: false, error: 'WINDOW_EXPIRED' };
    }

    this.store.delete(RECORD_KEY);
    return { success: true, value: record.positionMs };
  }

  peek(): ResumeRecord | null {
    return this.store.get(RECORD_KEY) ?? null;
  }
}
