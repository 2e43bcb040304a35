/**
 * Where a freshly loaded source starts playing
 */

export interface SeekSettings {
  readonly skipBeginningMs: number;
  readonly randomSeekEnabled: boolean;
  readonly introEnabled: boolean;
  readonly introDurationMs: number;
}

export type SeekReason = 'skip_beginning' | 'random_seek' | 'intro' | 'none';

export interface SeekDecision {
  readonly positionMs: number;
  readonly reason: SeekReason;
}

// Random seeks stay out of the last tenth
const SAFE_END_FRACTION = 0.9;

export class InitialSeekPolicy {
  constructor(
    private readonly settings: SeekSettings,
    private readonly random: () => number = Math.random
  ) {}

  /**
   * Null when the duration is unknown (live streams)
   */
  decide(durationMs: number | null): SeekDecision | null {
    if (durationMs === null || durationMs <= 0) {
      return null;
    }

    if (this.settings.skipBeginningMs > 0) {
      return { positionMs: this.settings.skipBeginningMs, reason: 'skip_beginning' };
    }

    const introMs = this.settings.introEnabled ? this.settings.introDurationMs : 0;

    if (this.settings.randomSeekEnabled) {
      const safeEnd = Math.floor(durationMs * SAFE_END_FRACTION);
      if (safeEnd > introMs) {
        return { positionMs: introMs + Math.floor(this.random() * (safeEnd - introMs)), reason: 'random_seek' };
      }
    }

    if (introMs > 0) {
      return { positionMs: 0, reason: 'intro' };
    }
    return { positionMs: 0, reason: 'none' };
  }
}
