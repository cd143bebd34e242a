/**
 * Suppression Controller
 *
 * Quiet hours and snooze. While suppressed the tracker skips its checks,
 * but agreement clocks keep running.
 */

import { ConfigError } from '../errors';
import { DEFAULT_QUIET_HOURS, QuietHoursConfig } from '../config';
import { Clock, MINUTE_MS, systemClock } from '../utils/clock';
import { SuppressionProvider } from './types';

export type SuppressionReason = 'quiet_hours' | 'snooze';

export interface SuppressionControllerConfig {
  quiet_hours?: Partial<QuietHoursConfig>;
  /** Refuses snooze requests */
  strict_mode?: boolean;
  default_snooze_ms?: number;
  clock?: Clock;
}

export interface SnoozeResult {
  accepted: boolean;
  until: Date | null;
  reason?: string;
}

const MINUTES_PER_DAY = 1440;

function checkMinute(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value >= MINUTES_PER_DAY) {
    throw new ConfigError(`${name} must be between 0 and ${MINUTES_PER_DAY - 1}`, {
      metadata: { [name]: value },
    });
  }
}

/**
 * Whether a local time of day falls inside the quiet window. A window whose
 * start is after its end runs overnight.
 */
export function isWithinQuietHours(now: Date, quietHours: QuietHoursConfig): boolean {
  if (!quietHours.enabled) {
    return false;
  }
  const minute = now.getHours() * 60 + now.getMinutes();
  const { start_minute: start, end_minute: end } = quietHours;

  if (start === end) {
    return false;
  }
  if (start < end) {
    return minute >= start && minute < end;
  }
  return minute >= start || minute < end;
}

export class SuppressionController implements SuppressionProvider {
  private quietHours: QuietHoursConfig;
  private strictMode: boolean;
  private defaultSnoozeMs: number;
  private clock: Clock;
  private snoozeUntil: Date | null = null;

  constructor(config: SuppressionControllerConfig = {}) {
    this.quietHours = { ...DEFAULT_QUIET_HOURS, ...config.quiet_hours };
    checkMinute('start_minute', this.quietHours.start_minute);
    checkMinute('end_minute', this.quietHours.end_minute);
    this.strictMode = config.strict_mode ?? false;
    this.defaultSnoozeMs = config.default_snooze_ms ?? 5 * MINUTE_MS;
    this.clock = config.clock ?? systemClock;
  }

  isSuppressed(now: Date): boolean {
    return this.getReason(now) !== null;
  }

  getReason(now: Date): SuppressionReason | null {
    if (this.isSnoozed(now)) {
      return 'snooze';
    }
    if (isWithinQuietHours(now, this.quietHours)) {
      return 'quiet_hours';
    }
    return null;
  }

  /**
   * Suppresses checks until `now + durationMs`. Refused in strict mode.
   */
  snooze(durationMs: number = this.defaultSnoozeMs): SnoozeResult {
    if (this.strictMode) {
      return { accepted: false, until: null, reason: 'Snooze is disabled in strict mode' };
    }
    if (!Number.isFinite(durationMs) || durationMs <= 0) {
      return { accepted: false, until: null, reason: 'Snooze duration must be positive' };
    }

    this.snoozeUntil = new Date(this.clock.now().getTime() + durationMs);
    return { accepted: true, until: new Date(this.snoozeUntil.getTime()) };
  }

  cancelSnooze(): void {
    this.snoozeUntil = null;
  }

  isSnoozed(now: Date): boolean {
    if (this.snoozeUntil === null) {
      return false;
    }
    if (now.getTime() >= this.snoozeUntil.getTime()) {
      this.snoozeUntil = null;
      return false;
    }
    return true;
  }

  getSnoozeUntil(): Date | null {
    return this.snoozeUntil ? new Date(this.snoozeUntil.getTime()) : null;
  }

  /**
   * Enabling strict mode also ends any running snooze
   */
  setStrictMode(enabled: boolean): void {
    this.strictMode = enabled;
    if (enabled) {
      this.snoozeUntil = null;
    }
  }

  isStrictMode(): boolean {
    return this.strictMode;
  }

  setQuietHours(update: Partial<QuietHoursConfig>): void {
    const next = { ...this.quietHours, ...update };
    checkMinute('start_minute', next.start_minute);
    checkMinute('end_minute', next.end_minute);
    this.quietHours = next;
  }

  getQuietHours(): QuietHoursConfig {
    return { ...this.quietHours };
  }
}
