/**
 * Time helpers for agreements
 */

import { Agreement } from '../types';
import { MINUTE_MS } from '../utils/clock';

/**
 * Milliseconds until expiry; negative once expired
 */
export function msRemaining(agreement: Agreement, now: Date): number {
  return agreement.expires_at.getTime() - now.getTime();
}

/**
 * Share of the agreed time used so far, 0-100
 */
export function progressPercentage(agreement: Agreement, now: Date): number {
  if (agreement.agreed_duration_ms === 0) {
    return 100;
  }
  const elapsed = now.getTime() - agreement.created_at.getTime();
  const percentage = (elapsed / agreement.agreed_duration_ms) * 100;
  return Math.min(100, Math.max(0, Math.round(percentage)));
}

/**
 * Short human form, e.g. "1h 5m", "4m 30s", "45s"
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.round(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) {
    return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
  }
  if (minutes > 0) {
    return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
  }
  return `${seconds}s`;
}

/**
 * Whole minutes, rounded, used in dialogue prompts
 */
export function toMinutes(ms: number): number {
  return Math.round(ms / MINUTE_MS);
}
