/**
 * Wall-clock source. Injected everywhere time is read so ticks and tests
 * can control it.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export const MINUTE_MS = 60000;
export const HOUR_MS = 60 * MINUTE_MS;
