import type { Logger } from 'pino';
import type { SettingName } from './settings.js';

/** Longest delay Node timers honour. Longer delays fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Convert a duration setting to milliseconds usable by a timer. Negative
 * values become 0; values past the timer limit are capped to it.
 */
export function secondsToTimerMs(seconds: number, setting: SettingName, logger?: Logger): number {
  const ms = Math.max(0, seconds) * 1000;
  if (ms <= MAX_TIMER_DELAY_MS) {
    return ms;
  }

  logger?.warn(
    { setting, seconds, cappedMs: MAX_TIMER_DELAY_MS },
    `${setting} exceeds the longest supported timer, capping at ${MAX_TIMER_DELAY_MS}ms`
  );
  return MAX_TIMER_DELAY_MS;
}
