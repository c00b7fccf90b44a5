/** Longest delay a Node timer holds; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Reads a playback duration (seconds) from free text.
 * Only a plain positive integer a timer can hold counts; anything else
 * means unbounded.
 */
export const parseDurationOverride = (
  text: string | null | undefined,
): number | undefined => {
  const trimmed = text?.trim() ?? '';
  if (!/^\d+$/.test(trimmed)) return undefined;

  const seconds = parseInt(trimmed, 10);
  return seconds > 0 && isTimerDuration(seconds) ? seconds : undefined;
};

export const isTimerDuration = (seconds: number): boolean =>
  seconds * 1000 <= MAX_TIMER_DELAY_MS;
