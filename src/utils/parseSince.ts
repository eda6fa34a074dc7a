const UNIT_SECONDS: Record<string, number> = {
  w: 7 * 24 * 3600,
  d: 24 * 3600,
  h: 3600,
  m: 60,
  s: 1,
};

/**
 * Converts a duration like "3d", "12h", "45 min" or "2 weeks" into the epoch
 * second that far before `now`. Ping timestamps are stored in seconds.
 *
 * @param now Base time in milliseconds (default: Date.now())
 * @returns epoch seconds, or null if the string isn't a duration
 */
export function parseSince(sinceStr: string, now = Date.now()): number | null {
  const match = sinceStr
    .trim()
    .match(/^(\d+)\s*(w|wk|weeks?|d|days?|h|hours?|m|min|minutes?|s|sec|seconds?)$/i);
  if (!match) return null;

  const value = parseInt(match[1], 10);
  const unit = match[2].toLowerCase()[0];

  return Math.floor(now / 1000) - value * UNIT_SECONDS[unit];
}
