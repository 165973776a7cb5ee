const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const WEEK = 7 * DAY;

const UNIT_MS: Record<string, number> = {
  s: SECOND,
  sec: SECOND,
  secs: SECOND,
  second: SECOND,
  seconds: SECOND,
  m: MINUTE,
  min: MINUTE,
  mins: MINUTE,
  minute: MINUTE,
  minutes: MINUTE,
  h: HOUR,
  hr: HOUR,
  hrs: HOUR,
  hour: HOUR,
  hours: HOUR,
  d: DAY,
  day: DAY,
  days: DAY,
  w: WEEK,
  wk: WEEK,
  week: WEEK,
  weeks: WEEK
};

const TOKEN = /^\s*(\d+(?:\.\d+)?|an?)\s*([a-z]+)/;

/**
 * Parses "5m", "2h30m", "1 day and 2 hours", "an hour" into milliseconds.
 * Returns null when any part of the input is not a duration.
 */
export function parseDuration(input: string): number | null {
  let rest = String(input ?? "")
    .toLowerCase()
    .replace(/,/g, " ")
    .replace(/\band\b/g, " ")
    .trim();
  if (!rest) return null;

  let total = 0;
  while (rest.trim()) {
    const m = rest.match(TOKEN);
    if (!m) return null;
    if (!Object.hasOwn(UNIT_MS, m[2])) return null;
    const unit = UNIT_MS[m[2]];
    const n = m[1] === "a" || m[1] === "an" ? 1 : Number(m[1]);
    total += n * unit;
    rest = rest.slice(m[0].length);
  }
  return Math.round(total);
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

export function formatDuration(ms: number): string {
  let rest = Math.max(0, Math.round(ms / SECOND)) * SECOND;
  if (rest === 0) return "0 seconds";
  const parts: string[] = [];
  for (const [size, word] of [
    [DAY, "day"],
    [HOUR, "hour"],
    [MINUTE, "minute"],
    [SECOND, "second"]
  ] as const) {
    const n = Math.floor(rest / size);
    if (n > 0) parts.push(plural(n, word));
    rest -= n * size;
  }
  return parts.join(" ");
}
