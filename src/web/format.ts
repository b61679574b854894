// Utility formatting and content helpers

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIMESTAMP_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * Escapes HTML special characters and both quote styles
 * @param s - String to escape
 * @returns HTML-safe string
 */
export function escapeHtml(s: string): string {
  const entities: Record<string, string> = {
    "&": "&amp;",
    "<": "&lt;",
    ">": "&gt;",
    '"': "&quot;",
    "'": "&#039;",
  };
  return s.replace(/[&<>"']/g, (c) => entities[c] ?? c);
}

function buildLocalDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0
): Date | null {
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  const d = new Date(year, month - 1, day, hours, minutes, seconds);
  // Date silently rolls over out-of-range parts (April 31 -> May 1)
  if (d.getFullYear() !== year || d.getMonth() !== month - 1 || d.getDate() !== day) return null;
  return d;
}

/**
 * Checks that a string is a real calendar date written as `YYYY-MM-DD`.
 *
 * isDateValid("2016-02-29") // true
 * isDateValid("2019-04-31") // false
 * isDateValid("10.10.2010") // false
 */
export function isDateValid(s: string): boolean {
  const m = DATE_RE.exec(s);
  if (!m) return false;
  return buildLocalDate(Number(m[1]), Number(m[2]), Number(m[3])) !== null;
}

/**
 * Reads a stored timestamp. `YYYY-MM-DD` and `YYYY-MM-DD HH:MM[:SS]` strings
 * are local time, numbers are epoch milliseconds.
 * @throws RangeError when the value is not a usable date
 */
export function parseTimestamp(value: string | number | Date): Date {
  if (value instanceof Date) return value;
  if (typeof value === "number") return new Date(value);
  const m = TIMESTAMP_RE.exec(value.trim());
  const parsed = m
    ? buildLocalDate(
        Number(m[1]),
        Number(m[2]),
        Number(m[3]),
        Number(m[4] ?? 0),
        Number(m[5] ?? 0),
        Number(m[6] ?? 0)
      )
    : new Date(value);
  if (!parsed || Number.isNaN(parsed.getTime())) {
    throw new RangeError(`Invalid date: ${value}`);
  }
  return parsed;
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

/** Local calendar date of `d` as `YYYY-MM-DD`. */
export function toDateString(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1, 2)}-${pad(d.getDate(), 2)}`;
}

/**
 * Picks the Russian noun form for a count.
 *
 * pluralForm(5, "минута", "минуты", "минут") // "минут"
 * pluralForm(22, "минута", "минуты", "минут") // "минуты"
 */
export function pluralForm(n: number, one: string, few: string, many: string): string {
  const abs = Math.abs(Math.trunc(n));
  const mod10 = abs % 10;
  const mod100 = abs % 100;

  if (mod100 >= 11 && mod100 <= 20) return many;
  if (mod10 === 1) return one;
  if (mod10 >= 2 && mod10 <= 4) return few;
  return many;
}

/**
 * Formats how long ago something happened, e.g. "5 минут назад".
 * Anything older than a day is shown as an absolute `dd.mm.yy в HH:MM`.
 */
export function relativeTime(timestamp: string | number | Date, now: Date = new Date()): string {
  const at = parseTimestamp(timestamp);
  const elapsed = Math.max(0, now.getTime() - at.getTime());

  if (elapsed < MINUTE) {
    const s = Math.floor(elapsed / SECOND);
    return `${s} ${pluralForm(s, "секунда", "секунды", "секунд")} назад`;
  }
  if (elapsed < HOUR) {
    const m = Math.floor(elapsed / MINUTE);
    return `${m} ${pluralForm(m, "минута", "минуты", "минут")} назад`;
  }
  if (elapsed < DAY) {
    const h = Math.floor(elapsed / HOUR);
    return `${h} ${pluralForm(h, "час", "часа", "часов")} назад`;
  }

  const date = `${pad(at.getDate(), 2)}.${pad(at.getMonth() + 1, 2)}.${pad(at.getFullYear() % 100, 2)}`;
  const time = `${pad(at.getHours(), 2)}:${pad(at.getMinutes(), 2)}`;
  return `${date} в ${time}`;
}

export type RemainingTime = readonly [hours: string, minutes: string, seconds: string];

/**
 * Time left until `date`, split into zero-padded hours, minutes and seconds.
 * Hours are not wrapped into days. Past dates give all zeros.
 */
export function remainingTime(
  date: string | number | Date,
  now: Date = new Date()
): RemainingTime {
  const left = Math.max(0, Math.floor((parseTimestamp(date).getTime() - now.getTime()) / SECOND));
  const hours = Math.floor(left / 3600);
  const minutes = Math.floor((left % 3600) / 60);
  const seconds = left % 60;
  return [pad(hours, 2), pad(minutes, 2), pad(seconds, 1)];
}

/**
 * Rounds a price up to whole rubles and groups thousands with spaces
 * @param n - Amount
 * @returns Formatted string (e.g., "12 500 ₽")
 */
export function formatCurrency(n: number): string {
  const rounded = Math.ceil(n);
  // String() switches to exponent notation from 1e21
  const digits = Number.isFinite(rounded) ? BigInt(rounded).toString() : String(rounded);
  const grouped = digits.replace(/\B(?=(\d{3})+(?!\d))/g, " ");
  return `${grouped} ₽`;
}
