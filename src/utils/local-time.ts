export interface ClockTime {
  readonly hour: number;
  readonly minute: number;
}

/** Calendar fields of an instant; `weekday` is 0 = Monday … 6 = Sunday. */
export interface LocalParts {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly weekday: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

export const ALL_WEEKDAYS: readonly number[] = [0, 1, 2, 3, 4, 5, 6];

const CLOCK_TIME = /^(\d{1,2}):(\d{2})$/;
const WEEKDAY_INDEX: Record<string, number> = {
  Mon: 0, Tue: 1, Wed: 2, Thu: 3, Fri: 4, Sat: 5, Sun: 6,
};

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timezone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      year: "numeric",
      month: "numeric",
      day: "numeric",
      weekday: "short",
      hour: "numeric",
      minute: "numeric",
      second: "numeric",
      hourCycle: "h23",
    });
    formatters.set(timezone, fmt);
  }
  return fmt;
}

export function isValidTimeZone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Calendar fields of `epochMs` in `timezone`, or in the process-local zone
 * when no zone is given.
 */
export function localParts(epochMs: number, timezone?: string): LocalParts {
  if (!timezone) {
    const d = new Date(epochMs);
    return {
      year: d.getFullYear(),
      month: d.getMonth() + 1,
      day: d.getDate(),
      weekday: (d.getDay() + 6) % 7,
      hour: d.getHours(),
      minute: d.getMinutes(),
      second: d.getSeconds(),
    };
  }

  const fields = new Map<string, string>();
  for (const part of formatterFor(timezone).formatToParts(new Date(epochMs))) {
    fields.set(part.type, part.value);
  }
  const num = (type: string): number => {
    const value = fields.get(type);
    if (value === undefined) throw new Error(`Missing ${type} in formatted date for ${timezone}`);
    return parseInt(value, 10);
  };

  return {
    year: num("year"),
    month: num("month"),
    day: num("day"),
    weekday: WEEKDAY_INDEX[fields.get("weekday") ?? ""] ?? 0,
    hour: num("hour") % 24,
    minute: num("minute"),
    second: num("second"),
  };
}

/** Offset of `timezone` from UTC at `epochMs`, in minutes (east positive). */
/**
 * The IANA name of a whole-hour fixed offset. `Etc/GMT` zones carry the
 * inverted sign: UTC+1 is `Etc/GMT-1`.
 */
export function fixedOffsetZone(offsetMinutes: number): string {
  if (offsetMinutes % 60 !== 0) throw new Error(`No fixed-offset zone for ${offsetMinutes} minutes`);
  const hours = offsetMinutes / 60;
  if (hours === 0) return "UTC";
  return `Etc/GMT${hours > 0 ? "-" : "+"}${Math.abs(hours)}`;
}

export function utcOffsetMinutes(epochMs: number, timezone: string): number {
  const p = localParts(epochMs, timezone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const truncated = Math.floor(epochMs / 1000) * 1000;
  return Math.round((asUtc - truncated) / 60_000);
}

export function dateKey(parts: Pick<LocalParts, "year" | "month" | "day">): string {
  return `${parts.year}-${pad2(parts.month)}-${pad2(parts.day)}`;
}

export function parseClockTime(value: string): ClockTime | null {
  const match = CLOCK_TIME.exec(value.trim());
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

export function formatClockTime(time: ClockTime): string {
  return `${pad2(time.hour)}:${pad2(time.minute)}`;
}

/** Shift a clock time by whole minutes, wrapping around midnight. */
export function addMinutes(time: ClockTime, minutes: number): ClockTime {
  const total = mod(time.hour * 60 + time.minute + Math.trunc(minutes), 1440);
  return { hour: Math.floor(total / 60), minute: total % 60 };
}

export function mod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}
