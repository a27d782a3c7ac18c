const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})\s+(am|pm)$/i;
const TIMEZONE_SUFFIX = /\s+BST$/i;
const MINUTES_PER_DAY = 24 * 60;

/**
 * Parses a schedule clock string ("7:45 PM" or "7:45 PM BST") into minutes after midnight.
 * Blank, placeholder ("---") and malformed values yield null.
 */
export const parseClockMinutes = (value: string | null | undefined): number | null => {
  if (!value) return null;
  const trimmed = value.trim().replace(TIMEZONE_SUFFIX, "");
  if (trimmed.length === 0 || trimmed === "---") return null;
  const match = CLOCK_PATTERN.exec(trimmed);
  if (!match) return null;
  const [, hourText = "", minuteText = "", meridiem = ""] = match;
  const hour = Number(hourText);
  const minute = Number(minuteText);
  if (hour < 1 || hour > 12 || minute > 59) return null;
  const isPm = meridiem.toLowerCase() === "pm";
  return ((hour % 12) + (isPm ? 12 : 0)) * 60 + minute;
};

/** Time of day of `date` in fractional minutes after local midnight. */
export const minutesOfDay = (date: Date): number =>
  date.getHours() * 60 + date.getMinutes() + date.getSeconds() / 60 + date.getMilliseconds() / 60_000;

/** Anchors a clock value to the calendar day of `reference`; schedules carry no date of their own. */
export const atClockOn = (reference: Date, minutes: number): Date => {
  const normalized = ((Math.floor(minutes) % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  return new Date(
    reference.getFullYear(),
    reference.getMonth(),
    reference.getDate(),
    Math.floor(normalized / 60),
    normalized % 60,
    0,
    0,
  );
};

export const parseClockOn = (reference: Date, value: string | null | undefined): Date | null => {
  const minutes = parseClockMinutes(value);
  return minutes === null ? null : atClockOn(reference, minutes);
};

export const addMinutes = (date: Date, minutes: number): Date => new Date(date.getTime() + minutes * 60_000);

export const formatEtaLabel = (diffMs: number): string => {
  if (diffMs <= 0) return "Arrived";
  const totalSeconds = Math.floor(diffMs / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
};

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"] as const;
export type Weekday = (typeof WEEKDAYS)[number];

export const weekdayOf = (date: Date): Weekday => WEEKDAYS[date.getDay()] ?? "Sunday";
