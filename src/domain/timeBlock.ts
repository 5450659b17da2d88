/**
 * Weekday letters as the registrar feed writes them.
 * R = Thursday, U = Sunday.
 */
export const WEEKDAYS = ["M", "T", "W", "R", "F", "S", "U"] as const;

export type Weekday = (typeof WEEKDAYS)[number];

const MINUTES_PER_DAY = 24 * 60;
const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})$/;

/**
 * One weekly recurring meeting interval.
 * start/end are minutes after midnight, half-open: [start, end).
 */
export interface TimeBlock {
  readonly days: ReadonlySet<Weekday>;
  readonly start: number;
  readonly end: number;
  readonly location?: string;
}

export function isWeekday(value: string): value is Weekday {
  return WEEKDAYS.some((day) => day === value);
}

/**
 * Parse "HH:MM" (24-hour) into minutes after midnight.
 * Returns null for anything that is not a wall-clock time; "24:00" is accepted as end of day.
 */
export function parseClockTime(time: string): number | null {
  const match = CLOCK_PATTERN.exec(time.trim());
  if (!match) return null;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (minutes > 59) return null;

  const total = hours * 60 + minutes;
  return total <= MINUTES_PER_DAY ? total : null;
}

export function formatClockTime(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${String(hours).padStart(2, "0")}:${String(mins).padStart(2, "0")}`;
}

/**
 * Parse a run of day letters ("MWF") into an ordered, de-duplicated list.
 * Returns the offending letters when any are unknown.
 */
export function parseDayLetters(
  letters: string
): { days: Weekday[]; invalid: string[] } {
  const seen = new Set<Weekday>();
  const invalid: string[] = [];

  for (const letter of letters.toUpperCase().replace(/\s+/g, "")) {
    if (isWeekday(letter)) {
      seen.add(letter);
    } else {
      invalid.push(letter);
    }
  }

  return { days: WEEKDAYS.filter((day) => seen.has(day)), invalid };
}

export function formatDays(days: ReadonlySet<Weekday>): string {
  return WEEKDAYS.filter((day) => days.has(day)).join("");
}

/**
 * Build a validated, frozen TimeBlock.
 * Throws a plain Error describing the problem; catalogue construction wraps it.
 */
export function createTimeBlock(
  days: Iterable<string>,
  start: string | number,
  end: string | number,
  location?: string
): TimeBlock {
  const daySet = new Set<Weekday>();
  for (const day of days) {
    if (!isWeekday(day)) {
      throw new Error(`Unknown weekday "${day}"`);
    }
    daySet.add(day);
  }
  if (daySet.size === 0) {
    throw new Error("Meeting has no weekdays");
  }

  const startMinutes = typeof start === "number" ? start : parseClockTime(start);
  const endMinutes = typeof end === "number" ? end : parseClockTime(end);
  if (startMinutes === null || !Number.isInteger(startMinutes) || startMinutes < 0) {
    throw new Error(`Invalid start time "${start}"`);
  }
  if (endMinutes === null || !Number.isInteger(endMinutes) || endMinutes > MINUTES_PER_DAY) {
    throw new Error(`Invalid end time "${end}"`);
  }
  if (startMinutes >= endMinutes) {
    throw new Error(
      `Start ${formatClockTime(startMinutes)} is not before end ${formatClockTime(endMinutes)}`
    );
  }

  const block: TimeBlock = {
    days: daySet,
    start: startMinutes,
    end: endMinutes,
    ...(location ? { location } : {}),
  };
  return Object.freeze(block);
}

function sharesDay(a: TimeBlock, b: TimeBlock): boolean {
  for (const day of a.days) {
    if (b.days.has(day)) return true;
  }
  return false;
}

/**
 * Two blocks conflict when they share a weekday and their time ranges overlap.
 * Back-to-back blocks (one ends 10:00, the next starts 10:00) do not conflict.
 */
export function conflicts(a: TimeBlock, b: TimeBlock): boolean {
  if (!sharesDay(a, b)) return false;
  return a.start < b.end && b.start < a.end;
}
