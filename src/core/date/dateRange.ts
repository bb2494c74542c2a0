export const dateModes = ["today", "yesterday", "last_7_days", "last_30_days", "custom"] as const;

export type DateMode = (typeof dateModes)[number];

export type RangePoint = {
  year: number;
  /** Zero-based, as the portal expects. */
  month: number;
  day: number;
  hour: number;
};

export type DateRange = {
  mode: DateMode;
  start: RangePoint;
  end: RangePoint;
  /** `DD/MM/YYYY` labels for reports. */
  label: { start: string; end: string };
};

export type DateRangeInput = {
  mode: DateMode;
  timeZone: string;
  customStart?: string;
  customEnd?: string;
};

type CalendarDay = { year: number; month: number; day: number };

const isoDatePattern = /^(\d{4})-(\d{2})-(\d{2})$/;

export const isDateMode = (value: string): value is DateMode =>
  (dateModes as readonly string[]).includes(value);

const zonedParts = (now: Date, timeZone: string): CalendarDay & { hour: number } => {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    hourCycle: "h23"
  }).formatToParts(now);

  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? Number(part.value) : 0;
  };

  return { year: read("year"), month: read("month") - 1, day: read("day"), hour: read("hour") };
};

const shiftDays = (day: CalendarDay, offset: number): CalendarDay => {
  const shifted = new Date(Date.UTC(day.year, day.month, day.day + offset));
  return { year: shifted.getUTCFullYear(), month: shifted.getUTCMonth(), day: shifted.getUTCDate() };
};

const parseIsoDay = (name: string, value: string | undefined): CalendarDay => {
  const match = value ? isoDatePattern.exec(value.trim()) : null;
  if (!match) {
    throw new Error(`${name} must be a YYYY-MM-DD date. Received: ${value ?? "<unset>"}`);
  }
  const day = { year: Number(match[1]), month: Number(match[2]) - 1, day: Number(match[3]) };
  const check = new Date(Date.UTC(day.year, day.month, day.day));
  if (check.getUTCMonth() !== day.month || check.getUTCDate() !== day.day) {
    throw new Error(`${name} is not a calendar date. Received: ${value ?? "<unset>"}`);
  }
  return day;
};

const label = (day: CalendarDay): string =>
  `${String(day.day).padStart(2, "0")}/${String(day.month + 1).padStart(2, "0")}/${day.year}`;

const toRange = (mode: DateMode, start: CalendarDay, end: CalendarDay, endHour: number): DateRange => ({
  mode,
  start: { ...start, hour: 0 },
  end: { ...end, hour: endHour },
  label: { start: label(start), end: label(end) }
});

/**
 * Resolves a reporting window in `timeZone`. Ranges that end today stop at
 * the current hour; ranges that end on a past day run to 23:00.
 */
export const resolveDateRange = (input: DateRangeInput, now: Date = new Date()): DateRange => {
  const current = zonedParts(now, input.timeZone);
  const today: CalendarDay = { year: current.year, month: current.month, day: current.day };

  switch (input.mode) {
    case "today":
      return toRange("today", today, today, current.hour);
    case "yesterday": {
      const yesterday = shiftDays(today, -1);
      return toRange("yesterday", yesterday, yesterday, 23);
    }
    case "last_7_days":
      return toRange("last_7_days", shiftDays(today, -6), today, current.hour);
    case "last_30_days":
      return toRange("last_30_days", shiftDays(today, -29), today, current.hour);
    case "custom": {
      const start = parseIsoDay("HARVEST_START_DATE", input.customStart);
      const end = input.customEnd ? parseIsoDay("HARVEST_END_DATE", input.customEnd) : start;
      if (Date.UTC(end.year, end.month, end.day) < Date.UTC(start.year, start.month, start.day)) {
        throw new Error(`HARVEST_END_DATE must not be before HARVEST_START_DATE`);
      }
      return toRange("custom", start, end, 23);
    }
  }
};

/** `YYYY-MM-DD` of the range end, used as the archive key. */
export const rangeEndDay = (range: DateRange): string =>
  `${range.end.year}-${String(range.end.month + 1).padStart(2, "0")}-${String(range.end.day).padStart(2, "0")}`;
