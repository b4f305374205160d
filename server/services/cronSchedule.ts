/**
 * 5-field cron expressions (minute hour day-of-month month day-of-week)
 * evaluated against wall-clock time in an IANA timezone.
 *
 * Supported per field: `*`, numbers, ranges `a-b`, steps `*\/n` and `a-b/n`,
 * and comma lists of those. Day-of-week takes 0-7, with 0 and 7 both Sunday.
 * When both day fields are restricted a date matches if either does.
 */

export type CronSchedule = Readonly<{
  expression: string;
  minutes: ReadonlySet<number>;
  hours: ReadonlySet<number>;
  daysOfMonth: ReadonlySet<number>;
  months: ReadonlySet<number>;
  daysOfWeek: ReadonlySet<number>;
  dayOfMonthRestricted: boolean;
  dayOfWeekRestricted: boolean;
}>;

export type ZonedParts = {
  minute: number;
  hour: number;
  day: number;
  month: number;
  weekday: number;
};

export class CronParseError extends Error {
  constructor(expression: string, detail: string) {
    super(`Invalid cron expression "${expression}": ${detail}`);
    this.name = "CronParseError";
  }
}

const MINUTE_MS = 60_000;

const WEEKDAYS: Record<string, number> = { Sun: 0, Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6 };

function parseField(expression: string, field: string, min: number, max: number): Set<number> {
  const values = new Set<number>();

  for (const part of field.split(",")) {
    const [rangePart, stepPart] = part.split("/");
    const step = stepPart === undefined ? 1 : Number(stepPart);
    if (!Number.isInteger(step) || step < 1) {
      throw new CronParseError(expression, `bad step in "${part}"`);
    }

    let start: number;
    let end: number;
    if (rangePart === "*") {
      start = min;
      end = max;
    } else if (rangePart.includes("-")) {
      const [a, b] = rangePart.split("-");
      start = Number(a);
      end = Number(b);
    } else {
      start = Number(rangePart);
      end = stepPart === undefined ? start : max;
    }

    if (!Number.isInteger(start) || !Number.isInteger(end) || start < min || end > max || start > end) {
      throw new CronParseError(expression, `"${part}" is outside ${min}-${max}`);
    }
    for (let v = start; v <= end; v += step) values.add(v);
  }

  return values;
}

export function parseCron(expression: string): CronSchedule {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new CronParseError(expression, `expected 5 fields, got ${fields.length}`);
  }
  const [minute, hour, dom, month, dow] = fields;

  const daysOfWeek = parseField(expression, dow, 0, 7);
  if (daysOfWeek.delete(7)) daysOfWeek.add(0);

  return {
    expression,
    minutes: parseField(expression, minute, 0, 59),
    hours: parseField(expression, hour, 0, 23),
    daysOfMonth: parseField(expression, dom, 1, 31),
    months: parseField(expression, month, 1, 12),
    daysOfWeek,
    dayOfMonthRestricted: dom !== "*",
    dayOfWeekRestricted: dow !== "*",
  };
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      minute: "numeric",
      hour: "numeric",
      day: "numeric",
      month: "numeric",
      weekday: "short",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function zonedParts(date: Date, timeZone: string): ZonedParts {
  const parts: ZonedParts = { minute: 0, hour: 0, day: 1, month: 1, weekday: 0 };
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    switch (part.type) {
      case "minute":
        parts.minute = Number(part.value);
        break;
      case "hour":
        parts.hour = Number(part.value) % 24;
        break;
      case "day":
        parts.day = Number(part.value);
        break;
      case "month":
        parts.month = Number(part.value);
        break;
      case "weekday":
        parts.weekday = WEEKDAYS[part.value] ?? 0;
        break;
    }
  }
  return parts;
}

export function matchesCron(schedule: CronSchedule, date: Date, timeZone: string): boolean {
  const p = zonedParts(date, timeZone);
  if (!schedule.minutes.has(p.minute) || !schedule.hours.has(p.hour) || !schedule.months.has(p.month)) {
    return false;
  }

  const domMatch = schedule.daysOfMonth.has(p.day);
  const dowMatch = schedule.daysOfWeek.has(p.weekday);
  if (schedule.dayOfMonthRestricted && schedule.dayOfWeekRestricted) return domMatch || dowMatch;
  return domMatch && dowMatch;
}

/**
 * Latest minute in (after, until] at which the schedule fires, or null.
 * Scans minute by minute backwards from `until`.
 */
export function latestFiringBetween(
  schedule: CronSchedule,
  after: Date,
  until: Date,
  timeZone: string,
): Date | null {
  const floor = Math.floor(until.getTime() / MINUTE_MS) * MINUTE_MS;
  for (let t = floor; t > after.getTime(); t -= MINUTE_MS) {
    const candidate = new Date(t);
    if (matchesCron(schedule, candidate, timeZone)) return candidate;
  }
  return null;
}
