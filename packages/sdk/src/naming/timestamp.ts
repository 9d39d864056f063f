export type FilenameTimestamp = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  // Signed UTC offset in minutes, e.g. -420 for -07-00.
  offsetMinutes: number;
  // The instant in UTC milliseconds.
  epochMs: number;
};

export type TimestampFields = Omit<FilenameTimestamp, "epochMs">;

const MS_PER_DAY = 86_400_000;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31;
}

// Returns a reason string for the first impossible field, or undefined if the fields form a real instant.
export function timestampProblem(f: TimestampFields): string | undefined {
  if (f.month < 1 || f.month > 12) return `month ${f.month} out of range`;
  if (f.day < 1 || f.day > daysInMonth(f.year, f.month)) return `day ${f.day} out of range for ${f.year}-${f.month}`;
  if (f.hour > 23) return `hour ${f.hour} out of range`;
  if (f.minute > 59) return `minute ${f.minute} out of range`;
  if (f.second > 59) return `second ${f.second} out of range`;
  return undefined;
}

export function offsetProblem(hours: number, minutes: number): string | undefined {
  if (hours > 23) return `UTC offset hours ${hours} out of range`;
  if (minutes > 59) return `UTC offset minutes ${minutes} out of range`;
  return undefined;
}

export function toEpochMs(f: TimestampFields): number {
  // Date.UTC maps years 0-99 to 1900-1999; setUTCFullYear does not.
  const d = new Date(0);
  d.setUTCFullYear(f.year, f.month - 1, f.day);
  d.setUTCHours(f.hour, f.minute, f.second, 0);
  return d.getTime() - f.offsetMinutes * 60_000;
}

export function utcYearAndDayOfYear(epochMs: number): { year: number; dayOfYear: number } {
  const d = new Date(epochMs);
  const year = d.getUTCFullYear();
  const jan1 = new Date(0);
  jan1.setUTCFullYear(year, 0, 1);
  const dayOfYear = Math.floor((epochMs - jan1.getTime()) / MS_PER_DAY) + 1;
  return { year, dayOfYear };
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

// RFC 3339 in the filename's own offset, e.g. 2014-05-15T17:07:08-07:00.
// A zero offset is always rendered +00:00.
export function formatRfc3339(t: FilenameTimestamp): string {
  const sign = t.offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(t.offsetMinutes);
  const offset = `${sign}${pad2(Math.trunc(abs / 60))}:${pad2(abs % 60)}`;
  const date = `${String(t.year).padStart(4, "0")}-${pad2(t.month)}-${pad2(t.day)}`;
  return `${date}T${pad2(t.hour)}:${pad2(t.minute)}:${pad2(t.second)}${offset}`;
}
