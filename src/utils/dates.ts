const MS_PER_DAY = 86_400_000;

// day zero of spreadsheet serial dates (1900 date system)
const SPREADSHEET_EPOCH_MS = Date.UTC(1899, 11, 30);

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/i;
const YEAR_FIRST = /^(\d{4})[/.](\d{1,2})[/.](\d{1,2})(?:\s+[\d:.]+(?:\s*[AP]M)?)?$/i;
const COMPACT = /^(\d{4})(\d{2})(\d{2})$/;
const US_SLASHED = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+[\d:.]+(?:\s*[AP]M)?)?$/i;
const DOTTED = /^(\d{1,2})\.(\d{1,2})\.(\d{4})(?:\s+[\d:.]+)?$/;
const DAY_MONTH_NAME = /^(\d{1,2})[-\s]([a-z]{3,9})\.?[-\s,]+(\d{4})$/i;
const MONTH_NAME_DAY = /^([a-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})$/i;
const NUMERIC = /^\d+(?:\.\d+)?$/;

/**
 * Builds the UTC-midnight Date of a calendar day, or null when the
 * parts do not name a real day (2/30, month 13, ...).
 */
export const calendarDay = (year: number, month: number, day: number): Date | null => {
  if (year < 1900 || year > 9999) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
};

const monthFromName = (name: string): number | null => {
  const index = MONTHS.indexOf(name.slice(0, 3).toLowerCase());
  return index === -1 ? null : index + 1;
};

const truncateToDay = (epochMs: number): Date => new Date(Math.floor(epochMs / MS_PER_DAY) * MS_PER_DAY);

/**
 * Numbers are spreadsheet serial days, yyyymmdd integers, or epoch
 * timestamps in seconds, milliseconds or nanoseconds, told apart by
 * magnitude.
 */
const fromNumber = (value: number): Date | null => {
  if (!Number.isFinite(value) || value < 1) return null;
  if (value < 1e6) return truncateToDay(SPREADSHEET_EPOCH_MS + Math.floor(value) * MS_PER_DAY);
  if (value < 1e9) {
    if (!Number.isInteger(value) || value < 1e7 || value >= 1e8) return null;
    return calendarDay(Math.floor(value / 10000), Math.floor(value / 100) % 100, value % 100);
  }
  if (value < 1e11) return truncateToDay(value * 1000);
  if (value < 1e14) return truncateToDay(value);
  if (value >= 1e17 && value < 1e20) return truncateToDay(value / 1e6);
  return null;
};

const fromString = (text: string): Date | null => {
  let match = ISO_DATE.exec(text) ?? YEAR_FIRST.exec(text) ?? COMPACT.exec(text);
  if (match) {
    return calendarDay(Number(match[1]), Number(match[2]), Number(match[3]));
  }
  match = US_SLASHED.exec(text);
  if (match) {
    return calendarDay(Number(match[3]), Number(match[1]), Number(match[2]));
  }
  match = DOTTED.exec(text);
  if (match) {
    return calendarDay(Number(match[3]), Number(match[2]), Number(match[1]));
  }
  match = DAY_MONTH_NAME.exec(text);
  if (match) {
    const month = monthFromName(match[2]);
    return month === null ? null : calendarDay(Number(match[3]), month, Number(match[1]));
  }
  match = MONTH_NAME_DAY.exec(text);
  if (match) {
    const month = monthFromName(match[1]);
    return month === null ? null : calendarDay(Number(match[3]), month, Number(match[2]));
  }
  if (NUMERIC.test(text)) {
    return fromNumber(Number(text));
  }
  return null;
};

/**
 * Reads a cell as a calendar day. Date values are taken on their UTC day,
 * so a Date meant as a local calendar day should be built with Date.UTC.
 */
export const parseCalendarDate = (value: unknown): Date | null => {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : truncateToDay(value.getTime());
  }
  if (typeof value === 'number') {
    return fromNumber(value);
  }
  if (typeof value === 'string') {
    const text = value.trim();
    return text === '' ? null : fromString(text);
  }
  return null;
};

export const toDayKey = (date: Date): string => date.toISOString().slice(0, 10);

export const daysBetween = (from: Date, to: Date): number => Math.round((to.getTime() - from.getTime()) / MS_PER_DAY);
