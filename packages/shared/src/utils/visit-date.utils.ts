// ============================================================================
// Patient-Visit Ingestion: Visit Date Utilities
// ============================================================================

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

interface DatePattern {
  label: string;
  regex: RegExp;
  /** Capture-group index of year, month and day. */
  groups: { year: number; month: number; day: number };
}

/**
 * Accepted visit date layouts, tried in order. The first layout whose shape
 * matches and yields a real calendar date wins.
 */
export const VISIT_DATE_PATTERNS: readonly DatePattern[] = [
  { label: 'YYYY-MM-DD', regex: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, groups: { year: 1, month: 2, day: 3 } },
  { label: 'DD-MM-YYYY', regex: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, groups: { year: 3, month: 2, day: 1 } },
  { label: 'DD/MM/YYYY', regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, groups: { year: 3, month: 2, day: 1 } },
  { label: 'YYYY/MM/DD', regex: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, groups: { year: 1, month: 2, day: 3 } },
];

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

const DAY_NAMES = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isValidCalendarDate({ year, month, day }: CalendarDate): boolean {
  if (year < 1 || month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInMonth(year, month);
}

/**
 * Parse a visit date against {@link VISIT_DATE_PATTERNS}.
 * Returns null when no layout produces a valid date.
 */
export function parseVisitDate(value: string): CalendarDate | null {
  const input = value.trim();

  for (const pattern of VISIT_DATE_PATTERNS) {
    const match = pattern.regex.exec(input);
    if (!match) continue;

    const candidate: CalendarDate = {
      year: Number(match[pattern.groups.year]),
      month: Number(match[pattern.groups.month]),
      day: Number(match[pattern.groups.day]),
    };
    if (isValidCalendarDate(candidate)) {
      return candidate;
    }
  }

  return null;
}

/** Date dimension key: 2024-05-15 becomes 20240515. */
export function toDateId({ year, month, day }: CalendarDate): number {
  return year * 10000 + month * 100 + day;
}

export function toIsoDate({ year, month, day }: CalendarDate): string {
  return [
    String(year).padStart(4, '0'),
    String(month).padStart(2, '0'),
    String(day).padStart(2, '0'),
  ].join('-');
}

export interface DateAttributes {
  dateId: number;
  fullDate: string;
  day: number;
  month: number;
  year: number;
  quarter: number;
  monthName: string;
  dayName: string;
  isWeekend: boolean;
}

/**
 * Calendar attributes stored on the date dimension row.
 * Weekday is computed in UTC.
 */
export function describeCalendarDate(date: CalendarDate): DateAttributes {
  const utc = new Date(0);
  utc.setUTCFullYear(date.year, date.month - 1, date.day);
  const weekday = utc.getUTCDay();

  return {
    dateId: toDateId(date),
    fullDate: toIsoDate(date),
    day: date.day,
    month: date.month,
    year: date.year,
    quarter: Math.floor((date.month - 1) / 3) + 1,
    monthName: MONTH_NAMES[date.month - 1],
    dayName: DAY_NAMES[weekday],
    isWeekend: weekday === 0 || weekday === 6,
  };
}
