// Date parsing for entity extraction and argument repair
// Everything normalizes to YYYY-MM-DD; relative phrases resolve against a supplied clock

export interface DateRange {
  start: string;
  end: string;
}

export const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const MONTH_PATTERN = '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|jun(?:e)?|jul(?:y)?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';

const pad = (n: number) => String(n).padStart(2, '0');

export function isoDate(year: number, month: number, day: number): string | undefined {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return `${year}-${pad(month)}-${pad(day)}`;
}

export function monthIndex(name: string): number | undefined {
  const prefix = name.toLowerCase().slice(0, 3);
  const index = MONTHS.findIndex(m => m.startsWith(prefix));
  return index === -1 ? undefined : index + 1;
}

export function lastDayOfMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function monthRange(year: number, month: number): DateRange {
  return {
    start: `${year}-${pad(month)}-01`,
    end: `${year}-${pad(month)}-${pad(lastDayOfMonth(year, month))}`,
  };
}

/**
 * Normalizes a single date written as 2024-03-05, 2024/3/5, 2024.03.05,
 * 20240305, "March 5, 2024" or "5 March 2024".
 */
export function normalizeDate(text: string): string | undefined {
  const value = text.trim();

  let match = value.match(/^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})$/);
  if (match) return isoDate(Number(match[1]), Number(match[2]), Number(match[3]));

  match = value.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (match) return isoDate(Number(match[1]), Number(match[2]), Number(match[3]));

  match = value.match(new RegExp(`^${MONTH_PATTERN}\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})$`, 'i'));
  if (match) {
    const month = monthIndex(match[1]);
    return month ? isoDate(Number(match[3]), month, Number(match[2])) : undefined;
  }

  match = value.match(new RegExp(`^(\\d{1,2})(?:st|nd|rd|th)?\\s+${MONTH_PATTERN}\\.?,?\\s+(\\d{4})$`, 'i'));
  if (match) {
    const month = monthIndex(match[2]);
    return month ? isoDate(Number(match[3]), month, Number(match[1])) : undefined;
  }

  return undefined;
}

const DATE_TOKEN = new RegExp(
  [
    '\\b\\d{4}[-/.]\\d{1,2}[-/.]\\d{1,2}\\b',
    '\\b\\d{8}\\b',
    `\\b${MONTH_PATTERN}\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?,?\\s+\\d{4}\\b`,
    `\\b\\d{1,2}(?:st|nd|rd|th)?\\s+${MONTH_PATTERN}\\.?,?\\s+\\d{4}\\b`,
  ].join('|'),
  'gi',
);

/** Explicit calendar dates in order of appearance. */
export function findDates(text: string): string[] {
  const dates: string[] = [];
  for (const match of text.matchAll(DATE_TOKEN)) {
    const date = normalizeDate(match[0]);
    if (date) dates.push(date);
  }
  return dates;
}

// A month named without a year is the most recent one not after the clock
function inferYear(month: number, now: Date): number {
  const year = now.getUTCFullYear();
  return month > now.getUTCMonth() + 1 ? year - 1 : year;
}

/**
 * Month-level phrases: "March", "March 2024", "March to April 2024",
 * "last month", "this month", "Q1 2024", "first half of 2024", "second half".
 */
export function findMonthRange(text: string, now: Date): DateRange | undefined {
  const lower = text.toLowerCase();
  const thisYear = now.getUTCFullYear();
  const thisMonth = now.getUTCMonth() + 1;

  if (/\blast month\b/.test(lower)) {
    return thisMonth === 1 ? monthRange(thisYear - 1, 12) : monthRange(thisYear, thisMonth - 1);
  }
  if (/\bthis month\b/.test(lower)) {
    return monthRange(thisYear, thisMonth);
  }

  const yearAfter = (from: number) => {
    const m = lower.slice(from).match(/^\D{0,10}?(\d{4})\b/);
    return m ? Number(m[1]) : undefined;
  };

  const quarter = lower.match(/\bq([1-4])\b/);
  if (quarter) {
    const q = Number(quarter[1]);
    const year = yearAfter((quarter.index ?? 0) + quarter[0].length) ?? thisYear;
    return { start: monthRange(year, q * 3 - 2).start, end: monthRange(year, q * 3).end };
  }

  const half = lower.match(/\b(first|second) half\b/);
  if (half) {
    const year = yearAfter((half.index ?? 0) + half[0].length) ?? thisYear;
    return half[1] === 'first'
      ? { start: `${year}-01-01`, end: `${year}-06-30` }
      : { start: `${year}-07-01`, end: `${year}-12-31` };
  }

  const monthWords = [...lower.matchAll(new RegExp(`\\b${MONTH_PATTERN}\\b(?:\\s+(\\d{4}))?`, 'g'))]
    // "may" only counts as a month with a year after it
    .filter(m => m[1] !== 'may' || m[2] !== undefined);
  if (monthWords.length === 0) return undefined;

  const first = monthWords[0];
  const last = monthWords[monthWords.length - 1];
  const firstMonth = monthIndex(first[1]);
  const lastMonth = monthIndex(last[1]);
  if (!firstMonth || !lastMonth) return undefined;

  const lastYear = last[2] ? Number(last[2]) : first[2] ? Number(first[2]) : inferYear(lastMonth, now);
  const firstYear = first[2] ? Number(first[2]) : firstMonth <= lastMonth ? lastYear : lastYear - 1;

  return { start: monthRange(firstYear, firstMonth).start, end: monthRange(lastYear, lastMonth).end };
}
