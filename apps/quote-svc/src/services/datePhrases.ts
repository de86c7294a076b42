/**
 * Best-effort resolution of date phrases found in chat messages.
 *
 * Matchers run in the order of DATE_PHRASE_MATCHERS and the first one that
 * resolves wins, wherever it sits in the text: explicit dates beat weekend
 * phrases, which beat today/tomorrow, which beat weekday names.
 */

import { IsoDate, addDays, dayOfWeek, formatIsoDate, isIsoDate, nextWeekday } from '@charterquote/shared';

export interface DatePhraseMatcher {
  name: string;
  pattern: RegExp;
  resolve(match: RegExpExecArray, reference: IsoDate): IsoDate | undefined;
}

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12
};

const MONTH_NAME =
  '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';
const WEEKDAY_NAME = '(sun|mon|tues|wednes|thurs|fri|satur)day';
const WEEKDAY_STEMS = ['sun', 'mon', 'tues', 'wednes', 'thurs', 'fri', 'satur'];
const SATURDAY = 6;

const monthNumber = (name: string) => MONTHS[name.slice(0, 3).toLowerCase()];
const weekdayNumber = (stem: string) => WEEKDAY_STEMS.indexOf(stem.toLowerCase());

function expandYear(year: string): number {
  const value = Number(year);
  return year.length === 2 ? 2000 + value : value;
}

/**
 * A month/day with no year means its next occurrence on or after the reference.
 */
function resolveMonthDay(month: number, day: number, reference: IsoDate, year?: number): IsoDate | undefined {
  const referenceYear = Number(reference.slice(0, 4));
  const candidate = formatIsoDate(year ?? referenceYear, month, day);
  if (!isIsoDate(candidate)) return undefined;
  if (year !== undefined || candidate >= reference) return candidate;

  const nextYear = formatIsoDate(referenceYear + 1, month, day);
  return isIsoDate(nextYear) ? nextYear : undefined;
}

/**
 * Day of the week after the reference's Monday-to-Sunday week.
 */
function weekdayOfFollowingWeek(reference: IsoDate, weekday: number): IsoDate {
  const isoDay = dayOfWeek(reference) || 7; // Monday = 1 ... Sunday = 7
  const nextMonday = addDays(reference, 8 - isoDay);
  return addDays(nextMonday, (weekday + 6) % 7);
}

export const DATE_PHRASE_MATCHERS: DatePhraseMatcher[] = [
  {
    name: 'iso-date',
    pattern: /\b(\d{4}-\d{2}-\d{2})\b/,
    resolve: (match) => (isIsoDate(match[1]) ? match[1] : undefined)
  },
  {
    name: 'month-day',
    pattern: new RegExp(`\\b${MONTH_NAME}\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?(?:,?\\s+(\\d{4}))?\\b`, 'i'),
    resolve: (match, reference) =>
      resolveMonthDay(monthNumber(match[1]), Number(match[2]), reference, match[3] ? Number(match[3]) : undefined)
  },
  {
    name: 'day-month',
    pattern: new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:of\\s+)?${MONTH_NAME}\\b\\.?(?:,?\\s+(\\d{4}))?`, 'i'),
    resolve: (match, reference) =>
      resolveMonthDay(monthNumber(match[2]), Number(match[1]), reference, match[3] ? Number(match[3]) : undefined)
  },
  {
    name: 'numeric',
    pattern: /\b(\d{1,2})\/(\d{1,2})(?:\/(\d{4}|\d{2}))?\b/,
    resolve: (match, reference) =>
      resolveMonthDay(Number(match[1]), Number(match[2]), reference, match[3] ? expandYear(match[3]) : undefined)
  },
  {
    name: 'next-weekend',
    pattern: /\bnext\s+weekend\b/i,
    resolve: (_match, reference) => nextWeekday(reference, SATURDAY)
  },
  {
    name: 'this-weekend',
    pattern: /\b(?:this\s+)?weekend\b/i,
    resolve: (_match, reference) => (dayOfWeek(reference) === SATURDAY ? reference : nextWeekday(reference, SATURDAY))
  },
  {
    name: 'relative-day',
    pattern: /\b(today|tonight|tomorrow)\b/i,
    resolve: (match, reference) => (match[1].toLowerCase() === 'tomorrow' ? addDays(reference, 1) : reference)
  },
  {
    name: 'next-weekday',
    pattern: new RegExp(`\\bnext\\s+${WEEKDAY_NAME}\\b`, 'i'),
    resolve: (match, reference) => weekdayOfFollowingWeek(reference, weekdayNumber(match[1]))
  },
  {
    name: 'weekday',
    pattern: new RegExp(`\\b${WEEKDAY_NAME}\\b`, 'i'),
    resolve: (match, reference) => nextWeekday(reference, weekdayNumber(match[1]))
  }
];

export function parseDatePhrase(text: string, reference: IsoDate): IsoDate | undefined {
  for (const matcher of DATE_PHRASE_MATCHERS) {
    const match = matcher.pattern.exec(text);
    if (!match) continue;

    const resolved = matcher.resolve(match, reference);
    if (resolved) return resolved;
  }
  return undefined;
}
