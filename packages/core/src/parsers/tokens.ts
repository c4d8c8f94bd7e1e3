/**
 * Shared vocabulary for the text-scanning parsers: status phrases, date tokens, locations
 */

export const STATUS_PHRASE = /\b(out for delivery|delivered|in[ -]transit|picked[ -]up|exception)\b/i;
export const STATUS_PHRASE_GLOBAL = new RegExp(STATUS_PHRASE.source, 'gi');

const MONTHS = [
  'jan', 'feb', 'mar', 'apr', 'may', 'jun',
  'jul', 'aug', 'sep', 'oct', 'nov', 'dec',
];
const MONTH_NAME = '(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sept?(?:ember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';
const TIME = '(?:\\s+\\d{1,2}:\\d{2}(?::\\d{2})?(?:\\s*[ap]\\.?m\\.?)?)?';

const ISO_DATE = '\\d{4}-\\d{2}-\\d{2}(?:[T ]\\d{2}:\\d{2}(?::\\d{2})?(?:\\.\\d+)?(?:Z|[+-]\\d{2}:?\\d{2})?)?';
const US_DATE = `\\d{1,2}[/-]\\d{1,2}[/-](?:\\d{4}|\\d{2})${TIME}`;
const NAMED_DATE = `${MONTH_NAME}\\.?\\s+\\d{1,2},?\\s+\\d{4}${TIME}`;

export const DATE_TOKEN = new RegExp(`\\b(?:${ISO_DATE}|${US_DATE}|${NAMED_DATE})`, 'i');
export const DATE_TOKEN_GLOBAL = new RegExp(DATE_TOKEN.source, 'gi');

/** "Columbus, OH" or "Fort Wayne, IN 46801" (zip dropped) */
export const LOCATION = /\b([A-Z][A-Za-z.'-]*(?:\s[A-Z][A-Za-z.'-]*){0,2}),\s*([A-Z]{2})\b/;

function applyTime(hours: number, meridiem: string | undefined): number {
  if (!meridiem) return hours;
  const pm = meridiem.toLowerCase().startsWith('p');
  if (pm && hours < 12) return hours + 12;
  if (!pm && hours === 12) return 0;
  return hours;
}

function utcDate(year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31 || hours > 23 || minutes > 59 || seconds > 59) return null;
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  // reject rollovers such as 02/31
  return date.getUTCDate() === day ? date : null;
}

function parseTime(rest: string): [number, number, number] {
  const match = /(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([ap])\.?m\.?)?/i.exec(rest);
  if (!match) return [0, 0, 0];
  return [applyTime(Number(match[1]), match[4]), Number(match[2]), Number(match[3] ?? 0)];
}

/**
 * Parse a date token. Values without a zone are read as UTC; two-digit years are 20xx.
 */
export function parseDateToken(token: string): Date | null {
  const text = token.trim();

  const iso = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?(\.\d+)?(Z|[+-]\d{2}:?\d{2})?)?$/.exec(text);
  if (iso) {
    if (iso[8]) {
      const parsed = new Date(text.replace(' ', 'T'));
      return Number.isNaN(parsed.getTime()) ? null : parsed;
    }
    return utcDate(
      Number(iso[1]), Number(iso[2]), Number(iso[3]),
      Number(iso[4] ?? 0), Number(iso[5] ?? 0), Number(iso[6] ?? 0)
    );
  }

  const us = /^(\d{1,2})[/-](\d{1,2})[/-](\d{4}|\d{2})(.*)$/.exec(text);
  if (us) {
    const year = us[3].length === 2 ? 2000 + Number(us[3]) : Number(us[3]);
    return utcDate(year, Number(us[1]), Number(us[2]), ...parseTime(us[4]));
  }

  const named = /^([a-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})(.*)$/i.exec(text);
  if (named) {
    const month = MONTHS.indexOf(named[1].slice(0, 3).toLowerCase()) + 1;
    if (month === 0) return null;
    return utcDate(Number(named[3]), month, Number(named[2]), ...parseTime(named[4]));
  }

  return null;
}

export function findDate(text: string): { token: string; date: Date | null } | null {
  const match = DATE_TOKEN.exec(text);
  return match ? { token: match[0], date: parseDateToken(match[0]) } : null;
}

export function findLocation(text: string): string | null {
  const match = LOCATION.exec(text);
  return match ? `${match[1]}, ${match[2]}` : null;
}

/**
 * Remove date tokens and status phrases so what is left can be searched for a place
 */
export function withoutDatesAndStatus(text: string): string {
  return text
    .replace(DATE_TOKEN_GLOBAL, ' ')
    .replace(STATUS_PHRASE_GLOBAL, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}
