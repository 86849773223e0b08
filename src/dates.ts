import { format, isValid, parse } from 'date-fns';
import { DateFidelity, GedcomDate } from './types.js';

// Only used to fill fields a format leaves out; never shows up in output
const REFERENCE_DATE = new Date(2000, 0, 1);

const APPROXIMATE_PREFIX = /^(ABT|ABOUT|CAL|EST|BEF|AFT)\s+(.+)$/;
const BETWEEN_PATTERN = /^BET\s+(.+?)\s+AND\s+(.+)$/;
const FROM_TO_PATTERN = /^FROM\s+(.+?)\s+TO\s+(.+)$/;
const FROM_PATTERN = /^FROM\s+(.+)$/;
const TO_PATTERN = /^TO\s+(.+)$/;

const YEAR_PATTERN = /^\d{3,4}$/;
const MONTH_YEAR_PATTERN = /^[A-Z]{3}\s\d{3,4}$/;
const DAY_MONTH_YEAR_PATTERN = /^\d{1,2}\s[A-Z]{3}\s\d{3,4}$/;

interface SimpleDate {
  value: string;
  fidelity: DateFidelity;
}

/**
 * Read a plain calendar date: "14 OCT 1895", "OCT 1895" or "1895".
 */
function parseSimpleDate(text: string): SimpleDate | null {
  if (YEAR_PATTERN.test(text)) {
    return { value: text.padStart(4, '0'), fidelity: 'year-only' };
  }
  if (MONTH_YEAR_PATTERN.test(text)) {
    const parsed = tryParse(normalizeMonthTokens(text), 'MMM yyyy');
    return parsed ? { value: format(parsed, 'yyyy-MM'), fidelity: 'month' } : null;
  }
  if (DAY_MONTH_YEAR_PATTERN.test(text)) {
    const parsed = tryParse(normalizeMonthTokens(text), 'd MMM yyyy');
    return parsed ? { value: format(parsed, 'yyyy-MM-dd'), fidelity: 'exact' } : null;
  }
  return null;
}

function tryParse(value: string, formatToken: string): Date | null {
  try {
    const parsed = parse(value, formatToken, REFERENCE_DATE);
    return isValid(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

// "OCT" -> "Oct"
function normalizeMonthTokens(value: string): string {
  return value
    .split(' ')
    .map(token => /^[A-Z]+$/.test(token) ? token.charAt(0) + token.slice(1).toLowerCase() : token)
    .join(' ');
}

function unparsed(text: string): GedcomDate {
  return { text, fidelity: 'unparsed' };
}

function range(text: string, qualifier: string, start: string | undefined, end: string | undefined): GedcomDate {
  const startDate = start !== undefined ? parseSimpleDate(start) : undefined;
  const endDate = end !== undefined ? parseSimpleDate(end) : undefined;
  if (startDate === null || endDate === null) {
    return unparsed(text);
  }
  const date: GedcomDate = { text, fidelity: 'range', qualifier };
  if (startDate) date.value = startDate.value;
  if (endDate) date.end = endDate.value;
  return date;
}

/**
 * Normalize a GEDCOM DATE value. Text that cannot be read is kept with
 * fidelity 'unparsed' rather than rejected.
 */
export function parseGedcomDate(raw: string): GedcomDate {
  const text = raw.trim();
  const upper = text.toUpperCase().replace(/\s+/g, ' ');

  let match = upper.match(BETWEEN_PATTERN);
  if (match) return range(text, 'BET', match[1], match[2]);

  match = upper.match(FROM_TO_PATTERN);
  if (match) return range(text, 'FROM', match[1], match[2]);

  match = upper.match(FROM_PATTERN);
  if (match) return range(text, 'FROM', match[1], undefined);

  match = upper.match(TO_PATTERN);
  if (match) return range(text, 'TO', undefined, match[1]);

  match = upper.match(APPROXIMATE_PREFIX);
  if (match) {
    const inner = parseSimpleDate(match[2]);
    return inner
      ? { text, fidelity: 'approximate', value: inner.value, qualifier: match[1] }
      : unparsed(text);
  }

  const simple = parseSimpleDate(upper);
  return simple ? { text, fidelity: simple.fidelity, value: simple.value } : unparsed(text);
}

/**
 * Year of a date's normalized start (or end, for "TO x"), if known.
 */
export function dateYear(date: GedcomDate | undefined): string | undefined {
  return (date?.value ?? date?.end)?.slice(0, 4);
}
