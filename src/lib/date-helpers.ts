
import { format, isValid, parse, parseISO } from 'date-fns';
import { ParseError } from './errors';

/**
 * Accepted textual date formats, in priority order. The first format that
 * parses wins, so `02/03/2024` is read day-first as 2 March 2024. Keep the
 * order stable: files written by earlier versions depend on it.
 */
export const DATE_FORMATS = ['yyyy-MM-dd', 'dd-MM-yyyy', 'dd/MM/yyyy', 'yyyy/MM/dd'] as const;

export const CANONICAL_DATE_FORMAT = 'yyyy-MM-dd';

// date-fns reads `yyyy` as 1-4 digits; each format must see a full 4-digit year
const FORMAT_SHAPES: Record<(typeof DATE_FORMATS)[number], RegExp> = {
  'yyyy-MM-dd': /^\d{4}-\d{1,2}-\d{1,2}$/,
  'dd-MM-yyyy': /^\d{1,2}-\d{1,2}-\d{4}$/,
  'dd/MM/yyyy': /^\d{1,2}\/\d{1,2}\/\d{4}$/,
  'yyyy/MM/dd': /^\d{4}\/\d{1,2}\/\d{1,2}$/,
};

// extended ISO date, optionally followed by a time
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}(T|$)/;

// date-fns needs a reference date to fill missing fields; every format above is complete
const REFERENCE_DATE = new Date(2000, 0, 1);

export const tryNormalizeDate = (text: string): string | null => {
  const cleaned = text.trim();
  if (!cleaned) return null;
  for (const fmt of DATE_FORMATS) {
    if (!FORMAT_SHAPES[fmt].test(cleaned)) continue;
    const d = parse(cleaned, fmt, REFERENCE_DATE);
    if (isValid(d)) return format(d, CANONICAL_DATE_FORMAT);
  }
  return null;
};

export function normalizeDate(text: string): string {
  const iso = tryNormalizeDate(text);
  if (iso === null) {
    throw new ParseError(`Unrecognized date "${text}". Expected one of: ${DATE_FORMATS.join(', ')}.`, 'date');
  }
  return iso;
}

/**
 * Resolves a stored date to a calendar Date for month/year comparisons.
 * Falls back to ISO parsing for `YYYY-MM-DDTHH:mm...` date-times when none
 * of the known formats match; null means the record has no usable date.
 */
export function parseLedgerDate(text: string): Date | null {
  const iso = tryNormalizeDate(text);
  if (iso) return parse(iso, CANONICAL_DATE_FORMAT, REFERENCE_DATE);
  const cleaned = text.trim();
  if (!ISO_DATE_TIME.test(cleaned)) return null;
  const fallback = parseISO(cleaned);
  return isValid(fallback) ? fallback : null;
}

export const todayIso = (now: Date = new Date()) => format(now, CANONICAL_DATE_FORMAT);

/** 'YYYY-MM' bucket key for a stored date, or null when it cannot be parsed. */
export const monthKey = (text: string): string | null => {
  const d = parseLedgerDate(text);
  return d ? format(d, 'yyyy-MM') : null;
};
