/**
 * Canonical filter contracts + normalization
 *
 * Single source of truth for the "All" sentinel, the canonical `LedgerFilter`
 * shape, and a normalization function that turns raw UI values into a filter
 * while reporting what it corrected.
 */

export const ALL = 'All' as const;

// ── Canonical filter shape ──────────────────────────────────────────────────

export type LedgerFilter = {
  month?: number;     // 1-12; anything else matches nothing
  year?: number;
  category?: string;  // case-insensitive substring of the record's category
};

/** Raw values as they arrive from a form or query string. */
export type RawLedgerFilter = {
  month?: string | number | null;
  year?: string | number | null;
  category?: string | null;
};

// ── Normalization ───────────────────────────────────────────────────────────

const isUnset = (v: string | number | null | undefined) =>
  v == null || (typeof v === 'string' && (v.trim() === '' || v.trim().toLowerCase() === ALL.toLowerCase()));

const toInt = (v: string | number): number | null => {
  if (typeof v === 'number') return Number.isInteger(v) ? v : null;
  const cleaned = v.trim();
  return /^\d+$/.test(cleaned) ? Number(cleaned) : null;
};

/**
 * Text that is not a whole number is dropped (no constraint). A whole number
 * out of range (month 13, year 0) is kept, so the filter matches nothing.
 * Both cases land in `correctedFields`.
 */
export function normalizeLedgerFilter(
  input: RawLedgerFilter,
): { filter: LedgerFilter; correctedFields: string[] } {
  const correctedFields: string[] = [];
  const filter: LedgerFilter = {};

  if (!isUnset(input.month) && input.month != null) {
    const m = toInt(input.month);
    if (m !== null) filter.month = m;
    if (m === null || m < 1 || m > 12) correctedFields.push('month');
  }

  if (!isUnset(input.year) && input.year != null) {
    const y = toInt(input.year);
    if (y !== null) filter.year = y;
    if (y === null || y < 1) correctedFields.push('year');
  }

  if (!isUnset(input.category) && input.category != null) {
    filter.category = input.category.trim();
  }

  return { filter, correctedFields };
}
