import { getMonth, getYear } from 'date-fns';
import { parseLedgerDate } from './date-helpers';
import type { LedgerFilter } from './filter-contracts';
import type { LedgerRecord } from './types';

/**
 * Returns a new array with the records matching every set predicate, in
 * ledger order. Records whose date cannot be read are never included, even
 * when no month/year predicate is set.
 */
export function filterRecords(records: readonly LedgerRecord[], filter: LedgerFilter = {}): LedgerRecord[] {
  const needle = filter.category?.toLowerCase() ?? '';
  return records.filter((r) => {
    const d = parseLedgerDate(r.date);
    if (!d) return false;
    if (filter.month !== undefined && getMonth(d) + 1 !== filter.month) return false;
    if (filter.year !== undefined && getYear(d) !== filter.year) return false;
    if (needle && !r.category.toLowerCase().includes(needle)) return false;
    return true;
  });
}
