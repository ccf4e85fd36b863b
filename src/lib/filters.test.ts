import { describe, expect, it } from 'vitest';
import { normalizeLedgerFilter } from './filter-contracts';
import { filterRecords } from './filters';
import type { LedgerRecord } from './types';

const rent: LedgerRecord = { date: '2024-01-15', name: 'Rent', category: 'Housing', amount: 1200 };
const salary: LedgerRecord = { date: '2024-01-01', name: 'Income', category: 'Income', amount: 50000 };
const ledger = [rent, salary];

describe('filterRecords', () => {
  it('combines month, year and category substring', () => {
    expect(filterRecords(ledger, { month: 1, year: 2024, category: 'hous' })).toEqual([rent]);
  });

  it('returns the full ledger in order when nothing is set', () => {
    const view = filterRecords(ledger, {});
    expect(view).toEqual(ledger);
    expect(view).not.toBe(ledger);
  });

  it('matches categories case-insensitively', () => {
    expect(filterRecords(ledger, { category: 'INC' })).toEqual([salary]);
  });

  it('filters on month and year', () => {
    const march: LedgerRecord = { date: '2023-03-09', name: 'Train', category: 'Travel', amount: 40 };
    expect(filterRecords([rent, march], { month: 3 })).toEqual([march]);
    expect(filterRecords([rent, march], { year: 2024 })).toEqual([rent]);
    expect(filterRecords([rent, march], { month: 2 })).toEqual([]);
  });

  it('drops records without a readable date', () => {
    const broken: LedgerRecord = { date: 'sometime', name: 'Coffee', category: 'Food', amount: 3 };
    expect(filterRecords([broken, rent], {})).toEqual([rent]);
  });

  it('leaves out dates that are only a year, a year-month or basic ISO', () => {
    const yearOnly: LedgerRecord = { date: '2024', name: 'Gift', category: 'Other', amount: 10 };
    const yearMonth: LedgerRecord = { date: '2024-01', name: 'Book', category: 'Other', amount: 12 };
    const basic: LedgerRecord = { date: '20240115', name: 'Cinema', category: 'Other', amount: 9 };
    expect(filterRecords([yearOnly, yearMonth, basic, rent], { month: 1 })).toEqual([rent]);
    expect(filterRecords([yearOnly, yearMonth, basic], {})).toEqual([]);
  });

  it('leaves out dates with a 2-digit year', () => {
    const short: LedgerRecord = { date: '15/01/24', name: 'Rent', category: 'Housing', amount: 1200 };
    expect(filterRecords([short, rent], { year: 2024 })).toEqual([rent]);
  });

  it('reads non-canonical and ISO date-time values', () => {
    const imported: LedgerRecord = { date: '2024-01-20T08:00:00', name: 'Taxi', category: 'Travel', amount: 15 };
    const slashed: LedgerRecord = { date: '03/01/2024', name: 'Bus', category: 'Travel', amount: 2 };
    expect(filterRecords([imported, slashed], { month: 1, year: 2024 })).toEqual([imported, slashed]);
  });
});

describe('normalizeLedgerFilter', () => {
  it('treats All and blanks as unset', () => {
    expect(normalizeLedgerFilter({ month: 'All', year: '', category: 'all' })).toEqual({ filter: {}, correctedFields: [] });
    expect(normalizeLedgerFilter({})).toEqual({ filter: {}, correctedFields: [] });
  });

  it('parses form values', () => {
    expect(normalizeLedgerFilter({ month: '01', year: '2024', category: ' hous ' })).toEqual({
      filter: { month: 1, year: 2024, category: 'hous' },
      correctedFields: [],
    });
    expect(normalizeLedgerFilter({ month: 12, year: 1999 }).filter).toEqual({ month: 12, year: 1999 });
  });

  it('drops text that is not a whole number and reports it', () => {
    expect(normalizeLedgerFilter({ month: 'abc', year: 'abc' })).toEqual({
      filter: {},
      correctedFields: ['month', 'year'],
    });
  });

  it('rejects hex, exponent and fractional notation', () => {
    expect(normalizeLedgerFilter({ month: '0x3', year: '1e3' })).toEqual({
      filter: {},
      correctedFields: ['month', 'year'],
    });
    expect(normalizeLedgerFilter({ month: '2.5', year: 2024.5 })).toEqual({
      filter: {},
      correctedFields: ['month', 'year'],
    });
  });

  it('keeps out-of-range whole numbers so they match nothing', () => {
    const { filter, correctedFields } = normalizeLedgerFilter({ month: '13', year: '0' });
    expect(filter).toEqual({ month: 13, year: 0 });
    expect(correctedFields).toEqual(['month', 'year']);
    expect(filterRecords(ledger, filter)).toEqual([]);
  });
});
