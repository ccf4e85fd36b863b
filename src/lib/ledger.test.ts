import { describe, expect, it } from 'vitest';
import { NotFoundError, ParseError, ValidationError } from './errors';
import { Ledger, sameRecord } from './ledger';
import type { LedgerRecord } from './types';

const rent: LedgerRecord = { date: '2024-01-15', name: 'Rent', category: 'Housing', amount: 1200 };
const salary: LedgerRecord = { date: '2024-01-01', name: 'Income', category: 'Income', amount: 50000 };

describe('Ledger.add', () => {
  it('stores the normalized record', () => {
    const ledger = new Ledger();
    const added = ledger.add({ date: '15/01/2024', name: ' Rent ', category: 'Housing', amount: '1200' });

    expect(added).toEqual(rent);
    expect(ledger.size).toBe(1);
    expect(ledger.snapshot()).toEqual([rent]);
  });

  it('defaults a blank date to today', () => {
    const ledger = new Ledger({ now: () => new Date(2024, 2, 5) });
    expect(ledger.add({ date: '  ', name: 'Coffee', category: 'Food', amount: 3.5 }).date).toBe('2024-03-05');
    expect(ledger.add({ name: 'Tea', category: 'Food', amount: '2' }).date).toBe('2024-03-05');
  });

  it('rejects a blank name without touching the ledger', () => {
    const ledger = new Ledger({ records: [rent] });
    let caught: unknown;
    try {
      ledger.add({ date: '2024-01-20', name: '   ', category: 'Food', amount: '5' });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).not.toBeInstanceOf(ParseError);
    if (caught instanceof ValidationError) expect(caught.field).toBe('name');
    expect(ledger.snapshot()).toEqual([rent]);
  });

  it('rejects a missing amount as a validation failure', () => {
    const ledger = new Ledger();
    expect(() => ledger.add({ name: 'Lunch', category: 'Food', amount: '' })).toThrow('Amount is required.');
    expect(ledger.size).toBe(0);
  });

  it('rejects an unparseable amount or date as a parse failure', () => {
    const ledger = new Ledger();
    expect(() => ledger.add({ date: '2024-01-02', name: 'Lunch', category: 'Food', amount: 'abc' })).toThrow(ParseError);
    expect(() => ledger.add({ date: 'yesterday', name: 'Lunch', category: 'Food', amount: '9' })).toThrow(ParseError);
    expect(ledger.size).toBe(0);
  });

  it('rejects a date with a 2-digit year', () => {
    const ledger = new Ledger();
    expect(() => ledger.add({ date: '15/01/24', name: 'Rent', category: 'Housing', amount: '1200' })).toThrow(ParseError);
    expect(ledger.size).toBe(0);
  });

  it('adds income under the Income category', () => {
    const ledger = new Ledger({ now: () => new Date(2024, 0, 1) });
    expect(ledger.addIncome('50000')).toEqual(salary);
  });
});

describe('Ledger.delete', () => {
  it('removes only the first structurally equal record', () => {
    const ledger = new Ledger({ records: [rent, salary, rent] });
    const removed = ledger.delete({ ...rent });

    expect(removed).toEqual(rent);
    expect(ledger.snapshot()).toEqual([salary, rent]);
  });

  it('matches amounts within a small tolerance', () => {
    const ledger = new Ledger({ records: [rent] });
    ledger.delete({ ...rent, amount: 1200.0000000001 });
    expect(ledger.size).toBe(0);
  });

  it('reports a missing record and leaves the ledger unchanged', () => {
    const ledger = new Ledger({ records: [rent, salary] });
    expect(() => ledger.delete({ ...rent, name: 'Mortgage' })).toThrow(NotFoundError);
    expect(() => ledger.delete({ ...rent, amount: 1200.01 })).toThrow(NotFoundError);
    expect(ledger.snapshot()).toEqual([rent, salary]);
  });

  it('removes by position', () => {
    const ledger = new Ledger({ records: [rent, salary] });
    expect(ledger.deleteAt(1)).toEqual(salary);
    expect(() => ledger.deleteAt(1)).toThrow(NotFoundError);
    expect(() => ledger.deleteAt(-1)).toThrow(NotFoundError);
    expect(ledger.snapshot()).toEqual([rent]);
  });
});

describe('Ledger contents', () => {
  it('replaces everything with a copy of the given records', () => {
    const ledger = new Ledger({ records: [rent] });
    const next = [salary];
    ledger.replaceAll(next);
    next.push(rent);

    expect(ledger.snapshot()).toEqual([salary]);
  });

  it('hands out frozen snapshots that do not follow later changes', () => {
    const ledger = new Ledger({ records: [rent] });
    const before = ledger.snapshot();
    ledger.add({ date: '2024-01-01', name: 'Income', category: 'Income', amount: '50000' });

    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before[0])).toBe(true);
    expect(before).toHaveLength(1);
    expect(ledger.snapshot()).toHaveLength(2);
  });

  it('compares records field by field', () => {
    expect(sameRecord(rent, { ...rent })).toBe(true);
    expect(sameRecord(rent, { ...rent, category: 'housing' })).toBe(false);
  });
});
