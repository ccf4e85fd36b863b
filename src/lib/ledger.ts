import { normalizeDate, todayIso } from './date-helpers';
import { NotFoundError, ParseError, ValidationError } from './errors';
import { createLogger } from './log';
import { amountsEqual, parseAmount } from './money';
import { INCOME_CATEGORY, recordInputSchema, type LedgerRecord, type RecordInput } from './types';

const log = createLogger('ledger');

export type LedgerOptions = {
  records?: readonly LedgerRecord[];
  now?: () => Date; // clock for default dates
};

export const sameRecord = (a: LedgerRecord, b: LedgerRecord) =>
  a.date === b.date &&
  a.name === b.name &&
  a.category === b.category &&
  amountsEqual(a.amount, b.amount);

const freezeRecord = (r: LedgerRecord): LedgerRecord =>
  Object.freeze({ date: r.date, name: r.name, category: r.category, amount: r.amount });

/**
 * Validates form-style input and builds the record that would be stored.
 * Throws ValidationError for missing fields and ParseError for a bad
 * date or amount; nothing is mutated.
 */
export function buildRecord(input: RecordInput, now: Date = new Date()): LedgerRecord {
  const parsed = recordInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.message ?? 'Invalid record.', issue?.path.join('.'));
  }
  const { date, name, category, amount } = parsed.data;

  const value = parseAmount(amount);
  if (value === null) {
    throw new ParseError(`Amount "${amount}" is not a number.`, 'amount');
  }

  return {
    date: date ? normalizeDate(date) : todayIso(now),
    name,
    category,
    amount: value,
  };
}

/**
 * Ordered, in-memory list of transaction records. Insertion order is kept
 * and duplicates are allowed; records have no id, so deletes match by value.
 */
export class Ledger {
  private records: LedgerRecord[];
  private readonly now: () => Date;

  constructor(opts: LedgerOptions = {}) {
    this.records = (opts.records ?? []).map(freezeRecord);
    this.now = opts.now ?? (() => new Date());
  }

  get size() {
    return this.records.length;
  }

  add(input: RecordInput): LedgerRecord {
    const record = freezeRecord(buildRecord(input, this.now()));
    this.records.push(record);
    log.debug('added', record);
    return record;
  }

  addIncome(amount: string | number): LedgerRecord {
    return this.add({ name: INCOME_CATEGORY, category: INCOME_CATEGORY, amount });
  }

  /** Removes the first record structurally equal to `match`. */
  delete(match: LedgerRecord): LedgerRecord {
    const idx = this.records.findIndex((r) => sameRecord(r, match));
    if (idx < 0) {
      throw new NotFoundError(`No record matching ${match.date} "${match.name}" (${match.category}, ${match.amount}).`);
    }
    const [removed] = this.records.splice(idx, 1);
    log.debug('deleted', removed);
    return removed;
  }

  deleteAt(index: number): LedgerRecord {
    if (!Number.isInteger(index) || index < 0 || index >= this.records.length) {
      throw new NotFoundError(`No record at position ${index}.`);
    }
    const [removed] = this.records.splice(index, 1);
    log.debug('deleted at', index, removed);
    return removed;
  }

  replaceAll(records: readonly LedgerRecord[]): void {
    this.records = records.map(freezeRecord);
    log.debug('replaced contents', { count: this.records.length });
  }

  snapshot(): readonly LedgerRecord[] {
    return Object.freeze([...this.records]);
  }
}
