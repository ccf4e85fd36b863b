import { LedgerError, ValidationError, ParseError, describeError } from '@/lib/errors';
import { normalizeLedgerFilter, type RawLedgerFilter } from '@/lib/filter-contracts';
import { filterRecords } from '@/lib/filters';
import { Ledger } from '@/lib/ledger';
import { ensureLedgerFile, readLedgerFile, writeLedgerFile } from '@/lib/ledger-file';
import { createLogger } from '@/lib/log';
import { parseAmount } from '@/lib/money';
import { goalInputSchema, type GoalProgress, type LedgerRecord, type Totals } from '@/lib/types';
import { byCategory, byMonth, computeTotals, goalProgress } from '@/lib/utils/agg';

const log = createLogger('ledger-session');

export type ActionResult<T = void> =
  | { success: true; data: T }
  | { success: false; error: LedgerError; message: string };

export type LedgerSessionOptions = {
  records?: readonly LedgerRecord[];
  goal?: number;
  /** When set, every successful mutation rewrites this file. */
  autoSavePath?: string;
  now?: () => Date;
};

const ok = <T>(data: T): ActionResult<T> => ({ success: true, data });

const fail = <T>(error: LedgerError): ActionResult<T> => ({ success: false, error, message: error.message });

/**
 * Runs `fn` and turns a thrown LedgerError into a failed result. Anything
 * else is a programming error and keeps propagating.
 */
function attempt<T>(action: string, fn: () => T): ActionResult<T> {
  try {
    return ok(fn());
  } catch (e) {
    if (e instanceof LedgerError) {
      log.debug(`${action} failed:`, e.message);
      return fail<T>(e);
    }
    log.error(`${action} crashed:`, describeError(e));
    throw e;
  }
}

/**
 * The ledger plus the savings goal, with the operations a front end calls.
 * Every operation returns a result object; filtered views are fresh arrays
 * and are not remembered between calls.
 */
export class LedgerSession {
  readonly ledger: Ledger;
  private goalAmount: number;
  private readonly autoSavePath?: string;

  constructor(opts: LedgerSessionOptions = {}) {
    this.ledger = new Ledger({ records: opts.records, now: opts.now });
    this.goalAmount = opts.goal ?? 0;
    this.autoSavePath = opts.autoSavePath;
  }

  get goal() {
    return this.goalAmount;
  }

  records(): readonly LedgerRecord[] {
    return this.ledger.snapshot();
  }

  addRecord(date: string | undefined, name: string, category: string, amountText: string): ActionResult<LedgerRecord> {
    return this.mutate('addRecord', () => this.ledger.add({ date, name, category, amount: amountText }));
  }

  addIncome(amountText: string): ActionResult<LedgerRecord> {
    return this.mutate('addIncome', () => this.ledger.addIncome(amountText));
  }

  deleteRecord(record: LedgerRecord): ActionResult<LedgerRecord> {
    return this.mutate('deleteRecord', () => this.ledger.delete(record));
  }

  deleteRecordAt(index: number): ActionResult<LedgerRecord> {
    return this.mutate('deleteRecordAt', () => this.ledger.deleteAt(index));
  }

  /** Replaces the whole ledger with the file's valid rows; returns how many were loaded. */
  loadFromFile(file: string): ActionResult<number> {
    return attempt('loadFromFile', () => {
      const { records, skipped } = readLedgerFile(file);
      this.ledger.replaceAll(records);
      log.debug(`loaded ${records.length} record(s) from ${file}, skipped ${skipped}`);
      return records.length;
    });
  }

  saveToFile(file: string, records: readonly LedgerRecord[] = this.ledger.snapshot()): ActionResult {
    return attempt('saveToFile', () => writeLedgerFile(file, records));
  }

  /** Creates the file with a header row when missing, then loads it. */
  openLedger(file: string): ActionResult<number> {
    const created = attempt('openLedger', () => ensureLedgerFile(file));
    if (!created.success) return created;
    if (created.data) log.debug(`created ${file}`);
    return this.loadFromFile(file);
  }

  applyFilter(raw: RawLedgerFilter = {}): readonly LedgerRecord[] {
    const { filter, correctedFields } = normalizeLedgerFilter(raw);
    if (correctedFields.length > 0) log.debug('corrected filter fields:', correctedFields);
    return filterRecords(this.ledger.snapshot(), filter);
  }

  computeTotals(records: readonly LedgerRecord[] = this.ledger.snapshot()): Totals {
    return computeTotals(records);
  }

  computeCategoryBreakdown(records: readonly LedgerRecord[] = this.ledger.snapshot()): Map<string, number> {
    return byCategory(records);
  }

  computeMonthlyTrend(records: readonly LedgerRecord[] = this.ledger.snapshot()): Map<string, number> {
    return byMonth(records);
  }

  /** Sets the savings goal; "0" clears it. A rejected value keeps the old goal. */
  setGoal(amountText: string): ActionResult<number> {
    return attempt('setGoal', () => {
      const parsed = goalInputSchema.safeParse(amountText);
      if (!parsed.success) throw new ValidationError(parsed.error.issues[0]?.message ?? 'Goal amount is required.', 'goal');
      const value = parseAmount(parsed.data);
      if (value === null) throw new ParseError(`Goal "${amountText}" is not a number.`, 'goal');
      if (value < 0) throw new ValidationError('Goal cannot be negative.', 'goal');
      this.goalAmount = value;
      return value;
    });
  }

  computeGoalProgress(records: readonly LedgerRecord[] = this.ledger.snapshot()): GoalProgress {
    return goalProgress(computeTotals(records).balance, this.goalAmount);
  }

  private mutate<T>(action: string, fn: () => T): ActionResult<T> {
    const result = attempt(action, fn);
    if (!result.success || !this.autoSavePath) return result;
    const saved = this.saveToFile(this.autoSavePath);
    if (!saved.success) {
      log.warn(`${action} applied in memory but auto-save failed:`, saved.message);
      return fail<T>(saved.error);
    }
    return result;
  }
}
