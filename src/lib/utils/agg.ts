import { monthKey } from '@/lib/date-helpers';
import { add, dec, div, mul, sub, toNum } from '@/lib/money';
import { INCOME_CATEGORY, type GoalProgress, type LedgerRecord, type Totals } from '@/lib/types';

export const isIncome = (r: Pick<LedgerRecord, 'category'>) =>
  r.category.toLowerCase() === INCOME_CATEGORY.toLowerCase();

export function computeTotals(records: readonly LedgerRecord[]): Totals {
  let income = dec(0);
  let expense = dec(0);
  for (const r of records) {
    if (isIncome(r)) income = add(income, dec(r.amount));
    else expense = add(expense, dec(r.amount));
  }
  return {
    income: toNum(income),
    expense: toNum(expense),
    balance: toNum(sub(income, expense)),
  };
}

// No clamping: overspending gives a negative percentage, overshooting > 100.
export function goalProgress(balance: number, goal: number): GoalProgress {
  if (!(goal > 0)) return { set: false };
  const percent = mul(div(dec(balance), dec(goal)), dec(100));
  return { set: true, goal, balance, percent: toNum(percent) };
}

export const formatGoalProgress = (p: GoalProgress) => (p.set ? `${p.percent.toFixed(1)}%` : 'Not set');

/** Sum per category as typed (case-sensitive), in order of first appearance. */
export function byCategory(records: readonly LedgerRecord[]): Map<string, number> {
  const sums = new Map<string, ReturnType<typeof dec>>();
  for (const r of records) {
    sums.set(r.category, add(sums.get(r.category) ?? dec(0), dec(r.amount)));
  }
  return new Map([...sums].map(([k, v]): [string, number] => [k, toNum(v)]));
}

/** Expense sums per 'YYYY-MM', keys ascending. Undatable records are left out. */
export function byMonth(records: readonly LedgerRecord[]): Map<string, number> {
  const buckets = new Map<string, ReturnType<typeof dec>>();
  for (const r of records) {
    if (isIncome(r)) continue;
    const key = monthKey(r.date);
    if (!key) continue;
    buckets.set(key, add(buckets.get(key) ?? dec(0), dec(r.amount)));
  }
  return new Map(
    [...buckets.entries()]
      .sort((a, b) => a[0].localeCompare(b[0]))
      .map(([k, v]): [string, number] => [k, toNum(v)]),
  );
}
