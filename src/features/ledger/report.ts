import { formatAmount } from '@/lib/money';
import { formatGoalProgress } from '@/lib/utils/agg';
import type { LedgerSession } from './session';

export type Flags = {
  file?: string;
  month?: string;
  year?: string;
  category?: string;
  goal?: string;
  exportTo?: string;
};

export function parseFlags(args: string[]): Flags {
  const flags: Flags = {};
  for (const a of args) {
    const [key, ...rest] = a.split('=');
    const value = rest.join('=');
    if (key === '--file') flags.file = value;
    if (key === '--month') flags.month = value;
    if (key === '--year') flags.year = value;
    if (key === '--category') flags.category = value;
    if (key === '--goal') flags.goal = value;
    if (key === '--export') flags.exportTo = value;
  }
  return flags;
}

export function buildReport(session: LedgerSession, flags: Flags): string[] {
  const view = session.applyFilter({ month: flags.month, year: flags.year, category: flags.category });
  const totals = session.computeTotals(view);
  const lines = [
    `Records: ${view.length} of ${session.ledger.size}`,
    `Income:  ${formatAmount(totals.income)}`,
    `Expense: ${formatAmount(totals.expense)}`,
    `Balance: ${formatAmount(totals.balance)}`,
    `Goal:    ${formatGoalProgress(session.computeGoalProgress(view))}`,
    '',
    'By category:',
  ];
  for (const [category, amount] of session.computeCategoryBreakdown(view)) {
    lines.push(`  ${category}: ${formatAmount(amount)}`);
  }
  lines.push('', 'Monthly expenses:');
  for (const [month, amount] of session.computeMonthlyTrend(view)) {
    lines.push(`  ${month}: ${formatAmount(amount)}`);
  }
  return lines;
}
