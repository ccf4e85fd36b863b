import * as Papa from 'papaparse';
import { tryNormalizeDate } from './date-helpers';
import { createLogger } from './log';
import { formatAmount, parseAmount } from './money';
import type { LedgerRecord } from './types';

const log = createLogger('csv');

export const CSV_HEADER = ['Date', 'Name', 'Category', 'Amount'] as const;

export type ParsedLedgerCsv = {
  records: LedgerRecord[];
  skipped: number; // data rows dropped for a wrong field count or a bad amount
};

/**
 * Ledger → CSV text. ISO dates, amounts with two decimals, standard quoting
 * (only fields holding a comma, quote, line break or edge space get quotes).
 */
export function serializeLedger(records: readonly LedgerRecord[]): string {
  const rows = records.map((r) => [r.date, r.name, r.category, formatAmount(r.amount)]);
  // array-of-rows form: no trailing line break from papaparse, whatever the data
  return Papa.unparse([[...CSV_HEADER], ...rows], { newline: '\n' }) + '\n';
}

const isHeaderRow = (row: string[]) =>
  row.length === CSV_HEADER.length &&
  row.every((cell, i) => cell.trim().toLowerCase() === CSV_HEADER[i].toLowerCase());

/**
 * CSV text → records. Tolerant on purpose: rows with the wrong number of
 * fields or an unparseable amount are skipped, and a date that matches none
 * of the known formats is kept verbatim.
 */
export function parseLedgerCsv(text: string): ParsedLedgerCsv {
  const content = text.startsWith('\ufeff') ? text.slice(1) : text;
  const result = Papa.parse<string[]>(content, { delimiter: ',', skipEmptyLines: true });
  if (result.errors.length > 0) {
    log.warn(`${result.errors.length} CSV syntax issue(s); first: ${result.errors[0].message} (row ${result.errors[0].row})`);
  }

  const rows = result.data;
  const start = rows.length > 0 && isHeaderRow(rows[0]) ? 1 : 0;

  const records: LedgerRecord[] = [];
  let skipped = 0;
  for (const row of rows.slice(start)) {
    if (row.length !== CSV_HEADER.length) {
      skipped++;
      continue;
    }
    const [rawDate, name, category, rawAmount] = row;
    const amount = parseAmount(rawAmount);
    if (amount === null) {
      skipped++;
      continue;
    }
    records.push({ date: tryNormalizeDate(rawDate) ?? rawDate, name, category, amount });
  }

  if (skipped > 0) log.warn(`skipped ${skipped} malformed row(s)`);
  log.debug('parsed', { records: records.length, skipped });
  return { records, skipped };
}
