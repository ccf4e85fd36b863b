import fs from 'fs';
import path from 'path';
import { parseLedgerCsv, serializeLedger, type ParsedLedgerCsv } from './csv';
import { IOError, describeError } from './errors';
import { createLogger } from './log';
import type { LedgerRecord } from './types';

const log = createLogger('ledger-file');

export function readLedgerFile(file: string): ParsedLedgerCsv {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (e) {
    log.error(`read failed for ${file}:`, describeError(e));
    throw new IOError(`Could not read ${file}: ${describeError(e)}`, file, e);
  }
  return parseLedgerCsv(text);
}

/**
 * Writes the full ledger to `file`. The content goes to a sibling temp file
 * first and is renamed into place, so readers see either the old file or the
 * complete new one.
 */
export function writeLedgerFile(file: string, records: readonly LedgerRecord[]): void {
  const tmp = path.join(path.dirname(file), `.${path.basename(file)}.${process.pid}.tmp`);
  try {
    fs.writeFileSync(tmp, serializeLedger(records), 'utf-8');
    fs.renameSync(tmp, file);
  } catch (e) {
    fs.rmSync(tmp, { force: true });
    log.error(`write failed for ${file}:`, describeError(e));
    throw new IOError(`Could not write ${file}: ${describeError(e)}`, file, e);
  }
  log.debug(`wrote ${records.length} record(s) to ${file}`);
}

/** Creates `file` holding only the header row when it does not exist yet. */
export function ensureLedgerFile(file: string): boolean {
  if (fs.existsSync(file)) return false;
  writeLedgerFile(file, []);
  return true;
}
