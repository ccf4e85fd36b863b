/**
 * Usage:
 *   npx tsx scripts/ledger-report.ts [--file=expenses.csv] [--month=1] [--year=2024]
 *                                    [--category=food] [--goal=5000] [--export=filtered.csv]
 *
 * Without --file the path comes from LEDGER_DATA_FILE (see .env.example).
 */

import 'dotenv/config';
import { loadConfig } from '@/lib/config';
import { LedgerSession } from '@/features/ledger/session';
import { buildReport, parseFlags } from '@/features/ledger/report';

function main() {
  const flags = parseFlags(process.argv.slice(2));
  const file = flags.file ?? loadConfig().dataFile;
  const session = new LedgerSession();

  const loaded = session.loadFromFile(file);
  if (!loaded.success) {
    console.error(`❌ ${loaded.message}`);
    process.exitCode = 1;
    return;
  }

  if (flags.goal) {
    const goal = session.setGoal(flags.goal);
    if (!goal.success) console.warn(`⚠️ Goal ignored: ${goal.message}`);
  }

  console.log(`📒 ${file}\n`);
  console.log(buildReport(session, flags).join('\n'));

  if (flags.exportTo) {
    const view = session.applyFilter({ month: flags.month, year: flags.year, category: flags.category });
    const saved = session.saveToFile(flags.exportTo, view);
    if (saved.success) console.log(`\n✅ Exported ${view.length} record(s) to ${flags.exportTo}`);
    else {
      console.error(`❌ ${saved.message}`);
      process.exitCode = 1;
    }
  }
}

main();
