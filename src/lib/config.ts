import { z } from 'zod';

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  LEDGER_DATA_FILE: z.string().trim().min(1).default('expenses.csv'),
  LEDGER_DEBUG: booleanFlag,
  NODE_ENV: z.string().optional(),
});

export type LedgerConfig = {
  dataFile: string;
  debug: boolean;
};

/**
 * Reads settings from the environment. Scripts import `dotenv/config` first,
 * so values from a local `.env` are visible here.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid ledger configuration: ${detail}`);
  }
  const { LEDGER_DATA_FILE, LEDGER_DEBUG, NODE_ENV } = parsed.data;
  return {
    dataFile: LEDGER_DATA_FILE,
    debug: LEDGER_DEBUG || NODE_ENV === 'development',
  };
}
