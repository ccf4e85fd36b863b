import { z } from 'zod';

/** The category value that marks a record as income (compared case-insensitively). */
export const INCOME_CATEGORY = 'Income';

export interface LedgerRecord {
  date: string;      // 'YYYY-MM-DD' once normalized; imports may keep raw text
  name: string;
  category: string;
  amount: number;    // non-negative by convention, sign not enforced
}

export type Totals = {
  income: number;
  expense: number;
  balance: number;
};

export type GoalProgress =
  | { set: false }
  | { set: true; goal: number; balance: number; percent: number };

// Schema for adding a record from form input. Amount stays text here; parsing
// it is a separate step so a bad number reports as a parse failure.
export const recordInputSchema = z.object({
  date: z.string().trim().optional(),
  name: z.string({ required_error: "Name is required." }).trim().min(1, { message: "Name is required." }),
  category: z.string({ required_error: "Category is required." }).trim().min(1, { message: "Category is required." }),
  amount: z.union([
    z.number(),
    z.string().trim().min(1, { message: "Amount is required." }),
  ], { errorMap: () => ({ message: "Amount is required." }) }),
});

export type RecordInput = z.input<typeof recordInputSchema>;

export const goalInputSchema = z.string().trim().min(1, { message: "Goal amount is required." });
