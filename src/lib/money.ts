
import Big from 'big.js';

// 20 decimals should be plenty; round half up like banks
Big.DP = 20;
Big.RM = Big.roundHalfUp;

/** Tolerance used when comparing two amounts for equality. */
export const EPS = 1e-9;

export const dec = (n?: number | string | null) => new Big(n ?? 0);

export const add = (a: Big, b: Big) => a.plus(b);
export const sub = (a: Big, b: Big) => a.minus(b);
export const mul = (a: Big, b: Big) => a.times(b);
export const div = (a: Big, b: Big) => {
    if (b.eq(0)) return dec(0); // Avoid division by zero
    return a.div(b);
}

export function toNum(v: Big | number | string | null | undefined): number {
  if (v == null) return 0;
  if (typeof v === 'number') return v;
  if (typeof v === 'string') {
    const n = Number(v);
    return Number.isNaN(n) ? 0 : n;
  }
  return v.toNumber();
}

// plain decimal or exponent notation, nothing else (no hex, no "Infinity")
const AMOUNT_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses user- or file-supplied amount text into a finite number.
 * Returns null when the text is not a plain decimal number.
 */
export function parseAmount(raw: string | number): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  const cleaned = raw.trim();
  if (!AMOUNT_RE.test(cleaned)) return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

/** Two fixed decimals, e.g. 45.5 -> "45.50". */
export const formatAmount = (n: number | Big) => (typeof n === 'number' ? dec(n) : n).toFixed(2);

export const amountsEqual = (a: number, b: number) => sub(dec(a), dec(b)).abs().lte(EPS);
