import { ParseError } from '../errors';
import type { ParseErrorPolicy } from '../types';

export type CellParse = { ok: true; value: number } | { ok: false };

// Plain decimal notation only: no hex, no Infinity/NaN, no thousands separators.
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseCell(cell: string | undefined): CellParse {
  if (cell == null) return { ok: false };
  const trimmed = cell.trim();
  if (!DECIMAL.test(trimmed)) return { ok: false };
  const value = Number(trimmed);
  return Number.isFinite(value) ? { ok: true, value } : { ok: false };
}

/**
 * Reads `row[column]` as a number under the given policy.
 * Returns `null` only for `skip_row`, meaning the caller should drop the row.
 */
export function resolveCell(
  row: readonly string[],
  column: number,
  policy: ParseErrorPolicy,
  context: string
): number | null {
  const cell = column < row.length ? row[column] : undefined;
  const parsed = parseCell(cell);
  if (parsed.ok) return parsed.value;

  switch (policy) {
    case 'zero':
      return 0;
    case 'skip_row':
      return null;
    case 'fail':
      throw new ParseError({ column, cell, context });
  }
}
