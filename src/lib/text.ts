import type { Cell, TableRow } from '../types/table.ts';

/** Collapse runs of whitespace (newlines included) and trim. */
export function normalizeText(text: Cell | undefined): string {
  if (!text) return '';
  return text.replace(/\s+/g, ' ').trim();
}

/** Cell text at `col`, or null for a missing row, a short row or an empty cell. */
export function cellAt(row: TableRow | undefined, col: number): string | null {
  if (!row || col < 0 || col >= row.length) return null;
  return row[col] ?? null;
}

/** Trimmed column-0 label of a row. */
export function rowLabel(row: TableRow | undefined): string {
  return cellAt(row, 0)?.trim() ?? '';
}
