import type { TableRow } from '../types/table.ts';
import { cellAt } from './text.ts';
import { isDimensionToken } from './tokens.ts';

/**
 * Door-type text of column `col`, with a dimension the table extractor pushed
 * into one of the next `lookahead` columns appended to it.
 *
 * Only a cell that is exactly one dimension counts as a fragment, and only the
 * first one found is taken: "10S 1" + "000(W)x2190(H)".
 */
export function mergeContinuation(row: TableRow, col: number, lookahead: number): string {
  const text = cellAt(row, col) ?? '';
  const last = Math.min(row.length, col + 1 + lookahead);

  for (let next = col + 1; next < last; next++) {
    const fragment = cellAt(row, next);
    if (fragment && isDimensionToken(fragment.trim())) {
      return `${text} ${fragment}`;
    }
  }

  return text;
}
