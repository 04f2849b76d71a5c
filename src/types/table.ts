import { z } from 'zod/v4';

// ── Table source output ──
// A table source (PDF table extractor, OCR, spreadsheet export) yields per page
// a list of grids whose cells are text or null for an empty cell.

export const CellSchema = z.string().nullable();

export const TableSchema = z.array(z.array(CellSchema));

export const TablePageSchema = z.object({
  pageNo: z.number().int().positive(),
  tables: z.array(TableSchema),
});

export const TableExtractSchema = z.object({
  source: z.string().optional(),
  pages: z.array(TablePageSchema),
});

export type Cell = z.infer<typeof CellSchema>;
export type TableRow = Cell[];
export type Table = z.infer<typeof TableSchema>;
export type TablePage = z.infer<typeof TablePageSchema>;
export type TableExtract = z.infer<typeof TableExtractSchema>;

/**
 * Anything that can hand out the tables of a document page by page.
 * `extractTables` may reject for a single page; callers drop that page.
 */
export interface TableSource {
  pageCount(): number | Promise<number>;
  extractTables(pageNo: number): Promise<Table[]>;
}

/**
 * One labelled block of a door schedule table. Row indices point into the
 * table; `endRow` is exclusive.
 */
export interface SectionLayout {
  headerRow: number;
  endRow: number;
  fireRatingRow: number | null;
  descriptionRow: number | null;
  locationRow: number | null;
  remarksRow: number | null;
}
