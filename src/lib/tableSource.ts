import { readFile } from 'node:fs/promises';
import { TableExtractSchema } from '../types/table.ts';
import type { Table, TableExtract, TableSource } from '../types/table.ts';
import { InputNotFoundError, ValidationError } from './errors.ts';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Parse the JSON written by an external table extractor:
 * `{ "pages": [{ "pageNo": 1, "tables": [[["DOOR TYPE", "MD\n1"], ...]] }] }`.
 */
export function parseTableExtract(json: string): TableExtract {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    const reason = err instanceof Error ? err.message : 'unreadable JSON';
    throw new ValidationError('Input is not valid JSON', [{ message: reason }]);
  }

  const result = TableExtractSchema.safeParse(raw);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, 'Input does not match the table extract format');
  }
  return result.data;
}

export async function readTableExtract(path: string): Promise<TableExtract> {
  let json: string;
  try {
    json = await readFile(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) throw new InputNotFoundError(path);
    throw err;
  }
  return parseTableExtract(json);
}

/** Serve an in-memory extract page by page, numbering pages from 1 in file order. */
export function createExtractSource(extract: TableExtract): TableSource {
  return {
    pageCount: () => extract.pages.length,
    extractTables: async (pageNo: number): Promise<Table[]> => {
      const page = extract.pages[pageNo - 1];
      if (!page) throw new RangeError(`Page ${pageNo} is out of range (1-${extract.pages.length})`);
      return page.tables;
    },
  };
}
