import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InputNotFoundError, ValidationError } from './errors.ts';
import { createExtractSource, parseTableExtract, readTableExtract } from './tableSource.ts';

const extract = {
  source: 'schedule.pdf',
  pages: [
    { pageNo: 1, tables: [[['DOOR TYPE', 'MD\n1'], ['LOCATION', null]]] },
    { pageNo: 2, tables: [] },
  ],
};

describe('parseTableExtract', () => {
  it('accepts pages of tables with empty cells', () => {
    expect(parseTableExtract(JSON.stringify(extract))).toEqual(extract);
  });

  it('rejects invalid JSON', () => {
    expect(() => parseTableExtract('{ pages: ')).toThrow('Input is not valid JSON');
  });

  it('reports where the shape is wrong', () => {
    try {
      parseTableExtract(JSON.stringify({ pages: [{ pageNo: 0, tables: [] }] }));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.message).toBe('Input does not match the table extract format');
        expect(err.details?.map(d => d.field)).toEqual(['pages.0.pageNo']);
      }
    }
  });

  it('rejects non-text cells', () => {
    const bad = { pages: [{ pageNo: 1, tables: [[['DOOR TYPE', 5]]] }] };
    expect(() => parseTableExtract(JSON.stringify(bad))).toThrow(ValidationError);
  });
});

describe('readTableExtract', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'door-schedule-source-'));
    await writeFile(join(dir, 'extract.json'), JSON.stringify(extract), 'utf-8');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and validates a file', async () => {
    await expect(readTableExtract(join(dir, 'extract.json'))).resolves.toEqual(extract);
  });

  it('throws InputNotFoundError for a missing file', async () => {
    await expect(readTableExtract(join(dir, 'missing.json'))).rejects.toBeInstanceOf(InputNotFoundError);
  });
});

describe('createExtractSource', () => {
  it('serves pages by position', async () => {
    const source = createExtractSource(extract);
    expect(source.pageCount()).toBe(2);
    await expect(source.extractTables(1)).resolves.toEqual(extract.pages[0].tables);
    await expect(source.extractTables(2)).resolves.toEqual([]);
  });

  it('rejects a page out of range', async () => {
    await expect(createExtractSource(extract).extractTables(3)).rejects.toThrow(
      'Page 3 is out of range (1-2)',
    );
  });
});
