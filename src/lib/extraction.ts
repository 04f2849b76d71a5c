import type { DoorRecord, DoorSplit, ExtractionProgress } from '../types/door.ts';
import type { SectionLayout, Table, TableExtract, TablePage, TableSource } from '../types/table.ts';
import { DEFAULT_CONFIG, type ExtractionConfig } from './config.ts';
import { mergeContinuation } from './continuation.ts';
import { parseDoorType } from './doorType.ts';
import { TableExtractionError, errorMessage } from './errors.ts';
import { isMultiDoor, splitMultiDoor } from './multiDoor.ts';
import { postProcessRecords } from './postProcess.ts';
import { readSectionFields, resolveSections } from './sectionResolver.ts';
import { cellAt } from './text.ts';
import { isValidDoorRecord } from './validator.ts';

export type ExtractionLogger = Pick<Console, 'info' | 'warn' | 'error'>;

export const silentLogger: ExtractionLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface TableExtractOptions {
  config?: ExtractionConfig;
  logger?: ExtractionLogger;
}

export interface ExtractOptions extends TableExtractOptions {
  /** Called with the error of every table or page whose output was dropped. */
  onTableError?: (error: TableExtractionError) => void;
  onProgress?: (progress: ExtractionProgress) => void;
  /** Run the label clean-up and dimension back-fill pass. Default true. */
  postProcess?: boolean;
}

// ── Per table ──

/**
 * Door records of one table, in section then column then split order.
 * Only records that pass validation are returned.
 */
export function extractDoorsFromTable(table: Table, options: TableExtractOptions = {}): DoorRecord[] {
  const config = options.config ?? DEFAULT_CONFIG;
  const logger = options.logger ?? console;

  if (table.length < 2) return [];

  return resolveSections(table, config).flatMap(section => {
    const headerRow = table[section.headerRow];
    const records: DoorRecord[] = [];

    for (let col = 1; col < headerRow.length; col++) {
      try {
        records.push(...extractColumn(table, section, col, config));
      } catch (err) {
        logger.warn(`Skipping column ${col} of section at row ${section.headerRow}: ${errorMessage(err)}`);
      }
    }

    return records;
  });
}

function extractColumn(
  table: Table,
  section: SectionLayout,
  col: number,
  config: ExtractionConfig,
): DoorRecord[] {
  const headerRow = table[section.headerRow];
  const raw = cellAt(headerRow, col);

  if (!raw || !raw.trim()) return [];
  if (config.skipColumnMarkers.some(marker => raw.includes(marker))) return [];

  const text = mergeContinuation(headerRow, col, config.continuationLookahead);
  const parsed = parseDoorType(text, config.codeRejectMarkers);
  if (!parsed.code) return [];

  const fields = readSectionFields(table, section, col);
  const splits: DoorSplit[] = isMultiDoor(text)
    ? splitMultiDoor(text)
    : [{ code: parsed.code, dimensions: parsed.dimensions }];

  return splits
    .map(split => ({ door_type: split.code, dimensions: split.dimensions, ...fields }))
    .filter(record => isValidDoorRecord(record, config.metadataMarkers));
}

// ── Per page ──

/**
 * Records of every table on a page, in table order. A table whose processing
 * raises contributes nothing; the rest of the page is still extracted.
 */
export function extractDoorsFromPage(page: TablePage, options: ExtractOptions = {}): DoorRecord[] {
  const logger = options.logger ?? console;

  if (page.tables.length === 0) {
    logger.info(`  No tables found on page ${page.pageNo}`);
    return [];
  }

  logger.info(`  Found ${page.tables.length} table(s) on page ${page.pageNo}`);

  return page.tables.reduce<DoorRecord[]>((acc, table, tableIndex) => {
    try {
      const doors = extractDoorsFromTable(table, options);
      if (doors.length > 0) {
        logger.info(`    Table ${tableIndex + 1}: Extracted ${doors.length} door(s)`);
      }
      return acc.concat(doors);
    } catch (err) {
      reportFailure(new TableExtractionError(page.pageNo, tableIndex, err), logger, options);
      return acc;
    }
  }, []);
}

function reportFailure(error: TableExtractionError, logger: ExtractionLogger, options: ExtractOptions): void {
  logger.error(`  ${error.message}`);
  options.onTableError?.(error);
}

function finish(records: DoorRecord[], totalPages: number, options: ExtractOptions): DoorRecord[] {
  const progress: ExtractionProgress = {
    status: 'post_processing',
    completedPages: totalPages,
    totalPages,
    extractedDoors: records.length,
    errorMessage: null,
  };

  let result = records;
  if (options.postProcess !== false) {
    options.onProgress?.(progress);
    result = postProcessRecords(records);
  }

  options.onProgress?.({ ...progress, status: 'done', extractedDoors: result.length });
  return result;
}

// ── Whole documents ──

/** Records of every page of an already-extracted document, in page order. */
export function extractDoorsFromExtract(extract: TableExtract, options: ExtractOptions = {}): DoorRecord[] {
  const totalPages = extract.pages.length;

  const records = extract.pages.reduce<DoorRecord[]>((acc, page, i) => {
    options.onProgress?.({
      status: 'extracting',
      completedPages: i,
      totalPages,
      extractedDoors: acc.length,
      errorMessage: null,
    });
    return acc.concat(extractDoorsFromPage(page, options));
  }, []);

  return finish(records, totalPages, options);
}

/**
 * Pull pages from a table source one at a time. A page whose tables cannot be
 * produced is dropped and the run goes on; only a source that cannot report
 * its page count fails the run.
 */
export async function extractDoorsFromSource(
  source: TableSource,
  options: ExtractOptions = {},
): Promise<DoorRecord[]> {
  const logger = options.logger ?? console;

  let totalPages: number;
  try {
    totalPages = await source.pageCount();
  } catch (err) {
    options.onProgress?.({
      status: 'error',
      completedPages: 0,
      totalPages: 0,
      extractedDoors: 0,
      errorMessage: errorMessage(err),
    });
    throw err;
  }

  let records: DoorRecord[] = [];
  for (let pageNo = 1; pageNo <= totalPages; pageNo++) {
    options.onProgress?.({
      status: 'extracting',
      completedPages: pageNo - 1,
      totalPages,
      extractedDoors: records.length,
      errorMessage: null,
    });

    logger.info(`Processing page ${pageNo}...`);

    let tables: Table[];
    try {
      tables = await source.extractTables(pageNo);
    } catch (err) {
      reportFailure(new TableExtractionError(pageNo, null, err), logger, options);
      continue;
    }

    records = records.concat(extractDoorsFromPage({ pageNo, tables }, options));
  }

  return finish(records, totalPages, options);
}
