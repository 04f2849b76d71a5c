import type { DoorRecord, DoorSummary } from '../types/door.ts';

export const REPORT_RULE = '='.repeat(80);
const PREVIEW_COUNT = 3;
const PREVIEW_WIDTH = 80;

export function summarizeRecords(records: readonly DoorRecord[]): DoorSummary {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.door_type, (counts.get(record.door_type) ?? 0) + 1);
  }

  return {
    totalDoors: records.length,
    uniqueTypes: counts.size,
    withDimensions: records.filter(r => r.dimensions).length,
    countsByType: [...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  };
}

/** Closing console report of a run: totals, per-type counts and a preview. */
export function formatReport(records: readonly DoorRecord[], outputPath: string): string[] {
  const summary = summarizeRecords(records);
  const lines = [
    REPORT_RULE,
    'Extraction complete!',
    `Total doors extracted: ${summary.totalDoors}`,
    `Data saved to: ${outputPath}`,
    '',
    'Door types summary:',
    ...summary.countsByType.map(([type, count]) => `  ${type}: ${count}`),
    '',
    `First ${PREVIEW_COUNT} door entries:`,
  ];

  records.slice(0, PREVIEW_COUNT).forEach((door, i) => {
    lines.push(
      '',
      `${i + 1}. ${door.door_type}`,
      `   Dimensions: ${door.dimensions}`,
      `   Fire Rating: ${door.fire_rating.slice(0, PREVIEW_WIDTH)}`,
      `   Description: ${door.description.slice(0, PREVIEW_WIDTH)}`,
      `   Location: ${door.location.slice(0, PREVIEW_WIDTH)}`,
      `   Remarks: ${door.remarks.slice(0, PREVIEW_WIDTH)}`,
    );
  });

  return lines;
}
