import { DOOR_RECORD_KEYS, DoorRecordSchema, type DoorRecord } from '../types/door.ts';
import { ValidationError } from './errors.ts';

export type OutputFormat = 'json' | 'csv';

/** Format implied by an output path: `.csv` is CSV, anything else JSON. */
export function formatForPath(path: string): OutputFormat {
  return path.toLowerCase().endsWith('.csv') ? 'csv' : 'json';
}

/**
 * Check records handed in from outside the pipeline before they are written.
 * Throws a ValidationError naming the offending record index and field.
 */
export function assertDoorRecords(records: readonly unknown[]): DoorRecord[] {
  return records.map((record, i) => {
    const result = DoorRecordSchema.safeParse(record);
    if (!result.success) {
      const invalid = ValidationError.fromZodError(result.error);
      throw new ValidationError(
        `Record ${i} is not a valid door record`,
        invalid.details?.map(d => ({ ...d, field: `${i}.${d.field ?? ''}` })),
      );
    }
    return result.data;
  });
}

function ordered(record: DoorRecord): DoorRecord {
  return {
    door_type: record.door_type,
    dimensions: record.dimensions,
    fire_rating: record.fire_rating,
    description: record.description,
    location: record.location,
    remarks: record.remarks,
  };
}

export function toJson(records: readonly DoorRecord[]): string {
  return JSON.stringify(records.map(ordered), null, 4);
}

function csvField(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export function toCsv(records: readonly DoorRecord[], options: { bom?: boolean } = {}): string {
  const header = DOOR_RECORD_KEYS.map(csvField).join(',');
  const rows = records.map(r => DOOR_RECORD_KEYS.map(key => csvField(r[key])).join(','));
  const csv = [header, ...rows].join('\n');
  return options.bom ? '\uFEFF' + csv : csv;
}

export function serializeRecords(records: readonly unknown[], format: OutputFormat): string {
  const valid = assertDoorRecords(records);
  return format === 'csv' ? toCsv(valid, { bom: true }) : toJson(valid);
}
