import type { DoorRecord } from '../types/door.ts';
import { findDimension } from './tokens.ts';

function stripLabel(value: string, label: string): string {
  return value.replaceAll(label, '').trim();
}

/**
 * Final clean-up over a whole run: drop label text that leaked into field
 * values, and take the dimension from the door type when none was found.
 * Returns new records.
 */
export function postProcessRecords(records: readonly DoorRecord[]): DoorRecord[] {
  return records.map(record => ({
    door_type: record.door_type,
    dimensions: record.dimensions || (findDimension(record.door_type) ?? ''),
    fire_rating: stripLabel(record.fire_rating, 'FIRE-RATING'),
    description: stripLabel(record.description, 'DESCRIPTION'),
    location: stripLabel(record.location, 'LOCATION'),
    remarks: stripLabel(record.remarks, 'REMARKS'),
  }));
}
