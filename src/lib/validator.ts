import type { DoorRecord } from '../types/door.ts';
import { DEFAULT_CONFIG } from './config.ts';
import { hasUppercase, isDimensionToken } from './tokens.ts';

/**
 * Whether a draft record is a real door rather than title-block text or a
 * stray dimension that ended up in a door-type cell.
 */
export function isValidDoorRecord(
  record: Pick<DoorRecord, 'door_type'>,
  metadataMarkers: readonly string[] = DEFAULT_CONFIG.metadataMarkers,
): boolean {
  const doorType = record.door_type.trim();
  const upper = doorType.toUpperCase();

  if (metadataMarkers.some(marker => upper.includes(marker.toUpperCase()))) return false;
  if (doorType.startsWith('000(W)x') || isDimensionToken(doorType)) return false;
  return hasUppercase(doorType);
}
