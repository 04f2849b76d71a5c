import { z } from 'zod/v4';

export const DIMENSION_SHAPE = /^\d+\(W\)x\d+\(H\)$/;

export const DoorRecordSchema = z.object({
  door_type: z.string().min(1).regex(/[A-Z]/, 'door_type must contain an uppercase letter'),
  dimensions: z.string().refine(
    v => v === '' || DIMENSION_SHAPE.test(v),
    'dimensions must be empty or <W>(W)x<H>(H)',
  ),
  fire_rating: z.string(),
  description: z.string(),
  location: z.string(),
  remarks: z.string(),
});

export type DoorRecord = z.infer<typeof DoorRecordSchema>;

/** Export column order. */
export const DOOR_RECORD_KEYS = [
  'door_type',
  'dimensions',
  'fire_rating',
  'description',
  'location',
  'remarks',
] as const satisfies readonly (keyof DoorRecord)[];

export type DoorFields = Omit<DoorRecord, 'door_type' | 'dimensions'>;

export interface ParsedDoorType {
  code: string | null;
  dimensions: string;
}

export interface DoorSplit {
  code: string;
  dimensions: string;
}

export interface ExtractionProgress {
  status: 'extracting' | 'post_processing' | 'done' | 'error';
  completedPages: number;
  totalPages: number;
  extractedDoors: number;
  errorMessage: string | null;
}

export interface DoorSummary {
  totalDoors: number;
  uniqueTypes: number;
  withDimensions: number;
  countsByType: [string, number][];
}
