import { z } from 'zod/v4';
import { ConfigError, ValidationError } from './errors.ts';

// ── Labels and deny-lists the layout heuristics depend on ──

const LabelListSchema = z.array(z.string().min(1)).min(1);

export const ExtractionConfigSchema = z.object({
  /** Column-0 text that opens a section. */
  headerLabel: z.string().min(1),
  /** Column-0 text below which a section holds drawings, not data. */
  terminatorLabel: z.string().min(1),
  fieldLabels: z.object({
    fireRating: LabelListSchema,
    description: LabelListSchema,
    location: LabelListSchema,
    remarks: LabelListSchema,
  }),
  /** Title-block text that disqualifies a record when found in its door type. */
  metadataMarkers: z.array(z.string().min(1)),
  /** Door-type cells containing any of these are not door columns at all. */
  skipColumnMarkers: z.array(z.string().min(1)),
  /** A first line containing any of these is a leaked header, not a code. */
  codeRejectMarkers: z.array(z.string().min(1)),
  /** How many following columns may hold the rest of a split dimension. */
  continuationLookahead: z.number().int().min(0),
});

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type ExtractionConfigOverrides = Partial<ExtractionConfig>;

export const DEFAULT_CONFIG: ExtractionConfig = {
  headerLabel: 'DOOR TYPE',
  terminatorLabel: 'ELEVATION',
  fieldLabels: {
    fireRating: ['FIRE-RATING', 'FIRE RATING'],
    description: ['DESCRIPTION'],
    location: ['LOCATION'],
    remarks: ['REMARKS'],
  },
  metadataMarkers: [
    'TENDER DRAWING',
    'DRAWING TITLE',
    'PRECINCT NAME',
    'PROJECT TITLE',
    'LOT NO',
    'MUKIM NO',
    'JOB TITLE',
    'DRAWN BY',
    'CHECKED BY',
    'SCALE',
    'DATE',
    'REV',
    'DESCRIPTION',
  ],
  skipColumnMarkers: ['TENDER DRAWING', 'DRAWING TITLE'],
  codeRejectMarkers: ['PRECINCT', 'DRAWING', 'PROJECT'],
  continuationLookahead: 2,
};

/**
 * Merge overrides onto the defaults. Overrides replace whole entries; lists
 * are not concatenated.
 */
export function resolveConfig(overrides: ExtractionConfigOverrides = {}): ExtractionConfig {
  const result = ExtractionConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...overrides });
  if (!result.success) {
    const invalid = ValidationError.fromZodError(result.error);
    throw new ConfigError('Invalid extraction config', invalid.details);
  }
  return result.data;
}

const LookaheadEnvSchema = z.coerce.number().int().min(0);

/**
 * Read config overrides from the environment:
 * - DOOR_SCHEDULE_EXTRA_MARKERS: comma-separated deny-list additions
 * - DOOR_SCHEDULE_LOOKAHEAD: continuation lookahead (columns)
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ExtractionConfig {
  const overrides: ExtractionConfigOverrides = {};

  const extra = env.DOOR_SCHEDULE_EXTRA_MARKERS;
  if (extra && extra.trim()) {
    const markers = extra
      .split(',')
      .map(m => m.trim().toUpperCase())
      .filter(m => m.length > 0);
    overrides.metadataMarkers = [...DEFAULT_CONFIG.metadataMarkers, ...markers];
  }

  const lookahead = env.DOOR_SCHEDULE_LOOKAHEAD;
  if (lookahead !== undefined && lookahead.trim() !== '') {
    const parsed = LookaheadEnvSchema.safeParse(lookahead.trim());
    if (!parsed.success) {
      throw new ConfigError(`DOOR_SCHEDULE_LOOKAHEAD must be a non-negative integer, got "${lookahead}"`);
    }
    overrides.continuationLookahead = parsed.data;
  }

  return resolveConfig(overrides);
}
