import type { DoorFields } from '../types/door.ts';
import type { SectionLayout, Table } from '../types/table.ts';
import { DEFAULT_CONFIG, type ExtractionConfig } from './config.ts';
import { cellAt, normalizeText, rowLabel } from './text.ts';
import { isHeaderLabel } from './tokens.ts';

type FieldKey = 'fireRatingRow' | 'descriptionRow' | 'locationRow' | 'remarksRow';

/**
 * Split a door schedule table into its label sections.
 *
 * Every row whose column 0 reads "DOOR TYPE" opens a section that runs to the
 * next such row or the end of the table. Inside a section the fire-rating,
 * description, location and remarks rows are located by their column-0
 * label; an "ELEVATION" row ends the section early since everything below it
 * is drawing content.
 */
export function resolveSections(
  table: Table,
  config: ExtractionConfig = DEFAULT_CONFIG,
): SectionLayout[] {
  const headerRows: number[] = [];
  table.forEach((row, i) => {
    if (isHeaderLabel(cellAt(row, 0), config.headerLabel)) headerRows.push(i);
  });

  const labelToField = buildLabelLookup(config);

  return headerRows.map((headerRow, s) => {
    const section: SectionLayout = {
      headerRow,
      endRow: s + 1 < headerRows.length ? headerRows[s + 1] : table.length,
      fireRatingRow: null,
      descriptionRow: null,
      locationRow: null,
      remarksRow: null,
    };

    for (let i = headerRow; i < section.endRow; i++) {
      const label = rowLabel(table[i]);
      if (!label) continue;
      if (label === config.terminatorLabel) {
        section.endRow = i;
        break;
      }
      const field = labelToField.get(label);
      if (field) section[field] = i;
    }

    return section;
  });
}

function buildLabelLookup(config: ExtractionConfig): Map<string, FieldKey> {
  const lookup = new Map<string, FieldKey>();
  const add = (labels: readonly string[], field: FieldKey) => {
    for (const label of labels) lookup.set(label, field);
  };
  add(config.fieldLabels.fireRating, 'fireRatingRow');
  add(config.fieldLabels.description, 'descriptionRow');
  add(config.fieldLabels.location, 'locationRow');
  add(config.fieldLabels.remarks, 'remarksRow');
  return lookup;
}

/**
 * Normalized shared field values of one door column. A section without a row
 * for a field, or a row too short to reach the column, gives "".
 */
export function readSectionFields(table: Table, section: SectionLayout, col: number): DoorFields {
  const read = (rowIndex: number | null) =>
    rowIndex === null ? '' : normalizeText(cellAt(table[rowIndex], col));

  return {
    fire_rating: read(section.fireRatingRow),
    description: read(section.descriptionRow),
    location: read(section.locationRow),
    remarks: read(section.remarksRow),
  };
}
