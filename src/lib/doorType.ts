import type { ParsedDoorType } from '../types/door.ts';
import { DEFAULT_CONFIG } from './config.ts';
import {
  containsDimension,
  findDimension,
  hasUppercase,
  isVariantToken,
  splitLines,
  tokenize,
} from './tokens.ts';

const NO_CODE: ParsedDoorType = { code: null, dimensions: '' };

/**
 * Parse the text of a door-type cell into a type code and a dimension.
 *
 * The first token of the first line is the base code. A variant (instance
 * tag) on a later line is appended as `CODE/VARIANT`:
 *
 *   "MD\n1250(W)x2240(H)\n1"                 -> MD/1,    1250(W)x2240(H)
 *   "FDM\n1"                                 -> FDM/1,   ""
 *   "FD1 1-HR FIRE RATED\n10S 1000(W)x2190(H)" -> FD1/10S, 1000(W)x2190(H)
 *
 * Leaked title-block text (markers such as "PRECINCT" on the first line) yields
 * no code.
 */
export function parseDoorType(
  text: string | null | undefined,
  codeRejectMarkers: readonly string[] = DEFAULT_CONFIG.codeRejectMarkers,
): ParsedDoorType {
  if (!text) return NO_CODE;

  const lines = splitLines(text);
  if (lines.length === 0) return NO_CODE;

  const [firstLine, ...rest] = lines;
  const firstLineTokens = tokenize(firstLine);
  const baseCode = firstLineTokens[0];

  if (!hasUppercase(baseCode)) return NO_CODE;
  if (baseCode.startsWith('000(W)')) return NO_CODE;
  if (codeRejectMarkers.some(marker => firstLine.includes(marker))) return NO_CODE;

  // "GD 2100(W)x2190(H)": dimension on the code line itself
  let dimensions = '';
  for (const token of firstLineTokens) {
    const found = findDimension(token);
    if (found) {
      dimensions = found;
      break;
    }
  }

  let variant = '';
  for (const line of rest) {
    const tokens = tokenize(line);
    const lead = tokens[0];

    if (containsDimension(line)) {
      if (tokens.length >= 2 && isVariantToken(lead)) {
        // "10S 1000(W)x2190(H)"
        variant = lead;
        dimensions = findDimension(tokens.slice(1).join(' ')) ?? '';
      } else if (!dimensions) {
        dimensions = findDimension(line) ?? '';
      }
    } else if (lead && isVariantToken(lead) && !variant) {
      // "21 (MIN 850mm CLEAR WHEN ONE-DOOR LEAF IS OPEN)"
      variant = lead;
    }
  }

  return {
    code: variant ? `${baseCode}/${variant}` : baseCode,
    dimensions,
  };
}
