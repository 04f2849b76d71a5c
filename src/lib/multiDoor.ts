import type { DoorSplit } from '../types/door.ts';
import {
  countDimensionMarkers,
  extractVariantCandidate,
  findDimensions,
  firstToken,
  isSingleDigit,
  splitLines,
  tokenize,
} from './tokens.ts';

const LEGACY_CODE = 'FD1';
const LEGACY_VARIANT_LINE_RE = /^\d+[A-Z]\s+\d+[A-Z]$/;

/**
 * A door-type cell describes several doors when its first token shows up again
 * later in the text ("DB DB ...") or it states more than one dimension.
 */
export function isMultiDoor(text: string): boolean {
  const trimmed = text.trim();
  const first = firstToken(trimmed);
  if (first && trimmed.slice(first.length).includes(first)) return true;
  return countDimensionMarkers(trimmed) > 1;
}

/**
 * Expand a multi-door cell into one (code, dimension) pair per door.
 *
 *   "DB DB\n9 900(W)x2190(H) 10 1 000(W)x2190(H)"
 *     -> DB/9 900(W)x2190(H), DB/10 1000(W)x2190(H)
 *   "FMD2 FMD2 FMD2\n475(W)x2190(H) 600(W)x2190(H) 800(W)x2190(H)\n4A 6 8"
 *     -> FMD2/4A, FMD2/6, FMD2/8
 *
 * The door count is how often the base code repeats on the first line.
 * Dimensions and variants are collected separately and zipped by position;
 * a door without one gets an empty dimension or a bare code.
 */
export function splitMultiDoor(text: string): DoorSplit[] {
  const splits = splitByRepeatedCode(text);
  if (splits.length > 0) return splits;
  if (text.includes(`${LEGACY_CODE} ${LEGACY_CODE}`)) return splitLegacyPair(text);
  return [];
}

function splitByRepeatedCode(text: string): DoorSplit[] {
  const lines = splitLines(text);
  if (lines.length < 2) return [];

  const firstLineTokens = tokenize(lines[0]);
  const baseCode = firstLineTokens[0];
  if (!baseCode) return [];

  const doorCount = firstLineTokens.filter(t => t === baseCode).length;
  if (doorCount < 2) return [];

  const detailLines = lines.slice(1);
  const dimensions = repairSplitWidths(findDimensions(text), detailLines.flatMap(tokenize));
  const variants = collectVariants(detailLines, doorCount);

  return Array.from({ length: doorCount }, (_, i) => {
    const variant = variants[i] ?? '';
    return {
      code: variant ? `${baseCode}/${variant}` : baseCode,
      dimensions: dimensions[i] ?? '',
    };
  });
}

/**
 * "1 000(W)x2190(H)" reads as dimension "000(W)x2190(H)"; glue the lone digit
 * in front of it back on.
 */
function repairSplitWidths(dimensions: string[], tokens: string[]): string[] {
  return dimensions.map(dim => {
    if (!dim.startsWith('000(W)x')) return dim;
    for (let j = 1; j < tokens.length; j++) {
      if (tokens[j] === dim && isSingleDigit(tokens[j - 1])) {
        return tokens[j - 1] + dim;
      }
    }
    return dim;
  });
}

function collectVariants(lines: string[], doorCount: number): string[] {
  const variants: string[] = [];

  // A dedicated variant line: no dimensions, at least one token per door.
  for (const line of lines) {
    const tokens = tokenize(line);
    if (tokens.some(t => findDimensions(t).length > 0) || tokens.length < doorCount) continue;

    for (const token of tokens) {
      const variant = extractVariantCandidate(token);
      if (variant === null) continue;
      variants.push(variant);
      if (variants.length >= doorCount) return variants;
    }
  }

  // Otherwise pick them out of mixed lines such as "9 900(W)x2190(H) 10 ...".
  for (const line of lines) {
    for (const token of tokenize(line)) {
      const variant = extractVariantCandidate(token);
      if (variant === null || variants.includes(variant)) continue;
      variants.push(variant);
      if (variants.length >= doorCount) return variants;
    }
  }

  return variants;
}

/**
 * Older FD1 pair layout: "...FD1 FD1\n650(W)x2190(H) 800(W)x2190(H)\n6A 8A".
 */
function splitLegacyPair(text: string): DoorSplit[] {
  const dimensions: string[] = [];
  let variants: string[] = [];

  for (const line of splitLines(text)) {
    if (line.includes('(W)x')) {
      dimensions.push(...findDimensions(line));
    } else if (LEGACY_VARIANT_LINE_RE.test(line)) {
      variants = tokenize(line);
    }
  }

  const count = Math.max(dimensions.length, variants.length, 2);
  return Array.from({ length: count }, (_, i) => {
    const variant = variants[i] ?? '';
    return {
      code: variant ? `${LEGACY_CODE}/${variant}` : LEGACY_CODE,
      dimensions: dimensions[i] ?? '',
    };
  });
}
