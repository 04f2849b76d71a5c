// ── Tokenizer and token classes for door-type cell text ──

const DIMENSION_RE = /\d+\(W\)x\d+\(H\)/;
const DIMENSION_GLOBAL_RE = /\d+\(W\)x\d+\(H\)/g;
const DIMENSION_TOKEN_RE = /^\d+\(W\)x\d+\(H\)$/;
const VARIANT_TOKEN_RE = /^\d+[A-Z]*$/;
const VARIANT_PREFIX_RE = /^(\d+[A-Z]*)(?:\s|\(|$)/;
const PURE_NUMBER_RE = /^\d+$/;

/** Non-empty, trimmed lines. */
export function splitLines(text: string): string[] {
  return text
    .trim()
    .split('\n')
    .map(l => l.trim())
    .filter(l => l.length > 0);
}

export function tokenize(line: string): string[] {
  return line.split(/\s+/).filter(t => t.length > 0);
}

export function firstToken(text: string): string | null {
  return tokenize(text)[0] ?? null;
}

export function hasUppercase(text: string): boolean {
  return /[A-Z]/.test(text);
}

/** The whole token is a `<W>(W)x<H>(H)` dimension. */
export function isDimensionToken(token: string): boolean {
  return DIMENSION_TOKEN_RE.test(token);
}

export function containsDimension(text: string): boolean {
  return DIMENSION_RE.test(text);
}

/** First dimension substring, or null. */
export function findDimension(text: string): string | null {
  return DIMENSION_RE.exec(text)?.[0] ?? null;
}

/** Every dimension substring, in order of appearance. */
export function findDimensions(text: string): string[] {
  return text.match(DIMENSION_GLOBAL_RE) ?? [];
}

/** Number of `(W)x` markers, i.e. how many dimensions the text tries to state. */
export function countDimensionMarkers(text: string): number {
  return text.split('(W)x').length - 1;
}

/** An instance tag such as "1", "10", "10S" or "4A". */
export function isVariantToken(token: string): boolean {
  return VARIANT_TOKEN_RE.test(token);
}

/**
 * Leading `\d+[A-Z]*` of a token, as found on the variant line of a multi-door
 * cell ("16", "4A", "21(MIN"). Pure numerals of three or more digits are door
 * widths, not variants, and yield null.
 */
export function extractVariantCandidate(token: string): string | null {
  if (!/^\d/.test(token)) return null;
  const match = VARIANT_PREFIX_RE.exec(token);
  if (!match) return null;
  const variant = match[1];
  if (variant.length > 2 && PURE_NUMBER_RE.test(variant)) return null;
  return variant;
}

/** A single decimal digit, the leading "1" of a width the extractor split off. */
export function isSingleDigit(token: string): boolean {
  return /^\d$/.test(token);
}

export function isHeaderLabel(text: string | null | undefined, label: string): boolean {
  return (text ?? '').trim() === label;
}
