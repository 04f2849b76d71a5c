import { describe, it, expect } from 'vitest';
import { cellAt, normalizeText, rowLabel } from './text.ts';

describe('normalizeText', () => {
  it('collapses inner whitespace and newlines', () => {
    expect(normalizeText('Double leaf\n  timber\tdoor')).toBe('Double leaf timber door');
  });

  it('trims', () => {
    expect(normalizeText('  Lobby \n')).toBe('Lobby');
  });

  it('returns empty string for empty input', () => {
    expect(normalizeText(null)).toBe('');
    expect(normalizeText(undefined)).toBe('');
    expect(normalizeText('')).toBe('');
    expect(normalizeText(' \n ')).toBe('');
  });

  it('is idempotent', () => {
    const once = normalizeText(' c/w  closer\n& kick plate ');
    expect(normalizeText(once)).toBe(once);
  });
});

describe('cellAt', () => {
  it('reads a cell', () => {
    expect(cellAt(['A', 'B'], 1)).toBe('B');
  });

  it('returns null past the end of a short row', () => {
    expect(cellAt(['A'], 3)).toBeNull();
  });

  it('returns null for a missing row or empty cell', () => {
    expect(cellAt(undefined, 0)).toBeNull();
    expect(cellAt(['A', null], 1)).toBeNull();
  });
});

describe('rowLabel', () => {
  it('trims column 0', () => {
    expect(rowLabel([' LOCATION ', 'x'])).toBe('LOCATION');
  });

  it('is empty for an empty label cell', () => {
    expect(rowLabel([null, 'x'])).toBe('');
    expect(rowLabel([])).toBe('');
  });
});
