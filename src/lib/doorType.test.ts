import { describe, it, expect } from 'vitest';
import { parseDoorType } from './doorType.ts';

describe('parseDoorType', () => {
  it('appends a variant from a later line', () => {
    expect(parseDoorType('MD\n1250(W)x2240(H)\n1')).toEqual({
      code: 'MD/1',
      dimensions: '1250(W)x2240(H)',
    });
  });

  it('handles a code with a variant and no dimension', () => {
    expect(parseDoorType('FDM\n1')).toEqual({ code: 'FDM/1', dimensions: '' });
  });

  it('reads a variant sharing its line with the dimension', () => {
    expect(parseDoorType('FD1 1-HR FIRE RATED\n10S 1000(W)x2190(H)')).toEqual({
      code: 'FD1/10S',
      dimensions: '1000(W)x2190(H)',
    });
  });

  it('takes a two-digit variant after the dimension', () => {
    expect(parseDoorType('DM\n1000(W)x2170(H)\n10')).toEqual({
      code: 'DM/10',
      dimensions: '1000(W)x2170(H)',
    });
  });

  it('picks up a dimension on the code line', () => {
    expect(parseDoorType('GD 2100(W)x2190(H)')).toEqual({ code: 'GD', dimensions: '2100(W)x2190(H)' });
  });

  it('keeps the code-line dimension over a later bare one', () => {
    expect(parseDoorType('GD 2100(W)x2190(H)\n900(W)x2100(H)')).toEqual({
      code: 'GD',
      dimensions: '2100(W)x2190(H)',
    });
  });

  it('reads a variant followed by annotation text', () => {
    expect(parseDoorType('D2\n900(W)x2100(H)\n21 (MIN 850mm CLEAR WHEN ONE-DOOR LEAF IS OPEN)')).toEqual({
      code: 'D2/21',
      dimensions: '900(W)x2100(H)',
    });
  });

  it('keeps only the dimension out of a decorated line', () => {
    expect(parseDoorType('SD\nCLEAR 900(W)x2100(H) MIN')).toEqual({
      code: 'SD',
      dimensions: '900(W)x2100(H)',
    });
  });

  it('returns no code for empty text', () => {
    expect(parseDoorType('')).toEqual({ code: null, dimensions: '' });
    expect(parseDoorType(null)).toEqual({ code: null, dimensions: '' });
    expect(parseDoorType(' \n ')).toEqual({ code: null, dimensions: '' });
  });

  it('rejects a first token without uppercase letters', () => {
    expect(parseDoorType('123\n900(W)x2100(H)').code).toBeNull();
    expect(parseDoorType('fd1\n1').code).toBeNull();
  });

  it('rejects a truncated dimension in the code position', () => {
    expect(parseDoorType('000(W)x2190(H)').code).toBeNull();
  });

  it('rejects leaked title-block lines', () => {
    expect(parseDoorType('PRECINCT NAME: BLOCK A').code).toBeNull();
    expect(parseDoorType('SHEET DRAWING NO.\nA-301').code).toBeNull();
    expect(parseDoorType('PROJECT: NEW WING').code).toBeNull();
  });

  it('takes custom reject markers', () => {
    expect(parseDoorType('MD LEGEND\n1', ['LEGEND']).code).toBeNull();
    expect(parseDoorType('MD LEGEND\n1').code).toBe('MD/1');
  });
});
