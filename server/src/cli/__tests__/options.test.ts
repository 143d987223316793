import { InvalidArgumentError } from 'commander';
import { collectFieldAssignment, parseNonNegativeInt } from '../options.js';

describe('parseNonNegativeInt', () => {
  it('parses whole numbers', () => {
    expect(parseNonNegativeInt('0')).toBe(0);
    expect(parseNonNegativeInt('14')).toBe(14);
  });

  it('rejects negatives and fractions', () => {
    expect(() => parseNonNegativeInt('-1')).toThrow(InvalidArgumentError);
    expect(() => parseNonNegativeInt('1.5')).toThrow(InvalidArgumentError);
    expect(() => parseNonNegativeInt('abc')).toThrow(InvalidArgumentError);
  });
});

describe('collectFieldAssignment', () => {
  it('accumulates repeated key=value pairs', () => {
    const first = collectFieldAssignment('remark=late truck', {});
    expect(collectFieldAssignment(' pmLocation =PM=1', first)).toEqual({ remark: 'late truck', pmLocation: 'PM=1' });
  });

  it('keeps an empty value so the field can be cleared', () => {
    expect(collectFieldAssignment('remark=', {})).toEqual({ remark: '' });
  });

  it('rejects a pair without a key', () => {
    expect(() => collectFieldAssignment('=late', {})).toThrow(InvalidArgumentError);
    expect(() => collectFieldAssignment('remark', {})).toThrow(InvalidArgumentError);
  });
});
