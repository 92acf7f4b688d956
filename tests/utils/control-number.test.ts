import { describe, it, expect } from 'vitest';
import { parseControlNumber, compareControlKeys, compareControlNumbers, getSectionKey } from '@cisbench/types';

describe('parseControlNumber', () => {
  it('should split into integer components', () => {
    expect(parseControlNumber('1.2.10')).toEqual([1n, 2n, 10n]);
    expect(parseControlNumber('5')).toEqual([5n]);
  });

  it('should throw on a non-integer component', () => {
    expect(() => parseControlNumber('1.a')).toThrow('Invalid control number "1.a": component "a" is not an integer');
    expect(() => parseControlNumber('1..2')).toThrow('component "" is not an integer');
  });
});

describe('compareControlNumbers', () => {
  it('should compare components numerically', () => {
    expect(compareControlNumbers('1.2', '1.10')).toBeLessThan(0);
    expect(compareControlNumbers('2.1', '1.10')).toBeGreaterThan(0);
    expect(compareControlNumbers('1.1.3', '1.1.3')).toBe(0);
  });

  it('should sort a prefix before its extensions', () => {
    expect(compareControlNumbers('1.1', '1.1.1')).toBeLessThan(0);
    expect(compareControlNumbers('1.1.1', '1.1')).toBeGreaterThan(0);
  });

  it('should compare components beyond the safe integer range', () => {
    expect(compareControlNumbers('1.9007199254740993', '1.9007199254740992')).toBeGreaterThan(0);
    expect(compareControlNumbers('1.9007199254740992', '1.9007199254740993')).toBeLessThan(0);
  });

  it('should ignore leading zeros', () => {
    expect(compareControlNumbers('1.02', '1.2')).toBe(0);
  });

  it('should give a total order over mixed depths', () => {
    const nums = ['1.10', '1.2', '1.1.3', '2.1', '1.1'];
    expect([...nums].sort(compareControlNumbers)).toEqual(['1.1', '1.1.3', '1.2', '1.10', '2.1']);
  });
});

describe('compareControlKeys', () => {
  it('should compare parsed keys', () => {
    expect(compareControlKeys([1n, 2n], [1n, 10n])).toBeLessThan(0);
    expect(compareControlKeys([1n, 1n], [1n])).toBeGreaterThan(0);
    expect(compareControlKeys([3n], [3n])).toBe(0);
  });
});

describe('getSectionKey', () => {
  it('should return the first component', () => {
    expect(getSectionKey('1.1.1')).toBe('1');
    expect(getSectionKey('12.4')).toBe('12');
    expect(getSectionKey('7')).toBe('7');
  });
});
