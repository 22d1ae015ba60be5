/**
 * @file packages/cli/src/domain/logic/path-comparator.test.ts
 * @description Unit tests for natural path ordering.
 */

import { describe, it, expect } from 'vitest';
import { comparePaths, pathLess, sortPaths, sortedEntries } from './path-comparator.js';

const sign = (n: number): number => Math.sign(n);

describe('comparePaths', () => {
  it('should order embedded numbers by value', () => {
    expect(sortPaths(['temp2', 'temp10', 'temp1'])).toEqual(['temp1', 'temp2', 'temp10']);
  });

  it('should order full sensor paths by their trailing index', () => {
    const paths = [
      '/xyz/openbmc_project/sensors/fan_tach/fan10',
      '/xyz/openbmc_project/sensors/fan_tach/fan9',
      '/xyz/openbmc_project/sensors/fan_tach/fan1',
    ];
    expect(sortPaths(paths)).toEqual([
      '/xyz/openbmc_project/sensors/fan_tach/fan1',
      '/xyz/openbmc_project/sensors/fan_tach/fan9',
      '/xyz/openbmc_project/sensors/fan_tach/fan10',
    ]);
  });

  it('should compare digit runs in the middle of a string', () => {
    expect(sign(comparePaths('cpu2_core10', 'cpu2_core9'))).toBe(1);
    expect(sign(comparePaths('cpu10_core1', 'cpu2_core9'))).toBe(1);
  });

  it('should treat equal-value runs of different width as equal', () => {
    expect(comparePaths('fan007', 'fan7')).toBe(0);
    expect(comparePaths('fan7', 'fan007')).toBe(0);
  });

  it('should let the suffix decide after equal-value runs', () => {
    expect(sign(comparePaths('fan007a', 'fan7b'))).toBe(-1);
    expect(sign(comparePaths('fan7b', 'fan007a'))).toBe(1);
  });

  it('should sort a digit before a non-digit regardless of code point', () => {
    // '/' has a lower code point than '1'
    expect(sign(comparePaths('a1', 'a/'))).toBe(-1);
    expect(sign(comparePaths('a/', 'a1'))).toBe(1);
    expect(sign(comparePaths('a1', 'ab'))).toBe(-1);
  });

  it('should sort an exhausted string first', () => {
    expect(sign(comparePaths('temp', 'temp1'))).toBe(-1);
    expect(sign(comparePaths('temp1', 'temp'))).toBe(1);
    expect(comparePaths('', '')).toBe(0);
    expect(sign(comparePaths('', 'a'))).toBe(-1);
  });

  it('should compare other characters by code point', () => {
    expect(sign(comparePaths('B', 'a'))).toBe(-1);
    expect(sign(comparePaths('p12v', 'p3v3'))).toBe(1);
  });

  it('should handle digit runs beyond the safe integer range', () => {
    expect(sign(comparePaths('s99999999999999999999', 's100000000000000000000'))).toBe(-1);
  });

  it('should be a strict weak ordering over a sample of paths', () => {
    const sample = [
      '',
      'a',
      'a/',
      'a1',
      'a01',
      'a2',
      'a10',
      'a10b',
      'a010a',
      'ab',
      'b',
      'temp',
      'temp1',
      'temp001',
      'temp2',
      'temp10',
      'fan7',
      'fan007',
      'fan007a',
      'fan7b',
      'cpu2_core10',
      'cpu2_core9',
      '/sensors/voltage/p12v',
      '/sensors/voltage/p3v3',
    ];

    for (const a of sample) {
      expect(pathLess(a, a)).toBe(false);
      for (const b of sample) {
        expect(pathLess(a, b) && pathLess(b, a)).toBe(false);
        expect(sign(comparePaths(a, b)) + sign(comparePaths(b, a))).toBe(0);
        for (const c of sample) {
          if (pathLess(a, b) && pathLess(b, c)) {
            expect(pathLess(a, c)).toBe(true);
          }
          if (comparePaths(a, b) === 0 && comparePaths(b, c) === 0) {
            expect(comparePaths(a, c)).toBe(0);
          }
        }
      }
    }
  });
});

describe('sortPaths', () => {
  it('should not depend on the input order for naturally equal paths', () => {
    expect(sortPaths(['fan7', 'fan007'])).toEqual(['fan007', 'fan7']);
    expect(sortPaths(['fan007', 'fan7'])).toEqual(['fan007', 'fan7']);
  });

  it('should return a new array', () => {
    const input = ['b', 'a'];
    const sorted = sortPaths(input);
    expect(sorted).toEqual(['a', 'b']);
    expect(input).toEqual(['b', 'a']);
  });
});

describe('sortedEntries', () => {
  it('should sort map entries by key', () => {
    const map = new Map([
      ['temp10', 'x'],
      ['temp2', 'y'],
    ]);
    expect(sortedEntries(map)).toEqual([
      ['temp2', 'y'],
      ['temp10', 'x'],
    ]);
  });
});
