// src/__tests__/core/remainder.test.ts

import { describe, it, expect } from 'vitest';
import { Remainder } from '../../core/remainder.js';

describe('Remainder', () => {
  const source = ['prog', '-v', 'cmd', '--output', 'x'];

  it('should reproduce the untouched tail', () => {
    const remainder = new Remainder(source, 2);
    expect(remainder.count).toBe(3);
    expect(remainder.tokens).toEqual(['cmd', '--output', 'x']);
    expect(remainder.source).toBe(source);
  });

  it('should prepend a program name for chained scans', () => {
    expect(new Remainder(source, 3).withProgramName('cmd')).toEqual(['cmd', '--output', 'x']);
  });

  it('should be empty at the end of argv', () => {
    const remainder = Remainder.empty(source);
    expect(remainder.offset).toBe(5);
    expect(remainder.count).toBe(0);
    expect(remainder.isEmpty).toBe(true);
    expect(remainder.tokens).toEqual([]);
  });

  it('should reject offsets outside argv', () => {
    expect(() => new Remainder(source, 6)).toThrow(RangeError);
    expect(() => new Remainder(source, -1)).toThrow('Remainder offset -1 outside argv of length 5');
  });
});
