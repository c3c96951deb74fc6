import { describe, it, expect } from 'vitest';
import { roundHalfEven } from './rounding';

describe('roundHalfEven', () => {
  it('rounds exact halves to the even neighbour', () => {
    expect(roundHalfEven(240.5)).toBe(240);
    expect(roundHalfEven(241.5)).toBe(242);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(roundHalfEven(-2.5)).toBe(-2);
  });

  it('rounds everything else to the nearest value', () => {
    expect(roundHalfEven(14.16)).toBe(14);
    expect(roundHalfEven(19.51)).toBe(20);
    expect(roundHalfEven(0.56668, 4)).toBe(0.5667);
  });

  it('treats binary halves at four places as ties', () => {
    // 0.03125 = 1/32 is exactly between 0.0312 and 0.0313
    expect(roundHalfEven(0.03125, 4)).toBe(0.0312);
    expect(roundHalfEven(0.09375, 4)).toBe(0.0938);
  });

  it('rounds decimal halves by their stored value', () => {
    // 0.12345 is stored just above the midpoint, 1.005 just below
    expect(roundHalfEven(0.12345, 4)).toBe(0.1235);
    expect(roundHalfEven(1.005, 2)).toBe(1);
  });
});
