import { classify, timeUnitOf } from '../src/modules/tick-cap';
import { ValidationError } from '../src/errors';

/**
 * Tests for the tick-cap guard.
 */
describe('classify', () => {
  it('passes movements within the cap through unchanged', () => {
    expect(classify(100, 130, 50)).toEqual({ truncatedTick: 130, wasCapped: false });
    expect(classify(100, 70, 50)).toEqual({ truncatedTick: 70, wasCapped: false });
  });

  it('treats a movement exactly at the cap as uncapped', () => {
    expect(classify(100, 150, 50)).toEqual({ truncatedTick: 150, wasCapped: false });
    expect(classify(100, 50, 50)).toEqual({ truncatedTick: 50, wasCapped: false });
  });

  it('clamps upward movements beyond the cap', () => {
    expect(classify(100, 180, 50)).toEqual({ truncatedTick: 150, wasCapped: true });
  });

  it('clamps downward movements beyond the cap', () => {
    expect(classify(-10, -200, 50)).toEqual({ truncatedTick: -60, wasCapped: true });
  });

  it('caps every non-zero move when the cap is zero', () => {
    expect(classify(5, 6, 0)).toEqual({ truncatedTick: 5, wasCapped: true });
    expect(classify(5, 5, 0)).toEqual({ truncatedTick: 5, wasCapped: false });
  });

  it('rejects ticks outside int24', () => {
    expect(() => classify(0, 8_388_608, 50)).toThrow(ValidationError);
    expect(() => classify(-8_388_609, 0, 50)).toThrow(ValidationError);
  });

  it('rejects a negative or fractional cap', () => {
    expect(() => classify(0, 1, -1)).toThrow(ValidationError);
    expect(() => classify(0, 1, 1.5)).toThrow(ValidationError);
  });

  it('accepts the int24 extremes', () => {
    expect(classify(8_388_607, -8_388_608, 100)).toEqual({
      truncatedTick: 8_388_507,
      wasCapped: true,
    });
  });
});

describe('timeUnitOf', () => {
  it('buckets timestamps by block duration', () => {
    expect(timeUnitOf(1200, 12)).toBe(100);
    expect(timeUnitOf(1211, 12)).toBe(100);
    expect(timeUnitOf(1212, 12)).toBe(101);
  });
});
