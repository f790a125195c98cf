import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import {
  clampInteger,
  isAllDigits,
  parseDecimalSecondsAsTicks,
  parseInteger,
  parseLeadingInteger,
  parseSecondsAsTicks,
} from './numeric.js';

const BYTE = { min: 0, max: 255 };

describe('parseInteger', () => {
  it('should accept a plain decimal integer', () => {
    expect(parseInteger('42', BYTE)).toEqual({ success: true, value: 42 });
  });

  it('should accept an explicit plus sign', () => {
    expect(parseInteger('+7', BYTE)).toEqual({ success: true, value: 7 });
  });

  it.each(['42x', ' 42', '42 ', '1e3', '', '0x10', '4.0', '-'])(
    'should reject %j as a format error',
    (token) => {
      expect(parseInteger(token, BYTE)).toEqual({ success: false, reason: 'format' });
    }
  );

  it('should reject values outside the bounds as range errors', () => {
    expect(parseInteger('256', BYTE)).toEqual({ success: false, reason: 'range' });
    expect(parseInteger('-1', BYTE)).toEqual({ success: false, reason: 'range' });
  });

  it('should reject integers too large to represent exactly', () => {
    const bounds = { min: 0, max: Number.MAX_SAFE_INTEGER };
    expect(parseInteger('99999999999999999999', bounds)).toEqual({
      success: false,
      reason: 'range',
    });
  });

  it('should normalise negative zero', () => {
    const result = parseInteger('-0', { min: -5, max: 5 });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(Object.is(result.value, 0)).toBe(true);
    }
  });

  it('should accept exactly the integers within the bounds (property-based)', () => {
    fc.assert(
      fc.property(fc.integer({ min: -1000, max: 1000 }), (value) => {
        const result = parseInteger(String(value), { min: -100, max: 100 });
        if (value >= -100 && value <= 100) {
          return result.success && result.value === value;
        }
        return !result.success && result.reason === 'range';
      })
    );
  });
});

describe('parseSecondsAsTicks', () => {
  it('should convert seconds to microsecond ticks', () => {
    expect(parseSecondsAsTicks('3', { min: 0, max: 10 })).toEqual({
      success: true,
      value: 3_000_000,
    });
  });

  it('should pass rejections through unchanged', () => {
    expect(parseSecondsAsTicks('11', { min: 0, max: 10 })).toEqual({
      success: false,
      reason: 'range',
    });
    expect(parseSecondsAsTicks('3s', { min: 0, max: 10 })).toEqual({
      success: false,
      reason: 'format',
    });
  });
});

describe('parseDecimalSecondsAsTicks', () => {
  it.each([
    ['0.5', 500_000],
    ['.25', 250_000],
    ['1.', 1_000_000],
    ['2', 2_000_000],
    ['0.000001', 1],
  ])('should convert %s seconds to %d ticks', (token, ticks) => {
    expect(parseDecimalSecondsAsTicks(token, 4294)).toEqual({ success: true, value: ticks });
  });

  it.each(['-1', 'abc', '1,5', '', '.', '1e2'])('should reject %j as a format error', (token) => {
    expect(parseDecimalSecondsAsTicks(token, 4294)).toEqual({ success: false, reason: 'format' });
  });

  it('should reject values above the maximum', () => {
    expect(parseDecimalSecondsAsTicks('4294.5', 4294)).toEqual({ success: false, reason: 'range' });
  });
});

describe('clampInteger', () => {
  it('should report which bound was applied', () => {
    expect(clampInteger(-30, { min: -20, max: 19 })).toEqual({ value: -20, clamped: 'min' });
    expect(clampInteger(25, { min: -20, max: 19 })).toEqual({ value: 19, clamped: 'max' });
    expect(clampInteger(3, { min: -20, max: 19 })).toEqual({ value: 3, clamped: undefined });
  });

  it('should always land within the bounds (property-based)', () => {
    fc.assert(
      fc.property(fc.integer(), (value) => {
        const result = clampInteger(value, { min: 1, max: 99 });
        return result.value >= 1 && result.value <= 99;
      })
    );
  });
});

describe('parseLeadingInteger', () => {
  it('should read the signed digits a token starts with', () => {
    expect(parseLeadingInteger('50x')).toEqual({ value: 50, exact: false });
    expect(parseLeadingInteger('-7')).toEqual({ value: -7, exact: true });
    expect(parseLeadingInteger('+12.5')).toEqual({ value: 12, exact: false });
  });

  it('should read a token without leading digits as 0', () => {
    expect(parseLeadingInteger('abc')).toEqual({ value: 0, exact: false });
    expect(parseLeadingInteger('-')).toEqual({ value: 0, exact: false });
    expect(parseLeadingInteger('')).toEqual({ value: 0, exact: false });
  });

  it('should normalise negative zero', () => {
    expect(Object.is(parseLeadingInteger('-0').value, 0)).toBe(true);
  });

  it('should agree with exact parsing for plain integers (property-based)', () => {
    fc.assert(
      fc.property(fc.integer({ min: -100000, max: 100000 }), fc.string(), (value, suffix) => {
        const parsed = parseLeadingInteger(`${String(value)}${suffix}`);
        return parsed.value === value || /^\d/.test(suffix);
      })
    );
  });
});

describe('isAllDigits', () => {
  it('should accept digits only', () => {
    expect(isAllDigits('0123')).toBe(true);
    expect(isAllDigits('12a')).toBe(false);
    expect(isAllDigits('')).toBe(false);
    expect(isAllDigits('+1')).toBe(false);
  });
});
