import {
  describe,
  expect,
  it
} from 'vitest';

import {
  assertNonNullable,
  assertUnsignedInteger,
  ensureNonNullable,
  isUnsignedInteger
} from '../src/typeGuards.ts';

describe('assertNonNullable', () => {
  it('passes for falsy but present values', () => {
    expect(() => {
      assertNonNullable(0);
    }).not.toThrow();
    expect(() => {
      assertNonNullable('');
    }).not.toThrow();
  });

  it('throws for null and undefined', () => {
    expect(() => {
      assertNonNullable(null);
    }).toThrow('Value is null');
    expect(() => {
      assertNonNullable(undefined);
    }).toThrow('Value is undefined');
  });

  it('throws the provided error instance', () => {
    const error = new RangeError('missing cell');
    expect(() => {
      assertNonNullable(undefined, error);
    }).toThrow(error);
  });
});

describe('ensureNonNullable', () => {
  it('returns the value when present', () => {
    expect(ensureNonNullable([1, 2, 3][1])).toBe(2);
  });

  it('throws a custom message for a missing index', () => {
    expect(() => ensureNonNullable([1, 2, 3][5], 'no such cell')).toThrow('no such cell');
  });
});

describe('isUnsignedInteger', () => {
  it('accepts zero and positive integers', () => {
    expect(isUnsignedInteger(0)).toBe(true);
    expect(isUnsignedInteger(9)).toBe(true);
  });

  it('rejects negatives, fractions and non-numbers', () => {
    expect(isUnsignedInteger(-1)).toBe(false);
    expect(isUnsignedInteger(1.5)).toBe(false);
    expect(isUnsignedInteger(Number.NaN)).toBe(false);
    expect(isUnsignedInteger('3')).toBe(false);
    expect(isUnsignedInteger(null)).toBe(false);
  });
});

describe('assertUnsignedInteger', () => {
  it('describes the rejected value by default', () => {
    expect(() => {
      assertUnsignedInteger(-2);
    }).toThrow('Expected a non-negative integer, got -2');
  });

  it('passes for a valid value', () => {
    expect(() => {
      assertUnsignedInteger(7);
    }).not.toThrow();
  });
});
