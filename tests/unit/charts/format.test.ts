import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { formatValue } from '@/modules/charts/index.js';

describe('formatValue', () => {
  it('groups thousands with apostrophes', () => {
    expect(formatValue(new Decimal(1_234_567))).toBe("1'234'567");
    expect(formatValue(new Decimal(999))).toBe('999');
    expect(formatValue(new Decimal(1000))).toBe("1'000");
  });

  it('truncates the fraction when no decimals are asked for', () => {
    expect(formatValue(new Decimal('1234.9'))).toBe("1'234");
  });

  it('rounds to the given number of decimals', () => {
    expect(formatValue(new Decimal('12345.678'), 2)).toBe("12'345.68");
    expect(formatValue(new Decimal(50), 2)).toBe('50.00');
  });

  it('keeps the sign of negative values', () => {
    expect(formatValue(new Decimal(-4321))).toBe("-4'321");
  });
});
