import type { Decimal } from 'decimal.js';

const THOUSANDS_RE = /\B(?=(\d{3})+(?!\d))/g;

/**
 * Formats a value with apostrophe-grouped thousands, e.g. 1234567 -> 1'234'567.
 * With `decimals` of 0 the fraction is truncated.
 */
export const formatValue = (value: Decimal, decimals = 0): string => {
  const fixed = decimals === 0 ? value.trunc().toFixed(0) : value.toFixed(decimals);
  const negative = fixed.startsWith('-');
  const [integer = '', fraction] = (negative ? fixed.slice(1) : fixed).split('.');
  const grouped = integer.replace(THOUSANDS_RE, "'");

  return `${negative ? '-' : ''}${grouped}${fraction !== undefined ? `.${fraction}` : ''}`;
};
