import { Decimal } from 'decimal.js';

const COMMA_DECIMAL_PATTERN = /^[-+]?\d+(?:,\d+)?$/;

/**
 * Parses an amount written with a comma as decimal separator ("-25,00").
 */
export function parseCommaDecimal(amountStr: string): Decimal {
  const trimmed = amountStr.trim();
  if (!COMMA_DECIMAL_PATTERN.test(trimmed)) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }
  return new Decimal(trimmed.replace(',', '.'));
}

/** Exact decimal string with at least `minDecimals` fraction digits. */
export function formatDecimal(value: Decimal, minDecimals = 2): string {
  return value.toFixed(Math.max(minDecimals, value.decimalPlaces()));
}

