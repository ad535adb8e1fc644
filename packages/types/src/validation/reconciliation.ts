/**
 * Balance checks for parsed transactions.
 * Every export line carries its own start and end balance, so each line
 * can be verified on its own: start_balance + amount = end_balance.
 */

import { Decimal } from 'decimal.js';
import { formatDecimal } from '../utils/money.js';

export interface LineBalanceResult {
  /** Whether the line balances within tolerance */
  passed: boolean;
  /** start + amount */
  expectedEndBalance: Decimal;
  actualEndBalance: Decimal;
  /** Absolute difference between expected and actual */
  difference: Decimal;
  tolerance: Decimal;
}

export interface LineBalanceOptions {
  /** Allowed absolute difference (default: 0, amounts are exact) */
  tolerance?: Decimal.Value;
}

export function checkLineBalance(
  startBalance: Decimal,
  endBalance: Decimal,
  amount: Decimal,
  options: LineBalanceOptions = {}
): LineBalanceResult {
  const tolerance = new Decimal(options.tolerance ?? 0);
  const expectedEndBalance = startBalance.plus(amount);
  const difference = expectedEndBalance.minus(endBalance).abs();

  return {
    passed: difference.lessThanOrEqualTo(tolerance),
    expectedEndBalance,
    actualEndBalance: endBalance,
    difference,
    tolerance,
  };
}

/**
 * Format a line balance result as a single human-readable message.
 */
export function formatLineBalanceResult(result: LineBalanceResult): string {
  const status = result.passed ? 'PASSED' : 'FAILED';
  const base =
    `Balance check ${status}: expected end balance ${formatDecimal(result.expectedEndBalance)}, ` +
    `found ${formatDecimal(result.actualEndBalance)}`;
  return result.passed ? base : `${base} (difference ${formatDecimal(result.difference)})`;
}
