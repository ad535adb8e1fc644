import type { Transaction } from '@rekening/types';
import { checkLineBalance, formatLineBalanceResult } from '@rekening/types';
import type { DescriptionDecoder } from '@rekening/description';
import type { RowFields } from './row-reader.js';

export interface AssemblyContext {
  /** Balance mismatches are appended here */
  warnings: string[];
  lineNumber?: number | null;
}

/**
 * Decodes the description, checks the line balance and returns the
 * finished, frozen transaction. A line that does not balance is kept
 * and reported as a warning.
 */
export function assembleTransaction(
  fields: RowFields,
  order: number,
  decoder: DescriptionDecoder,
  context: AssemblyContext
): Transaction {
  const balance = checkLineBalance(fields.startBalance, fields.endBalance, fields.amount);
  if (!balance.passed) {
    const where = typeof context.lineNumber === 'number' ? `Line ${context.lineNumber}` : `Record ${order}`;
    context.warnings.push(`${where}: ${formatLineBalanceResult(balance)}`);
  }

  return Object.freeze({
    account: fields.account,
    currency: fields.currency,
    date: fields.date,
    valueDate: fields.valueDate,
    order,
    startBalance: fields.startBalance,
    endBalance: fields.endBalance,
    amount: fields.amount,
    rawDescription: fields.description,
    description: decoder.decode(fields.description),
  });
}

/**
 * Two lines describe the same booking when account, date, currency,
 * amount and both balances match. `order` is not part of the file and the
 * bank rewrites descriptions between downloads, so both are ignored.
 */
export function isSameTransaction(a: Transaction, b: Transaction): boolean {
  return (
    a.account === b.account &&
    a.date === b.date &&
    a.currency === b.currency &&
    a.amount.equals(b.amount) &&
    a.startBalance.equals(b.startBalance) &&
    a.endBalance.equals(b.endBalance)
  );
}

/** Drops later lines that are the same booking as an earlier one. */
export function deduplicateTransactions(transactions: readonly Transaction[]): Transaction[] {
  const result: Transaction[] = [];
  for (const txn of transactions) {
    if (!result.some((kept) => isSameTransaction(kept, txn))) {
      result.push(txn);
    }
  }
  return result;
}
