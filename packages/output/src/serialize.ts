/**
 * JSON-like output: plain objects holding only strings, numbers, arrays
 * and objects. Decimals become exact strings with at least two decimals.
 */
import type {
  CreditCardTransaction,
  CreditCardTransactionJson,
  DecodedDescription,
  DescriptionJson,
  RecordError,
  StatementFileOutput,
  StatementFormat,
  Transaction,
  TransactionJson,
} from '@rekening/types';
import { formatDecimal } from '@rekening/types';

/** `{ type, ...fields }`, fields in decoding order. */
export function descriptionToJsonLike(description: DecodedDescription): DescriptionJson {
  const json: DescriptionJson = { type: description.type };
  for (const [key, value] of description.fields) {
    json[key] = value;
  }
  return json;
}

export function transactionToJsonLike(transaction: Transaction): TransactionJson {
  return {
    account: transaction.account,
    currency: transaction.currency,
    date: transaction.date,
    value_date: transaction.valueDate,
    order: transaction.order,
    start_balance: formatDecimal(transaction.startBalance),
    end_balance: formatDecimal(transaction.endBalance),
    amount: formatDecimal(transaction.amount),
    raw_description: transaction.rawDescription,
    description: descriptionToJsonLike(transaction.description),
  };
}

/** Values that are absent become "". */
export function creditCardTransactionToJsonLike(transaction: CreditCardTransaction): CreditCardTransactionJson {
  return {
    date: transaction.date,
    amount: formatDecimal(transaction.amount),
    descriptions: [...transaction.descriptions],
    card_number: transaction.cardNumber ?? '',
    country_code: transaction.countryCode,
    foreign_amount: transaction.foreignAmount === null ? '' : formatDecimal(transaction.foreignAmount),
    foreign_currency: transaction.foreignCurrency ?? '',
    exchange_rate: transaction.exchangeRate === null ? '' : transaction.exchangeRate.toString(),
  };
}

export interface StatementOutputInput {
  source: string;
  warnings: readonly string[];
  errors: readonly RecordError[];
}

export function buildTsvOutput(
  transactions: readonly Transaction[],
  input: StatementOutputInput
): StatementFileOutput {
  return buildOutput('tsv', transactions.map(transactionToJsonLike), input);
}

export function buildIcsOutput(
  transactions: readonly CreditCardTransaction[],
  input: StatementOutputInput
): StatementFileOutput {
  return buildOutput('ics', transactions.map(creditCardTransactionToJsonLike), input);
}

function buildOutput(
  format: StatementFormat,
  transactions: TransactionJson[] | CreditCardTransactionJson[],
  input: StatementOutputInput
): StatementFileOutput {
  return {
    source: input.source,
    format,
    transactions,
    warnings: [...input.warnings],
    errors: input.errors.map((error) => ({ line: error.line, field: error.field, message: error.message })),
  };
}

export interface StringifyOptions {
  /** Indent by two spaces (default: true) */
  pretty?: boolean;
  /** Sort object keys; otherwise insertion order is kept (default: false) */
  sortKeys?: boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeysDeep(value[key])])
    );
  }
  return value;
}

export function stringifyJsonLike(value: unknown, options: StringifyOptions = {}): string {
  const { pretty = true, sortKeys = false } = options;
  return JSON.stringify(sortKeys ? sortKeysDeep(value) : value, null, pretty ? 2 : undefined);
}
