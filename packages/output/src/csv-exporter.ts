/**
 * CSV export of account transactions for spreadsheet import.
 */

import type { CreditCardTransaction, Transaction } from '@rekening/types';
import { formatDecimal } from '@rekening/types';
import { getCounterparty, getCounterpartyIban, getRemittanceInfo } from '@rekening/description';

export interface CsvExportOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Include the raw description column (default: false) */
  includeRaw?: boolean;
  /** 'iso' (YYYY-MM-DD) or 'dutch' (DD-MM-YYYY) (default: 'iso') */
  dateFormat?: 'iso' | 'dutch';
}

const BASE_COLUMNS = [
  'Date',
  'Value Date',
  'Account',
  'Currency',
  'Amount',
  'Start Balance',
  'End Balance',
  'Type',
  'Counterparty',
  'Counterparty IBAN',
  'Description',
] as const;

const RAW_COLUMNS = ['Raw Description'] as const;

const CREDIT_CARD_COLUMNS = [
  'Date',
  'Card',
  'Description',
  'Description 2',
  'Country',
  'Amount',
  'Foreign Amount',
  'Foreign Currency',
  'Exchange Rate',
] as const;

/**
 * Quotes a value when it holds the delimiter, a quote or a line break.
 */
function escapeCsvValue(value: string, delimiter: string): string {
  const needsQuoting =
    value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r');

  if (needsQuoting) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}

function formatDate(isoDate: string, format: 'iso' | 'dutch'): string {
  if (format === 'dutch') {
    const parts = isoDate.split('-');
    if (parts.length === 3) {
      return `${parts[2]}-${parts[1]}-${parts[0]}`;
    }
  }

  return isoDate;
}

function resolveOptions(options: CsvExportOptions): Required<CsvExportOptions> {
  return {
    includeHeader: options.includeHeader ?? true,
    delimiter: options.delimiter ?? ',',
    includeRaw: options.includeRaw ?? false,
    dateFormat: options.dateFormat ?? 'iso',
  };
}

function buildDataRow(txn: Transaction, options: Required<CsvExportOptions>): string[] {
  const row: string[] = [
    formatDate(txn.date, options.dateFormat),
    formatDate(txn.valueDate, options.dateFormat),
    txn.account,
    txn.currency,
    formatDecimal(txn.amount),
    formatDecimal(txn.startBalance),
    formatDecimal(txn.endBalance),
    txn.description.type,
    getCounterparty(txn.description) ?? '',
    getCounterpartyIban(txn.description) ?? '',
    getRemittanceInfo(txn.description) ?? '',
  ];

  if (options.includeRaw) {
    row.push(txn.rawDescription);
  }

  return row;
}

function rowToCsvLine(row: readonly string[], delimiter: string): string {
  return row.map((value) => escapeCsvValue(value, delimiter)).join(delimiter);
}

/**
 * One line per transaction, in input order.
 */
export function exportCsv(transactions: readonly Transaction[], options: CsvExportOptions = {}): string {
  const opts = resolveOptions(options);
  const lines: string[] = [];

  if (opts.includeHeader) {
    const headers: string[] = [...BASE_COLUMNS];
    if (opts.includeRaw) {
      headers.push(...RAW_COLUMNS);
    }
    lines.push(rowToCsvLine(headers, opts.delimiter));
  }

  for (const txn of transactions) {
    lines.push(rowToCsvLine(buildDataRow(txn, opts), opts.delimiter));
  }

  return lines.join('\n');
}

export function exportCreditCardCsv(
  transactions: readonly CreditCardTransaction[],
  options: CsvExportOptions = {}
): string {
  const opts = resolveOptions(options);
  const lines: string[] = [];

  if (opts.includeHeader) {
    lines.push(rowToCsvLine(CREDIT_CARD_COLUMNS, opts.delimiter));
  }

  for (const txn of transactions) {
    const row = [
      formatDate(txn.date, opts.dateFormat),
      txn.cardNumber ?? '',
      txn.descriptions[0] ?? '',
      txn.descriptions[1] ?? '',
      txn.countryCode,
      formatDecimal(txn.amount),
      txn.foreignAmount === null ? '' : formatDecimal(txn.foreignAmount),
      txn.foreignCurrency ?? '',
      txn.exchangeRate === null ? '' : txn.exchangeRate.toString(),
    ];
    lines.push(rowToCsvLine(row, opts.delimiter));
  }

  return lines.join('\n');
}
