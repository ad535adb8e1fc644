import { Decimal } from 'decimal.js';
import { buildCreditCardTransaction } from '@rekening/ics-parser';
import { readTsv } from '@rekening/tsv-parser';
import type { CreditCardTransaction, Transaction } from '@rekening/types';

const row = (...columns: string[]): string => columns.join('\t');

export const PAYMENT_LINE = row(
  '112233445',
  'EUR',
  '20211230',
  '100,00',
  '75,00',
  '20211230',
  '-25,00',
  'BEA   NR:A1B23C   30.12.21/09.15 Hema EV123,PAS123               ZAANDAM'
);

export const TRANSFER_LINE = row(
  '112233445',
  'EUR',
  '20211231',
  '9427,00',
  '9550,01',
  '20211231',
  '123,01',
  '/TRTP/SEPA OVERBOEKING/IBAN/NL01RABO0123456789/BIC/RABONL2U/NAME/J Jansen, Zoon/REMI/Factuur "42"'
);

export const SAVINGS_LINE = row('998877665', 'EUR', '20220103', '500,00', '510,5', '20220103', '10,5', 'Rente');

export function readTransactions(...lines: string[]): Transaction[] {
  return readTsv(lines).transactions;
}

export const CAFE: CreditCardTransaction = buildCreditCardTransaction({
  cardNumber: '4321',
  date: '2024-01-08',
  descriptions: ['Cafe Zonneschijn', 'NEW YORK'],
  countryCode: 'USA',
  amount: new Decimal('-11.08'),
  foreignAmount: new Decimal('12.00'),
  foreignCurrency: 'USD',
  exchangeRate: new Decimal('1.08303'),
});

export const OPENING_BALANCE: CreditCardTransaction = buildCreditCardTransaction({
  cardNumber: null,
  date: '2023-12-11',
  descriptions: ['GEINCASSEERD VORIG SALDO', ''],
  countryCode: '',
  amount: new Decimal('250.00'),
});

export function first<T>(items: readonly T[]): T {
  const [item] = items;
  if (item === undefined) {
    throw new Error('Expected at least one item');
  }
  return item;
}
