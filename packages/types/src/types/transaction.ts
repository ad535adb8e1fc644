import type { Decimal } from 'decimal.js';
import type { DescriptionType } from '../schemas/output.js';

/** A description split into named fields, in order of appearance. */
export interface DecodedDescription {
  readonly type: DescriptionType;
  readonly fields: ReadonlyMap<string, string>;
}

/** One line of the tab-separated account export. */
export interface Transaction {
  readonly account: string;
  readonly currency: string;
  readonly date: string;
  readonly valueDate: string;
  /** 1-based position of the record in its input; keeps same-day order. */
  readonly order: number;
  readonly startBalance: Decimal;
  readonly endBalance: Decimal;
  readonly amount: Decimal;
  readonly rawDescription: string;
  readonly description: DecodedDescription;
}

/** One transaction from a credit card statement. */
export interface CreditCardTransaction {
  /** Last four digits of the card, null before the first card header. */
  readonly cardNumber: string | null;
  readonly date: string;
  readonly descriptions: readonly string[];
  readonly countryCode: string;
  readonly amount: Decimal;
  readonly foreignAmount: Decimal | null;
  readonly foreignCurrency: string | null;
  readonly exchangeRate: Decimal | null;
}

/** A record that was skipped, as reported in results and output documents. */
export interface RecordError {
  line: number | null;
  field: string | null;
  message: string;
}
