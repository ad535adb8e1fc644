import { z } from 'zod';

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

const DecimalStringSchema = z
  .string()
  .regex(/^-?\d+\.\d{2,}$/, 'Amount must be a decimal string with at least two decimals');

export const DescriptionTypeSchema = z.enum([
  'structured_transfer',
  'pos_debit',
  'pos_credit',
  'atm_withdrawal',
  'direct_debit',
  'wire_transfer',
  'interest_accrual',
  'card_subscription_fee',
  'legacy_insurance',
  'unrecognized',
]);
export type DescriptionType = z.infer<typeof DescriptionTypeSchema>;

export const DescriptionJsonSchema = z.object({ type: DescriptionTypeSchema }).catchall(z.string());
export type DescriptionJson = z.infer<typeof DescriptionJsonSchema>;

export const TransactionJsonSchema = z.object({
  account: z.string().regex(/^\d+$/, 'Account must be digits only'),
  currency: z.string().regex(/^[A-Z]{3}$/, 'Currency must be a three letter code'),
  date: IsoDateSchema,
  value_date: IsoDateSchema,
  order: z.number().int().positive(),
  start_balance: DecimalStringSchema,
  end_balance: DecimalStringSchema,
  amount: DecimalStringSchema,
  raw_description: z.string(),
  description: DescriptionJsonSchema,
});
export type TransactionJson = z.infer<typeof TransactionJsonSchema>;

export const CreditCardTransactionJsonSchema = z.object({
  date: IsoDateSchema,
  amount: DecimalStringSchema,
  descriptions: z.array(z.string()),
  card_number: z.string(),
  country_code: z.string(),
  foreign_amount: z.union([DecimalStringSchema, z.literal('')]),
  foreign_currency: z.string(),
  exchange_rate: z.string(),
});
export type CreditCardTransactionJson = z.infer<typeof CreditCardTransactionJsonSchema>;

export const RecordErrorJsonSchema = z.object({
  line: z.number().int().positive().nullable(),
  field: z.string().nullable(),
  message: z.string(),
});

export const StatementFormatSchema = z.enum(['tsv', 'ics']);
export type StatementFormat = z.infer<typeof StatementFormatSchema>;

export const StatementFileOutputSchema = z.object({
  source: z.string().min(1),
  format: StatementFormatSchema,
  transactions: z.union([z.array(TransactionJsonSchema), z.array(CreditCardTransactionJsonSchema)]),
  warnings: z.array(z.string()),
  errors: z.array(RecordErrorJsonSchema),
});
export type StatementFileOutput = z.infer<typeof StatementFileOutputSchema>;

export const ParserOptionsSchema = z.object({
  strict: z.boolean().default(false),
  verbose: z.boolean().default(false),
  encoding: z.enum(['latin1', 'utf8']).default('latin1'),
});
export type ParserOptions = z.infer<typeof ParserOptionsSchema>;
export type ParserOptionsInput = z.input<typeof ParserOptionsSchema>;
