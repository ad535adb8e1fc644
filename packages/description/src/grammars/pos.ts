import type { DescriptionType } from '@rekening/types';
import { buildISODate } from '@rekening/types';
import type { FieldEntry, Grammar, GrammarInput } from '../types.js';

/**
 * Card payments (BEA) and ATM withdrawals (GEA).
 *
 * Legacy layout, reference and timestamp in the first column:
 *   BEA   NR:A1B23C   30.12.21/09.15 | Hema EV123,PAS123 | ZAANDAM | suffix...
 *
 * Current layout, the device type in the first column:
 *   BEA, Betaalpas | IKEA Amsterdam,PAS123 | NR:0ABC0D, 01.02.23/14:15 | AMSTERDAM | suffix...
 *
 * The timestamp is the moment of payment and may fall on another day than
 * the booking date of the line. It is reported as printed.
 */

const POS_PATTERNS = {
  legacyHeader: /^(BEA) +NR:([^ ]+) +([0-9./:-]+)$/,
  reference: /^NR:([^, ]+)[, ]+([0-9./:-]+) *$/,
  merchantAndCard: /^(.*),(PAS[^ ]*) *$/,
  reversal: /TERUGBOEKING/,
};

export interface PosTimestamp {
  date: string;
  time: string;
}

/**
 * "31.12.23/23.59" or "31.12.23/23:59" -> 2023-12-31, 23:59.
 * Returns null for anything that is not a real date and time.
 */
export function parsePosTimestamp(raw: string): PosTimestamp | null {
  const parts = raw.trim().split(/[-:./]/);
  if (parts.length !== 5 || !parts.every((part) => /^\d{1,2}$/.test(part))) {
    return null;
  }
  const [day, month, year, hours, minutes] = parts.map((part) => parseInt(part, 10));
  if (
    day === undefined ||
    month === undefined ||
    year === undefined ||
    hours === undefined ||
    minutes === undefined ||
    hours > 23 ||
    minutes > 59
  ) {
    return null;
  }
  const date = buildISODate(2000 + year, month, day);
  if (date === null) {
    return null;
  }
  return {
    date,
    time: `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}`,
  };
}

function timestampFields(raw: string): FieldEntry[] {
  const parsed = parsePosTimestamp(raw);
  if (parsed === null) {
    return [['timestamp', raw.trim()]];
  }
  return [
    ['date', parsed.date],
    ['time', parsed.time],
  ];
}

function merchantFields(column: string, normalize: (value: string) => string): FieldEntry[] {
  const match = POS_PATTERNS.merchantAndCard.exec(column);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    return [
      ['merchant', normalize(match[1])],
      ['card', match[2]],
    ];
  }
  return [['merchant', normalize(column)]];
}

function cardPaymentType(suffix: string): DescriptionType {
  return POS_PATTERNS.reversal.test(suffix) ? 'pos_credit' : 'pos_debit';
}

function columns(input: GrammarInput, count: number): string[] {
  const width = input.config.columnWidth;
  const result: string[] = [];
  for (let i = 0; i < count; i++) {
    result.push(input.tail.slice(i * width, (i + 1) * width));
  }
  result.push(input.tail.slice(count * width));
  return result;
}

export const legacyPosGrammar: Grammar = {
  name: 'pos_legacy',
  decode(input, normalize) {
    const header = POS_PATTERNS.legacyHeader.exec(input.head.trimEnd());
    if (header?.[1] === undefined || header[2] === undefined || header[3] === undefined) {
      return null;
    }
    const [merchantColumn = '', locationColumn = '', suffixColumn = ''] = columns(input, 2);
    const suffix = normalize(suffixColumn);

    return {
      type: cardPaymentType(suffix),
      fields: [
        ['header', header[1]],
        ['reference', header[2]],
        ...timestampFields(header[3]),
        ...merchantFields(merchantColumn, normalize),
        ['location', normalize(locationColumn)],
        ['suffix', suffix],
      ],
    };
  },
};

function createCurrentPosGrammar(name: string, typeOf: (suffix: string) => DescriptionType): Grammar {
  return {
    name,
    decode(input, normalize) {
      const [merchantColumn = '', referenceColumn = '', locationColumn = '', suffixColumn = ''] = columns(input, 3);
      const reference = POS_PATTERNS.reference.exec(referenceColumn);
      if (reference?.[1] === undefined || reference[2] === undefined) {
        return null;
      }
      const suffix = normalize(suffixColumn);

      return {
        type: typeOf(suffix),
        fields: [
          ['header', normalize(input.head)],
          ...merchantFields(merchantColumn, normalize),
          ['reference', reference[1]],
          ...timestampFields(reference[2]),
          ['location', normalize(locationColumn)],
          ['suffix', suffix],
        ],
      };
    },
  };
}

export const cardPaymentGrammar: Grammar = createCurrentPosGrammar('pos', cardPaymentType);

export const atmWithdrawalGrammar: Grammar = createCurrentPosGrammar('atm', () => 'atm_withdrawal');
