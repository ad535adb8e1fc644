import type { FieldEntry, Grammar } from '../types.js';

const FEE_PATTERN = /^(.*[^ ]) +([-0-9,.]+)$/;

/**
 * Monthly package costs, one `<label><spaces><amount>` item per column:
 *
 *   ABN AMRO Bank N.V.              Credit Card                 1,70CreditCard(2)               1,00
 */
export const bankFeesGrammar: Grammar = {
  name: 'bank_fees',
  decode(input, normalize) {
    const width = input.config.columnWidth;
    const fields: FieldEntry[] = [['header', normalize(input.head)]];

    for (let start = 0; start < input.tail.length; start += width) {
      const column = input.tail.slice(start, start + width);
      if (column.trim() === '') {
        continue;
      }
      const match = FEE_PATTERN.exec(column.trimEnd());
      if (match?.[1] !== undefined && match[2] !== undefined) {
        fields.push([normalize(match[1]), match[2].replace(/,/g, '.')]);
      } else {
        fields.push(['unparsed', normalize(column)]);
      }
    }

    return { type: 'card_subscription_fee', fields };
  },
};
