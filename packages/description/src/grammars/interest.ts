import { parseDutchDate } from '@rekening/types';
import type { Grammar } from '../types.js';

const PERIOD_PATTERN = /^over the period from\s+(\d{2}-\d{2}-\d{4})\s+to\s+(\d{2}-\d{2}-\d{4})\s*(.*)$/;

/**
 * Yearly interest on savings accounts.
 *
 *   Basic interest                  over the period from            31-12-2022 to 31-12-2023 ...
 *   CREDIT INTEREST
 */
export const interestGrammar: Grammar = {
  name: 'interest',
  decode(input, normalize) {
    const header = normalize(input.head);
    const text = normalize(input.tail);
    const period = PERIOD_PATTERN.exec(text);

    if (period?.[1] !== undefined && period[2] !== undefined) {
      const from = parseDutchDate(period[1]);
      const to = parseDutchDate(period[2]);
      if (from !== null && to !== null) {
        return {
          type: 'interest_accrual',
          fields: [
            ['header', header],
            ['from', from],
            ['to', to],
            ['note', normalize(period[3] ?? '')],
          ],
        };
      }
    }

    return {
      type: 'interest_accrual',
      fields: [
        ['header', header],
        ['note', text],
      ],
    };
  },
};
