import type { DescriptionType } from '@rekening/types';
import type { FieldEntry, Grammar, GrammarInput } from '../types.js';

/**
 * SEPA transfers and direct debits:
 *
 *   SEPA Overboeking                IBAN: NL01ABNA0123456789        BIC: ABNANL2A ...
 *
 * Values are delimited by the labels, not by the columns: a value runs
 * until the next label and often continues in the next column.
 */

interface LabelPosition {
  label: string;
  index: number;
  valueStart: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function findLabels(input: GrammarInput): LabelPosition[] {
  const { labels, columnWidth } = input.config;
  if (labels.length === 0) {
    return [];
  }
  const pattern = new RegExp(`(${labels.map(escapeRegExp).join('|')}): `, 'g');
  const tail = input.tail;
  const positions: LabelPosition[] = [];

  for (const match of tail.matchAll(pattern)) {
    const label = match[1];
    const index = match.index;
    if (label === undefined || index === undefined) {
      continue;
    }
    // A label starts the tail, follows a space, or starts a column.
    if (index === 0 || tail[index - 1] === ' ' || index % columnWidth === 0) {
      positions.push({ label, index, valueStart: index + match[0].length });
    }
  }

  return positions;
}

export function createLabeledGrammar(name: string, type: DescriptionType): Grammar {
  return {
    name,
    decode(input, normalize) {
      const fields: FieldEntry[] = [['header', normalize(input.head)]];
      const positions = findLabels(input);

      const preamble = normalize(input.tail.slice(0, positions[0]?.index ?? input.tail.length));
      if (preamble !== '') {
        fields.push(['preamble', preamble]);
      }

      positions.forEach((position, i) => {
        const end = positions[i + 1]?.index ?? input.tail.length;
        fields.push([position.label, normalize(input.tail.slice(position.valueStart, end))]);
      });

      return { type, fields };
    },
  };
}

export const directDebitGrammar: Grammar = createLabeledGrammar('sepa_direct_debit', 'direct_debit');

export const wireTransferGrammar: Grammar = createLabeledGrammar('sepa_transfer', 'wire_transfer');
