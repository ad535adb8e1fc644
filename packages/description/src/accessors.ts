import type { DecodedDescription } from '@rekening/types';

function firstField(description: DecodedDescription, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = description.fields.get(key);
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return null;
}

/** Name of the other party: account holder, creditor or merchant. */
export function getCounterparty(description: DecodedDescription): string | null {
  return firstField(description, ['NAME', 'Naam', 'merchant']);
}

export function getCounterpartyIban(description: DecodedDescription): string | null {
  return firstField(description, ['IBAN']);
}

/** The free text a person would read as "what was this for". */
export function getRemittanceInfo(description: DecodedDescription): string | null {
  return firstField(description, ['REMI', 'Omschrijving', 'text', 'note', 'header']);
}

/** Fields as a plain object, in field order. */
export function fieldsToRecord(description: DecodedDescription): Record<string, string> {
  return Object.fromEntries(description.fields);
}
