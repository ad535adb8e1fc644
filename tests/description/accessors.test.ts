import { describe, it, expect } from 'vitest';
import {
  decodeDescription,
  fieldsToRecord,
  getCounterparty,
  getCounterpartyIban,
  getRemittanceInfo,
  parsePosTimestamp,
} from '@rekening/description';
import { printed } from './layout.js';

describe('parsePosTimestamp', () => {
  it.each([
    ['31.12.23/23.59', { date: '2023-12-31', time: '23:59' }],
    ['31.12.23/23:59', { date: '2023-12-31', time: '23:59' }],
    ['01-02-23/4:05', { date: '2023-02-01', time: '04:05' }],
  ])('should parse %s', (raw, expected) => {
    expect(parsePosTimestamp(raw)).toEqual(expected);
  });

  it.each(['30.02.23/10.00', '01.01.23/24.00', '01.01.23', 'NR:01.01.23/10.00'])('should reject %s', (raw) => {
    expect(parsePosTimestamp(raw)).toBeNull();
  });
});

describe('field accessors', () => {
  const structured = decodeDescription(
    '/TRTP/SEPA OVERBOEKING/IBAN/NL02TEST0123456789/BIC/TESTNL2A/NAME/J Jansen/REMI/huur mei'
  );
  const transfer = decodeDescription(
    printed('SEPA Overboeking', 'IBAN: NL02TEST0123456789', 'BIC: TESTNL2A', 'Naam: J Jansen', 'Omschrijving: huur mei')
  );
  const payment = decodeDescription(
    printed('BEA, Betaalpas', 'Fietsenmaker Het Wiel,PAS321', 'NR:7F3K2L, 14.08.23/09:05', 'HAARLEM')
  );
  const unknown = decodeDescription('Something else');

  it('should find the counterparty name', () => {
    expect(getCounterparty(structured)).toBe('J Jansen');
    expect(getCounterparty(transfer)).toBe('J Jansen');
    expect(getCounterparty(payment)).toBe('Fietsenmaker Het Wiel');
    expect(getCounterparty(unknown)).toBeNull();
  });

  it('should find the counterparty IBAN', () => {
    expect(getCounterpartyIban(structured)).toBe('NL02TEST0123456789');
    expect(getCounterpartyIban(transfer)).toBe('NL02TEST0123456789');
    expect(getCounterpartyIban(payment)).toBeNull();
  });

  it('should find the remittance text', () => {
    expect(getRemittanceInfo(structured)).toBe('huur mei');
    expect(getRemittanceInfo(transfer)).toBe('huur mei');
    expect(getRemittanceInfo(payment)).toBe('BEA, Betaalpas');
    expect(getRemittanceInfo(unknown)).toBe('Something else');
  });

  it('should convert fields to a plain object in order', () => {
    expect(Object.keys(fieldsToRecord(transfer))).toEqual(['header', 'IBAN', 'BIC', 'Naam', 'Omschrijving']);
  });
});
