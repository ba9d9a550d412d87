import { describe, expect, it } from 'vitest';

import { PurchaseOrderLedger } from '../src/Ledger';
import { LedgerMatcher } from '../src/LedgerMatcher';
import { InvoiceFields } from '../src/types';

function fields(invoiceNumber: string | null): InvoiceFields {
  return { invoice_number: invoiceNumber, vendor: null, date: null, total: null };
}

function ledgerOf(...invoiceNumbers: string[]): PurchaseOrderLedger {
  return new PurchaseOrderLedger(
    ['InvoiceNumber', 'Vendor'],
    invoiceNumbers.map(n => ({ InvoiceNumber: n, Vendor: 'Acme' }))
  );
}

describe('LedgerMatcher', () => {
  it('matches an invoice number present in the ledger', () => {
    const matcher = new LedgerMatcher(ledgerOf('A100', 'A123'));
    expect(matcher.match(fields('A123'))).toBe(true);
  });

  it('does not match an invoice number missing from the ledger', () => {
    const matcher = new LedgerMatcher(ledgerOf('A100'));
    expect(matcher.match(fields('B200'))).toBe(false);
  });

  it('never matches an absent invoice number', () => {
    expect(new LedgerMatcher(ledgerOf('A100')).match(fields(null))).toBe(false);
    expect(new LedgerMatcher(ledgerOf()).match(fields(null))).toBe(false);
    expect(new LedgerMatcher(ledgerOf('')).match(fields(''))).toBe(false);
  });

  it('never matches against an empty ledger', () => {
    expect(new LedgerMatcher(ledgerOf()).match(fields('A100'))).toBe(false);
  });

  it('compares exactly by default', () => {
    const matcher = new LedgerMatcher(ledgerOf('A123', ' B7 '));
    expect(matcher.match(fields('a123'))).toBe(false);
    expect(matcher.match(fields('B7'))).toBe(false);
    expect(matcher.match(fields(' B7 '))).toBe(true);
  });

  describe('with normalization', () => {
    it('ignores case and surrounding whitespace', () => {
      const matcher = new LedgerMatcher(ledgerOf('A123', ' b7 '), { normalize: true });
      expect(matcher.match(fields('a123'))).toBe(true);
      expect(matcher.match(fields('B7'))).toBe(true);
      expect(matcher.match(fields('A124'))).toBe(false);
    });
  });
});
