import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { LedgerLoadError } from '../src/errors';
import { loadLedger, parseLedger } from '../src/Ledger';

describe('parseLedger', () => {
  it('reads the InvoiceNumber column as strings', () => {
    const ledger = parseLedger('InvoiceNumber,Amount\nA100,250\n00123,10\n', 'po.csv');

    expect(ledger.columns).toEqual(['InvoiceNumber', 'Amount']);
    expect(ledger.invoiceNumbers).toEqual(['A100', '00123']);
    expect(ledger.rows[1]).toEqual({ InvoiceNumber: '00123', Amount: '10' });
    expect(ledger.size).toBe(2);
  });

  it('strips a byte order mark from the header', () => {
    expect(parseLedger('\uFEFFInvoiceNumber\nA1\n', 'po.csv').invoiceNumbers).toEqual(['A1']);
  });

  it('keeps surrounding whitespace in values', () => {
    expect(parseLedger('InvoiceNumber\n A1 \n', 'po.csv').invoiceNumbers).toEqual([' A1 ']);
  });

  it('accepts a header without rows', () => {
    const ledger = parseLedger('InvoiceNumber,Vendor\n', 'po.csv');
    expect(ledger.size).toBe(0);
    expect(ledger.columns).toEqual(['InvoiceNumber', 'Vendor']);
  });

  it('rejects an empty file', () => {
    expect(() => parseLedger('', 'po.csv')).toThrow('Ledger po.csv is empty');
  });

  it('requires the exact InvoiceNumber header', () => {
    expect(() => parseLedger('invoicenumber\nA1\n', 'po.csv')).toThrow(
      'Ledger po.csv has no InvoiceNumber column (found: invoicenumber)'
    );
  });

  it('loads rows with trailing cells missing', () => {
    const ledger = parseLedger('InvoiceNumber,Vendor,Amount\nA100,Acme\nB200,Beta,5\n', 'po.csv');

    expect(ledger.invoiceNumbers).toEqual(['A100', 'B200']);
    expect(ledger.rows[0].Amount).toBeUndefined();
    expect(ledger.rows[1]).toEqual({ InvoiceNumber: 'B200', Vendor: 'Beta', Amount: '5' });
  });

  it('rejects rows with more cells than the header', () => {
    expect(() => parseLedger('InvoiceNumber,Vendor\nA1,Acme,extra\n', 'po.csv')).toThrow(LedgerLoadError);
  });

  it('is read-only', () => {
    const ledger = parseLedger('InvoiceNumber\nA1\n', 'po.csv');
    expect(Object.isFrozen(ledger.rows)).toBe(true);
    expect(Object.isFrozen(ledger.rows[0])).toBe(true);
  });
});

describe('loadLedger', () => {
  it('loads a ledger file', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'ledger-'));
    const csvPath = path.join(dir, 'po.csv');
    await writeFile(csvPath, 'InvoiceNumber,Vendor\nA100,Acme\n', 'utf8');

    const ledger = await loadLedger(csvPath);
    expect(ledger.invoiceNumbers).toEqual(['A100']);
  });

  it('reports a missing file with its path', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'ledger-'));
    const csvPath = path.join(dir, 'missing.csv');

    const error = await loadLedger(csvPath).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(LedgerLoadError);
    expect(error).toMatchObject({ path: csvPath });
  });
});
