import { InvoiceFields } from './types';
import { PurchaseOrderLedger } from './Ledger';

export interface LedgerMatcherOptions {
  // Compare trimmed, upper-cased invoice numbers instead of exact strings
  normalize?: boolean;
}

function normalizeInvoiceNumber(value: string): string {
  return value.trim().toUpperCase();
}

export class LedgerMatcher {
  private readonly normalize: boolean;
  private readonly known: Set<string>;

  constructor(ledger: PurchaseOrderLedger, options: LedgerMatcherOptions = {}) {
    this.normalize = options.normalize ?? false;
    const values = this.normalize
      ? ledger.invoiceNumbers.map(normalizeInvoiceNumber)
      : ledger.invoiceNumbers;
    this.known = new Set(values);
  }

  match(fields: InvoiceFields): boolean {
    const invoiceNumber = fields.invoice_number;
    if (!invoiceNumber) return false;

    const key = this.normalize ? normalizeInvoiceNumber(invoiceNumber) : invoiceNumber;
    return this.known.has(key);
  }
}
