import fs from 'fs/promises';
import { stringify } from 'csv-stringify/sync';
import { InvoiceRecord } from './types';

export const RESULT_COLUMNS = ['invoice_number', 'vendor', 'date', 'total', 'file', 'matched'] as const;

function toRow(record: InvoiceRecord): string[] {
  return [
    record.invoice_number ?? '',
    record.vendor ?? '',
    record.date ?? '',
    record.total ?? '',
    record.file,
    record.matched ? 'True' : 'False',
  ];
}

/** Results in discovery order. Records are only ever appended. */
export class ResultTable {
  private records: InvoiceRecord[] = [];

  append(record: InvoiceRecord): void {
    this.records.push(Object.freeze({ ...record }));
  }

  get size(): number {
    return this.records.length;
  }

  all(): readonly InvoiceRecord[] {
    return this.records;
  }

  toCsv(): string {
    // Header is written explicitly so an empty table still yields it
    return stringify([[...RESULT_COLUMNS], ...this.records.map(toRow)], { record_delimiter: 'unix' });
  }

  async write(outputPath: string): Promise<void> {
    await fs.writeFile(outputPath, this.toCsv(), 'utf-8');
  }
}
