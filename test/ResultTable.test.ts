import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { ResultTable } from '../src/ResultTable';
import { InvoiceRecord } from '../src/types';

const HEADER = 'invoice_number,vendor,date,total,file,matched\n';

function record(overrides: Partial<InvoiceRecord> = {}): InvoiceRecord {
  return {
    invoice_number: 'A100',
    vendor: null,
    date: null,
    total: '250.00',
    file: 'a.pdf',
    matched: true,
    ...overrides,
  };
}

describe('ResultTable', () => {
  it('writes only the header when empty', () => {
    expect(new ResultTable().toCsv()).toBe(HEADER);
  });

  it('serializes absent fields as empty cells and matched as True/False', () => {
    const table = new ResultTable();
    table.append(record());
    table.append(record({ invoice_number: null, total: null, file: 'b.pdf', matched: false }));

    expect(table.toCsv()).toBe(`${HEADER}A100,,,250.00,a.pdf,True\n,,,,b.pdf,False\n`);
  });

  it('quotes values containing commas', () => {
    const table = new ResultTable();
    table.append(record({ total: '1,234.50' }));

    expect(table.toCsv()).toBe(`${HEADER}A100,,,"1,234.50",a.pdf,True\n`);
  });

  it('keeps insertion order', () => {
    const table = new ResultTable();
    table.append(record({ file: 'z.pdf' }));
    table.append(record({ file: 'a.pdf' }));

    expect(table.all().map(r => r.file)).toEqual(['z.pdf', 'a.pdf']);
    expect(table.size).toBe(2);
  });

  it('writes the CSV to disk', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'results-'));
    const outputPath = path.join(dir, 'out.csv');
    const table = new ResultTable();
    table.append(record());

    await table.write(outputPath);
    await expect(readFile(outputPath, 'utf8')).resolves.toBe(`${HEADER}A100,,,250.00,a.pdf,True\n`);
  });
});
