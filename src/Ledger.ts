import fs from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { LedgerRow } from './types';
import { LedgerLoadError, describeError } from './errors';

export const INVOICE_NUMBER_COLUMN = 'InvoiceNumber';

const ledgerRowsSchema = z.array(z.record(z.string()));

/** Purchase-order ledger; read-only once loaded. */
export class PurchaseOrderLedger {
  readonly columns: readonly string[];
  readonly rows: readonly Readonly<LedgerRow>[];
  readonly invoiceNumbers: readonly string[];

  constructor(columns: string[], rows: LedgerRow[]) {
    if (!columns.includes(INVOICE_NUMBER_COLUMN)) {
      throw new Error(`Ledger has no ${INVOICE_NUMBER_COLUMN} column`);
    }
    this.columns = Object.freeze([...columns]);
    this.rows = Object.freeze(rows.map(row => Object.freeze({ ...row })));
    this.invoiceNumbers = Object.freeze(this.rows.map(row => row[INVOICE_NUMBER_COLUMN] ?? ''));
  }

  get size(): number {
    return this.rows.length;
  }
}

export function parseLedger(content: string, source: string): PurchaseOrderLedger {
  const seen: { header: string[] | null } = { header: null };
  let parsed: unknown;

  try {
    parsed = parse(content, {
      columns: (names: string[]) => {
        seen.header = names;
        return names;
      },
      bom: true,
      skip_empty_lines: true,
      // Short rows load with their trailing cells absent; extra cells are still an error
      relax_column_count_less: true,
    });
  } catch (e) {
    throw new LedgerLoadError(source, `Malformed ledger CSV ${source}: ${describeError(e)}`, { cause: e });
  }

  const columns = seen.header;
  if (columns === null) {
    throw new LedgerLoadError(source, `Ledger ${source} is empty`);
  }
  if (!columns.includes(INVOICE_NUMBER_COLUMN)) {
    throw new LedgerLoadError(
      source,
      `Ledger ${source} has no ${INVOICE_NUMBER_COLUMN} column (found: ${columns.join(', ') || 'none'})`
    );
  }

  const rows = ledgerRowsSchema.safeParse(parsed);
  if (!rows.success) {
    throw new LedgerLoadError(source, `Ledger ${source} contains unreadable rows`);
  }

  return new PurchaseOrderLedger(columns, rows.data);
}

export async function loadLedger(csvPath: string): Promise<PurchaseOrderLedger> {
  let content: string;
  try {
    content = await fs.readFile(csvPath, 'utf-8');
  } catch (e) {
    throw new LedgerLoadError(csvPath, `Cannot read ledger ${csvPath}: ${describeError(e)}`, { cause: e });
  }
  return parseLedger(content, csvPath);
}
