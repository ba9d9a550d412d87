import fs from 'fs/promises';
import path from 'path';
import { BatchSummary, ExtractionFailurePolicy, InvoiceRecord, TextExtractor } from './types';
import { FieldExtractor, emptyFields } from './FieldExtractor';
import { LedgerMatcher, LedgerMatcherOptions } from './LedgerMatcher';
import { loadLedger } from './Ledger';
import { ResultTable } from './ResultTable';
import { AuditStore } from './AuditStore';
import { describeError } from './errors';

export interface BatchProcessorOptions {
  onExtractionError?: ExtractionFailurePolicy;
  matcher?: LedgerMatcherOptions;
  audit?: AuditStore;
}

export function isPdfName(name: string): boolean {
  return name.toLowerCase().endsWith('.pdf');
}

export class BatchProcessor {
  private onExtractionError: ExtractionFailurePolicy;

  constructor(
    private textExtractor: TextExtractor,
    private fieldExtractor: FieldExtractor = new FieldExtractor(),
    private options: BatchProcessorOptions = {}
  ) {
    this.onExtractionError = options.onExtractionError ?? 'abort';
  }

  async process(pdfFolder: string, poCsv: string, outputPath: string): Promise<BatchSummary> {
    const ledger = await loadLedger(poCsv);
    const matcher = new LedgerMatcher(ledger, this.options.matcher);

    // readdir order, deliberately unsorted
    const entries = (await fs.readdir(pdfFolder)).filter(isPdfName);
    const results = new ResultTable();
    let failed = 0;

    for (const fname of entries) {
      const filePath = path.join(pdfFolder, fname);

      let text: string;
      try {
        text = await this.textExtractor.extract(filePath);
      } catch (e) {
        if (this.onExtractionError === 'abort') throw e;
        failed++;
        console.error(`[BatchProcessor] Skipping ${fname}: ${describeError(e)}`);
        results.append({ ...emptyFields(), file: fname, matched: false });
        continue;
      }

      const fields = this.fieldExtractor.extractFields(text);
      const record: InvoiceRecord = {
        ...fields,
        file: fname,
        matched: matcher.match(fields),
      };
      results.append(record);
    }

    await results.write(outputPath);

    const summary: BatchSummary = {
      processed: results.size,
      matched: results.all().filter(r => r.matched).length,
      failed,
      outputPath,
    };

    if (this.options.audit) {
      await this.recordRun(this.options.audit, pdfFolder, poCsv, results, summary);
    }

    console.log(`Processed ${summary.processed} invoices; results saved to ${outputPath}`);
    return summary;
  }

  private async recordRun(
    audit: AuditStore,
    pdfFolder: string,
    poCsv: string,
    results: ResultTable,
    summary: BatchSummary
  ): Promise<void> {
    const runId = await audit.startRun(pdfFolder, poCsv, summary.outputPath);
    for (const record of results.all()) {
      await audit.addResult(runId, record);
    }
    await audit.finishRun(runId, summary);
  }
}
