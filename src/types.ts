export interface InvoiceFields {
  invoice_number: string | null;
  vendor: string | null;
  date: string | null;
  total: string | null;
}

export type InvoiceField = keyof InvoiceFields;

export interface InvoiceRecord extends InvoiceFields {
  file: string; // Directory entry name of the source PDF
  matched: boolean;
}

export interface FieldPattern {
  field: InvoiceField;
  regexPattern: string;
  flags: string;
  group: number; // Capture group holding the value
}

export type LedgerRow = Record<string, string>;

export interface TextExtractor {
  readonly name: string;
  extract(filePath: string): Promise<string>;
}

export interface OcrEngine {
  recognize(pdf: Buffer): Promise<string>;
}

export type OcrMode = 'none' | 'vision';

export type ExtractionFailurePolicy = 'abort' | 'skip';

export interface BatchSummary {
  processed: number;
  matched: number;
  failed: number;
  outputPath: string;
}

// Audit Types
export interface AuditRun {
  id: number;
  startedAt: string;
  pdfFolder: string;
  poCsv: string;
  outputPath: string;
  processed: number | null;
  matched: number | null;
  failed: number | null;
}

export interface AuditResult {
  runId: number;
  file: string;
  invoiceNumber: string | null;
  vendor: string | null;
  date: string | null;
  total: string | null;
  matched: boolean;
}
