export class InvoiceMatcherError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A required CLI argument or environment setting is missing or malformed. */
export class ConfigurationError extends InvoiceMatcherError {}

/** The purchase-order ledger could not be read or lacks the InvoiceNumber column. */
export class LedgerLoadError extends InvoiceMatcherError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

/** A document failed to yield text. */
export class ExtractionError extends InvoiceMatcherError {
  readonly file: string;

  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.file = file;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
