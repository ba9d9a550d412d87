import { BatchSummary, FieldPattern, OcrEngine } from './types';
import { loadEnvConfig, parseCliArgs } from './config';
import { DEFAULT_FIELD_PATTERNS, FieldExtractor, loadFieldPatterns } from './FieldExtractor';
import { createTextExtractor } from './TextExtractor';
import { BatchProcessor } from './BatchProcessor';
import { AuditStore } from './AuditStore';
import { ConfigurationError, describeError } from './errors';

async function openAuditStore(filePath: string): Promise<AuditStore> {
  try {
    return await AuditStore.open(filePath);
  } catch (e) {
    throw new ConfigurationError(`Cannot open audit database ${filePath}: ${describeError(e)}`, { cause: e });
  }
}

export interface RunOverrides {
  env?: NodeJS.ProcessEnv;
  ocrEngine?: OcrEngine;
}

/** Parses configuration, wires the pipeline and processes one folder. Null when only help was shown. */
export async function run(args: string[], overrides: RunOverrides = {}): Promise<BatchSummary | null> {
  // Arguments and environment are validated before any file is read
  const cli = parseCliArgs(args);
  if (!cli) return null;
  const config = loadEnvConfig(overrides.env ?? process.env);

  let patterns: FieldPattern[] = [...DEFAULT_FIELD_PATTERNS];
  if (config.fieldPatternsPath) {
    patterns = patterns.concat(loadFieldPatterns(config.fieldPatternsPath));
  }

  const textExtractor = createTextExtractor(config.ocr, overrides.ocrEngine);
  const audit = config.auditDbPath ? await openAuditStore(config.auditDbPath) : undefined;
  const processor = new BatchProcessor(textExtractor, new FieldExtractor(patterns), {
    onExtractionError: config.onExtractionError,
    matcher: { normalize: config.normalizeMatching },
    audit,
  });

  try {
    return await processor.process(cli.pdfFolder, cli.poCsv, cli.output);
  } finally {
    await audit?.close();
  }
}
