import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { ExtractionFailurePolicy, OcrMode } from './types';
import { ConfigurationError } from './errors';

export interface CliOptions {
  pdfFolder: string;
  poCsv: string;
  output: string;
}

export interface EnvConfig {
  ocr: OcrMode;
  onExtractionError: ExtractionFailurePolicy;
  normalizeMatching: boolean;
  fieldPatternsPath: string | null;
  auditDbPath: string | null;
}

const cliSchema = z.object({
  pdfFolder: z.string().min(1, '--pdf-folder must not be empty'),
  poCsv: z.string().min(1, '--po-csv must not be empty'),
  output: z.string().min(1, '--output must not be empty'),
});

const envSchema = z.object({
  INVOICE_OCR: z.enum(['none', 'vision']).default('none'),
  INVOICE_ON_EXTRACTION_ERROR: z.enum(['abort', 'skip']).default('abort'),
  INVOICE_MATCH_NORMALIZE: z.enum(['true', 'false']).default('false'),
  INVOICE_FIELD_PATTERNS: z.string().optional(),
  INVOICE_AUDIT_DB: z.string().optional(),
});

function buildProgram(): Command {
  return new Command()
    .name('invoice-po-matcher')
    .description('Extract and match invoices against purchase orders.')
    .requiredOption('--pdf-folder <path>', 'Folder containing invoice PDFs')
    .requiredOption('--po-csv <path>', 'CSV file with purchase orders (must include InvoiceNumber column)')
    .requiredOption('--output <path>', 'Path to save the results CSV')
    .allowExcessArguments(false)
    .exitOverride()
    // main() reports the ConfigurationError itself
    .configureOutput({ outputError: () => undefined });
}

/**
 * Parses user arguments (without the node/script prefix).
 * Returns null when help was requested and printed.
 */
export function parseCliArgs(args: string[]): CliOptions | null {
  const program = buildProgram();
  try {
    program.parse(args, { from: 'user' });
  } catch (e) {
    if (e instanceof CommanderError) {
      if (e.exitCode === 0) return null;
      throw new ConfigurationError(e.message.replace(/^error: /, ''), { cause: e });
    }
    throw e;
  }

  const result = cliSchema.safeParse(program.opts());
  if (!result.success) {
    throw new ConfigurationError(result.error.issues[0].message);
  }
  return result.data;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  // An empty variable counts as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`Invalid ${issue.path.join('.')}: ${issue.message}`);
  }

  const vars = result.data;
  return {
    ocr: vars.INVOICE_OCR,
    onExtractionError: vars.INVOICE_ON_EXTRACTION_ERROR,
    normalizeMatching: vars.INVOICE_MATCH_NORMALIZE === 'true',
    fieldPatternsPath: vars.INVOICE_FIELD_PATTERNS ?? null,
    auditDbPath: vars.INVOICE_AUDIT_DB ?? null,
  };
}
