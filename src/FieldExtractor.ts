import fs from 'fs';
import { z } from 'zod';
import { FieldPattern, InvoiceFields } from './types';
import { ConfigurationError, describeError } from './errors';

// "Invoice" + optional '#' + a run of word characters; "Total" + optional ':'/'-' + digits, commas, periods.
// Letters and digits are Unicode-aware so scanned non-ASCII invoice numbers survive.
export const DEFAULT_FIELD_PATTERNS: readonly FieldPattern[] = [
  { field: 'invoice_number', regexPattern: 'Invoice\\s*#?\\s*([\\p{L}\\p{N}_]+)', flags: 'iu', group: 1 },
  { field: 'total', regexPattern: 'Total\\s*[:\\-]?\\s*([\\p{Nd},.]+)', flags: 'iu', group: 1 },
];

const fieldPatternSchema = z.object({
  field: z.enum(['invoice_number', 'vendor', 'date', 'total']),
  regexPattern: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/, 'only the i, m, s and u flags are supported').default('i'),
  group: z.number().int().nonnegative().default(1),
});

const fieldPatternFileSchema = z.array(fieldPatternSchema);

interface CompiledPattern {
  field: FieldPattern['field'];
  regex: RegExp;
  group: number;
}

export function emptyFields(): InvoiceFields {
  return {
    invoice_number: null,
    vendor: null,
    date: null,
    total: null,
  };
}

function compile(pattern: FieldPattern): CompiledPattern {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern.regexPattern, pattern.flags);
  } catch (e) {
    throw new ConfigurationError(
      `Invalid pattern for ${pattern.field}: ${describeError(e)}`,
      { cause: e }
    );
  }

  // An empty alternative always matches, so the result length reveals the group count
  const emptyMatch = new RegExp(`(?:${pattern.regexPattern})|`, pattern.flags).exec('');
  const groupCount = emptyMatch ? emptyMatch.length - 1 : 0;
  if (pattern.group > groupCount) {
    throw new ConfigurationError(
      `Pattern for ${pattern.field} has ${groupCount} capture group(s); group ${pattern.group} requested`
    );
  }

  return { field: pattern.field, regex, group: pattern.group };
}

export class FieldExtractor {
  private patterns: CompiledPattern[];

  constructor(patterns: readonly FieldPattern[] = DEFAULT_FIELD_PATTERNS) {
    this.patterns = patterns.map(compile);
  }

  /**
   * Runs every pattern against the whole text. The first pattern to match a field wins,
   * and within a pattern only the leftmost match counts.
   */
  extractFields(text: string): InvoiceFields {
    const fields = emptyFields();

    for (const pattern of this.patterns) {
      if (fields[pattern.field] !== null) continue;
      const match = pattern.regex.exec(text);
      const value = match?.[pattern.group];
      if (value !== undefined) {
        fields[pattern.field] = value;
      }
    }

    return fields;
  }
}

/** Parses a list of extra patterns, e.g. the contents of a patterns JSON file. */
export function parseFieldPatterns(raw: unknown, source = 'field patterns'): FieldPattern[] {
  const result = fieldPatternFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigurationError(`Invalid ${source}${where}: ${issue.message}`);
  }
  // Compile eagerly so a broken pattern fails at startup
  result.data.forEach(compile);
  return result.data;
}

export function loadFieldPatterns(filePath: string): FieldPattern[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ConfigurationError(`Cannot read field patterns from ${filePath}: ${describeError(e)}`, { cause: e });
  }
  return parseFieldPatterns(raw, filePath);
}
