import fs from 'fs/promises';
import path from 'path';
import type { ImageAnnotatorClient } from '@google-cloud/vision';
import { OcrEngine, OcrMode, TextExtractor } from './types';
import { ExtractionError, describeError } from './errors';

export type PdfTextParser = (data: Buffer) => Promise<string>;

// pdf-parse is loaded on first use; it is only needed once a real PDF is read
const parseWithPdfParse: PdfTextParser = async (data) => {
  const pdfParse = (await import('pdf-parse/lib/pdf-parse.js')).default;
  const parsed = await pdfParse(data);
  return parsed.text || '';
};

/** Reads the embedded text layer only. Scanned pages without one yield ''. */
export class PdfTextLayerExtractor implements TextExtractor {
  readonly name = 'text-layer';

  constructor(private parsePdf: PdfTextParser = parseWithPdfParse) {}

  async read(filePath: string): Promise<Buffer> {
    try {
      return await fs.readFile(filePath);
    } catch (e) {
      throw new ExtractionError(
        path.basename(filePath),
        `Cannot read ${filePath}: ${describeError(e)}`,
        { cause: e }
      );
    }
  }

  async textLayer(filePath: string, data: Buffer): Promise<string> {
    try {
      return await this.parsePdf(data);
    } catch (e) {
      throw new ExtractionError(
        path.basename(filePath),
        `PDF parse failed for ${filePath}: ${describeError(e)}`,
        { cause: e }
      );
    }
  }

  async extract(filePath: string): Promise<string> {
    const data = await this.read(filePath);
    return this.textLayer(filePath, data);
  }
}

/**
 * Falls back to OCR when the text layer is blank. OCR problems are logged and the
 * text-layer result (usually '') is returned instead.
 */
export class OcrFallbackExtractor implements TextExtractor {
  readonly name = 'text-layer+ocr';

  constructor(private textLayer: PdfTextLayerExtractor, private ocr: OcrEngine) {}

  async extract(filePath: string): Promise<string> {
    const data = await this.textLayer.read(filePath);
    const text = await this.textLayer.textLayer(filePath, data);
    if (text.trim()) return text;

    try {
      return await this.ocr.recognize(data);
    } catch (e) {
      console.warn(`[TextExtractor] OCR unavailable for ${path.basename(filePath)}: ${describeError(e)}`);
      return text;
    }
  }
}

// Without explicit pages, Vision reads the first two pages and the last page of the PDF
export class VisionOcrEngine implements OcrEngine {
  private client: ImageAnnotatorClient | null = null;

  private async getClient(): Promise<ImageAnnotatorClient> {
    if (!this.client) {
      const { ImageAnnotatorClient } = await import('@google-cloud/vision');
      this.client = new ImageAnnotatorClient();
    }
    return this.client;
  }

  async recognize(pdf: Buffer): Promise<string> {
    const client = await this.getClient();
    const [result] = await client.batchAnnotateFiles({
      requests: [
        {
          inputConfig: { content: pdf, mimeType: 'application/pdf' },
          features: [{ type: 'DOCUMENT_TEXT_DETECTION' }],
        },
      ],
    });

    const pages = result.responses?.[0]?.responses ?? [];
    return pages
      .map(page => page.fullTextAnnotation?.text ?? '')
      .join('\n');
  }
}

export function createTextExtractor(mode: OcrMode, ocr: OcrEngine = new VisionOcrEngine()): TextExtractor {
  const textLayer = new PdfTextLayerExtractor();
  if (mode === 'none') return textLayer;
  return new OcrFallbackExtractor(textLayer, ocr);
}
