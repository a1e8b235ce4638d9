/**
 * PdfExtractor - Extract text from PDF documents page by page
 *
 * Wraps pdf-parse and reports per-page text together with extraction
 * diagnostics. Validation of the text (empty documents, scans) is left to the
 * caller, which knows which file it is converting.
 */

import { PDFParse } from 'pdf-parse';
import { logger } from '../../utils/logger.js';

export interface PdfPageText {
  pageNumber: number; // 1-based page number
  text: string;
}

/**
 * PDF extraction result
 */
export interface PdfExtractionResult {
  pages: PdfPageText[];
  pageCount: number;
  diagnostics: {
    extractionMethod: 'pdf-parse';
    hasText: boolean;
    textLength: number;
    isScanned: boolean; // Heuristic: true if text length is very low relative to page count
  };
}

/**
 * Anything that turns PDF bytes into page texts
 */
export interface PdfTextExtractor {
  extract(pdfBuffer: Buffer): Promise<PdfExtractionResult>;
}

export class PdfExtractor implements PdfTextExtractor {
  private readonly minTextPerPage: number;

  constructor(config: { minTextPerPage?: number } = {}) {
    this.minTextPerPage = config.minTextPerPage ?? 50;
  }

  /**
   * Extract text from PDF buffer
   *
   * @throws Error if the buffer cannot be parsed as a PDF
   */
  async extract(pdfBuffer: Buffer): Promise<PdfExtractionResult> {
    // pdf.js may take ownership of the bytes it is given
    const parser = new PDFParse({ data: new Uint8Array(pdfBuffer) });
    try {
      const result = await parser.getText();
      const pages = [...result.pages]
        .sort((a, b) => a.num - b.num)
        .map((page) => ({ pageNumber: page.num, text: page.text }));

      const pageCount = pages.length;
      const textLength = pages.reduce((sum, page) => sum + page.text.trim().length, 0);
      const textPerPage = pageCount > 0 ? textLength / pageCount : 0;

      const diagnostics: PdfExtractionResult['diagnostics'] = {
        extractionMethod: 'pdf-parse',
        hasText: textLength > 0,
        textLength,
        isScanned: pageCount > 0 && textPerPage < this.minTextPerPage,
      };

      logger.debug({ pageCount, ...diagnostics }, 'PDF extraction completed');

      return { pages, pageCount, diagnostics };
    } catch (error) {
      logger.error({ error }, 'PDF extraction failed');
      throw new Error(`PDF extraction failed: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      await parser.destroy().catch((destroyError: unknown) => {
        logger.warn({ error: destroyError }, 'Failed to release PDF parser');
      });
    }
  }
}
