/**
 * DocumentConverter - turn a Source Document into its derived artifacts
 *
 * For `<dir>/<stem>.pdf` it writes `<stem>.txt`, `<stem>.xml` and
 * `<stem>.structured.xml` into the processed directory of the store. All three
 * come from a single extraction pass.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import type { Logger } from 'pino';
import { ArtifactStore, type DerivedArtifactKind } from '../artifacts/ArtifactStore.js';
import { PdfExtractor, type PdfTextExtractor } from '../../extraction/pdf/PdfExtractor.js';
import { ConversionError, isAppError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errorHandling.js';
import { cleanLines, cleanText } from './textCleanup.js';
import { splitSections } from './curriculumStructure.js';
import { renderDocumentXml, renderStructuredXml } from './xmlRenderer.js';

export interface ConversionResult {
  pdfPath: string;
  txtPath: string;
  xmlPath: string;
  structuredPath: string;
  pageCount: number;
  sectionCount: number;
}

export interface ConvertOptions {
  /** Limit output to the given derived kinds (all three by default) */
  only?: DerivedArtifactKind[];
}

export class DocumentConverter {
  private readonly log: Logger;

  constructor(
    private readonly store: ArtifactStore,
    private readonly extractor: PdfTextExtractor = new PdfExtractor()
  ) {
    this.log = createChildLogger({ component: 'converter' });
  }

  /**
   * @throws {ConversionError} If the PDF cannot be read, holds no extractable text or cannot be rendered as XML
   */
  async convert(pdfPath: string, options: ConvertOptions = {}): Promise<ConversionResult> {
    const resolved = path.resolve(pdfPath);
    const kinds = new Set<DerivedArtifactKind>(options.only ?? ['txt', 'xml', 'structured']);
    const paths = this.store.artifactPaths(resolved);

    let buffer: Buffer;
    try {
      buffer = await readFile(resolved);
    } catch (error) {
      throw new ConversionError(resolved, `cannot read file (${errorMessage(error)})`);
    }

    let pages: Array<{ pageNumber: number; text: string }>;
    try {
      const extraction = await this.extractor.extract(buffer);
      pages = extraction.pages.map((page) => ({ pageNumber: page.pageNumber, text: cleanText(page.text).trimEnd() }));
      if (extraction.diagnostics.isScanned) {
        this.log.warn({ pdfPath: resolved, ...extraction.diagnostics }, 'PDF looks scanned, text may be incomplete');
      }
    } catch (error) {
      if (isAppError(error)) throw error;
      throw new ConversionError(resolved, errorMessage(error));
    }

    // Page-by-page concatenation, one blank line between pages
    const text = cleanText(pages.map((page) => page.text).join('\n\n'));
    if (text.length === 0) {
      throw new ConversionError(resolved, 'no extractable text');
    }

    const source = path.basename(resolved);
    const sections = splitSections(cleanLines(text.split('\n')));

    let documentXml: string;
    let structuredXml: string;
    try {
      documentXml = renderDocumentXml(source, pages);
      structuredXml = renderStructuredXml(source, sections);
    } catch (error) {
      throw new ConversionError(resolved, `XML rendering failed (${errorMessage(error)})`);
    }

    await this.store.ensureLayout();
    if (kinds.has('txt')) {
      await this.store.writeAtomic(paths.txt, text);
    }
    if (kinds.has('xml')) {
      await this.store.writeAtomic(paths.xml, documentXml);
    }
    if (kinds.has('structured')) {
      await this.store.writeAtomic(paths.structured, structuredXml);
    }

    this.log.info(
      { pdfPath: resolved, pageCount: pages.length, sectionCount: sections.length, kinds: [...kinds] },
      'Document converted'
    );

    return {
      pdfPath: resolved,
      txtPath: paths.txt,
      xmlPath: paths.xml,
      structuredPath: paths.structured,
      pageCount: pages.length,
      sectionCount: sections.length,
    };
  }
}

