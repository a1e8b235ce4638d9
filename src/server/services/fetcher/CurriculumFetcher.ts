/**
 * CurriculumFetcher - locate the curriculum PDF on the programme page and store it
 *
 * One attempt per call: open the page, take the first matching link, download
 * it into the downloads directory and move the Latest Pointer to it.
 */

import path from 'path';
import type { Logger } from 'pino';
import type { FileNaming } from '../../config/env.js';
import { ArtifactStore } from '../artifacts/ArtifactStore.js';
import { NavigationError, NotFoundError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { CatalogPageReader } from './CatalogPageReader.js';
import type { DownloadedFile, PdfDownloader } from './PdfDownloader.js';
import {
  fileNameFromUrl,
  hasPdfSignature,
  sanitizePdfFileName,
  selectPdfLink,
  timestampedFileName,
  type ResolvedLink,
} from './pdfLinks.js';

export interface CurriculumFetcherConfig {
  defaultUrl: string;
  pdfLinkPattern: RegExp;
  pdfLinkText?: string;
  fileNaming: FileNaming;
  now?: () => Date;
}

export interface FetchOptions {
  url?: string;
  /** Explicit destination; bypasses the downloads directory naming */
  saveAs?: string;
}

export interface FetchResult {
  pdfPath: string;
  sourceUrl: string;
  pageUrl: string;
  bytes: number;
}

export class CurriculumFetcher {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly store: ArtifactStore,
    private readonly reader: CatalogPageReader,
    private readonly downloader: PdfDownloader,
    private readonly config: CurriculumFetcherConfig
  ) {
    this.log = createChildLogger({ component: 'fetcher' });
    this.now = config.now ?? (() => new Date());
  }

  /**
   * @throws {NavigationError} If the page or the document cannot be retrieved
   * @throws {NotFoundError} If the page has no matching PDF link
   */
  async fetch(options: FetchOptions = {}): Promise<FetchResult> {
    const url = options.url ?? this.config.defaultUrl;
    const page = await this.reader.readLinks(url);

    const link = selectPdfLink(page.links, page.pageUrl, {
      pattern: this.config.pdfLinkPattern,
      linkText: this.config.pdfLinkText,
    });
    if (!link) {
      throw new NotFoundError('PDF link', url, { linkCount: page.links.length, pageTitle: page.title });
    }
    this.log.info({ url: link.url, text: link.text }, 'PDF link found');

    const file = await this.downloader.download(link.url, page.pageUrl);
    if (!hasPdfSignature(file.data)) {
      throw new NavigationError(link.url, 'downloaded file is not a PDF', { contentType: file.contentType ?? null });
    }

    const pdfPath = options.saveAs
      ? path.resolve(options.saveAs)
      : this.store.downloadPath(this.fileNameFor(link, file));

    await this.store.ensureLayout();
    await this.store.writeAtomic(pdfPath, file.data);
    await this.store.writeLatestPointer(pdfPath);

    this.log.info({ pdfPath, bytes: file.data.length }, 'Curriculum PDF downloaded');
    return { pdfPath, sourceUrl: link.url, pageUrl: page.pageUrl, bytes: file.data.length };
  }

  private fileNameFor(link: ResolvedLink, file: DownloadedFile): string {
    if (this.config.fileNaming === 'source') {
      const candidates = [file.fileName, fileNameFromUrl(link.url)];
      for (const candidate of candidates) {
        const name = candidate ? sanitizePdfFileName(candidate) : null;
        if (name) return name;
      }
    }
    return timestampedFileName(this.now());
  }
}
