/**
 * Service Initialization
 *
 * Builds the pipeline services from the validated environment.
 * Shared by the API server and the CLI scripts.
 */

import type { Env } from './env.js';
import { ArtifactStore } from '../services/artifacts/ArtifactStore.js';
import { PuppeteerPageReader } from '../services/fetcher/CatalogPageReader.js';
import { HttpPdfDownloader } from '../services/fetcher/PdfDownloader.js';
import { CurriculumFetcher } from '../services/fetcher/CurriculumFetcher.js';
import { DocumentConverter } from '../services/conversion/DocumentConverter.js';

export interface PipelineServices {
  store: ArtifactStore;
  fetcher: CurriculumFetcher;
  converter: DocumentConverter;
}

export function createPipelineServices(env: Env): PipelineServices {
  const store = new ArtifactStore(env.DATA_DIR);

  const reader = new PuppeteerPageReader({
    executablePath: env.BROWSER_EXECUTABLE_PATH,
    locale: env.BROWSER_LOCALE,
    navigationTimeoutMs: env.NAVIGATION_TIMEOUT_MS,
  });
  const downloader = new HttpPdfDownloader({ timeoutMs: env.DOWNLOAD_TIMEOUT_MS });

  const fetcher = new CurriculumFetcher(store, reader, downloader, {
    defaultUrl: env.CURRICULUM_URL,
    pdfLinkPattern: env.PDF_LINK_PATTERN,
    pdfLinkText: env.PDF_LINK_TEXT,
    fileNaming: env.FILE_NAMING,
  });
  const converter = new DocumentConverter(store);

  return { store, fetcher, converter };
}
