/**
 * PdfDownloader - fetch the linked document over HTTP
 */

import type { AxiosInstance } from 'axios';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { NavigationError } from '../../types/errors.js';
import { fileNameFromContentDisposition } from './pdfLinks.js';

export interface DownloadedFile {
  data: Buffer;
  contentType?: string;
  fileName?: string; // from Content-Disposition, unsanitised
}

export interface PdfDownloader {
  download(url: string, referer?: string): Promise<DownloadedFile>;
}

export class HttpPdfDownloader implements PdfDownloader {
  private readonly client: AxiosInstance;

  constructor(options: { timeoutMs?: number; client?: AxiosInstance } = {}) {
    this.client = options.client ?? createHttpClient({ timeout: options.timeoutMs ?? HTTP_TIMEOUTS.STANDARD });
  }

  /**
   * @throws {NavigationError} If the request fails or answers with an error status
   */
  async download(url: string, referer?: string): Promise<DownloadedFile> {
    try {
      const response = await this.client.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        headers: {
          Accept: 'application/pdf,application/octet-stream;q=0.9,*/*;q=0.8',
          ...(referer ? { Referer: referer } : {}),
        },
        maxRedirects: 5,
      });

      const contentType = response.headers['content-type'];
      const disposition = response.headers['content-disposition'];
      return {
        data: Buffer.from(response.data),
        contentType: typeof contentType === 'string' ? contentType : undefined,
        fileName: fileNameFromContentDisposition(typeof disposition === 'string' ? disposition : undefined) ?? undefined,
      };
    } catch (error) {
      throw new NavigationError(url, `download failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
