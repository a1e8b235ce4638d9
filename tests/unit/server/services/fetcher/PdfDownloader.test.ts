import { describe, it, expect } from 'vitest';
import axios, { type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { HttpPdfDownloader } from '../../../../../src/server/services/fetcher/PdfDownloader.js';
import { NavigationError } from '../../../../../src/server/types/errors.js';

const PDF_URL = 'https://cdn.example.edu/docs/plan.pdf';

function clientWith(adapter: AxiosAdapter) {
  return axios.create({ adapter });
}

describe('HttpPdfDownloader', () => {
  it('returns the body with content type and disposition name', async () => {
    const bytes = Buffer.from('%PDF-1.5 test');
    const requests: InternalAxiosRequestConfig[] = [];
    const downloader = new HttpPdfDownloader({
      client: clientWith(async (config) => {
        requests.push(config);
        return {
          data: bytes,
          status: 200,
          statusText: 'OK',
          headers: {
            'content-type': 'application/pdf',
            'content-disposition': 'attachment; filename="plan.pdf"',
          },
          config,
        };
      }),
    });

    const file = await downloader.download(PDF_URL, 'https://example.edu/program/ai');

    expect(file).toEqual({ data: bytes, contentType: 'application/pdf', fileName: 'plan.pdf' });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe(PDF_URL);
    expect(requests[0]?.responseType).toBe('arraybuffer');
    expect(requests[0]?.headers.get('Referer')).toBe('https://example.edu/program/ai');
  });

  it('leaves the file name unset without Content-Disposition', async () => {
    const downloader = new HttpPdfDownloader({
      client: clientWith(async (config) => ({
        data: Buffer.from('%PDF-1.5'),
        status: 200,
        statusText: 'OK',
        headers: {},
        config,
      })),
    });

    const file = await downloader.download(PDF_URL);

    expect(file.fileName).toBeUndefined();
    expect(file.contentType).toBeUndefined();
  });

  it('wraps transport failures as NavigationError', async () => {
    const downloader = new HttpPdfDownloader({
      client: clientWith(async () => {
        throw new Error('Request failed with status code 404');
      }),
    });

    const attempt = downloader.download(PDF_URL);

    await expect(attempt).rejects.toBeInstanceOf(NavigationError);
    await expect(attempt).rejects.toThrow(
      `Navigation to ${PDF_URL} failed: download failed: Request failed with status code 404`
    );
  });
});
