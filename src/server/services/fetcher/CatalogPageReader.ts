/**
 * CatalogPageReader - open the programme page in a headless browser and list its links
 *
 * Programme pages render their download links client-side, so a plain HTTP
 * fetch of the HTML is not enough.
 */

import puppeteer, { type Browser, type LaunchOptions } from 'puppeteer-core';
import { NavigationError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { PageLink } from './pdfLinks.js';

export interface CatalogPage {
  pageUrl: string; // final URL after redirects
  title: string;
  links: PageLink[];
}

export interface CatalogPageReader {
  readLinks(url: string): Promise<CatalogPage>;
}

export interface PuppeteerPageReaderConfig {
  executablePath?: string;
  locale: string;
  navigationTimeoutMs: number;
}

export class PuppeteerPageReader implements CatalogPageReader {
  private readonly log = createChildLogger({ component: 'catalog-page-reader' });

  constructor(private readonly config: PuppeteerPageReaderConfig) {}

  private launchOptions(): LaunchOptions {
    return {
      headless: true,
      // Without an explicit binary, use the locally installed Chrome
      ...(this.config.executablePath ? { executablePath: this.config.executablePath } : { channel: 'chrome' as const }),
      // Container-safe args to prevent crashes
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-dev-shm-usage',
        '--disable-gpu',
        '--disable-extensions',
        `--lang=${this.config.locale}`,
      ],
      timeout: this.config.navigationTimeoutMs,
    };
  }

  /**
   * @throws {NavigationError} If the browser cannot start or the page cannot be loaded
   */
  async readLinks(url: string): Promise<CatalogPage> {
    let browser: Browser;
    try {
      browser = await puppeteer.launch(this.launchOptions());
    } catch (error) {
      throw new NavigationError(url, `browser launch failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    try {
      const page = await browser.newPage();
      page.setDefaultNavigationTimeout(this.config.navigationTimeoutMs);
      await page.setExtraHTTPHeaders({ 'Accept-Language': this.config.locale });

      this.log.info({ url }, 'Opening catalogue page');
      const response = await page.goto(url, { waitUntil: 'networkidle2', timeout: this.config.navigationTimeoutMs });
      if (response && !response.ok()) {
        throw new NavigationError(url, `HTTP ${response.status()}`, { statusCode: response.status() });
      }

      const links = await page.$$eval('a[href]', (anchors) =>
        anchors.map((anchor) => ({
          href: anchor.getAttribute('href') ?? '',
          text: (anchor.textContent ?? '').trim(),
        }))
      );
      const title = await page.title();

      this.log.debug({ url, pageUrl: page.url(), linkCount: links.length }, 'Catalogue page links collected');
      return { pageUrl: page.url(), title, links };
    } catch (error) {
      if (error instanceof NavigationError) throw error;
      throw new NavigationError(url, error instanceof Error ? error.message : String(error));
    } finally {
      await browser.close().catch((closeError: unknown) => {
        this.log.warn({ error: closeError }, 'Failed to close browser');
      });
    }
  }
}
