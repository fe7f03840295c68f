import { chromium } from 'playwright';
import type { Browser } from 'playwright';
import type { BrowserOptions } from '../config.js';
import { sleep } from '../utils/concurrency.js';

export interface PageFetcher {
  fetchRenderedHtml(url: string): Promise<string>;
}

export interface BrowserSession extends PageFetcher {
  close(): Promise<void>;
}

export type OpenSession = () => Promise<BrowserSession>;

export class PlaywrightSession implements BrowserSession {
  private constructor(
    private readonly browser: Browser,
    private readonly options: BrowserOptions,
  ) {}

  static async launch(options: BrowserOptions): Promise<PlaywrightSession> {
    const browser = await chromium.launch({
      headless: options.headless,
      args: ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
    });
    return new PlaywrightSession(browser, options);
  }

  async fetchRenderedHtml(url: string): Promise<string> {
    const page = await this.browser.newPage({
      userAgent: this.options.userAgent,
      viewport: { width: 1920, height: 1080 },
    });
    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.options.navigationTimeoutMs });
      await sleep(this.options.settleMs);

      await page.evaluate('window.scrollTo(0, document.body.scrollHeight)');
      await sleep(this.options.scrollSettleMs);
      await page.evaluate('window.scrollTo(0, 0)');
      await sleep(this.options.scrollBackSettleMs);

      return await page.content();
    } finally {
      await page.close();
    }
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

export function playwrightSessionOpener(options: BrowserOptions): OpenSession {
  return () => PlaywrightSession.launch(options);
}
