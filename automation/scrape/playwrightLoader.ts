import { chromium } from 'playwright';
import { LoadOptions, PageLoader } from './pageLoader';

/** The parts of a Playwright page this loader drives. */
export interface BrowserPage {
  goto(url: string, options: { timeout: number }): Promise<unknown>;
  locator(selector: string): {
    first(): { waitFor(options: { state: 'visible'; timeout: number }): Promise<void> };
  };
  content(): Promise<string>;
}

export interface BrowserHandle {
  close(): Promise<void>;
}

/**
 * Headless Chromium loader. One browser and one page are reused for the whole
 * run, so loads are strictly one after another.
 */
export class PlaywrightPageLoader implements PageLoader {
  readonly engine = 'playwright' as const;

  constructor(
    private readonly browser: BrowserHandle,
    private readonly page: BrowserPage
  ) {}

  static async launch(headless = true): Promise<PlaywrightPageLoader> {
    const browser = await chromium.launch({ headless });
    try {
      const page = await browser.newPage();
      return new PlaywrightPageLoader(browser, page);
    } catch (err) {
      await browser.close();
      throw err;
    }
  }

  async load(url: string, opts: LoadOptions): Promise<string> {
    await this.page.goto(url, { timeout: opts.navigationMs });
    await this.page.locator(opts.waitFor).first().waitFor({
      state: 'visible',
      timeout: opts.markerMs,
    });
    return this.page.content();
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}
