/**
 * Page loaders: turn a URL into rendered HTML once a marker element exists.
 *
 * Two engines share this interface: Playwright (headless Chromium, see
 * playwrightLoader.ts) and plain HTTP for when a browser can't be started.
 */

import * as cheerio from 'cheerio';
import { HTTP_USER_AGENT } from '../selectors';

export interface LoadOptions {
  /** CSS selector that must be present before the page counts as loaded */
  waitFor: string;
  navigationMs: number;
  /** Marker wait after navigation; the HTTP engine adds it to its request timeout */
  markerMs: number;
}

export interface PageLoader {
  readonly engine: 'playwright' | 'fetch';
  load(url: string, opts: LoadOptions): Promise<string>;
  close(): Promise<void>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

// ---------------------------------------------------------------------------
// HTTP engine
// ---------------------------------------------------------------------------

export class FetchPageLoader implements PageLoader {
  readonly engine = 'fetch' as const;
  private readonly fetchFn: FetchFn;

  constructor(fetchFn: FetchFn = fetch) {
    this.fetchFn = fetchFn;
  }

  async load(url: string, opts: LoadOptions): Promise<string> {
    const res = await this.fetchFn(url, {
      headers: { 'User-Agent': HTTP_USER_AGENT },
      signal: AbortSignal.timeout(opts.navigationMs + opts.markerMs),
    });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
    }

    const html = await res.text();
    // No client-side rendering here: the marker is either in the HTML or never
    if (cheerio.load(html)(opts.waitFor).length === 0) {
      throw new Error(`Marker ${opts.waitFor} not found`);
    }
    return html;
  }

  async close(): Promise<void> {
    // nothing held open
  }
}
