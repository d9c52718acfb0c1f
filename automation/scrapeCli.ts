/**
 * CLI entry point for the roster bio scraper.
 *
 * Usage:
 *   npx tsx automation/scrapeCli.ts
 *   npx tsx automation/scrapeCli.ts --headless=false
 *   npx tsx automation/scrapeCli.ts --engine=fetch --delay=500
 *   npx tsx automation/scrapeCli.ts --out=data/bio.csv
 *   npx tsx automation/scrapeCli.ts --origin=https://example.edu --roster-path=/sports/hockey/roster
 */

import dotenv from 'dotenv';
dotenv.config();

import path from 'path';
import fs from 'fs';
import { ScrapeCliOptions, parseScrapeArgs } from './config';
import { BioScrapeSession, writeRunLog } from './scrape/helpers';
import { FetchPageLoader, PageLoader } from './scrape/pageLoader';
import { PlaywrightPageLoader } from './scrape/playwrightLoader';
import { scrapeRosterBios } from './scrape/rosterScraper';

// ---------------------------------------------------------------------------
// Lock file: prevent concurrent runs
// ---------------------------------------------------------------------------

const LOCK_PATH = path.resolve('./automation/.scraper.lock');

function acquireLock(): boolean {
  try {
    fs.writeFileSync(LOCK_PATH, String(process.pid), { flag: 'wx' });
    return true;
  } catch {
    return false;
  }
}

function releaseLock(): void {
  try {
    fs.unlinkSync(LOCK_PATH);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    if (!message.includes('ENOENT')) console.error(`Could not remove lock file: ${message}`);
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

export interface ScrapeRunResult {
  success: boolean;
  timestamp: string;
  session?: BioScrapeSession;
  error?: string;
  durationMs: number;
}

async function createLoader(opts: ScrapeCliOptions): Promise<PageLoader> {
  if (opts.engine === 'fetch') return new FetchPageLoader();
  return PlaywrightPageLoader.launch(opts.headless);
}

async function main(): Promise<ScrapeRunResult> {
  const opts = parseScrapeArgs(process.argv.slice(2), process.env);
  const startTime = Date.now();
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');

  console.log('=== Roster Bio Scraper ===');
  console.log(`Site:     ${opts.origin}${opts.rosterPath}`);
  console.log(`Engine:   ${opts.engine}${opts.engine === 'playwright' ? ` (headless: ${opts.headless})` : ''}`);
  console.log(`Output:   ${opts.outPath}`);
  console.log('');

  if (!acquireLock()) {
    const msg = 'Another scraper is already running (lock file exists)';
    console.error(msg);
    return { success: false, timestamp, error: msg, durationMs: Date.now() - startTime };
  }

  let loader: PageLoader | undefined;
  try {
    loader = await createLoader(opts);

    const session = await scrapeRosterBios(loader, {
      site: { origin: opts.origin, rosterPath: opts.rosterPath },
      outPath: opts.outPath,
      delayMs: opts.delayMs,
    });

    const result: ScrapeRunResult = {
      success: true,
      timestamp,
      session,
      durationMs: Date.now() - startTime,
    };

    const logPath = writeRunLog(`scrape_${timestamp}`, result);
    console.log(`Run log: ${logPath}`);
    if (session.errors.length > 0) {
      console.log(`[scrape] ${session.errors.length} profile(s) failed; see run log`);
    }

    return result;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Scraper failed: ${message}`);
    return {
      success: false,
      timestamp,
      error: message,
      durationMs: Date.now() - startTime,
    };
  } finally {
    if (loader) await loader.close();
    releaseLock();
  }
}

// ---------------------------------------------------------------------------
// Direct CLI execution
// ---------------------------------------------------------------------------

if (require.main === module) {
  main()
    .then((result) => {
      if (!result.success) process.exitCode = 1;
    })
    .catch((err: unknown) => {
      console.error('Scraper crashed:', err);
      process.exitCode = 1;
    });
}
