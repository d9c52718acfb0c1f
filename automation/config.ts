/**
 * CLI flag + environment parsing for the scrape and load entry points.
 *
 * Flags are `--key=value`; anything else is ignored. Environment variables
 * (loaded from .env by the CLIs) supply the defaults flags override.
 */

import {
  DEFAULT_BIO_CSV,
  DEFAULT_DESTINATION,
  DEFAULT_ROSTER_PATH,
  DEFAULT_SITE_ORIGIN,
  DEFAULT_STATS_CSV,
} from './selectors';

type Env = Record<string, string | undefined>;

function* flags(args: string[]): Generator<[string, string]> {
  for (const arg of args) {
    const eqIdx = arg.indexOf('=');
    if (eqIdx === -1) continue;
    yield [arg.slice(0, eqIdx), arg.slice(eqIdx + 1)];
  }
}

function parseDelay(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const n = parseInt(value, 10);
  return Number.isFinite(n) && n >= 0 ? n : undefined;
}

// ---------------------------------------------------------------------------
// Scrape
// ---------------------------------------------------------------------------

export type ScrapeEngine = 'playwright' | 'fetch';

export interface ScrapeCliOptions {
  engine: ScrapeEngine;
  headless: boolean;
  origin: string;
  rosterPath: string;
  outPath: string;
  delayMs: number;
}

/** The HTTP engine is polite by default; the browser is slow enough already. */
export const DEFAULT_DELAY_MS: Record<ScrapeEngine, number> = { playwright: 0, fetch: 500 };

function parseEngine(value: string | undefined): ScrapeEngine | null {
  return value === 'playwright' || value === 'fetch' ? value : null;
}

export function parseScrapeArgs(args: string[], env: Env): ScrapeCliOptions {
  let engine = parseEngine(env.SCRAPE_ENGINE) ?? 'playwright';
  let delay = parseDelay(env.SCRAPE_DELAY_MS);
  let headless = true;
  let origin = env.SITE_ORIGIN || DEFAULT_SITE_ORIGIN;
  let rosterPath = env.ROSTER_PATH || DEFAULT_ROSTER_PATH;
  let outPath = env.BIO_CSV || DEFAULT_BIO_CSV;

  for (const [key, val] of flags(args)) {
    switch (key) {
      case '--engine':
        engine = parseEngine(val) ?? engine;
        break;
      case '--headless':
        headless = val !== 'false';
        break;
      case '--origin':
        origin = val || origin;
        break;
      case '--roster-path':
        rosterPath = val || rosterPath;
        break;
      case '--out':
        outPath = val || outPath;
        break;
      case '--delay':
        delay = parseDelay(val) ?? delay;
        break;
    }
  }

  return {
    engine,
    headless,
    origin,
    rosterPath,
    outPath,
    delayMs: delay ?? DEFAULT_DELAY_MS[engine],
  };
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

export interface LoadCliOptions {
  bioCsvPath: string;
  statsCsvPath: string;
  destination: string;
  only: 'bio' | 'stats' | null;
}

export function parseLoadArgs(args: string[], env: Env): LoadCliOptions {
  const opts: LoadCliOptions = {
    bioCsvPath: env.BIO_CSV || DEFAULT_BIO_CSV,
    statsCsvPath: env.STATS_CSV || DEFAULT_STATS_CSV,
    destination: env.DATABASE_URL || DEFAULT_DESTINATION,
    only: null,
  };

  for (const [key, val] of flags(args)) {
    switch (key) {
      case '--bio':
        opts.bioCsvPath = val || opts.bioCsvPath;
        break;
      case '--stats':
        opts.statsCsvPath = val || opts.statsCsvPath;
        break;
      case '--db':
        opts.destination = val || opts.destination;
        break;
      case '--only':
        opts.only = val === 'bio' || val === 'stats' ? val : null;
        break;
    }
  }

  return opts;
}
