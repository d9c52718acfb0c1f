/**
 * Roster bio scraper
 *
 * Main export: scrapeRosterBios(loader, options)
 *
 * Loads the roster listing, discovers every profile link, visits each profile
 * in order and writes one CSV row per profile that could be extracted. A
 * profile that fails is logged and skipped; a roster page that fails aborts
 * the run before anything is written.
 */

import {
  SELECTORS,
  ROSTER_LOAD_TIMEOUT,
  PROFILE_NAVIGATION_TIMEOUT,
  PROFILE_MARKER_TIMEOUT,
  SiteConfig,
  rosterUrl,
} from '../selectors';
import { BioFields, BioScrapeSession, ProfileError, sleep, writeBioCsv } from './helpers';
import { PageLoader } from './pageLoader';
import { extractProfile, extractRosterEntries, gatherProfileLinks } from './profileExtractor';

export interface RosterScrapeOptions {
  site: SiteConfig;
  outPath: string;
  /** Pause between profile requests (ms) */
  delayMs?: number;
  timeouts?: {
    rosterMs?: number;
    navigationMs?: number;
    markerMs?: number;
  };
}

export async function scrapeRosterBios(
  loader: PageLoader,
  options: RosterScrapeOptions
): Promise<BioScrapeSession> {
  const startedAt = new Date().toISOString();
  const url = rosterUrl(options.site);
  const rosterMs = options.timeouts?.rosterMs ?? ROSTER_LOAD_TIMEOUT;
  const navigationMs = options.timeouts?.navigationMs ?? PROFILE_NAVIGATION_TIMEOUT;
  const markerMs = options.timeouts?.markerMs ?? PROFILE_MARKER_TIMEOUT;
  const delayMs = options.delayMs ?? 0;

  // ── Roster page (fatal on failure) ──────────────────────────────────
  console.log(`Opening roster page: ${url}`);
  const rosterHtml = await loader.load(url, {
    waitFor: SELECTORS.rosterMarker,
    navigationMs: rosterMs,
    markerMs: rosterMs,
  });

  const profileLinks = gatherProfileLinks(rosterHtml, options.site);
  console.log(`Found ${profileLinks.length} profile links`);

  // ── Profile loop ────────────────────────────────────────────────────
  let rows: BioFields[] = [];
  const errors: ProfileError[] = [];

  for (let i = 0; i < profileLinks.length; i++) {
    const profileUrl = profileLinks[i];
    try {
      console.log(`[${i + 1}/${profileLinks.length}] Visiting ${profileUrl}`);
      const html = await loader.load(profileUrl, {
        waitFor: SELECTORS.profileMarker,
        navigationMs,
        markerMs,
      });
      rows.push(extractProfile(html));
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Failed to scrape ${profileUrl}: ${message}`);
      errors.push({ url: profileUrl, error: message });
    }

    if (delayMs > 0 && i < profileLinks.length - 1) {
      await sleep(delayMs);
    }
  }

  const profilesSucceeded = rows.length;

  // ── Fallback: inline roster entries ─────────────────────────────────
  let usedRosterFallback = false;
  if (rows.length === 0) {
    console.log('No profile pages scraped; parsing roster page entries directly');
    rows = extractRosterEntries(rosterHtml);
    usedRosterFallback = rows.length > 0;
  }

  // ── Write CSV ───────────────────────────────────────────────────────
  const outPath = writeBioCsv(options.outPath, rows);
  console.log(`Wrote ${rows.length} bios to ${outPath}`);

  return {
    rosterUrl: url,
    startedAt,
    finishedAt: new Date().toISOString(),
    profileLinks,
    rows,
    errors,
    usedRosterFallback,
    outPath,
    summary: {
      profilesAttempted: profileLinks.length,
      profilesSucceeded,
      rowsTotal: rows.length,
    },
  };
}
