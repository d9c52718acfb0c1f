/**
 * Centralized selectors for the Sidearm roster pages.
 *
 * The roster site renders every profile with the same Sidearm markup. If the
 * markup changes, update these selectors here; no other files need to change.
 */

export const SELECTORS = {
  /** Present once the roster listing has rendered */
  rosterMarker: '.sidearm-roster-player-name',

  /** Inline player blocks on the roster listing itself */
  rosterPlayerBlock: '.sidearm-roster-player',

  /** Present once a profile page header has rendered */
  profileMarker: '.sidearm-roster-player-header-details',

  profile: {
    jerseyNumber: 'span.sidearm-roster-player-jersey-number',
    /** Wraps one <span> per name part (first, last, ...) */
    playerName: 'span.sidearm-roster-player-name',
    /** Each <dl> holds one <dt>label</dt><dd>value</dd> pair */
    fieldPairs: '.sidearm-roster-player-fields dl',
  },
} as const;

/** How long to wait for the roster page to load and render (ms) */
export const ROSTER_LOAD_TIMEOUT = 60_000;

/** How long to wait for a profile page navigation (ms) */
export const PROFILE_NAVIGATION_TIMEOUT = 60_000;

/** How long to wait for the profile header to render (ms) */
export const PROFILE_MARKER_TIMEOUT = 30_000;

/** Default site origin */
export const DEFAULT_SITE_ORIGIN = 'https://hurstathletics.com';

/** Default roster path on the site */
export const DEFAULT_ROSTER_PATH = '/sports/mens-ice-hockey/roster';

/** Default bio CSV written by the scraper and read by the loader */
export const DEFAULT_BIO_CSV = 'bio.csv';

/** Default stats CSV read by the loader */
export const DEFAULT_STATS_CSV = 'stats.csv';

/** Default embedded database file */
export const DEFAULT_DESTINATION = 'hurst_hockey.db';

/** Sent by the HTTP engine */
export const HTTP_USER_AGENT = 'Mozilla/5.0 (compatible; bio-scraper/1.0)';

export interface SiteConfig {
  origin: string;
  rosterPath: string;
}

export function rosterUrl(site: SiteConfig): string {
  return site.origin.replace(/\/+$/, '') + site.rosterPath;
}
