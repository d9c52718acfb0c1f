/**
 * Profile extraction and roster link discovery.
 *
 * Both work on rendered HTML, so the same code serves the Playwright engine
 * (page.content()) and the plain HTTP engine.
 */

import * as cheerio from 'cheerio';
import { SELECTORS, SiteConfig, rosterUrl } from '../selectors';
import { BioFields, BioHeader, emptyBioFields, normalizeText } from './helpers';

// ---------------------------------------------------------------------------
// Label → field mapping
// ---------------------------------------------------------------------------

const FIELD_LABEL_PREFIXES: Array<{ prefixes: string[]; field: BioHeader }> = [
  { prefixes: ['position'], field: 'Position' },
  { prefixes: ['height'], field: 'Height' },
  { prefixes: ['weight'], field: 'Weight' },
  { prefixes: ['class'], field: 'Class' },
  { prefixes: ['hometown'], field: 'Hometown' },
  { prefixes: ['high school', 'highschool'], field: 'HighSchool' },
];

/** Map a <dt> label such as "High School:" to its bio field, if recognised. */
export function fieldForLabel(label: string): BioHeader | null {
  const key = normalizeText(label).replace(/:+$/, '').toLowerCase();
  for (const { prefixes, field } of FIELD_LABEL_PREFIXES) {
    if (prefixes.some(p => key.startsWith(p))) return field;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Name parsing
// ---------------------------------------------------------------------------

export interface ParsedName {
  player: string;
  firstName: string;
  lastName: string;
}

/** First and last of the parts; middle parts only show up in `player`. */
export function splitNameParts(parts: string[]): ParsedName {
  const clean = parts.filter(p => p !== '');
  return {
    player: clean.join(' '),
    firstName: clean[0] ?? '',
    lastName: clean[clean.length - 1] ?? '',
  };
}

// ---------------------------------------------------------------------------
// Profile extraction
// ---------------------------------------------------------------------------

export function extractProfile(html: string): BioFields {
  const $ = cheerio.load(html);
  const data = emptyBioFields();

  const numEl = $(SELECTORS.profile.jerseyNumber).first();
  if (numEl.length > 0) {
    data.Number = normalizeText(numEl.text());
  }

  const nameEl = $(SELECTORS.profile.playerName).first();
  if (nameEl.length > 0) {
    let parts = nameEl
      .find('span')
      .toArray()
      .map(el => normalizeText($(el).text()));

    // Some pages render the name as bare text
    if (parts.length === 0) {
      const full = normalizeText(nameEl.text());
      parts = full === '' ? [] : full.split(' ');
    }

    const name = splitNameParts(parts);
    data.Player = name.player;
    data.FirstName = name.firstName;
    data.LastName = name.lastName;
  }

  $(SELECTORS.profile.fieldPairs).each((_, dl) => {
    const dt = $(dl).find('dt').first();
    const dd = $(dl).find('dd').first();
    if (dt.length === 0 || dd.length === 0) return;

    const field = fieldForLabel(dt.text());
    if (field) {
      data[field] = normalizeText(dd.text());
    }
  });

  return data;
}

/**
 * Extract the inline player blocks of the roster listing.
 *
 * Used when no profile page could be scraped.
 */
export function extractRosterEntries(html: string): BioFields[] {
  const $ = cheerio.load(html);
  return $(SELECTORS.rosterPlayerBlock)
    .toArray()
    .map(el => extractProfile($.html(el)));
}

// ---------------------------------------------------------------------------
// Link discovery
// ---------------------------------------------------------------------------

/**
 * Profile URLs linked from the roster page, absolute, in document order,
 * each listed once. The roster URL itself is never returned.
 */
export function gatherProfileLinks(html: string, site: SiteConfig): string[] {
  const $ = cheerio.load(html);
  const roster = rosterUrl(site);
  const origin = site.origin.replace(/\/+$/, '');
  const scheme = /^[a-z][a-z0-9+.-]*:/i.exec(origin)?.[0] ?? 'https:';
  const excluded = new Set([roster, roster + '/']);
  const hrefs: string[] = [];

  $('a[href]').each((_, a) => {
    const raw = ($(a).attr('href') ?? '').trim();
    if (!raw.includes(site.rosterPath + '/')) return;

    let href = raw;
    if (raw.startsWith('//')) href = scheme + raw;
    else if (raw.startsWith('/')) href = origin + raw;
    if (excluded.has(href)) return;
    if (!hrefs.includes(href)) hrefs.push(href);
  });

  return hrefs;
}
