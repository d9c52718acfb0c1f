/**
 * Scraper helpers: types, text normalisation, CSV and run-log writers.
 *
 * CSV output is hand-rolled; reading CSV back is the loader's job.
 */

import fs from 'fs';
import path from 'path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Column order of the scraped bio CSV. */
export const BIO_HEADERS = [
  'Number',
  'Player',
  'FirstName',
  'LastName',
  'Position',
  'Height',
  'Weight',
  'Class',
  'Hometown',
  'HighSchool',
] as const;

export type BioHeader = (typeof BIO_HEADERS)[number];

/** One scraped profile; every value is normalised text, "" when not found. */
export type BioFields = Record<BioHeader, string>;

export interface ProfileError {
  url: string;
  error: string;
}

export interface BioScrapeSession {
  rosterUrl: string;
  startedAt: string;
  finishedAt: string;
  profileLinks: string[];
  rows: BioFields[];
  errors: ProfileError[];
  /** True when rows came from the roster listing instead of profile pages */
  usedRosterFallback: boolean;
  outPath: string;
  summary: { profilesAttempted: number; profilesSucceeded: number; rowsTotal: number };
}

export function emptyBioFields(): BioFields {
  return {
    Number: '',
    Player: '',
    FirstName: '',
    LastName: '',
    Position: '',
    Height: '',
    Weight: '',
    Class: '',
    Hometown: '',
    HighSchool: '',
  };
}

// ---------------------------------------------------------------------------
// Text normalisation
// ---------------------------------------------------------------------------

/** Collapse whitespace runs (including U+00A0) to single spaces and trim. */
export function normalizeText(text: string | null | undefined): string {
  if (!text) return '';
  return text.replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim();
}

// ---------------------------------------------------------------------------
// CSV writing (hand-rolled)
// ---------------------------------------------------------------------------

export function csvEscape(value: string): string {
  if (value.includes('"') || value.includes(',') || value.includes('\n') || value.includes('\r')) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

export function bioRowsToCsv(rows: BioFields[]): string {
  const lines: string[] = [];
  lines.push(BIO_HEADERS.map(csvEscape).join(','));

  for (const row of rows) {
    lines.push(BIO_HEADERS.map(h => csvEscape(row[h])).join(','));
  }

  return lines.join('\n') + '\n';
}

/** Write the bio CSV, replacing any existing file. */
export function writeBioCsv(filePath: string, rows: BioFields[]): string {
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, bioRowsToCsv(rows));
  return resolved;
}

// ---------------------------------------------------------------------------
// Run log
// ---------------------------------------------------------------------------

export function writeRunLog(name: string, data: unknown, logDir = './logs'): string {
  const dir = path.resolve(logDir);
  fs.mkdirSync(dir, { recursive: true });
  const logPath = path.join(dir, `${name}.json`);
  fs.writeFileSync(logPath, JSON.stringify(data, null, 2));
  return logPath;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
