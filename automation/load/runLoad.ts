/**
 * Load bio and stats CSVs into a relational store.
 *
 * runLoad(bioCsvPath, statsCsvPath, destination) is the whole pipeline:
 * read + coerce both files, create the schema if needed, then insert bios and
 * stats, each as its own all-or-nothing batch. Nothing runs on import.
 */

import { describeDestination, openRecordStore, persistRecords } from '../db/persistRecords';
import { RecordStore } from '../db/recordStore';
import { CoercionReport, readBioCsv, readStatsCsv } from './coerce';
import { BIO_TABLE, STATS_TABLE, BioRecord, StatsRecord, TableShape } from './schema';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TableLoadSummary {
  csvPath: string;
  rowCount: number;
  rowsInserted: number;
  unknownColumns: string[];
}

export interface LoadRunResult {
  success: boolean;
  destination: string;
  bio?: TableLoadSummary;
  stats?: TableLoadSummary;
  error?: string;
  durationMs: number;
}

/** Every load creates both tables, whatever it inserts. */
const SCHEMA: ReadonlyArray<TableShape> = [BIO_TABLE, STATS_TABLE];

interface LoadPlan {
  bioCsvPath?: string;
  statsCsvPath?: string;
}

// ---------------------------------------------------------------------------
// Main entry points
// ---------------------------------------------------------------------------

export function runLoad(
  bioCsvPath: string,
  statsCsvPath: string,
  destination: string
): Promise<LoadRunResult> {
  return executeLoad(destination, { bioCsvPath, statsCsvPath });
}

export function loadBios(destination: string, csvPath: string): Promise<LoadRunResult> {
  return executeLoad(destination, { bioCsvPath: csvPath });
}

export function loadStats(destination: string, csvPath: string): Promise<LoadRunResult> {
  return executeLoad(destination, { statsCsvPath: csvPath });
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

function reportUnknown(label: string, unknownColumns: string[]): void {
  if (unknownColumns.length > 0) {
    console.log(`[load] ${label}: kept undeclared columns as text: ${unknownColumns.join(', ')}`);
  }
}

async function executeLoad(destination: string, plan: LoadPlan): Promise<LoadRunResult> {
  const startTime = Date.now();
  const result: LoadRunResult = { success: false, destination, durationMs: 0 };
  let store: RecordStore | null = null;

  try {
    // ── 1. Read + coerce (before touching the store) ──────────────────
    let bio: CoercionReport<BioRecord> | null = null;
    let stats: CoercionReport<StatsRecord> | null = null;

    if (plan.bioCsvPath) {
      bio = readBioCsv(plan.bioCsvPath);
      console.log(`[load] ${plan.bioCsvPath}: ${bio.rowCount} bio rows`);
      reportUnknown(plan.bioCsvPath, bio.unknownColumns);
    }
    if (plan.statsCsvPath) {
      stats = readStatsCsv(plan.statsCsvPath);
      console.log(`[load] ${plan.statsCsvPath}: ${stats.rowCount} stats rows`);
      reportUnknown(plan.statsCsvPath, stats.unknownColumns);
    }

    // ── 2. Persist ────────────────────────────────────────────────────
    console.log(`[load] Destination: ${describeDestination(destination)}`);
    store = await openRecordStore(destination);

    if (bio && plan.bioCsvPath) {
      const persisted = await persistRecords<BioRecord>(store, BIO_TABLE, bio.records, SCHEMA);
      result.bio = {
        csvPath: plan.bioCsvPath,
        rowCount: bio.rowCount,
        rowsInserted: persisted.rowsInserted,
        unknownColumns: bio.unknownColumns,
      };
    }
    if (stats && plan.statsCsvPath) {
      const persisted = await persistRecords<StatsRecord>(store, STATS_TABLE, stats.records, SCHEMA);
      result.stats = {
        csvPath: plan.statsCsvPath,
        rowCount: stats.rowCount,
        rowsInserted: persisted.rowsInserted,
        unknownColumns: stats.unknownColumns,
      };
    }

    result.success = true;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[load] Failed: ${message}`);
    result.error = message;
  } finally {
    if (store) await store.close();
    result.durationMs = Date.now() - startTime;
  }

  return result;
}
