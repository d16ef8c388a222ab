import fs from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { NONE_SENTINEL } from '../matching/types.js';
import type { ResultRow } from '../matching/types.js';
import { logger } from '../utils/logger.js';

export const RESULT_COLUMNS = [
  'show_date',
  'venue_name',
  'setlist_track_name',
  'matched_catalog_id',
  'matched_catalog_title',
  'match_confidence'
] as const;

type ResultColumn = (typeof RESULT_COLUMNS)[number];

function toRecord(row: ResultRow): Record<ResultColumn, string> {
  return {
    show_date: row.showDate,
    venue_name: row.venueName,
    setlist_track_name: row.setlistTrackName,
    matched_catalog_id: row.matchedCatalogId ?? NONE_SENTINEL,
    matched_catalog_title: row.matchedCatalogTitle,
    match_confidence: row.matchConfidence
  };
}

/**
 * Render result rows as CSV text, header first
 */
export function formatResultsCsv(rows: readonly ResultRow[]): string {
  return stringify(rows.map(toRecord), { header: true, columns: [...RESULT_COLUMNS] });
}

/**
 * Write the reconciliation results to CSV
 * @returns The path of the written file
 */
export async function writeResultsCsv(rows: readonly ResultRow[], outputPath: string): Promise<string> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, formatResultsCsv(rows), 'utf-8');
  logger.info(`Output saved to: ${outputPath}`);
  return outputPath;
}

/**
 * Fixed-width console table of results
 */
export function formatResultsTable(rows: readonly ResultRow[]): string {
  const line = (track: string, id: string, title: string, confidence: string): string =>
    `  ${track.padEnd(35)} ${id.padEnd(15)} ${title.padEnd(25)} ${confidence}`;

  return [
    line('Track', 'Catalog ID', 'Matched Title', 'Confidence'),
    line('-'.repeat(35), '-'.repeat(15), '-'.repeat(25), '-'.repeat(12)),
    ...rows.map((row) =>
      line(row.setlistTrackName, row.matchedCatalogId ?? NONE_SENTINEL, row.matchedCatalogTitle, row.matchConfidence)
    )
  ].join('\n');
}
