import fs from 'fs/promises';
import { parse } from 'csv-parse/sync';
import type { CatalogEntry } from '../matching/types.js';
import { logger } from '../utils/logger.js';

export const REQUIRED_CATALOG_COLUMNS = ['catalog_id', 'title', 'writers', 'controlled_percentage'] as const;

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

/**
 * Load the song catalog from CSV.
 *
 * Some exports wrap each whole row in quotes ("CAT-001,Neon Dreams,...");
 * such rows are split again after the first parse.
 */
export async function loadCatalog(filePath: string): Promise<CatalogEntry[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new CatalogError(`Catalog file not found: ${filePath}`);
    }
    throw error;
  }

  const catalog = parseCatalog(content);
  logger.info(`Loaded catalog: ${catalog.length} songs`);
  return catalog;
}

/**
 * Parse catalog CSV text
 * @throws CatalogError for empty or malformed input and missing columns
 */
export function parseCatalog(content: string): CatalogEntry[] {
  if (!content.trim()) {
    throw new CatalogError('Catalog file is empty');
  }

  const [headerRecord = [], ...dataRecords] = parseRecords(content);
  const headers = unwrapRecord(headerRecord, 2);
  const missing = REQUIRED_CATALOG_COLUMNS.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new CatalogError(`Catalog CSV missing required columns: ${missing.join(', ')}`);
  }
  if (dataRecords.length === 0) {
    throw new CatalogError('Catalog file contains no data rows');
  }

  const columnIndex = (column: string): number => headers.indexOf(column);
  const seen = new Set<string>();

  return dataRecords.map((record) => {
    const fields = unwrapRecord(record, headers.length);
    const field = (column: string): string => (fields[columnIndex(column)] ?? '').trim();

    const entry: CatalogEntry = {
      catalogId: field('catalog_id'),
      title: field('title'),
      writers: field('writers'),
      controlledPercentage: field('controlled_percentage')
    };

    if (seen.has(entry.catalogId)) {
      logger.warn(`Duplicate catalog_id "${entry.catalogId}" in catalog; the first entry wins on lookup`);
    }
    seen.add(entry.catalogId);
    return entry;
  });
}

function parseRecords(text: string): string[][] {
  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      skip_records_with_empty_values: true,
      relax_column_count: true,
      relax_quotes: true
    });
  } catch (error) {
    throw new CatalogError(`Catalog CSV could not be parsed: ${error instanceof Error ? error.message : String(error)}`);
  }
  return Array.isArray(records) ? records.filter(isStringArray) : [];
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((field) => typeof field === 'string');
}

/**
 * A row wrapped in quotes as a whole ("CAT-001,Neon Dreams,...") parses
 * as one field; split that field again when more columns are expected.
 */
function unwrapRecord(record: string[], expectedColumns: number): string[] {
  if (record.length !== 1 || expectedColumns < 2 || !record[0].includes(',')) {
    return record;
  }
  return parseRecords(record[0])[0] ?? record;
}
