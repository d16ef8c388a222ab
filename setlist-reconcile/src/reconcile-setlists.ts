import { loadConfig, resolveConfigPath } from './config/config.js';
import type { ReconcileConfig } from './config/types.js';
import { loadCatalog } from './ingest/catalog.js';
import { fetchTourData, flattenSetlists } from './ingest/tour-data.js';
import { createLLMProvider, LLMMatcher } from './llm/index.js';
import type { ResultRow } from './matching/types.js';
import { formatResultsTable, writeResultsCsv } from './output/csv-writer.js';
import { reconcile, summarizeResults } from './reconciler.js';
import { logger } from './utils/logger.js';

export interface ReconcileSetlistsOptions {
  configPath?: string;
  tourUrl?: string;
  tourFile?: string;
  catalogPath?: string;
  outputOverride?: string;
  deterministicOnly?: boolean;
  debug?: boolean;
}

export interface ReconcileSetlistsResult {
  rows: ResultRow[];
  outputPath: string;
}

/**
 * Main entry point: load inputs, match every track, write the CSV
 */
export async function reconcileSetlists(options: ReconcileSetlistsOptions = {}): Promise<ReconcileSetlistsResult> {
  if (options.debug) {
    logger.enableDebug();
  }

  logger.section('Setlist Reconciliation');

  const configPath = await resolveConfigPath(options.configPath);
  logger.info(configPath ? `Loading configuration from: ${configPath}` : 'No configuration file found, using defaults');
  const config = applyOverrides(await loadConfig(configPath), options);

  logger.info('[1] Loading data...');
  const tourData = await fetchTourData(config.tourData);
  const catalog = await loadCatalog(config.catalogPath);

  logger.info('[2] Flattening setlists...');
  const tracks = flattenSetlists(tourData);

  logger.info('[3] Matching tracks...');
  const matcher = createMatcher(config);
  const rows = await reconcile(tracks, catalog, matcher);

  logger.info('[4] Writing output...');
  const outputPath = await writeResultsCsv(rows, config.outputPath);

  logger.section('Results');
  console.log(formatResultsTable(rows));

  const counts = summarizeResults(rows);
  logger.success(
    `Done: ${rows.length} rows (Exact ${counts.Exact}, High ${counts.High}, Review ${counts.Review}, None ${counts.None})`
  );

  return { rows, outputPath };
}

function applyOverrides(config: ReconcileConfig, options: ReconcileSetlistsOptions): ReconcileConfig {
  return {
    ...config,
    tourData: {
      ...config.tourData,
      url: options.tourUrl ?? config.tourData.url,
      localPath: options.tourFile ?? config.tourData.localPath
    },
    catalogPath: options.catalogPath ?? config.catalogPath,
    outputPath: options.outputOverride ?? config.outputPath,
    llm: {
      ...config.llm,
      enabled: options.deterministicOnly ? false : config.llm.enabled
    }
  };
}

function createMatcher(config: ReconcileConfig): LLMMatcher | null {
  const provider = createLLMProvider(config.llm);
  if (!provider) {
    return null;
  }

  logger.info(`LLM matching via ${provider.name} (${config.llm.model})`);
  return new LLMMatcher({
    provider,
    settings: {
      model: config.llm.model,
      temperature: config.llm.temperature,
      maxRetries: config.retry.maxRetries,
      backoffBase: config.retry.backoffBase,
      backoffMax: config.retry.backoffMax,
      rateLimitDelayMs: config.rateLimit.delayMs
    }
  });
}
