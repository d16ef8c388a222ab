import fs from 'fs/promises';
import path from 'path';
import type { ReconcileConfig } from './types.js';
import { defaultConfig } from './defaults.js';

const DEFAULT_CONFIG_FILE = 'setlist-reconcile.json';

type PartialConfig = Partial<Omit<ReconcileConfig, 'tourData' | 'llm' | 'retry' | 'rateLimit'>> & {
  tourData?: Partial<ReconcileConfig['tourData']>;
  llm?: Partial<ReconcileConfig['llm']>;
  retry?: Partial<ReconcileConfig['retry']>;
  rateLimit?: Partial<ReconcileConfig['rateLimit']>;
};

/**
 * Loads configuration from a JSON file
 * @param configPath - Path to the configuration file (null = defaults only)
 * @param env - Environment used for OPENAI_API_KEY and RATE_LIMIT_DELAY overrides
 * @returns Loaded configuration merged with defaults
 */
export async function loadConfig(
  configPath: string | null,
  env: NodeJS.ProcessEnv = process.env
): Promise<ReconcileConfig> {
  let userConfig: PartialConfig = {};

  if (configPath) {
    try {
      const configContent = await fs.readFile(configPath, 'utf-8');
      userConfig = JSON.parse(configContent) as PartialConfig;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new Error(`Configuration file not found: ${configPath}`);
      }
      throw error;
    }
  }

  const config = applyEnvironment(mergeConfig(defaultConfig, userConfig), env);
  validateConfig(config);
  return config;
}

/**
 * Deep merges a partial config over defaults
 */
export function mergeConfig(defaults: ReconcileConfig, override: PartialConfig): ReconcileConfig {
  return {
    ...defaults,
    ...override,
    tourData: {
      ...defaults.tourData,
      ...override.tourData
    },
    llm: {
      ...defaults.llm,
      ...override.llm
    },
    retry: {
      ...defaults.retry,
      ...override.retry
    },
    rateLimit: {
      ...defaults.rateLimit,
      ...override.rateLimit
    }
  };
}

/**
 * Applies environment variable overrides
 */
function applyEnvironment(config: ReconcileConfig, env: NodeJS.ProcessEnv): ReconcileConfig {
  const result = { ...config, llm: { ...config.llm }, rateLimit: { ...config.rateLimit } };

  if (!result.llm.apiKey && env.OPENAI_API_KEY) {
    result.llm.apiKey = env.OPENAI_API_KEY;
  }

  if (env.RATE_LIMIT_DELAY !== undefined && env.RATE_LIMIT_DELAY !== '') {
    const seconds = Number(env.RATE_LIMIT_DELAY);
    if (Number.isNaN(seconds)) {
      throw new Error(`Configuration error: RATE_LIMIT_DELAY must be a number of seconds, got "${env.RATE_LIMIT_DELAY}"`);
    }
    result.rateLimit.delayMs = Math.round(seconds * 1000);
  }

  return result;
}

/**
 * Validates the configuration
 * @param config - Configuration to validate
 * @throws Error if configuration is invalid
 */
function validateConfig(config: ReconcileConfig): void {
  if (!config.catalogPath) {
    throw new Error('Configuration error: catalogPath is required');
  }

  if (!config.tourData.localPath) {
    throw new Error('Configuration error: tourData.localPath is required');
  }

  if (!config.outputPath) {
    throw new Error('Configuration error: outputPath is required');
  }

  if (config.llm.provider !== 'openai' && config.llm.provider !== 'ollama') {
    throw new Error('Configuration error: llm.provider must be "openai" or "ollama"');
  }

  if (config.llm.temperature < 0 || config.llm.temperature > 2) {
    throw new Error('Configuration error: llm.temperature must be between 0 and 2');
  }

  if (!Number.isInteger(config.retry.maxRetries) || config.retry.maxRetries < 0) {
    throw new Error('Configuration error: retry.maxRetries must be a non-negative integer');
  }

  if (config.retry.backoffBase < 1) {
    throw new Error('Configuration error: retry.backoffBase must be at least 1');
  }

  if (config.retry.backoffMax <= 0) {
    throw new Error('Configuration error: retry.backoffMax must be positive');
  }

  if (config.rateLimit.delayMs < 0) {
    throw new Error('Configuration error: rateLimit.delayMs must not be negative');
  }
}

/**
 * Finds the configuration file path
 * @param providedPath - Optional path provided by user
 * @param cwd - Directory searched for setlist-reconcile.json
 * @returns Path to configuration file, or null when none exists
 */
export async function resolveConfigPath(
  providedPath?: string,
  cwd: string = process.cwd()
): Promise<string | null> {
  if (providedPath) {
    return path.resolve(cwd, providedPath);
  }

  const candidate = path.join(cwd, DEFAULT_CONFIG_FILE);
  try {
    await fs.access(candidate);
    return candidate;
  } catch {
    return null;
  }
}
