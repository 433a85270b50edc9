import { ConfigError } from './utils/errors';

export interface Config {
  baseUrl: string;
  requestDelayMs: number;
  requestTimeoutMs: number;
  speciesCacheFile: string;
  variantCacheFile: string;
  outputFile: string;
}

export const DEFAULT_BASE_URL = 'https://pokeapi.co/api/v2';

const readMillis = (env: NodeJS.ProcessEnv, key: string, fallback: number): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative number, got '${raw}'`);
  }
  return value;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => ({
  baseUrl: (env.POKEAPI_BASE_URL || DEFAULT_BASE_URL).replace(/\/+$/, ''),
  requestDelayMs: readMillis(env, 'REQUEST_DELAY_MS', 200),
  requestTimeoutMs: readMillis(env, 'REQUEST_TIMEOUT_MS', 30000),
  speciesCacheFile: env.SPECIES_CACHE_FILE || 'species_cache.json',
  variantCacheFile: env.VARIANT_CACHE_FILE || 'variant_cache.json',
  outputFile: env.OUTPUT_FILE || 'pokedex_by_family.txt',
});
