import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config();

/**
 * Reads a numeric environment variable, falling back to the default when the
 * variable is unset or does not parse as a finite, non-negative number.
 *
 * @param name - Environment variable name
 * @param fallback - Value used when the variable is missing or invalid
 */
function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    console.warn(`Warning: ${name}=${raw} is not a valid non-negative number, using ${fallback}.`);
    return fallback;
  }

  return value;
}

/**
 * Resolves an optional file path from the environment against the working
 * directory. Empty means "not configured".
 */
function readPath(name: string): string {
  const raw = process.env[name];
  return raw ? path.resolve(process.cwd(), raw) : '';
}

/**
 * Global configuration object for the application.
 * Values are loaded from environment variables or use default fallbacks.
 */
export const config = {
  /**
   * Reverse geocoding service (Nominatim) configuration.
   */
  geocoder: {
    /** Base URL of the Nominatim instance */
    baseUrl: process.env.NOMINATIM_BASE_URL || 'https://nominatim.openstreetmap.org',
    /**
     * Client identity sent as User-Agent.
     * Nominatim's usage policy asks for a contact address in here.
     */
    userAgent: process.env.GEOCODER_USER_AGENT || 'photo-geo-catalog/0.1.0',
    /** Fixed delay applied after every lookup (default: 1000ms) */
    delayMs: readNumber('GEOCODER_DELAY_MS', 1000),
    /** Request timeout (default: 20s) */
    timeoutMs: readNumber('GEOCODER_TIMEOUT_MS', 20000),
    /** Retries for 5xx, 429 and network failures (default: 2) */
    maxRetries: readNumber('GEOCODER_MAX_RETRIES', 2),
  },

  /**
   * Catalog pipeline defaults. Each can be overridden per run.
   */
  catalog: {
    /** Anchor cache radius in miles (default: 10) */
    radiusMiles: readNumber('CATALOG_RADIUS_MI', 10),
    /** Maximum distance in time between donor and recipient (default: 60 minutes) */
    inferenceWindowMinutes: readNumber('CATALOG_INFERENCE_WINDOW_MIN', 60),
    /** Persisted anchor cache file; empty disables persistence */
    cacheFile: readPath('CATALOG_CACHE_FILE'),
  },

  /**
   * MCP Server Configuration.
   */
  mcp: {
    /** Name of the MCP server */
    name: process.env.MCP_SERVER_NAME || 'photo-geo-catalog',
    /** Version of the MCP server */
    version: process.env.MCP_SERVER_VERSION || '0.1.0',
    /** Upper bound for a single tool call (default: 30 minutes) */
    toolTimeoutMs: readNumber('MCP_TOOL_TIMEOUT_MS', 30 * 60 * 1000),
  },

  /**
   * Logger Configuration.
   */
  logger: {
    /** Minimum log level (default: 'info') */
    level: process.env.LOG_LEVEL || 'info',
    /** Optional log file; console only when empty */
    file: readPath('LOG_FILE'),
  },
};

export type AppConfig = typeof config;

export default config;
