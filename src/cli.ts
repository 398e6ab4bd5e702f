#!/usr/bin/env node
import { pathToFileURL } from 'url';
import { parseArgs } from 'util';
import config from './utils/config.js';
import logger from './utils/logger.js';
import { CatalogError, describeError } from './utils/errors.js';
import { formatIssues } from './utils/validation.js';
import { cliOptionsSchema, type CliOptions } from './schemas/toolSchemas.js';
import { buildPhotoCatalog } from './catalog/buildCatalog.js';

export const USAGE = `Usage: photo-geo-catalog --src <dir> --out <catalog.csv> --user-agent "<app/1.0 (contact: you@example.com)>"
  [--radius-mi 10] [--cache-file geo_cache.json] [--sleep 1.0] [--window-min 60]
  [--limit N] [--nearest] [--no-infer-places]`;

/**
 * Invalid or missing command line arguments.
 */
export class CliUsageError extends CatalogError {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        src: { type: 'string' },
        out: { type: 'string' },
        'user-agent': { type: 'string' },
        'radius-mi': { type: 'string' },
        'cache-file': { type: 'string' },
        sleep: { type: 'string' },
        'window-min': { type: 'string' },
        limit: { type: 'string' },
        nearest: { type: 'boolean' },
        'no-infer-places': { type: 'boolean' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new CliUsageError(describeError(error));
  }
}

/**
 * Parses and validates command line arguments. Flags left out fall back to
 * the environment configuration.
 *
 * @throws CliUsageError listing every invalid flag
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const values = readFlags(argv);

  const parsed = cliOptionsSchema.safeParse({
    src: values.src ?? '',
    out: values.out ?? '',
    userAgent: values['user-agent'] ?? process.env.GEOCODER_USER_AGENT ?? '',
    radiusMiles: values['radius-mi'] ?? config.catalog.radiusMiles,
    sleepSeconds: values.sleep ?? config.geocoder.delayMs / 1000,
    cacheFile: values['cache-file'] ?? config.catalog.cacheFile,
    windowMinutes: values['window-min'] ?? config.catalog.inferenceWindowMinutes,
    limit: values.limit,
    nearest: values.nearest ?? false,
    resolveInferredPlaces: !(values['no-infer-places'] ?? false),
  });

  if (!parsed.success) {
    throw new CliUsageError(`Invalid arguments: ${formatIssues(parsed.error)}`);
  }

  return parsed.data;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const options = parseCliArgs(argv);

  const result = await buildPhotoCatalog({
    src: options.src,
    out: options.out,
    userAgent: options.userAgent,
    radiusMiles: options.radiusMiles,
    delayMs: Math.round(options.sleepSeconds * 1000),
    cacheFile: options.cacheFile,
    windowMinutes: options.windowMinutes,
    limit: options.limit,
    strategy: options.nearest ? 'nearest' : 'first',
    resolveInferredPlaces: options.resolveInferredPlaces,
  });

  const { stats } = result;
  process.stdout.write(
    `Done. ${stats.records} photos cataloged to ${options.out} ` +
      `(${stats.lookups} lookups, ${stats.cacheHits} cache hits, ${stats.inferred} inferred, ${stats.anchors} anchors)\n`
  );
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}\n`);
      process.exit(2);
    }
    logger.error(`Catalog run failed: ${describeError(error)}`);
    process.exit(1);
  });
}
