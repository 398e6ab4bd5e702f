import config from '../utils/config.js';
import logger from '../utils/logger.js';
import { AnchorCache, type MatchStrategy } from '../geo/anchorCache.js';
import { loadAnchors, saveAnchors } from '../geo/anchorStore.js';
import { NominatimClient, type ReverseGeocoder } from '../geo/nominatimClient.js';
import { writeCatalog } from './catalogWriter.js';
import { scanPhotos } from './fileScanner.js';
import { ExifrMetadataProvider, type MetadataProvider } from './metadataProvider.js';
import { CatalogPipeline, type CatalogPipelineOptions, type CatalogResult } from './pipeline.js';

export interface BuildCatalogOptions extends CatalogPipelineOptions {
  /** Directory scanned recursively for JPG/JPEG files */
  src: string;
  /** Output CSV path */
  out: string;
  /** Anchor radius in miles */
  radiusMiles?: number;
  /** Anchor cache file, loaded at start and overwritten at the end */
  cacheFile?: string;
  strategy?: MatchStrategy;
  /** Client identity with contact info for the geocoding service */
  userAgent?: string;
  /** Pause after each geocoding call */
  delayMs?: number;
  /** Overrides for tests and embedding */
  geocoder?: ReverseGeocoder;
  metadata?: MetadataProvider;
}

/**
 * Full catalog run: scan, load the anchor cache, resolve, infer, then write
 * the CSV and persist the anchors.
 */
export async function buildPhotoCatalog(options: BuildCatalogOptions): Promise<CatalogResult> {
  const files = await scanPhotos(options.src);
  logger.info(`Found ${files.length} photos under ${options.src}`);

  const cacheFile = options.cacheFile ?? config.catalog.cacheFile;
  const anchors = cacheFile ? await loadAnchors(cacheFile) : [];
  const cache = new AnchorCache(options.radiusMiles ?? config.catalog.radiusMiles, anchors, options.strategy);

  const geocoder =
    options.geocoder ??
    new NominatimClient({
      userAgent: options.userAgent,
      delayMs: options.delayMs,
    });
  const metadata = options.metadata ?? new ExifrMetadataProvider();

  const pipeline = new CatalogPipeline(cache, geocoder, metadata, {
    windowMinutes: options.windowMinutes ?? config.catalog.inferenceWindowMinutes,
    resolveInferredPlaces: options.resolveInferredPlaces,
    registerFailedLookups: options.registerFailedLookups,
    limit: options.limit,
    progressEvery: options.progressEvery,
  });

  const result = await pipeline.run(files, options.src);

  await writeCatalog(options.out, result.records);
  if (cacheFile) {
    await saveAnchors(cacheFile, result.anchors);
  }

  return result;
}
