import path from 'path';
import logger from '../utils/logger.js';
import { NoInputFilesError } from '../utils/errors.js';
import type { AnchorCache } from '../geo/anchorCache.js';
import { GeocodeResolver, type ResolverStats } from '../geo/geocodeResolver.js';
import type { ReverseGeocoder } from '../geo/nominatimClient.js';
import { UNKNOWN_PLACE, type Anchor } from '../geo/types.js';
import { proposedFolder } from './catalogWriter.js';
import type { SourceFile } from './fileScanner.js';
import { inferMissingCoordinates } from './inference.js';
import { normalizePath, readCameraInfo, readCoordinate, type MetadataProvider } from './metadataProvider.js';
import { MotionTracker } from './motion.js';
import { resolveCaptureTime, sortKeyMs } from './timezone.js';
import type { MetadataFields, PhotoRecord } from './types.js';

export interface CatalogPipelineOptions {
  /** Inference window in minutes (default: 60) */
  windowMinutes?: number;
  /**
   * Resolve places for inferred coordinates (default: true). With a radius of
   * 0 every inferred record costs one more lookup, at its donor's coordinate.
   */
  resolveInferredPlaces?: boolean;
  /** Register unknown-place anchors for failed lookups (default: true) */
  registerFailedLookups?: boolean;
  /** Only catalog the first N records in capture order */
  limit?: number;
  /** Log progress every N records (default: 20) */
  progressEvery?: number;
}

export interface CatalogStats extends ResolverStats {
  files: number;
  records: number;
  withGps: number;
  inferred: number;
  emptyMetadata: number;
  anchors: number;
}

export interface CatalogResult {
  records: PhotoRecord[];
  anchors: Anchor[];
  stats: CatalogStats;
}

/**
 * Drives catalog runs.
 *
 * The anchor cache outlives a run, so a later run reuses earlier places. The
 * resolver counters and the motion cursor are created per run; nothing is
 * kept in module state. Records are resolved in one pass in capture order,
 * then coordinates are inferred in a second pass over the complete set.
 */
export class CatalogPipeline {
  constructor(
    private readonly cache: AnchorCache,
    private readonly geocoder: ReverseGeocoder,
    private readonly metadata: MetadataProvider,
    private readonly options: CatalogPipelineOptions = {}
  ) {}

  /**
   * @param files - Photos to catalog, in any order
   * @param source - Description of where the files came from, for errors
   * @throws NoInputFilesError when `files` is empty
   */
  async run(files: readonly SourceFile[], source = 'input'): Promise<CatalogResult> {
    if (files.length === 0) {
      throw new NoInputFilesError(source);
    }

    const resolver = new GeocodeResolver(this.cache, this.geocoder, {
      registerFailedLookups: this.options.registerFailedLookups,
    });

    const metadata = await this.metadata.readBatch(files.map(file => file.path));
    let records = files
      .map(file => this.createRecord(file, metadata.get(normalizePath(file.path)) ?? {}))
      .sort((a, b) => sortKeyMs(a.captureTime) - sortKeyMs(b.captureTime) || a.sourcePath.localeCompare(b.sourcePath));

    if (this.options.limit !== undefined && this.options.limit < records.length) {
      records = records.slice(0, this.options.limit);
    }

    await this.resolvePass(records, resolver);
    const inferred = await this.inferencePass(records, resolver);

    for (const record of records) {
      record.proposedFolder = proposedFolder(record);
    }

    const stats: CatalogStats = {
      ...resolver.getStats(),
      files: files.length,
      records: records.length,
      withGps: records.filter(record => record.geoSource === 'exif').length,
      inferred,
      emptyMetadata: records.filter(record => record.metadataStatus === 'empty').length,
      anchors: this.cache.size,
    };

    logger.info(
      `Cataloged ${stats.records} photos: ${stats.withGps} with GPS, ${stats.inferred} inferred, ` +
        `${stats.lookups} lookups, ${stats.cacheHits} cache hits, ${stats.failures} failed lookups`
    );

    return { records, anchors: this.cache.snapshot(), stats };
  }

  private createRecord(file: SourceFile, meta: MetadataFields): PhotoRecord {
    const fileName = path.basename(file.path);
    const coordinate = readCoordinate(meta);
    const metadataStatus = Object.keys(meta).length > 0 ? 'ok' : 'empty';
    if (metadataStatus === 'empty') {
      logger.debug(`No metadata for ${fileName}`);
    }

    return {
      sourcePath: file.path,
      fileName,
      captureTime: resolveCaptureTime(meta, file.mtimeMs, fileName),
      coordinate,
      place: { ...UNKNOWN_PLACE },
      geoSource: coordinate ? 'exif' : 'unknown',
      camera: readCameraInfo(meta),
      resolution: 'no-coordinate',
      metadataStatus,
      proposedFolder: '',
    };
  }

  private async resolvePass(records: PhotoRecord[], resolver: GeocodeResolver): Promise<void> {
    const progressEvery = this.options.progressEvery ?? 20;
    const motion = new MotionTracker();

    for (const [index, record] of records.entries()) {
      if (record.coordinate) {
        const outcome = await resolver.resolve(record.coordinate);
        record.place = outcome.place;
        record.resolution = outcome.status;
        record.motion = motion.advance({ coordinate: record.coordinate, captureTime: record.captureTime });
      }

      const done = index + 1;
      if (progressEvery > 0 && done % progressEvery === 0) {
        logger.info(
          `Cataloged ${done}/${records.length}... (new anchors this run: ${resolver.getStats().anchorsCreated})`
        );
      }
    }
  }

  private async inferencePass(records: PhotoRecord[], resolver: GeocodeResolver): Promise<number> {
    const inferences = inferMissingCoordinates(records, { windowMinutes: this.options.windowMinutes });

    if (this.options.resolveInferredPlaces ?? true) {
      for (const { recipient } of inferences) {
        if (!recipient.coordinate) {
          continue;
        }
        const outcome = await resolver.resolve(recipient.coordinate);
        recipient.place = outcome.place;
        recipient.resolution = outcome.status;
      }
    }

    return inferences.length;
  }
}
