import type { Coordinate, PlaceLabel } from '../geo/types.js';
import type { ResolutionOutcome } from '../geo/geocodeResolver.js';

/**
 * Flat field → value mapping returned by a metadata provider for one file,
 * keyed by EXIF tag name (DateTimeOriginal, GPSLatitude, OffsetTime, ...).
 * Empty when the file could not be read.
 */
export type MetadataFields = Record<string, unknown>;

/**
 * When a photo was taken.
 *
 * `wallClockMs` encodes the local wall-clock reading as if it were UTC, so
 * two naive timestamps can be compared without knowing their zone.
 */
export interface CaptureTime {
  wallClockMs: number;
  /** Signed minutes east of UTC, when known */
  offsetMinutes?: number;
  /** `UTC±HH:MM`, when known */
  utcOffset?: string;
  /** `metadata` for an EXIF timestamp, `file-mtime` for the fallback */
  source: 'metadata' | 'file-mtime';
  /** A timestamp field was present but could not be parsed */
  parseFailed?: boolean;
}

/**
 * How a record's coordinate was obtained.
 */
export type GeoSource = 'exif' | 'inferred' | 'unknown';

/**
 * Movement since the previous GPS-bearing record.
 */
export interface MotionFields {
  distanceMiles: number;
  /** Absent only if the elapsed time could not be computed */
  elapsedHours?: number;
  /** Only when elapsedHours > 0 */
  speedMph?: number;
}

export type ResolutionStatus = ResolutionOutcome['status'] | 'no-coordinate';

/**
 * Camera attributes carried through to the catalog unchanged.
 */
export interface CameraInfo {
  make: string;
  model: string;
  lens: string;
  fNumber: string;
  exposure: string;
  iso: string;
  focalLength: string;
  orientation: string;
  width: string;
  height: string;
}

/**
 * One photo's resolved state. Built once per input file and filled in by
 * each pipeline stage in order.
 */
export interface PhotoRecord {
  sourcePath: string;
  fileName: string;
  captureTime: CaptureTime;
  coordinate?: Coordinate;
  place: PlaceLabel;
  geoSource: GeoSource;
  motion?: MotionFields;
  camera: CameraInfo;
  /** Outcome of place resolution for this record */
  resolution: ResolutionStatus;
  /** `ok`, or `empty` when the metadata provider returned nothing */
  metadataStatus: 'ok' | 'empty';
  /** Donor's source path for inferred coordinates */
  inferredFrom?: string;
  /** `<slug(folderLabel)>_<YYYY-MM-DD>` */
  proposedFolder: string;
}
