import path from 'path';
import exifr from 'exifr';
import logger from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import { isValidCoordinate } from '../geo/haversine.js';
import type { Coordinate } from '../geo/types.js';
import type { CameraInfo, MetadataFields } from './types.js';

/**
 * EXIF tags read for every photo.
 */
export const METADATA_FIELDS = [
  // Dates
  'DateTimeOriginal',
  'CreateDate',
  'OffsetTimeOriginal',
  'OffsetTime',
  'OffsetTimeDigitized',
  // GPS
  'GPSLatitude',
  'GPSLatitudeRef',
  'GPSLongitude',
  'GPSLongitudeRef',
  'GPSAltitude',
  // Camera basics
  'Make',
  'Model',
  'LensModel',
  'FNumber',
  'ExposureTime',
  'ISO',
  'FocalLength',
  // Image info
  'Orientation',
  'ImageWidth',
  'ImageHeight',
  'ExifImageWidth',
  'ExifImageHeight',
] as const;

/**
 * Source of per-file capture metadata.
 */
export interface MetadataProvider {
  /**
   * Reads metadata for many files at once.
   *
   * @returns Mapping keyed by {@link normalizePath}; a file that could not
   * be read maps to an empty object
   */
  readBatch(filePaths: readonly string[]): Promise<Map<string, MetadataFields>>;
}

export function normalizePath(filePath: string): string {
  return path.resolve(filePath);
}

/**
 * Converts a GPS value to signed decimal degrees. Accepts a plain number or a
 * `[degrees, minutes, seconds]` triple; a `S`/`W` reference makes it negative.
 */
export function toDecimalDegrees(value: unknown, ref: unknown): number | undefined {
  let degrees: number | undefined;

  if (typeof value === 'number') {
    degrees = value;
  } else if (Array.isArray(value) && value.length > 0 && value.every((part): part is number => typeof part === 'number')) {
    const [d = 0, m = 0, s = 0] = value;
    degrees = Math.abs(d) + m / 60 + s / 3600;
    if (d < 0) {
      degrees = -degrees;
    }
  }

  if (degrees === undefined || !Number.isFinite(degrees)) {
    return undefined;
  }

  if (typeof ref === 'string' && /^[SW]/i.test(ref.trim())) {
    return -Math.abs(degrees);
  }
  return degrees;
}

/**
 * Flattens an EXIF parse result: GPS positions become signed decimal degrees
 * and empty values are dropped.
 */
export function normalizeMetadata(raw: Record<string, unknown>): MetadataFields {
  const fields: MetadataFields = {};

  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined || value === null || value === '') {
      continue;
    }
    fields[key] = value;
  }

  const latitude = toDecimalDegrees(raw.GPSLatitude, raw.GPSLatitudeRef);
  const longitude = toDecimalDegrees(raw.GPSLongitude, raw.GPSLongitudeRef);
  if (latitude === undefined) {
    delete fields.GPSLatitude;
  } else {
    fields.GPSLatitude = latitude;
  }
  if (longitude === undefined) {
    delete fields.GPSLongitude;
  } else {
    fields.GPSLongitude = longitude;
  }

  return fields;
}

/**
 * The coordinate recorded in metadata, if it is complete and in range.
 */
export function readCoordinate(meta: MetadataFields): Coordinate | undefined {
  const candidate = { latitude: meta.GPSLatitude, longitude: meta.GPSLongitude };
  if (typeof candidate.latitude !== 'number' || typeof candidate.longitude !== 'number') {
    return undefined;
  }

  const coordinate = { latitude: candidate.latitude, longitude: candidate.longitude };
  return isValidCoordinate(coordinate) ? coordinate : undefined;
}

function text(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '';
}

export function readCameraInfo(meta: MetadataFields): CameraInfo {
  return {
    make: text(meta.Make),
    model: text(meta.Model),
    lens: text(meta.LensModel),
    fNumber: text(meta.FNumber),
    exposure: text(meta.ExposureTime),
    iso: text(meta.ISO),
    focalLength: text(meta.FocalLength),
    orientation: text(meta.Orientation),
    width: text(meta.ExifImageWidth ?? meta.ImageWidth),
    height: text(meta.ExifImageHeight ?? meta.ImageHeight),
  };
}

/**
 * Reads EXIF with exifr. Timestamps are kept as the raw EXIF strings so the
 * timezone resolver sees the wall-clock reading, not a host-local Date.
 */
export class ExifrMetadataProvider implements MetadataProvider {
  async readBatch(filePaths: readonly string[]): Promise<Map<string, MetadataFields>> {
    const results = new Map<string, MetadataFields>();

    for (const filePath of filePaths) {
      const key = normalizePath(filePath);
      results.set(key, await this.read(key));
    }

    return results;
  }

  private async read(filePath: string): Promise<MetadataFields> {
    try {
      const raw: unknown = await exifr.parse(filePath, {
        pick: [...METADATA_FIELDS],
        reviveValues: false,
      });
      if (!raw || typeof raw !== 'object') {
        logger.debug(`No EXIF data in ${filePath}`);
        return {};
      }
      return normalizeMetadata(Object.fromEntries(Object.entries(raw)));
    } catch (error) {
      logger.warn(`EXIF read failed for ${filePath}: ${describeError(error)}`);
      return {};
    }
  }
}

/**
 * Serves metadata from memory. Used for tests and for callers that already
 * hold extracted metadata.
 */
export class InMemoryMetadataProvider implements MetadataProvider {
  private readonly entries = new Map<string, MetadataFields>();

  constructor(entries: Record<string, MetadataFields> = {}) {
    for (const [filePath, fields] of Object.entries(entries)) {
      this.entries.set(normalizePath(filePath), fields);
    }
  }

  async readBatch(filePaths: readonly string[]): Promise<Map<string, MetadataFields>> {
    const results = new Map<string, MetadataFields>();
    for (const filePath of filePaths) {
      const key = normalizePath(filePath);
      results.set(key, { ...(this.entries.get(key) ?? {}) });
    }
    return results;
  }
}
