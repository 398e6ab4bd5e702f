import fs from 'fs/promises';
import { stringify } from 'csv-stringify/sync';
import logger from '../utils/logger.js';
import { UNKNOWN_LOCATION } from '../geo/types.js';
import { captureClock, captureDate } from './timezone.js';
import type { PhotoRecord } from './types.js';

/**
 * Catalog columns in output order. `final_folder` is left empty for the
 * user to override `proposed_folder` before files are organized.
 */
export const CATALOG_COLUMNS = [
  'source_path',
  'file_name',
  'date',
  'time',
  'utc_offset',
  'lat',
  'lon',
  'geo_source',
  'inferred_from',
  'resolution',
  'city_label',
  'neighborhood',
  'county',
  'state',
  'country_code',
  'distance_mi',
  'elapsed_h',
  'speed_mph',
  'make',
  'model',
  'lens',
  'fnumber',
  'exposure',
  'iso',
  'focal_length',
  'orientation',
  'width',
  'height',
  'proposed_folder',
  'final_folder',
] as const;

export type CatalogColumn = (typeof CATALOG_COLUMNS)[number];
export type CatalogRow = Record<CatalogColumn, string>;

/**
 * Turns a place label into a folder-safe name: characters other than
 * alphanumerics, space, `_`, `-` and `,` become `_`, edges are trimmed and
 * whitespace runs collapse to `_`.
 *
 * @example
 * ```typescript
 * slugify('Portland, Oregon_Pearl District'); // 'Portland,_Oregon_Pearl_District'
 * ```
 */
export function slugify(label: string): string {
  const kept = Array.from(label, ch => (/[\p{L}\p{N} _\-,]/u.test(ch) ? ch : '_')).join('');
  const trimmed = kept.replace(/^[ _\-,]+|[ _\-,]+$/g, '');
  const joined = trimmed.split(/\s+/).filter(Boolean).join('_');
  return joined || UNKNOWN_LOCATION;
}

export function proposedFolder(record: Pick<PhotoRecord, 'place' | 'captureTime'>): string {
  return `${slugify(record.place.folderLabel)}_${captureDate(record.captureTime)}`;
}

function fixed(value: number | undefined, digits: number): string {
  return value === undefined ? '' : value.toFixed(digits);
}

export function toCatalogRow(record: PhotoRecord): CatalogRow {
  return {
    source_path: record.sourcePath,
    file_name: record.fileName,
    date: captureDate(record.captureTime),
    time: captureClock(record.captureTime),
    utc_offset: record.captureTime.utcOffset ?? '',
    lat: record.coordinate ? String(record.coordinate.latitude) : '',
    lon: record.coordinate ? String(record.coordinate.longitude) : '',
    geo_source: record.geoSource,
    inferred_from: record.inferredFrom ?? '',
    resolution: record.resolution,
    city_label: record.place.cityLabel,
    neighborhood: record.place.neighborhood,
    county: record.place.county,
    state: record.place.state,
    country_code: record.place.countryCode,
    distance_mi: fixed(record.motion?.distanceMiles, 3),
    elapsed_h: fixed(record.motion?.elapsedHours, 4),
    speed_mph: fixed(record.motion?.speedMph, 2),
    make: record.camera.make,
    model: record.camera.model,
    lens: record.camera.lens,
    fnumber: record.camera.fNumber,
    exposure: record.camera.exposure,
    iso: record.camera.iso,
    focal_length: record.camera.focalLength,
    orientation: record.camera.orientation,
    width: record.camera.width,
    height: record.camera.height,
    proposed_folder: record.proposedFolder,
    final_folder: '',
  };
}

export function renderCatalog(records: readonly PhotoRecord[]): string {
  return stringify(records.map(toCatalogRow), {
    header: true,
    columns: [...CATALOG_COLUMNS],
  });
}

/**
 * Writes the catalog CSV, replacing any existing file.
 */
export async function writeCatalog(filePath: string, records: readonly PhotoRecord[]): Promise<void> {
  await fs.writeFile(filePath, renderCatalog(records), 'utf-8');
  logger.info(`CSV written to: ${filePath} (${records.length} rows)`);
}
