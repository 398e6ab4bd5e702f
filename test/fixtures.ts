import type { NominatimAddress, ReverseGeocoder } from '../src/geo/nominatimClient.js';
import { UNKNOWN_PLACE, type Anchor, type Coordinate } from '../src/geo/types.js';
import type { CaptureTime, PhotoRecord } from '../src/catalog/types.js';

/** Miles per degree of latitude on the catalog's sphere */
export const MILES_PER_DEGREE = (3958.7613 * Math.PI) / 180;

export const BASE_WALL_CLOCK = Date.UTC(2024, 4, 10, 9, 0, 0);

/**
 * Reverse geocoder stand-in that records every coordinate it is asked about.
 */
export class FakeGeocoder implements ReverseGeocoder {
  readonly calls: Coordinate[] = [];

  constructor(private readonly answer: (coordinate: Coordinate) => NominatimAddress | Error) {}

  async reverse(coordinate: Coordinate): Promise<NominatimAddress> {
    this.calls.push(coordinate);
    const result = this.answer(coordinate);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }
}

export function anchorAt(latitude: number, longitude: number, city = `City ${latitude},${longitude}`): Anchor {
  return {
    latitude,
    longitude,
    cityLabel: city,
    neighborhood: '',
    county: '',
    state: '',
    countryCode: '',
    folderLabel: city,
  };
}

export function naiveTime(minutesFromBase: number): CaptureTime {
  return { wallClockMs: BASE_WALL_CLOCK + minutesFromBase * 60_000, source: 'metadata' };
}

export function makeRecord(
  name: string,
  minutesFromBase: number,
  coordinate?: Coordinate,
  overrides: Partial<PhotoRecord> = {}
): PhotoRecord {
  return {
    sourcePath: `/photos/${name}`,
    fileName: name,
    captureTime: naiveTime(minutesFromBase),
    coordinate,
    place: { ...UNKNOWN_PLACE },
    geoSource: coordinate ? 'exif' : 'unknown',
    camera: {
      make: '',
      model: '',
      lens: '',
      fNumber: '',
      exposure: '',
      iso: '',
      focalLength: '',
      orientation: '',
      width: '',
      height: '',
    },
    resolution: 'no-coordinate',
    metadataStatus: 'ok',
    proposedFolder: '',
    ...overrides,
  };
}
