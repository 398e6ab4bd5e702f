import type { Coordinate } from '../geo/types.js';

/**
 * Base class for failures raised by the catalog pipeline.
 */
export class CatalogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogError';
  }
}

/**
 * Raised when a run has nothing to catalog. This is the only fatal input
 * condition; every other failure degrades to a per-record outcome.
 */
export class NoInputFilesError extends CatalogError {
  constructor(readonly source: string) {
    super(`No JPG/JPEG files found in ${source}`);
    this.name = 'NoInputFilesError';
  }
}

/**
 * A reverse geocoding lookup that failed (network, timeout, bad response).
 */
export class GeocodeError extends CatalogError {
  constructor(readonly coordinate: Coordinate, cause: unknown) {
    super(
      `Reverse geocoding failed for ${coordinate.latitude},${coordinate.longitude}: ${describeError(cause)}`,
      { cause }
    );
    this.name = 'GeocodeError';
  }
}

/**
 * Renders an unknown thrown value for a log line.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
