import logger from '../utils/logger.js';
import { GeocodeError } from '../utils/errors.js';
import type { AnchorCache } from './anchorCache.js';
import type { ReverseGeocoder } from './nominatimClient.js';
import { buildPlaceLabel } from './placeLabel.js';
import { toPlaceLabel, UNKNOWN_PLACE, type Anchor, type Coordinate, type PlaceLabel } from './types.js';

/**
 * Result of resolving one coordinate to a place.
 */
export type ResolutionOutcome =
  | { status: 'cache-hit'; place: PlaceLabel; anchor: Anchor; distanceMiles: number }
  | { status: 'geocoded'; place: PlaceLabel; anchor: Anchor }
  | { status: 'lookup-failed'; place: PlaceLabel; anchor?: Anchor; error: GeocodeError };

export interface GeocodeResolverOptions {
  /**
   * Register an unknown-place anchor when a lookup fails, so nearby
   * coordinates are not re-queried for the rest of the run (default: true).
   */
  registerFailedLookups?: boolean;
}

export interface ResolverStats {
  lookups: number;
  cacheHits: number;
  failures: number;
  anchorsCreated: number;
}

/**
 * Resolves coordinates to places, reusing anchors within the cache radius
 * and falling back to a reverse geocoding lookup on a miss.
 */
export class GeocodeResolver {
  private readonly registerFailedLookups: boolean;
  private readonly stats: ResolverStats = { lookups: 0, cacheHits: 0, failures: 0, anchorsCreated: 0 };

  constructor(
    private readonly cache: AnchorCache,
    private readonly geocoder: ReverseGeocoder,
    options: GeocodeResolverOptions = {}
  ) {
    this.registerFailedLookups = options.registerFailedLookups ?? true;
  }

  async resolve(coordinate: Coordinate): Promise<ResolutionOutcome> {
    const match = this.cache.findMatch(coordinate);
    if (match) {
      this.stats.cacheHits++;
      return {
        status: 'cache-hit',
        place: toPlaceLabel(match.anchor),
        anchor: match.anchor,
        distanceMiles: match.distanceMiles,
      };
    }

    this.stats.lookups++;
    try {
      const address = await this.geocoder.reverse(coordinate);
      const place = buildPlaceLabel(address);
      const anchor = this.register(coordinate, place);
      return { status: 'geocoded', place, anchor };
    } catch (cause) {
      this.stats.failures++;
      const error = new GeocodeError(coordinate, cause);
      logger.warn(error.message);

      const place = { ...UNKNOWN_PLACE };
      const anchor = this.registerFailedLookups ? this.register(coordinate, place) : undefined;
      return { status: 'lookup-failed', place, anchor, error };
    }
  }

  getStats(): ResolverStats {
    return { ...this.stats };
  }

  private register(coordinate: Coordinate, place: PlaceLabel): Anchor {
    const anchor: Anchor = { latitude: coordinate.latitude, longitude: coordinate.longitude, ...place };
    this.cache.add(anchor);
    this.stats.anchorsCreated++;
    return anchor;
  }
}
