/**
 * Library entry point.
 */
export { AnchorCache, type AnchorMatch, type MatchStrategy } from './geo/anchorCache.js';
export { loadAnchors, saveAnchors } from './geo/anchorStore.js';
export { GeocodeResolver, type ResolutionOutcome, type ResolverStats } from './geo/geocodeResolver.js';
export { haversineMiles, EARTH_RADIUS_MILES } from './geo/haversine.js';
export { NominatimClient, type NominatimAddress, type ReverseGeocoder } from './geo/nominatimClient.js';
export { buildPlaceLabel } from './geo/placeLabel.js';
export { UNKNOWN_PLACE, type Anchor, type Coordinate, type PlaceLabel } from './geo/types.js';
export { buildPhotoCatalog, type BuildCatalogOptions } from './catalog/buildCatalog.js';
export { renderCatalog, writeCatalog, slugify } from './catalog/catalogWriter.js';
export { scanPhotos, type SourceFile } from './catalog/fileScanner.js';
export { inferMissingCoordinates } from './catalog/inference.js';
export {
  ExifrMetadataProvider,
  InMemoryMetadataProvider,
  type MetadataProvider,
} from './catalog/metadataProvider.js';
export { MotionTracker, computeMotion } from './catalog/motion.js';
export { CatalogPipeline, type CatalogResult, type CatalogStats } from './catalog/pipeline.js';
export { resolveCaptureTime, resolveUtcOffset, formatUtcOffset } from './catalog/timezone.js';
export type { CaptureTime, GeoSource, MotionFields, PhotoRecord } from './catalog/types.js';
export { CatalogError, GeocodeError, NoInputFilesError } from './utils/errors.js';
