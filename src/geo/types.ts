/**
 * Geographic types shared by the anchor cache and the geocode resolver.
 */

/**
 * A point in decimal degrees (WGS84).
 */
export interface Coordinate {
  latitude: number;
  longitude: number;
}

/**
 * Place fields derived from a reverse geocoding result.
 * Empty strings stand for "not provided by the service".
 */
export interface PlaceLabel {
  /** City paired with state or country code, e.g. "Portland, Oregon" */
  cityLabel: string;
  neighborhood: string;
  county: string;
  state: string;
  /** Two-letter, upper-case */
  countryCode: string;
  /** `cityLabel` or `cityLabel_neighborhood`; used to group photos */
  folderLabel: string;
}

/**
 * A previously resolved location. Anchors are only ever appended.
 */
export interface Anchor extends Coordinate, PlaceLabel {}

export const UNKNOWN_LOCATION = 'UnknownLocation';

/**
 * Place assigned to records that have no coordinate or whose lookup failed.
 */
export const UNKNOWN_PLACE: Readonly<PlaceLabel> = Object.freeze({
  cityLabel: UNKNOWN_LOCATION,
  neighborhood: '',
  county: '',
  state: '',
  countryCode: '',
  folderLabel: UNKNOWN_LOCATION,
});

/**
 * Copies the place fields out of an anchor (or any superset of PlaceLabel).
 */
export function toPlaceLabel(source: PlaceLabel): PlaceLabel {
  return {
    cityLabel: source.cityLabel,
    neighborhood: source.neighborhood,
    county: source.county,
    state: source.state,
    countryCode: source.countryCode,
    folderLabel: source.folderLabel,
  };
}
