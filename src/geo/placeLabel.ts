import type { NominatimAddress } from './nominatimClient.js';
import { UNKNOWN_LOCATION, type PlaceLabel } from './types.js';

const CITY_FIELDS = ['city', 'town', 'village', 'hamlet', 'municipality', 'county'] as const;
const NEIGHBORHOOD_FIELDS = [
  'neighbourhood',
  'neighborhood',
  'suburb',
  'quarter',
  'locality',
  'borough',
  'district',
] as const;

function firstPresent(address: NominatimAddress, fields: readonly string[]): string | undefined {
  for (const field of fields) {
    const value = address[field];
    if (value) {
      return value;
    }
  }
  return undefined;
}

/**
 * Settlement name, most specific tier first, then state, then country.
 */
export function pickCity(address: NominatimAddress): string | undefined {
  return firstPresent(address, [...CITY_FIELDS, 'state', 'country']);
}

export function pickNeighborhood(address: NominatimAddress): string | undefined {
  return firstPresent(address, NEIGHBORHOOD_FIELDS);
}

/**
 * Builds the place fields for a reverse geocoding result.
 *
 * @example
 * ```typescript
 * buildPlaceLabel({ city: 'Portland', state: 'Oregon', suburb: 'Pearl District', country_code: 'us' });
 * // cityLabel 'Portland, Oregon', folderLabel 'Portland, Oregon_Pearl District', countryCode 'US'
 * ```
 */
export function buildPlaceLabel(address: NominatimAddress): PlaceLabel {
  const city = pickCity(address) ?? UNKNOWN_LOCATION;
  const neighborhood = pickNeighborhood(address) ?? '';
  const state = firstPresent(address, ['state']) ?? '';
  const countryCode = (address.country_code ?? '').toUpperCase();

  let cityLabel = city;
  if (state) {
    cityLabel = `${city}, ${state}`;
  } else if (countryCode) {
    cityLabel = `${city}, ${countryCode}`;
  }

  return {
    cityLabel,
    neighborhood,
    county: address.county ?? '',
    state,
    countryCode,
    folderLabel: neighborhood ? `${cityLabel}_${neighborhood}` : cityLabel,
  };
}
