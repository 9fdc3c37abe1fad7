/**
 * Country Coordinates Loader
 *
 * Typed access to the static country centroid table in
 * src/data/canonical/country-coordinates.json. The table is independent of
 * the input dataset; countries missing from it get no marker on the map.
 *
 * USAGE:
 * ```typescript
 * import { COUNTRY_COORDINATES, findUnplacedCountries } from './country-coordinates-loader.js';
 *
 * COUNTRY_COORDINATES['Kenya']; // [1, 38]
 * ```
 */

import { z } from 'zod';
import coordinatesRaw from '../canonical/country-coordinates.json' with { type: 'json' };
import type { CountryCoordinates, CountryGroup } from '../../core/types.js';

const CoordinatesFileSchema = z.object({
  metadata: z.object({
    description: z.string(),
    units: z.string(),
  }),
  countries: z.record(
    z.tuple([z.number().min(-90).max(90), z.number().min(-180).max(180)])
  ),
});

const coordinatesFile = CoordinatesFileSchema.parse(coordinatesRaw);

/**
 * Country name → [lat, lon], in file order
 */
export const COUNTRY_COORDINATES: CountryCoordinates = Object.freeze(coordinatesFile.countries);

/**
 * Grouped countries that have no entry in the coordinate table
 */
export function findUnplacedCountries(
  groups: CountryGroup,
  coordinates: CountryCoordinates = COUNTRY_COORDINATES
): string[] {
  return [...groups.keys()].filter((country) => !Object.hasOwn(coordinates, country));
}
