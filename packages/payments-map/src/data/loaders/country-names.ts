/**
 * Country name normalization for the payment systems table.
 *
 * Source rows spell some countries differently from the coordinate table;
 * the aliases below map them onto the coordinate table's names.
 */

export const COUNTRY_ALIASES: Readonly<Record<string, string>> = {
  'United States': 'United States of America',
  USA: 'United States of America',
  UK: 'United Kingdom',
  UAE: 'United Arab Emirates',
  'South Korea': 'Republic of Korea',
  Korea: 'Republic of Korea',
  Russia: 'Russian Federation',
};

/**
 * Regional aggregate rows that are not countries
 */
export const REGIONAL_AGGREGATES: ReadonlySet<string> = new Set(['Africa', 'Asia', 'Europe']);

export function normalizeCountryName(name: string): string {
  const trimmed = name.trim();
  return Object.hasOwn(COUNTRY_ALIASES, trimmed) ? COUNTRY_ALIASES[trimmed] : trimmed;
}

export function isRegionalAggregate(country: string): boolean {
  return REGIONAL_AGGREGATES.has(country);
}
