/**
 * Payments Map Core Types
 *
 * Shared shapes for loaded payment-system records, per-layer markers and
 * legends. Tuple types mirror the JSON embedded in the generated page.
 *
 * @module core/types
 */

/**
 * One row of the payment systems table.
 *
 * Every field is a free-form category string; "NA" marks an unknown value.
 */
export interface PaymentSystemRecord {
  readonly name: string;
  readonly paymentType: string;
  readonly operator: string;
  readonly bankParticipation: string;
  readonly nonbankParticipation: string;
  readonly status: string;
  readonly nationalRegional: string;
  readonly settlementType: string;
  readonly qrCode: string;
  readonly crossBorder: string;
  readonly transactionsSupported: string;
  /** "Yes" when the country runs an active real-time payment system */
  readonly active: string;
  readonly url: string;
}

/**
 * Country name → records, in input row order
 */
export type CountryGroup = ReadonlyMap<string, readonly PaymentSystemRecord[]>;

/**
 * A country's marker on one layer
 */
export interface LayerMarker {
  readonly country: string;
  readonly color: string;
  /** Raw category value shown for the layer */
  readonly value: string;
  readonly popup: string;
  readonly systemCount: number;
}

/**
 * [color, label]
 */
export type LegendEntry = readonly [color: string, label: string];

/**
 * [title, entries]
 */
export type LayerLegend = readonly [title: string, entries: readonly LegendEntry[]];

/**
 * [latitude, longitude]
 */
export type LatLon = readonly [lat: number, lon: number];

export type CountryCoordinates = Readonly<Record<string, LatLon>>;
