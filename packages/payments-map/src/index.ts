/**
 * Payments Map
 *
 * Turns a table of national digital payment systems into a static,
 * layer-switchable Leaflet map.
 *
 * @packageDocumentation
 */

export type {
  CountryCoordinates,
  CountryGroup,
  LatLon,
  LayerLegend,
  LayerMarker,
  LegendEntry,
  PaymentSystemRecord,
} from './core/types.js';
export { DEFAULT_LAYER, LAYER_LABELS, LAYER_TYPES, isLayerType, mapLayers } from './core/layers.js';
export type { LayerType } from './core/layers.js';
export {
  FALLBACK_COLOR,
  colorForNationalRegional,
  colorForOperator,
  colorForPaymentType,
  colorForSettlement,
  colorForStatus,
  colorForYesNo,
  primarySettlementType,
} from './core/colorizers.js';
export {
  buildAllLayerMarkers,
  buildLayerMarkers,
  buildPopupHtml,
  selectRepresentative,
} from './core/markers.js';
export { LAYER_LEGENDS, getAllLegends, getLegend } from './core/legends.js';
export { ConfigError } from './core/errors.js';
export {
  groupByCountry,
  loadPaymentData,
  parsePaymentTable,
  summarizeGroups,
} from './data/loaders/record-loader.js';
export type { GroupOptions, GroupSummary, PaymentTableRow } from './data/loaders/record-loader.js';
export { normalizeCountryName } from './data/loaders/country-names.js';
export {
  COUNTRY_COORDINATES,
  findUnplacedCountries,
} from './data/loaders/country-coordinates-loader.js';
export { buildMapModel, renderMapHtml, writeMapHtml } from './render/map-document.js';
export type { MapDocumentOptions, MapModel } from './render/map-document.js';
