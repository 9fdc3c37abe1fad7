/**
 * Layer Marker Builder
 *
 * Turns grouped payment-system records into one marker per country per
 * layer. A country is characterized by a single representative record,
 * chosen once and reused for every layer.
 *
 * @module core/markers
 */

import {
  FALLBACK_COLOR,
  colorForNationalRegional,
  colorForOperator,
  colorForPaymentType,
  colorForSettlement,
  colorForStatus,
  colorForYesNo,
  primarySettlementType,
} from './colorizers.js';
import { escapeHtml } from './html.js';
import { isLayerType, mapLayers, type LayerType } from './layers.js';
import type { CountryGroup, LayerMarker, PaymentSystemRecord } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Records listed in a popup before the "...and N more" notice
 */
export const POPUP_RECORD_LIMIT = 5;

/**
 * Representative-selection predicates, highest priority first.
 * Ties resolve to the earliest record in input order.
 */
const REPRESENTATIVE_PREFERENCES: readonly ((record: PaymentSystemRecord) => boolean)[] = [
  (record) => record.active === 'Yes',
  (record) => record.status === 'Implemented',
];

/**
 * Per-layer field extraction and coloring
 */
interface LayerClassifier {
  readonly value: (record: PaymentSystemRecord) => string;
  readonly color: (value: string) => string;
}

const LAYER_CLASSIFIERS: Readonly<Record<LayerType, LayerClassifier>> = {
  payment_type: { value: (r) => r.paymentType, color: colorForPaymentType },
  operator: { value: (r) => r.operator, color: colorForOperator },
  status: { value: (r) => r.status, color: colorForStatus },
  bank_participation: { value: (r) => r.bankParticipation, color: colorForYesNo },
  nonbank_participation: { value: (r) => r.nonbankParticipation, color: colorForYesNo },
  // value is already the first component; colorForSettlement leaves it as is
  settlement_type: {
    value: (r) => primarySettlementType(r.settlementType),
    color: colorForSettlement,
  },
  national_regional: { value: (r) => r.nationalRegional, color: colorForNationalRegional },
  qr_code: { value: (r) => r.qrCode, color: colorForYesNo },
};

// ============================================================================
// Representative Selection
// ============================================================================

/**
 * Pick the record that colors a country's markers: the first active
 * real-time system, else the first implemented one, else the first record.
 *
 * @returns undefined only for an empty list
 */
export function selectRepresentative(
  records: readonly PaymentSystemRecord[]
): PaymentSystemRecord | undefined {
  for (const prefers of REPRESENTATIVE_PREFERENCES) {
    const match = records.find(prefers);
    if (match) return match;
  }
  return records[0];
}

// ============================================================================
// Popup
// ============================================================================

/**
 * Popup body for a country: header, record count and the first
 * POPUP_RECORD_LIMIT records in input order.
 */
export function buildPopupHtml(
  country: string,
  records: readonly PaymentSystemRecord[]
): string {
  let html = `<b>${escapeHtml(country)}</b><br/><br/>`;
  html += `<b>Payment Systems: ${records.length}</b><br/><br/>`;

  records.slice(0, POPUP_RECORD_LIMIT).forEach((record, index) => {
    html += `<b>${index + 1}. ${escapeHtml(record.name)}</b><br/>`;
    html += `Type: ${escapeHtml(record.paymentType)}<br/>`;
    html += `Operator: ${escapeHtml(record.operator)}<br/>`;
    html += `Status: ${escapeHtml(record.status)}<br/>`;
    if (record.active === 'Yes') {
      html += '✓ Active real-time system<br/>';
    }
    html += '<br/>';
  });

  if (records.length > POPUP_RECORD_LIMIT) {
    html += `<i>...and ${records.length - POPUP_RECORD_LIMIT} more systems</i><br/>`;
  }

  return html;
}

// ============================================================================
// Markers
// ============================================================================

function classify(
  representative: PaymentSystemRecord,
  layerType: string
): { color: string; value: string } {
  if (!isLayerType(layerType)) {
    return { color: FALLBACK_COLOR, value: 'Unknown' };
  }
  const classifier = LAYER_CLASSIFIERS[layerType];
  const value = classifier.value(representative);
  return { color: classifier.color(value), value };
}

interface CountrySummary {
  readonly country: string;
  readonly representative: PaymentSystemRecord;
  readonly popup: string;
  readonly systemCount: number;
}

function summarizeCountries(groups: CountryGroup): CountrySummary[] {
  const summaries: CountrySummary[] = [];
  for (const [country, records] of groups) {
    const representative = selectRepresentative(records);
    if (!representative) continue;
    summaries.push({
      country,
      representative,
      popup: buildPopupHtml(country, records),
      systemCount: records.length,
    });
  }
  return summaries;
}

function toMarker(summary: CountrySummary, layerType: string): LayerMarker {
  return {
    country: summary.country,
    ...classify(summary.representative, layerType),
    popup: summary.popup,
    systemCount: summary.systemCount,
  };
}

/**
 * Build one layer's markers, one per country in group order.
 * Unknown layer types yield neutral "Unknown" markers.
 */
export function buildLayerMarkers(groups: CountryGroup, layerType: string): LayerMarker[] {
  return summarizeCountries(groups).map((summary) => toMarker(summary, layerType));
}

/**
 * Markers for every layer. Representative and popup are computed once per
 * country and shared across layers.
 */
export function buildAllLayerMarkers(groups: CountryGroup): Record<LayerType, LayerMarker[]> {
  const summaries = summarizeCountries(groups);
  return mapLayers((layerType) => summaries.map((summary) => toMarker(summary, layerType)));
}
