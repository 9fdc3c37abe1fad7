/**
 * Layer Legends
 *
 * Hand-authored legend per layer. Entries follow the colorizer tables but
 * are not derived from observed data; rare categories fold into "NA/Other".
 *
 * @module core/legends
 */

import { NA_COLOR } from './colorizers.js';
import { isLayerType, mapLayers, type LayerType } from './layers.js';
import type { LayerLegend } from './types.js';

const YES_NO_ENTRIES = [
  ['#2E7D32', 'Yes'],
  ['#D32F2F', 'No'],
  [NA_COLOR, 'NA'],
] as const;

export const LAYER_LEGENDS: Readonly<Record<LayerType, LayerLegend>> = {
  payment_type: [
    'Payment System Type',
    [
      ['#2E7D32', 'Interbank payment system'],
      ['#1976D2', 'Cross-domain payment system'],
      ['#F57C00', 'Mobile money'],
      ['#7B1FA2', 'CBDC'],
      ['#C2185B', 'Mobile wallet'],
      [NA_COLOR, 'NA/Other'],
    ],
  ],
  operator: [
    'Operator',
    [
      ['#1565C0', 'Central bank'],
      ['#00897B', 'Bank association'],
      ['#6A1B9A', 'Commercial bank/Private PSP'],
      ['#AD1457', 'Private PSP'],
      [NA_COLOR, 'NA/Other'],
    ],
  ],
  status: [
    'Implementation Status',
    [
      ['#2E7D32', 'Implemented'],
      ['#F9A825', 'Planned/Piloted'],
      [NA_COLOR, 'NA'],
    ],
  ],
  bank_participation: ['Bank Participation', YES_NO_ENTRIES],
  nonbank_participation: ['Non-Bank Participation', YES_NO_ENTRIES],
  settlement_type: [
    'Settlement System Type',
    [
      ['#1565C0', 'RTGS'],
      ['#00897B', 'DNS'],
      ['#6A1B9A', 'ACH'],
      ['#F57C00', 'MN'],
      [NA_COLOR, 'NA/Other'],
    ],
  ],
  national_regional: [
    'Scope',
    [
      ['#1976D2', 'National'],
      ['#388E3C', 'Regional'],
    ],
  ],
  qr_code: ['QR Code Based', YES_NO_ENTRIES],
};

/**
 * Legend for a layer; unknown layers get an empty "Unknown" legend.
 */
export function getLegend(layerType: string): LayerLegend {
  return isLayerType(layerType) ? LAYER_LEGENDS[layerType] : ['Unknown', []];
}

export function getAllLegends(): Record<LayerType, LayerLegend> {
  return mapLayers(getLegend);
}
