/**
 * Layer Catalogue
 *
 * The eight selectable map layers, their control-panel labels and a helper
 * for building one value per layer.
 *
 * @module core/layers
 */

/**
 * Visualization layers, in control-panel order
 */
export const LAYER_TYPES = [
  'payment_type',
  'operator',
  'status',
  'bank_participation',
  'nonbank_participation',
  'settlement_type',
  'national_regional',
  'qr_code',
] as const;

export type LayerType = (typeof LAYER_TYPES)[number];

export const DEFAULT_LAYER: LayerType = 'payment_type';

/**
 * Button labels for the layer control
 */
export const LAYER_LABELS: Readonly<Record<LayerType, string>> = {
  payment_type: 'Payment System Type',
  operator: 'Operator',
  status: 'Implementation Status',
  bank_participation: 'Bank Participation',
  nonbank_participation: 'Non-Bank Participation',
  settlement_type: 'Settlement Type',
  national_regional: 'National/Regional',
  qr_code: 'QR Code Support',
};

export function isLayerType(value: string): value is LayerType {
  return LAYER_TYPES.some((layerType) => layerType === value);
}

/**
 * Build a record keyed by every layer, in LAYER_TYPES order
 */
export function mapLayers<T>(build: (layerType: LayerType) => T): Record<LayerType, T> {
  return {
    payment_type: build('payment_type'),
    operator: build('operator'),
    status: build('status'),
    bank_participation: build('bank_participation'),
    nonbank_participation: build('nonbank_participation'),
    settlement_type: build('settlement_type'),
    national_regional: build('national_regional'),
    qr_code: build('qr_code'),
  };
}
