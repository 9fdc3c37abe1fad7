/**
 * Category Colorizers
 *
 * Maps a single category value to a fixed palette color, one table per
 * visualized field. Lookups are exact string matches; anything outside a
 * table gets FALLBACK_COLOR.
 *
 * @module core/colorizers
 */

// ============================================================================
// Palette
// ============================================================================

/**
 * Color for values missing from a field's table
 */
export const FALLBACK_COLOR = '#757575';

/**
 * Color the tables use for an explicit "NA"
 */
export const NA_COLOR = '#9E9E9E';

export const PAYMENT_TYPE_COLORS: Readonly<Record<string, string>> = {
  'Interbank payment system': '#2E7D32',
  'Cross-domain payment system': '#1976D2',
  'Mobile money': '#F57C00',
  CBDC: '#7B1FA2',
  'Mobile wallet': '#C2185B',
  'Interbank payment system, Mobile wallet': '#00796B',
  NA: NA_COLOR,
};

export const OPERATOR_COLORS: Readonly<Record<string, string>> = {
  'Central bank': '#1565C0',
  'Bank association': '#00897B',
  'Commercial bank/Private PSP': '#6A1B9A',
  'Private PSP': '#AD1457',
  'Central bank/Bank association': '#0277BD',
  Other: '#F57C00',
  NA: NA_COLOR,
};

export const STATUS_COLORS: Readonly<Record<string, string>> = {
  Implemented: '#2E7D32',
  'Planned/Piloted': '#F9A825',
  NA: NA_COLOR,
};

export const YES_NO_COLORS: Readonly<Record<string, string>> = {
  Yes: '#2E7D32',
  No: '#D32F2F',
  NA: NA_COLOR,
};

export const SETTLEMENT_COLORS: Readonly<Record<string, string>> = {
  RTGS: '#1565C0',
  DNS: '#00897B',
  ACH: '#6A1B9A',
  MN: '#F57C00',
  'Distributed settlement': '#00796B',
  NA: NA_COLOR,
};

export const NATIONAL_REGIONAL_COLORS: Readonly<Record<string, string>> = {
  National: '#1976D2',
  Regional: '#388E3C',
};

// ============================================================================
// Lookup
// ============================================================================

function lookup(table: Readonly<Record<string, string>>, value: string): string {
  return Object.hasOwn(table, value) ? table[value] : FALLBACK_COLOR;
}

export function colorForPaymentType(paymentType: string): string {
  return lookup(PAYMENT_TYPE_COLORS, paymentType);
}

/**
 * Operator values carry stray whitespace in the source data, so this is the
 * only colorizer that trims before the lookup.
 */
export function colorForOperator(operator: string): string {
  return lookup(OPERATOR_COLORS, operator.trim());
}

export function colorForStatus(status: string): string {
  return lookup(STATUS_COLORS, status);
}

/**
 * Shared by bank participation, non-bank participation and QR code layers
 */
export function colorForYesNo(value: string): string {
  return lookup(YES_NO_COLORS, value);
}

/**
 * First component of a comma-joined settlement type, e.g.
 * "RTGS, DNS" → "RTGS". Empty input reads as "NA".
 */
export function primarySettlementType(settlement: string): string {
  if (!settlement) return 'NA';
  return settlement.split(',')[0].trim();
}

export function colorForSettlement(settlement: string): string {
  return lookup(SETTLEMENT_COLORS, primarySettlementType(settlement));
}

export function colorForNationalRegional(scope: string): string {
  return lookup(NATIONAL_REGIONAL_COLORS, scope);
}
