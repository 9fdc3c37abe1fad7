/**
 * Payment Systems Record Loader
 *
 * Reads the payment systems CSV, normalizes country names and groups the
 * rows by country. Loading is best-effort: absent columns and empty rows
 * fall back to defaults instead of failing.
 *
 * PIPELINE:
 * 1. parsePaymentTable: CSV text → rows keyed by header
 * 2. groupByCountry: rows → CountryGroup (optionally only active + implemented)
 * 3. loadPaymentData: file path → CountryGroup (read errors propagate)
 *
 * @module data/record-loader
 */

import { readFileSync } from 'node:fs';
import { csvParseRows } from 'd3-dsv';
import { isRegionalAggregate, normalizeCountryName } from './country-names.js';
import type { CountryGroup, PaymentSystemRecord } from '../../core/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One parsed CSV row. A header missing from the file, or a cell past the end
 * of a short row, reads as undefined; a present but empty cell reads as "".
 */
export type PaymentTableRow = Readonly<Record<string, string | undefined>>;

export interface GroupOptions {
  /** Keep only rows that are active real-time AND implemented */
  readonly filterToActiveImplemented: boolean;
}

export interface GroupSummary {
  readonly countries: number;
  readonly systems: number;
}

// ============================================================================
// Columns
// ============================================================================

export const COUNTRY_COLUMN = 'Country / Region';
export const ACTIVE_COLUMN = 'Active real-time payment system present';
export const STATUS_COLUMN = 'Status of payment system implementation';

/**
 * Record field → source header and the value used when the header is absent
 */
export const RECORD_COLUMNS: Readonly<
  Record<keyof PaymentSystemRecord, { readonly header: string; readonly fallback: string }>
> = {
  name: { header: 'Payment system name', fallback: 'NA' },
  paymentType: { header: 'Payment system type', fallback: 'NA' },
  operator: { header: 'Operator', fallback: 'NA' },
  bankParticipation: { header: 'Bank participation', fallback: 'NA' },
  nonbankParticipation: { header: 'Non-bank participation', fallback: 'NA' },
  status: { header: STATUS_COLUMN, fallback: 'NA' },
  nationalRegional: { header: 'National / Regional', fallback: 'NA' },
  settlementType: { header: 'Type of settlement system', fallback: 'NA' },
  qrCode: { header: 'QR code based transactions', fallback: 'NA' },
  crossBorder: { header: 'Cross-border payments', fallback: 'NA' },
  transactionsSupported: { header: 'Types of transactions supported', fallback: 'NA' },
  active: { header: ACTIVE_COLUMN, fallback: 'No' },
  url: { header: 'URL', fallback: '' },
};

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse CSV text with a header row. A leading byte-order mark is dropped so
 * the first header matches. Short rows only carry the cells they have, so
 * absent trailing columns fall back to their defaults.
 */
export function parsePaymentTable(text: string): PaymentTableRow[] {
  const content = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const [headers = [], ...rows] = csvParseRows(content);

  return rows.map((cells) =>
    Object.fromEntries(
      cells.slice(0, headers.length).map((cell, index): [string, string] => [headers[index], cell])
    )
  );
}

function field(row: PaymentTableRow, column: keyof PaymentSystemRecord): string {
  const { header, fallback } = RECORD_COLUMNS[column];
  return row[header] ?? fallback;
}

export function toPaymentSystemRecord(row: PaymentTableRow): PaymentSystemRecord {
  return {
    name: field(row, 'name'),
    paymentType: field(row, 'paymentType'),
    operator: field(row, 'operator'),
    bankParticipation: field(row, 'bankParticipation'),
    nonbankParticipation: field(row, 'nonbankParticipation'),
    status: field(row, 'status'),
    nationalRegional: field(row, 'nationalRegional'),
    settlementType: field(row, 'settlementType'),
    qrCode: field(row, 'qrCode'),
    crossBorder: field(row, 'crossBorder'),
    transactionsSupported: field(row, 'transactionsSupported'),
    active: field(row, 'active'),
    url: field(row, 'url'),
  };
}

/**
 * Whether a row describes an active real-time system that is implemented
 */
export function isActiveImplemented(row: PaymentTableRow): boolean {
  return field(row, 'active') === 'Yes' && field(row, 'status') === 'Implemented';
}

// ============================================================================
// Grouping
// ============================================================================

/**
 * Group rows by normalized country, preserving row order. Rows without a
 * country and regional aggregate rows are skipped.
 */
export function groupByCountry(
  rows: Iterable<PaymentTableRow>,
  options: GroupOptions
): CountryGroup {
  const groups = new Map<string, PaymentSystemRecord[]>();

  for (const row of rows) {
    const country = normalizeCountryName(row[COUNTRY_COLUMN] ?? '');
    if (!country || isRegionalAggregate(country)) continue;

    if (options.filterToActiveImplemented && !isActiveImplemented(row)) continue;

    const records = groups.get(country);
    const record = toPaymentSystemRecord(row);
    if (records) {
      records.push(record);
    } else {
      groups.set(country, [record]);
    }
  }

  return groups;
}

/**
 * Read, parse and group a payment systems CSV file.
 *
 * @throws the fs error when the file cannot be read
 */
export function loadPaymentData(csvFile: string, options: GroupOptions): CountryGroup {
  const text = readFileSync(csvFile, 'utf-8');
  return groupByCountry(parsePaymentTable(text), options);
}

export function summarizeGroups(groups: CountryGroup): GroupSummary {
  let systems = 0;
  for (const records of groups.values()) {
    systems += records.length;
  }
  return { countries: groups.size, systems };
}
