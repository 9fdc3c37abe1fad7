/**
 * Marker Builder Tests
 *
 * Validates:
 * 1. Representative selection (active → implemented → first)
 * 2. Popup content and truncation
 * 3. Per-layer color/value extraction
 */

import { describe, it, expect } from 'vitest';
import {
  buildAllLayerMarkers,
  buildLayerMarkers,
  buildPopupHtml,
  selectRepresentative,
} from './markers.js';
import { LAYER_TYPES } from './layers.js';
import type { CountryGroup, PaymentSystemRecord } from './types.js';

function record(overrides: Partial<PaymentSystemRecord> = {}): PaymentSystemRecord {
  return {
    name: 'NA',
    paymentType: 'NA',
    operator: 'NA',
    bankParticipation: 'NA',
    nonbankParticipation: 'NA',
    status: 'NA',
    nationalRegional: 'NA',
    settlementType: 'NA',
    qrCode: 'NA',
    crossBorder: 'NA',
    transactionsSupported: 'NA',
    active: 'No',
    url: '',
    ...overrides,
  };
}

describe('selectRepresentative()', () => {
  it('should prefer the active implemented record over an earlier planned one', () => {
    const planned = record({ name: 'Planned', active: 'No', status: 'Planned' });
    const live = record({ name: 'Live', active: 'Yes', status: 'Implemented' });

    expect(selectRepresentative([planned, live])).toBe(live);
  });

  it('should prefer an active record over an earlier implemented one', () => {
    const implemented = record({ name: 'Implemented', status: 'Implemented' });
    const active = record({ name: 'Active', active: 'Yes', status: 'Planned/Piloted' });

    expect(selectRepresentative([implemented, active])).toBe(active);
  });

  it('should take the first implemented record when none is active', () => {
    const planned = record({ name: 'Planned', status: 'Planned/Piloted' });
    const first = record({ name: 'First implemented', status: 'Implemented' });
    const second = record({ name: 'Second implemented', status: 'Implemented' });

    expect(selectRepresentative([planned, first, second])).toBe(first);
  });

  it('should take the first record when none is active or implemented', () => {
    const first = record({ name: 'First', status: 'Planned/Piloted' });
    const second = record({ name: 'Second', status: 'NA' });

    expect(selectRepresentative([first, second])).toBe(first);
  });

  it('should return undefined for an empty list', () => {
    expect(selectRepresentative([])).toBeUndefined();
  });
});

describe('buildPopupHtml()', () => {
  it('should render a single record', () => {
    const html = buildPopupHtml('Kenya', [
      record({
        name: 'PesaLink',
        paymentType: 'Interbank payment system',
        operator: 'Bank association',
        status: 'Implemented',
        active: 'Yes',
      }),
    ]);

    expect(html).toBe(
      '<b>Kenya</b><br/><br/>' +
        '<b>Payment Systems: 1</b><br/><br/>' +
        '<b>1. PesaLink</b><br/>' +
        'Type: Interbank payment system<br/>' +
        'Operator: Bank association<br/>' +
        'Status: Implemented<br/>' +
        '✓ Active real-time system<br/>' +
        '<br/>'
    );
  });

  it('should omit the active badge for inactive records', () => {
    const html = buildPopupHtml('Chile', [record({ name: 'TEF', active: 'No' })]);

    expect(html).not.toContain('Active real-time system');
  });

  it('should list five records and a truncation notice for seven', () => {
    const records = Array.from({ length: 7 }, (_, i) => record({ name: `System ${i + 1}` }));

    const html = buildPopupHtml('Brazil', records);

    expect(html.match(/<b>\d\. /g)).toHaveLength(5);
    expect(html).toContain('<b>Payment Systems: 7</b>');
    expect(html).toContain('<b>5. System 5</b>');
    expect(html).not.toContain('System 6');
    expect(html.endsWith('<i>...and 2 more systems</i><br/>')).toBe(true);
  });

  it('should not add a truncation notice for exactly five records', () => {
    const records = Array.from({ length: 5 }, (_, i) => record({ name: `System ${i + 1}` }));

    expect(buildPopupHtml('Peru', records)).not.toContain('more systems');
  });

  it('should list records in input order regardless of representative', () => {
    const html = buildPopupHtml('Ghana', [
      record({ name: 'Planned rail' }),
      record({ name: 'Live rail', active: 'Yes' }),
    ]);

    expect(html.indexOf('1. Planned rail')).toBeLessThan(html.indexOf('2. Live rail'));
  });

  it('should escape markup in interpolated values', () => {
    const html = buildPopupHtml('A & B', [record({ name: '<Pay> "Now"' })]);

    expect(html).toContain('<b>A &amp; B</b>');
    expect(html).toContain('<b>1. &lt;Pay&gt; &quot;Now&quot;</b>');
  });
});

describe('buildLayerMarkers()', () => {
  const groups: CountryGroup = new Map([
    [
      'Kenya',
      [
        record({ name: 'Planned', operator: 'Other', status: 'Planned/Piloted' }),
        record({
          name: 'PesaLink',
          paymentType: 'Interbank payment system',
          operator: 'Bank association',
          status: 'Implemented',
          settlementType: 'RTGS, DNS',
          qrCode: 'Yes',
          active: 'Yes',
        }),
      ],
    ],
    ['India', [record({ name: 'UPI', settlementType: '', operator: ' Central bank ' })]],
  ]);

  it('should produce one marker per country in group order', () => {
    const markers = buildLayerMarkers(groups, 'payment_type');

    expect(markers.map((m) => m.country)).toEqual(['Kenya', 'India']);
    expect(markers.map((m) => m.systemCount)).toEqual([2, 1]);
  });

  it('should color from the representative record', () => {
    const [kenya] = buildLayerMarkers(groups, 'operator');

    expect(kenya.value).toBe('Bank association');
    expect(kenya.color).toBe('#00897B');
  });

  it('should keep the raw operator value while coloring the trimmed one', () => {
    const india = buildLayerMarkers(groups, 'operator')[1];

    expect(india.value).toBe(' Central bank ');
    expect(india.color).toBe('#1565C0');
  });

  it('should truncate settlement values to their first component', () => {
    const [kenya, india] = buildLayerMarkers(groups, 'settlement_type');

    expect(kenya).toMatchObject({ value: 'RTGS', color: '#1565C0' });
    expect(india).toMatchObject({ value: 'NA', color: '#9E9E9E' });
  });

  it('should use yes/no colors for the QR code layer', () => {
    const [kenya, india] = buildLayerMarkers(groups, 'qr_code');

    expect(kenya).toMatchObject({ value: 'Yes', color: '#2E7D32' });
    expect(india).toMatchObject({ value: 'NA', color: '#9E9E9E' });
  });

  it('should fall back to a neutral Unknown marker for unknown layers', () => {
    const markers = buildLayerMarkers(groups, 'interchange_fee');

    expect(markers).toHaveLength(2);
    for (const marker of markers) {
      expect(marker.color).toBe('#757575');
      expect(marker.value).toBe('Unknown');
    }
  });

  it('should embed the full popup for every country', () => {
    const [kenya] = buildLayerMarkers(groups, 'status');

    expect(kenya.popup).toBe(buildPopupHtml('Kenya', groups.get('Kenya') ?? []));
  });

  it('should skip countries without records', () => {
    const withEmpty: CountryGroup = new Map([['Chad', []]]);

    expect(buildLayerMarkers(withEmpty, 'status')).toEqual([]);
  });
});

describe('buildAllLayerMarkers()', () => {
  const groups: CountryGroup = new Map([
    [
      'Ghana',
      [
        record({ name: 'Old', status: 'Planned/Piloted', bankParticipation: 'No' }),
        record({ name: 'GhIPSS', status: 'Implemented', bankParticipation: 'Yes', active: 'Yes' }),
      ],
    ],
    ['Peru', [record({ name: 'CCE', nationalRegional: 'Regional' })]],
  ]);

  it('should build every layer with one marker per country', () => {
    const layers = buildAllLayerMarkers(groups);

    expect(Object.keys(layers)).toEqual([...LAYER_TYPES]);
    for (const layerType of LAYER_TYPES) {
      expect(layers[layerType]).toHaveLength(2);
    }
  });

  it('should use the same representative for every layer', () => {
    const layers = buildAllLayerMarkers(groups);

    expect(layers.status[0].value).toBe('Implemented');
    expect(layers.bank_participation[0].value).toBe('Yes');
    expect(layers.national_regional[1]).toMatchObject({ value: 'Regional', color: '#388E3C' });
  });

  it('should match single-layer output', () => {
    const layers = buildAllLayerMarkers(groups);

    for (const layerType of LAYER_TYPES) {
      expect(layers[layerType]).toEqual(buildLayerMarkers(groups, layerType));
    }
  });
});
