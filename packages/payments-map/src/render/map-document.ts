/**
 * Map Document Emitter
 *
 * Assembles the per-layer markers, legends and the country coordinate table
 * into a single self-contained Leaflet page. All data is embedded as JSON;
 * at view time the page only fetches Leaflet and map tiles from CDNs.
 *
 * @module render/map-document
 */

import { writeFileSync } from 'node:fs';
import { escapeHtml } from '../core/html.js';
import { DEFAULT_LAYER, LAYER_LABELS, LAYER_TYPES, type LayerType } from '../core/layers.js';
import { getAllLegends } from '../core/legends.js';
import { buildAllLayerMarkers } from '../core/markers.js';
import type { CountryCoordinates, CountryGroup, LayerLegend, LayerMarker } from '../core/types.js';
import { COUNTRY_COORDINATES } from '../data/loaders/country-coordinates-loader.js';
import { CLIENT_SCRIPT } from './client-script.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Everything the page embeds
 */
export interface MapModel {
  readonly coordinates: CountryCoordinates;
  readonly layers: Readonly<Record<LayerType, readonly LayerMarker[]>>;
  readonly legends: Readonly<Record<LayerType, LayerLegend>>;
}

export interface MapDocumentOptions {
  /** Document title and caption heading */
  readonly title: string;
  /** Caption body text */
  readonly caption: string;
}

export const LEAFLET_VERSION = '1.9.4';
export const LEAFLET_CSS_URL = `https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.css`;
export const LEAFLET_JS_URL = `https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.js`;

export const DEFAULT_DOCUMENT_OPTIONS: MapDocumentOptions = {
  title: 'Real-Time Payment Systems (Implemented)',
  caption: 'Click markers for details. Switch layers to explore different attributes.',
};

// ============================================================================
// Model
// ============================================================================

export function buildMapModel(
  groups: CountryGroup,
  coordinates: CountryCoordinates = COUNTRY_COORDINATES
): MapModel {
  return {
    coordinates,
    layers: buildAllLayerMarkers(groups),
    legends: getAllLegends(),
  };
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * JSON safe to place inside a <script> element
 */
export function toScriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

function renderLayerButtons(): string {
  return LAYER_TYPES.map((layerType) => {
    const active = layerType === DEFAULT_LAYER ? ' active' : '';
    return `      <button type="button" class="layer-toggle${active}" data-layer="${layerType}">${escapeHtml(LAYER_LABELS[layerType])}</button>`;
  }).join('\n');
}

const STYLES = `    body {
      margin: 0;
      padding: 0;
      font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif;
    }
    #map { width: 100%; height: 100vh; }
    .panel {
      background: rgba(255, 255, 255, 0.95);
      padding: 10px;
      border-radius: 5px;
      box-shadow: 0 1px 5px rgba(0, 0, 0, 0.4);
      max-height: 500px;
      overflow-y: auto;
    }
    .panel h4 { margin: 0 0 8px; font-size: 13px; font-weight: 600; }
    .info { max-width: 260px; font-size: 13px; color: #555; }
    .info p { margin: 0; }
    .legend { line-height: 20px; color: #555; }
    .legend-item { display: flex; align-items: center; margin-bottom: 4px; font-size: 12px; }
    .legend-color {
      width: 16px;
      height: 16px;
      border-radius: 50%;
      display: inline-block;
      margin-right: 6px;
      border: 1px solid #999;
      flex-shrink: 0;
    }
    .layer-toggle {
      display: block;
      width: 100%;
      margin: 4px 0;
      padding: 6px 8px;
      border: 1px solid #ccc;
      border-radius: 3px;
      background: #f8f9fa;
      font-size: 12px;
      text-align: left;
      cursor: pointer;
    }
    .layer-toggle:hover { background: #e9ecef; }
    .layer-toggle.active { background: #007bff; border-color: #007bff; color: #fff; font-weight: 500; }
    .layer-toggle.active:hover { background: #0056b3; }`;

/**
 * Render the complete HTML document. Output depends only on the model and
 * options, so identical input produces identical bytes.
 */
export function renderMapHtml(
  model: MapModel,
  options: MapDocumentOptions = DEFAULT_DOCUMENT_OPTIONS
): string {
  const title = escapeHtml(options.title);

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${title}</title>
  <link rel="stylesheet" href="${LEAFLET_CSS_URL}">
  <style>
${STYLES}
  </style>
</head>
<body>
  <div id="map"></div>

  <div id="map-info" class="panel info">
    <h4>${title}</h4>
    <p>${escapeHtml(options.caption)}</p>
  </div>

  <div id="layer-control" class="panel layer-control">
    <h4>Select Layer</h4>
${renderLayerButtons()}
  </div>

  <div id="map-legend" class="panel legend"></div>

  <script src="${LEAFLET_JS_URL}"></script>
  <script>
    var countryCoords = ${toScriptJson(model.coordinates)};
    var layersData = ${toScriptJson(model.layers)};
    var layerLegends = ${toScriptJson(model.legends)};
    var defaultLayer = ${toScriptJson(DEFAULT_LAYER)};
  </script>
  <script>
${CLIENT_SCRIPT}
  </script>
</body>
</html>
`;
}

/**
 * Write the document, replacing any existing file.
 *
 * @throws the fs error when the path is not writable
 */
export function writeMapHtml(outputFile: string, html: string): void {
  writeFileSync(outputFile, html, 'utf-8');
}
