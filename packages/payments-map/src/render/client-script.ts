/**
 * Browser-side map behavior embedded in the generated page.
 *
 * Expects the page to define `countryCoords`, `layersData`, `layerLegends`
 * and `defaultLayer` before this script runs, plus the #map, #map-info,
 * #layer-control and #map-legend elements. The only state is the selected
 * layer; render() redraws markers and legend from the embedded data.
 */

export const TILE_URL = 'https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png';

export const CLIENT_SCRIPT = `(function () {
  var map = L.map('map').setView([20, 0], 2);

  L.tileLayer('${TILE_URL}', {
    attribution: '&copy; OpenStreetMap contributors',
    maxZoom: 18
  }).addTo(map);

  var currentLayer = defaultLayer;
  var markerGroup = L.layerGroup().addTo(map);

  function mountPanel(id, position) {
    var element = document.getElementById(id);
    var control = L.control({ position: position });
    control.onAdd = function () {
      L.DomEvent.disableClickPropagation(element);
      L.DomEvent.disableScrollPropagation(element);
      return element;
    };
    control.addTo(map);
    return element;
  }

  mountPanel('map-info', 'topleft');
  var layerPanel = mountPanel('layer-control', 'topright');
  var legendPanel = mountPanel('map-legend', 'bottomright');

  function renderLegend() {
    var legend = layerLegends[currentLayer];
    var html = '<h4>' + legend[0] + '</h4>';
    legend[1].forEach(function (entry) {
      html += '<div class="legend-item">' +
        '<span class="legend-color" style="background:' + entry[0] + '"></span>' +
        '<span>' + entry[1] + '</span></div>';
    });
    legendPanel.innerHTML = html;
  }

  function render() {
    markerGroup.clearLayers();
    layersData[currentLayer].forEach(function (marker) {
      var coords = countryCoords[marker.country];
      if (!coords) return;
      L.circleMarker([coords[0], coords[1]], {
        radius: marker.systemCount > 1 ? 8 : 6,
        fillColor: marker.color,
        color: '#000',
        weight: 1,
        opacity: 1,
        fillOpacity: 0.8
      }).bindPopup(marker.popup).addTo(markerGroup);
    });
    renderLegend();
  }

  var buttons = layerPanel.querySelectorAll('button[data-layer]');
  Array.prototype.forEach.call(buttons, function (button) {
    button.addEventListener('click', function () {
      var layer = button.getAttribute('data-layer');
      if (layer === currentLayer) return;
      Array.prototype.forEach.call(buttons, function (other) {
        other.classList.toggle('active', other === button);
      });
      currentLayer = layer;
      render();
    });
  });

  render();
})();`;
