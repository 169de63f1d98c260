import fs from 'fs';
import { LatLon, MapCanvas, PolylineStyle } from '../types';
import { DEFAULT_POLYLINE_STYLE, MAP_CONFIG } from './map_config';

interface View {
    lat: number;
    lon: number;
    zoom: number;
}

interface Polyline {
    points: LatLon[];
    style: PolylineStyle;
}

function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

// JSON embedded in a <script> block must not be able to close the tag
function scriptJson(value: unknown): string {
    return JSON.stringify(value).replace(/</g, '\\u003c');
}

/**
 * Map canvas that writes a standalone HTML page. Leaflet and the OSM tiles are
 * pulled from public CDNs when the page is opened, nothing is bundled.
 */
export class LeafletHtmlCanvas implements MapCanvas {
    private view: View | null = null;
    private polylines: Polyline[] = [];

    constructor(private title = 'Routes map') { }

    setCenter(lat: number, lon: number, zoom: number) {
        this.view = { lat, lon, zoom };
    }

    addPolyline(points: LatLon[], style: PolylineStyle = DEFAULT_POLYLINE_STYLE) {
        this.polylines.push({ points: points.map(([lat, lon]): LatLon => [lat, lon]), style: { ...style } });
    }

    get polylineCount(): number {
        return this.polylines.length;
    }

    toHtml(): string {
        if (!this.view) throw new Error('Map center not set');
        const { lat, lon, zoom } = this.view;
        return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8" />
<title>${escapeHtml(this.title)}</title>
<meta name="viewport" content="width=device-width, initial-scale=1.0" />
<link rel="stylesheet" href="${MAP_CONFIG.LEAFLET_CSS_URL}" />
<script src="${MAP_CONFIG.LEAFLET_JS_URL}"></script>
<style>html, body, #map { height: 100%; margin: 0; }</style>
</head>
<body>
<div id="map"></div>
<script>
var map = L.map('map').setView(${scriptJson([lat, lon])}, ${scriptJson(zoom)});
L.tileLayer(${scriptJson(MAP_CONFIG.TILE_LAYER_URL)}, { attribution: ${scriptJson(MAP_CONFIG.ATTRIBUTION)} }).addTo(map);
var lines = ${scriptJson(this.polylines)};
lines.forEach(function (line) { L.polyline(line.points, line.style).addTo(map); });
</script>
</body>
</html>
`;
    }

    save(filePath: string) {
        fs.writeFileSync(filePath, this.toHtml(), 'utf8');
    }
}
