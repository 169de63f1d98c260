import { LatLon, PolylineStyle } from '../types';

const FALLBACK_CENTER: LatLon = [0, 0];

export const MAP_CONFIG = {
    LEAFLET_CSS_URL: 'https://unpkg.com/leaflet@1.9.4/dist/leaflet.css',
    LEAFLET_JS_URL: 'https://unpkg.com/leaflet@1.9.4/dist/leaflet.js',
    TILE_LAYER_URL: 'https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png',
    ATTRIBUTION: '&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors',
    DEFAULT_ZOOM: 12,
    // Used when no stop is located, so the feed still gets an (empty) map
    FALLBACK_CENTER,
    FALLBACK_ZOOM: 2,
};

export const DEFAULT_POLYLINE_STYLE: PolylineStyle = {
    color: 'blue',
    weight: 2.5,
    opacity: 0.8,
};
