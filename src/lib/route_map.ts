import { GtfsTables, LatLon, MapCanvas, PolylineStyle, StopRow, TripGroup } from '../types';
import { Diagnostics } from './diagnostics';
import { EmptyCoordinateError, MissingColumnError, MissingTableError } from './errors';
import { DEFAULT_POLYLINE_STYLE, MAP_CONFIG } from './map_config';
import { RENDER_TABLES, resolveTripStops } from './trip_stops';

const SCOPE = 'ROUTE-MAP';

export interface RenderOptions {
    zoom?: number;
    style?: PolylineStyle;
}

export interface RenderResult {
    canvas: MapCanvas;
    center: LatLon;
    drawnTrips: number;
    skippedTrips: number;
}

/** Unweighted mean of every stop that has both coordinates. */
export function mapCenter(stops: StopRow[]): LatLon | null {
    let lat = 0;
    let lon = 0;
    let n = 0;
    for (const stop of stops) {
        if (stop.stop_lat === null || stop.stop_lon === null) continue;
        lat += stop.stop_lat;
        lon += stop.stop_lon;
        n++;
    }
    return n === 0 ? null : [lat / n, lon / n];
}

export function tripCoordinates(group: TripGroup): LatLon[] {
    const points: LatLon[] = [];
    for (const row of group.rows) {
        if (row.stop_lat !== null && row.stop_lon !== null) points.push([row.stop_lat, row.stop_lon]);
    }
    return points;
}

/**
 * Draws one polyline per trip onto a fresh canvas. Returns null, after
 * reporting why, when a required table or coordinate column is missing; trips
 * without any located stop are skipped individually. A feed with no located
 * stop at all still gets a map, centered on a world view and with no lines.
 */
export function renderRouteMap(
    tables: GtfsTables,
    createCanvas: () => MapCanvas,
    diagnostics: Diagnostics,
    options: RenderOptions = {}
): RenderResult | null {
    const stops = tables.stops;
    if (!stops) {
        diagnostics.fromError('error', SCOPE, new MissingTableError(['stops']));
        return null;
    }

    const missingColumns = ['stop_lat', 'stop_lon'].filter(c => !stops.columns.includes(c));
    if (missingColumns.length > 0) {
        diagnostics.fromError('error', SCOPE, new MissingColumnError('stops', missingColumns));
        return null;
    }

    let groups: TripGroup[];
    try {
        groups = resolveTripStops(tables, RENDER_TABLES);
    } catch (e) {
        if (!(e instanceof MissingTableError)) throw e;
        diagnostics.error(SCOPE, e.code, `${e.message}. Cannot plot routes.`);
        return null;
    }

    let center = mapCenter(stops.rows);
    let zoom = options.zoom ?? MAP_CONFIG.DEFAULT_ZOOM;
    if (!center) {
        diagnostics.warn(SCOPE, 'no_coordinates', 'No stop in stops.txt has valid coordinates; using a world view.');
        center = MAP_CONFIG.FALLBACK_CENTER;
        zoom = MAP_CONFIG.FALLBACK_ZOOM;
    }

    const canvas = createCanvas();
    canvas.setCenter(center[0], center[1], zoom);

    let drawnTrips = 0;
    let skippedTrips = 0;
    for (const group of groups) {
        const points = tripCoordinates(group);
        if (points.length === 0) {
            diagnostics.fromError('warn', SCOPE, new EmptyCoordinateError(group.trip_id));
            skippedTrips++;
            continue;
        }
        canvas.addPolyline(points, options.style ?? DEFAULT_POLYLINE_STYLE);
        drawnTrips++;
    }

    diagnostics.info(SCOPE, 'map_rendered', `Drew ${drawnTrips} trip(s), skipped ${skippedTrips}`);
    return { canvas, center, drawnTrips, skippedTrips };
}
