import { GtfsTables, StopRow, TableName, TripGroup, TripStopRow } from '../types';
import { MissingTableError } from './errors';

// Segment extraction and map rendering each declare their own minimum table set
export const SEGMENT_TABLES: readonly TableName[] = ['trips', 'stop_times', 'routes'];
export const RENDER_TABLES: readonly TableName[] = ['trips', 'stop_times', 'stops'];

export function requireTables(tables: GtfsTables, required: readonly TableName[]) {
    const missing = required.filter(t => tables[t] === undefined);
    if (missing.length > 0) throw new MissingTableError(missing);
}

/**
 * Joins stop_times onto trips (and stops, when loaded) and returns one group per
 * trip_id, each sorted by stop_sequence. The sort is stable, so rows sharing a
 * stop_sequence keep their stop_times.txt order.
 *
 * Both joins are left joins: a stop_time whose trip is unknown keeps a null
 * route_id, one whose stop is unknown keeps null coordinates. Trips listed in
 * trips.txt without any stop_times come back as empty groups.
 *
 * @throws MissingTableError when any table in `required` was not loaded
 */
export function resolveTripStops(tables: GtfsTables, required: readonly TableName[]): TripGroup[] {
    requireTables(tables, required);

    const tripRoute = new Map<string, string | null>();
    for (const trip of tables.trips?.rows ?? []) {
        // First definition wins on duplicate trip_ids
        if (!tripRoute.has(trip.trip_id)) tripRoute.set(trip.trip_id, trip.route_id);
    }

    const stopsById = new Map<string, StopRow>();
    for (const stop of tables.stops?.rows ?? []) {
        if (!stopsById.has(stop.stop_id)) stopsById.set(stop.stop_id, stop);
    }

    const groups = new Map<string, TripStopRow[]>();
    for (const st of tables.stop_times?.rows ?? []) {
        const stop = stopsById.get(st.stop_id);
        const row: TripStopRow = {
            trip_id: st.trip_id,
            stop_sequence: st.stop_sequence,
            stop_id: st.stop_id,
            route_id: tripRoute.get(st.trip_id) ?? null,
            stop_lat: stop?.stop_lat ?? null,
            stop_lon: stop?.stop_lon ?? null,
        };
        const rows = groups.get(st.trip_id);
        if (rows) rows.push(row);
        else groups.set(st.trip_id, [row]);
    }

    for (const tripId of tripRoute.keys()) {
        if (!groups.has(tripId)) groups.set(tripId, []);
    }

    return Array.from(groups, ([trip_id, rows]) => ({
        trip_id,
        rows: rows.sort((a, b) => a.stop_sequence - b.stop_sequence),
    }));
}
