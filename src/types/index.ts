export type TableName = 'trips' | 'stop_times' | 'routes' | 'stops';

export interface Table<T> {
    columns: string[]; // Header as read (trimmed)
    rows: T[];
}

export interface StopRow {
    stop_id: string;
    stop_lat: number | null;
    stop_lon: number | null;
}

export interface TripRow {
    trip_id: string;
    route_id: string | null;
}

export interface StopTimeRow {
    trip_id: string;
    stop_id: string;
    stop_sequence: number;
}

export interface RouteRow {
    route_id: string;
}

export interface TableRows {
    trips: TripRow;
    stop_times: StopTimeRow;
    routes: RouteRow;
    stops: StopRow;
}

export type GtfsTables = { [K in TableName]?: Table<TableRows[K]> };

export interface LoadedFeed {
    source: string; // Path as configured
    name: string; // Basename, used for output naming
    tables: GtfsTables;
    missing: TableName[];
    complete: boolean;
}

export interface TripStopRow {
    trip_id: string;
    stop_sequence: number;
    stop_id: string;
    route_id: string | null; // null when the trip is not in trips.txt
    stop_lat: number | null;
    stop_lon: number | null;
}

export interface TripGroup {
    trip_id: string;
    rows: TripStopRow[]; // Ascending stop_sequence
}

export type LatLon = [number, number];

export interface PolylineStyle {
    color: string;
    weight: number;
    opacity: number;
}

// Drawing surface the renderer targets; implementations decide the output format
export interface MapCanvas {
    setCenter(lat: number, lon: number, zoom: number): void;
    addPolyline(points: LatLon[], style?: PolylineStyle): void;
    save(filePath: string): void;
}
