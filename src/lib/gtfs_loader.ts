import fs from 'fs';
import path from 'path';
import AdmZip from 'adm-zip';
import { CsvError, Options } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import { GtfsTables, LoadedFeed, RouteRow, StopRow, StopTimeRow, Table, TableName, TripRow } from '../types';
import { Diagnostics } from './diagnostics';
import { errorMessage, MissingColumnError, MissingFileError, RowParseError } from './errors';

const SCOPE = 'GTFS-LOADER';

export const REQUIRED_TABLES: readonly TableName[] = ['trips', 'stop_times', 'routes', 'stops'];

export const REQUIRED_COLUMNS: Record<TableName, string[]> = {
    trips: ['trip_id', 'route_id'],
    stop_times: ['trip_id', 'stop_id', 'stop_sequence'],
    routes: ['route_id'],
    // stop_lat / stop_lon are only needed for plotting and are checked there
    stops: ['stop_id'],
};

// Returns file contents, or null when the file is not part of the feed
type FeedReader = (fileName: string) => string | null;

class FieldError extends Error { }

// on_skip is honoured by the parser but missing from its published Options type
type SkippingOptions = Options & {
    on_skip?: (err: CsvError | undefined) => undefined;
};

export interface ParsedRecord {
    fields: string[];
    line: number; // 1-based line in the source file
}

const INTEGER = /^-?\d+$/;

function directoryReader(dir: string): FeedReader {
    return (fileName) => {
        const filePath = path.join(dir, fileName);
        if (!fs.existsSync(filePath)) return null;
        return fs.readFileSync(filePath, 'utf8');
    };
}

function zipReader(zipPath: string): FeedReader {
    const entries = new AdmZip(zipPath).getEntries().filter(e => !e.isDirectory);
    return (fileName) => {
        // Prefer a root-level entry, fall back to one nested in a single folder
        const entry = entries.find(e => e.entryName === fileName)
            || entries.find(e => path.posix.basename(e.entryName) === fileName);
        if (!entry) return null;
        return entry.getData().toString('utf8');
    };
}

export function isZipSource(source: string): boolean {
    return source.toLowerCase().endsWith('.zip');
}

export function feedName(source: string): string {
    const base = path.basename(source);
    return isZipSource(base) ? base.slice(0, -'.zip'.length) : base;
}

function requireField(record: Record<string, string>, column: string): string {
    const value = record[column];
    if (!value) throw new FieldError(`empty ${column}`);
    return value;
}

function optionalField(record: Record<string, string>, column: string): string | null {
    return record[column] || null;
}

function parseCoordinate(value: string | undefined, limit: number): number | null {
    if (!value) return null;
    const n = Number(value);
    if (!Number.isFinite(n) || Math.abs(n) > limit) return null;
    return n;
}

function toTripRow(record: Record<string, string>): TripRow {
    return {
        trip_id: requireField(record, 'trip_id'),
        route_id: optionalField(record, 'route_id'),
    };
}

function toStopTimeRow(record: Record<string, string>): StopTimeRow {
    const raw = requireField(record, 'stop_sequence');
    if (!INTEGER.test(raw)) throw new FieldError(`invalid stop_sequence "${raw}"`);
    return {
        trip_id: requireField(record, 'trip_id'),
        stop_id: requireField(record, 'stop_id'),
        stop_sequence: Number(raw),
    };
}

function toRouteRow(record: Record<string, string>): RouteRow {
    return { route_id: requireField(record, 'route_id') };
}

function toStopRow(record: Record<string, string>): StopRow {
    return {
        stop_id: requireField(record, 'stop_id'),
        stop_lat: parseCoordinate(record.stop_lat, 90),
        stop_lon: parseCoordinate(record.stop_lon, 180),
    };
}

function toParsedRecord(value: unknown): ParsedRecord | null {
    if (typeof value !== 'object' || value === null) return null;
    if (!('record' in value) || !('info' in value)) return null;
    const { record, info } = value;
    if (!Array.isArray(record) || !record.every((f): f is string => typeof f === 'string')) return null;
    if (typeof info !== 'object' || info === null || !('lines' in info)) return null;
    if (typeof info.lines !== 'number') return null;
    return { fields: record, line: info.lines };
}

// Tokenises a GTFS text file. Records with broken quoting are skipped by the
// parser itself; field-count checks happen in readTable.
export function parseRecords(text: string, fileName: string, diagnostics: Diagnostics): ParsedRecord[] {
    const options: SkippingOptions = {
        bom: true,
        trim: true,
        info: true,
        skip_empty_lines: true,
        relax_column_count: true,
        skip_records_with_error: true,
        on_skip: (err) => {
            diagnostics.warn(SCOPE, 'row_parse', `${fileName}: skipped malformed row (${err?.message ?? 'unknown error'})`);
            return undefined;
        },
    };
    const output: unknown = parse(text, options);
    if (!Array.isArray(output)) {
        throw new Error(`Unexpected parser output for ${fileName}`);
    }
    return output.map(item => {
        const parsed = toParsedRecord(item);
        if (!parsed) throw new Error(`Unexpected parser output for ${fileName}`);
        return parsed;
    });
}

function readTable<T>(
    reader: FeedReader,
    table: TableName,
    toRow: (record: Record<string, string>) => T,
    source: string,
    diagnostics: Diagnostics
): Table<T> | null {
    const fileName = `${table}.txt`;

    let records: ParsedRecord[];
    try {
        const text = reader(fileName);
        if (text === null) {
            diagnostics.fromError('warn', SCOPE, new MissingFileError(fileName, source));
            return null;
        }
        records = parseRecords(text, fileName, diagnostics);
    } catch (e) {
        diagnostics.error(SCOPE, 'load_failed', `Error loading ${fileName} in ${source}: ${errorMessage(e)}`);
        return null;
    }

    const [first, ...body] = records;
    const header = first?.fields ?? [];
    const missingColumns = REQUIRED_COLUMNS[table].filter(c => !header.includes(c));
    if (missingColumns.length > 0) {
        diagnostics.fromError('error', SCOPE, new MissingColumnError(table, missingColumns));
        return null;
    }

    const rows: T[] = [];
    body.forEach(({ fields, line }) => {
        if (fields.length !== header.length) {
            diagnostics.fromError('warn', SCOPE, new RowParseError(fileName, line,
                `expected ${header.length} fields, found ${fields.length}`));
            return;
        }
        const record: Record<string, string> = {};
        header.forEach((column, i) => {
            record[column] = fields[i];
        });
        try {
            rows.push(toRow(record));
        } catch (e) {
            if (!(e instanceof FieldError)) throw e;
            diagnostics.fromError('warn', SCOPE, new RowParseError(fileName, line, e.message));
        }
    });

    diagnostics.info(SCOPE, 'table_loaded', `Loaded ${rows.length} rows from ${fileName}`);
    return { columns: header, rows };
}

function openFeed(source: string, diagnostics: Diagnostics): FeedReader {
    if (isZipSource(source)) {
        try {
            return zipReader(source);
        } catch (e) {
            diagnostics.error(SCOPE, 'load_failed', `Could not open archive ${source}: ${errorMessage(e)}`);
            return () => null;
        }
    }
    if (!fs.existsSync(source)) {
        diagnostics.warn(SCOPE, 'missing_source', `Feed directory not found: ${source}`);
    }
    return directoryReader(source);
}

export function loadFeed(source: string, diagnostics: Diagnostics): LoadedFeed {
    const reader = openFeed(source, diagnostics);
    const tables: GtfsTables = {};

    const trips = readTable(reader, 'trips', toTripRow, source, diagnostics);
    if (trips) tables.trips = trips;
    const stopTimes = readTable(reader, 'stop_times', toStopTimeRow, source, diagnostics);
    if (stopTimes) tables.stop_times = stopTimes;
    const routes = readTable(reader, 'routes', toRouteRow, source, diagnostics);
    if (routes) tables.routes = routes;
    const stops = readTable(reader, 'stops', toStopRow, source, diagnostics);
    if (stops) tables.stops = stops;

    const missing = REQUIRED_TABLES.filter(t => tables[t] === undefined);
    if (missing.length > 0) {
        diagnostics.warn(SCOPE, 'incomplete_feed', `Missing some GTFS files in ${source}`);
    }

    return {
        source,
        name: feedName(source),
        tables,
        missing,
        complete: missing.length === 0,
    };
}
