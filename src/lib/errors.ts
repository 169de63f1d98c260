import { TableName } from '../types';

export type GtfsErrorCode =
    | 'missing_file'
    | 'row_parse'
    | 'missing_table'
    | 'missing_column'
    | 'empty_coordinates'
    | 'map_save';

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export class GtfsError extends Error {
    constructor(public code: GtfsErrorCode, message: string) {
        super(message);
        this.name = 'GtfsError';
    }
}

export class MissingFileError extends GtfsError {
    constructor(public fileName: string, public source: string) {
        super('missing_file', `${fileName} not found in ${source}`);
        this.name = 'MissingFileError';
    }
}

export class RowParseError extends GtfsError {
    constructor(public fileName: string, public line: number, reason: string) {
        super('row_parse', `${fileName} line ${line}: ${reason}`);
        this.name = 'RowParseError';
    }
}

export class MissingTableError extends GtfsError {
    constructor(public tables: TableName[]) {
        super('missing_table', `Missing required table(s): ${tables.map(t => `${t}.txt`).join(', ')}`);
        this.name = 'MissingTableError';
    }
}

export class MissingColumnError extends GtfsError {
    constructor(public table: TableName, public columns: string[]) {
        super('missing_column', `${table}.txt is missing column(s): ${columns.join(', ')}`);
        this.name = 'MissingColumnError';
    }
}

export class EmptyCoordinateError extends GtfsError {
    constructor(public tripId: string) {
        super('empty_coordinates', `Skipping trip ${tripId}: No valid coordinates found.`);
        this.name = 'EmptyCoordinateError';
    }
}

export class MapSaveError extends GtfsError {
    constructor(public path: string, cause: unknown) {
        super('map_save', `Could not save map to ${path}: ${errorMessage(cause)}`);
        this.name = 'MapSaveError';
    }
}
