import path from 'path';
import { MapCanvas, TableName } from '../types';
import { Diagnostics } from './diagnostics';
import { MapSaveError, MissingTableError } from './errors';
import { feedName, loadFeed } from './gtfs_loader';
import { LeafletHtmlCanvas } from './leaflet_canvas';
import { MAP_CONFIG } from './map_config';
import { renderRouteMap } from './route_map';
import { extractSegments, SegmentCounts } from './segments';

const SCOPE = 'FEEDS';
const TOP_SEGMENTS = 3;

export type FeedStatus = 'saved' | 'no_map' | 'save_failed' | 'skipped' | 'failed';

export interface FeedReport {
    source: string;
    name: string;
    complete: boolean;
    missing: TableName[];
    segments: SegmentCounts;
    segmentError: MissingTableError | null;
    mapPath: string | null;
    drawnTrips: number;
    skippedTrips: number;
    status: FeedStatus;
}

export interface AnalyzeOptions {
    outputDir?: string;
    zoom?: number;
    diagnostics?: Diagnostics;
    createCanvas?: (name: string) => MapCanvas;
}

export function mapFileName(name: string): string {
    return `routes_map_${name}.html`;
}

function describeSegment(stops: readonly string[]): string {
    if (stops.length === 0) return '(no stops)';
    if (stops.length <= 4) return stops.join(' -> ');
    return `${stops[0]} -> ${stops[1]} -> ... -> ${stops[stops.length - 1]} (${stops.length} stops)`;
}

function logSegments(segments: SegmentCounts, diagnostics: Diagnostics) {
    diagnostics.info(SCOPE, 'segments', `${segments.total} trips collapse into ${segments.size} distinct segments`);
    for (const [stops, count] of segments.mostCommon(TOP_SEGMENTS)) {
        diagnostics.info(SCOPE, 'segments', `  ${count}x ${describeSegment(stops)}`);
    }
}

function processFeed(source: string, options: AnalyzeOptions, diagnostics: Diagnostics): FeedReport {
    const feed = loadFeed(source, diagnostics);
    const report: FeedReport = {
        source,
        name: feed.name,
        complete: feed.complete,
        missing: feed.missing,
        segments: new SegmentCounts(),
        segmentError: null,
        mapPath: null,
        drawnTrips: 0,
        skippedTrips: 0,
        status: 'no_map',
    };

    if (Object.keys(feed.tables).length === 0) {
        diagnostics.warn(SCOPE, 'feed_skipped', `Skipping ${source} due to missing files.`);
        report.status = 'skipped';
        return report;
    }

    const { segments, error } = extractSegments(feed.tables, diagnostics);
    report.segments = segments;
    report.segmentError = error;
    if (!error) logSegments(segments, diagnostics);

    const createCanvas = options.createCanvas ?? ((name: string) => new LeafletHtmlCanvas(`Routes: ${name}`));
    const rendered = renderRouteMap(feed.tables, () => createCanvas(feed.name), diagnostics, {
        zoom: options.zoom ?? MAP_CONFIG.DEFAULT_ZOOM,
    });
    if (!rendered) {
        diagnostics.error(SCOPE, 'no_map', `Failed to generate map for ${source}.`);
        return report;
    }
    report.drawnTrips = rendered.drawnTrips;
    report.skippedTrips = rendered.skippedTrips;

    const mapPath = path.join(options.outputDir ?? process.cwd(), mapFileName(feed.name));
    try {
        rendered.canvas.save(mapPath);
    } catch (e) {
        diagnostics.fromError('error', SCOPE, new MapSaveError(mapPath, e));
        report.status = 'save_failed';
        return report;
    }

    report.mapPath = mapPath;
    report.status = 'saved';
    diagnostics.info(SCOPE, 'map_saved', `Map saved as '${mapPath}'.`);
    return report;
}

/**
 * Runs load -> segments -> map for each feed in order. Feeds are independent:
 * whatever goes wrong in one is reported and the next one still runs.
 */
export function analyzeFeeds(feedPaths: string[], options: AnalyzeOptions = {}): FeedReport[] {
    const diagnostics = options.diagnostics ?? new Diagnostics();
    const reports: FeedReport[] = [];

    for (const source of feedPaths) {
        diagnostics.forFeed(source);
        diagnostics.info(SCOPE, 'feed_start', `Processing GTFS feed in directory ${source}...`);
        try {
            reports.push(processFeed(source, options, diagnostics));
        } catch (e) {
            diagnostics.fromError('error', SCOPE, e);
            reports.push({
                source,
                name: feedName(source),
                complete: false,
                missing: [],
                segments: new SegmentCounts(),
                segmentError: null,
                mapPath: null,
                drawnTrips: 0,
                skippedTrips: 0,
                status: 'failed',
            });
        }
    }
    diagnostics.forFeed(undefined);

    return reports;
}
