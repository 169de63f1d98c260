import path from 'path';
import defaultFeeds from './default_feeds.json';
import { MAP_CONFIG } from './map_config';

export interface AnalyzerConfig {
    feedPaths: string[];
    outputDir: string;
    zoom: number;
    warnings: string[];
}

function splitList(value: string): string[] {
    return value.split(',').map(s => s.trim()).filter(Boolean);
}

/**
 * Feed list: CLI args, then GTFS_FEEDS (comma-separated), then default_feeds.json.
 * MAP_OUTPUT_DIR and MAP_ZOOM tune where and how maps are written.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): AnalyzerConfig {
    const warnings: string[] = [];

    let feedPaths = argv.filter(a => a.trim() !== '');
    if (feedPaths.length === 0 && env.GTFS_FEEDS) feedPaths = splitList(env.GTFS_FEEDS);
    if (feedPaths.length === 0) feedPaths = [...defaultFeeds];

    let zoom = MAP_CONFIG.DEFAULT_ZOOM;
    if (env.MAP_ZOOM) {
        const parsed = Number(env.MAP_ZOOM);
        if (Number.isInteger(parsed) && parsed >= 0 && parsed <= 22) {
            zoom = parsed;
        } else {
            warnings.push(`Ignoring invalid MAP_ZOOM "${env.MAP_ZOOM}", using ${zoom}`);
        }
    }

    return {
        feedPaths,
        outputDir: path.resolve(env.MAP_OUTPUT_DIR || process.cwd()),
        zoom,
        warnings,
    };
}
