import path from 'path';
import { loadConfig } from '../src/lib/config';

describe('loadConfig', () => {
    it('prefers feeds given on the command line', () => {
        const config = loadConfig(['feeds/a', 'feeds/b.zip'], { GTFS_FEEDS: 'feeds/c' });

        expect(config.feedPaths).toEqual(['feeds/a', 'feeds/b.zip']);
    });

    it('falls back to GTFS_FEEDS', () => {
        const config = loadConfig([], { GTFS_FEEDS: ' feeds/c , ,feeds/d' });

        expect(config.feedPaths).toEqual(['feeds/c', 'feeds/d']);
    });

    it('uses the bundled default feed list last', () => {
        const config = loadConfig([], {});

        expect(config.feedPaths).toEqual(['feeds/samtrans', 'feeds/muni', 'feeds/actransit', 'feeds/vta']);
    });

    it('writes to the working directory unless MAP_OUTPUT_DIR is set', () => {
        expect(loadConfig([], {}).outputDir).toBe(process.cwd());
        expect(loadConfig([], { MAP_OUTPUT_DIR: 'out/maps' }).outputDir).toBe(path.resolve('out/maps'));
    });

    it('reads MAP_ZOOM and warns on nonsense', () => {
        expect(loadConfig([], { MAP_ZOOM: '14' }).zoom).toBe(14);

        const bad = loadConfig([], { MAP_ZOOM: 'close' });
        expect(bad.zoom).toBe(12);
        expect(bad.warnings).toEqual(['Ignoring invalid MAP_ZOOM "close", using 12']);
    });
});
