#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig } from '../src/lib/config';
import { analyzeFeeds } from '../src/lib/feed_runner';

dotenv.config({ path: '.env.local' });

function main() {
    console.log('--- Analyzing GTFS feeds ---');
    const config = loadConfig(process.argv.slice(2));
    config.warnings.forEach(w => console.warn(w));

    const reports = analyzeFeeds(config.feedPaths, {
        outputDir: config.outputDir,
        zoom: config.zoom,
    });

    console.log('\n--- Summary ---');
    for (const r of reports) {
        const segments = r.segmentError ? 'segments n/a' : `${r.segments.size} segments`;
        const map = r.mapPath ? `✅ ${r.mapPath}` : `❌ ${r.status}`;
        console.log(`${r.name}: ${segments}, ${r.drawnTrips} trips drawn, ${map}`);
    }

    if (reports.length > 0 && reports.every(r => r.mapPath === null)) {
        process.exitCode = 1;
    }
}

main();
