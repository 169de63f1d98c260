import { GtfsTables, TripGroup } from '../types';
import { Diagnostics } from './diagnostics';
import { MissingTableError } from './errors';
import { resolveTripStops, SEGMENT_TABLES } from './trip_stops';

const SCOPE = 'SEGMENTS';

/** Ordered stop_ids visited by one trip. */
export type Segment = readonly string[];

interface SegmentEntry {
    stops: Segment;
    count: number;
}

// JSON encoding keeps ids containing separators from colliding
function segmentKey(stops: Segment): string {
    return JSON.stringify(stops);
}

/**
 * Occurrence count per segment. Keys compare elementwise, so two trips share an
 * entry exactly when they visit the same stop_ids in the same order.
 */
export class SegmentCounts {
    private entriesByKey = new Map<string, SegmentEntry>();

    add(stops: Segment, count = 1) {
        const key = segmentKey(stops);
        const entry = this.entriesByKey.get(key);
        if (entry) entry.count += count;
        else this.entriesByKey.set(key, { stops: [...stops], count });
    }

    get(stops: Segment): number {
        return this.entriesByKey.get(segmentKey(stops))?.count ?? 0;
    }

    has(stops: Segment): boolean {
        return this.entriesByKey.has(segmentKey(stops));
    }

    /** Number of distinct segments. */
    get size(): number {
        return this.entriesByKey.size;
    }

    /** Number of trips counted. */
    get total(): number {
        let sum = 0;
        for (const entry of this.entriesByKey.values()) sum += entry.count;
        return sum;
    }

    entries(): Array<[Segment, number]> {
        return Array.from<SegmentEntry, [Segment, number]>(this.entriesByKey.values(), e => [e.stops, e.count]);
    }

    /** Highest counts first; ties keep first-seen order. */
    mostCommon(n?: number): Array<[Segment, number]> {
        const sorted = this.entries().sort((a, b) => b[1] - a[1]);
        return n === undefined ? sorted : sorted.slice(0, n);
    }

    equals(other: SegmentCounts): boolean {
        if (other.size !== this.size) return false;
        for (const [key, entry] of this.entriesByKey) {
            if (other.entriesByKey.get(key)?.count !== entry.count) return false;
        }
        return true;
    }
}

export function countSegments(groups: TripGroup[]): SegmentCounts {
    const counts = new SegmentCounts();
    for (const group of groups) {
        counts.add(group.rows.map(r => r.stop_id));
    }
    return counts;
}

export interface SegmentResult {
    segments: SegmentCounts;
    error: MissingTableError | null;
}

export function extractSegments(tables: GtfsTables, diagnostics: Diagnostics): SegmentResult {
    try {
        const groups = resolveTripStops(tables, SEGMENT_TABLES);
        return { segments: countSegments(groups), error: null };
    } catch (e) {
        if (!(e instanceof MissingTableError)) throw e;
        diagnostics.fromError('error', SCOPE, e);
        return { segments: new SegmentCounts(), error: e };
    }
}
