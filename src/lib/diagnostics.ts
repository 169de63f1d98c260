import { errorMessage, GtfsError } from './errors';

export type DiagnosticLevel = 'info' | 'warn' | 'error';

export interface Diagnostic {
    level: DiagnosticLevel;
    code: string; // GtfsErrorCode, or a progress code such as 'feed_start'
    scope: string; // e.g. 'GTFS-LOADER'
    message: string;
    feed?: string;
}

export interface DiagnosticsOptions {
    silent?: boolean; // Record only, no console output (tests)
}

// Collects stage events and echoes them to the console as `[SCOPE] message`.
export class Diagnostics {
    readonly entries: Diagnostic[] = [];
    private feed: string | undefined;

    constructor(private options: DiagnosticsOptions = {}) { }

    forFeed(feed: string | undefined) {
        this.feed = feed;
    }

    report(level: DiagnosticLevel, scope: string, code: string, message: string) {
        const entry: Diagnostic = { level, code, scope, message };
        if (this.feed !== undefined) entry.feed = this.feed;
        this.entries.push(entry);

        if (this.options.silent) return;
        const line = `[${scope}] ${message}`;
        if (level === 'error') console.error(line);
        else if (level === 'warn') console.warn(line);
        else console.log(line);
    }

    info(scope: string, code: string, message: string) {
        this.report('info', scope, code, message);
    }

    warn(scope: string, code: string, message: string) {
        this.report('warn', scope, code, message);
    }

    error(scope: string, code: string, message: string) {
        this.report('error', scope, code, message);
    }

    fromError(level: DiagnosticLevel, scope: string, err: unknown) {
        if (err instanceof GtfsError) {
            this.report(level, scope, err.code, err.message);
        } else {
            this.report(level, scope, 'unexpected', errorMessage(err));
        }
    }

    withCode(code: string): Diagnostic[] {
        return this.entries.filter(d => d.code === code);
    }
}
