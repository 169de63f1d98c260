import { Diagnostics } from '../src/lib/diagnostics';
import { MissingFileError } from '../src/lib/errors';

describe('Diagnostics', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('echoes entries to the console by level with a scope tag', () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const diagnostics = new Diagnostics();

        diagnostics.info('FEEDS', 'feed_start', 'starting');
        diagnostics.warn('GTFS-LOADER', 'row_parse', 'bad row');
        diagnostics.error('ROUTE-MAP', 'missing_table', 'no stops');

        expect(log).toHaveBeenCalledWith('[FEEDS] starting');
        expect(warn).toHaveBeenCalledWith('[GTFS-LOADER] bad row');
        expect(error).toHaveBeenCalledWith('[ROUTE-MAP] no stops');
    });

    it('records without printing when silent', () => {
        const log = jest.spyOn(console, 'log');
        const diagnostics = new Diagnostics({ silent: true });

        diagnostics.info('FEEDS', 'feed_start', 'quiet');

        expect(log).not.toHaveBeenCalled();
        expect(diagnostics.entries).toEqual([{ level: 'info', code: 'feed_start', scope: 'FEEDS', message: 'quiet' }]);
    });

    it('takes the code and message from typed errors', () => {
        const diagnostics = new Diagnostics({ silent: true });
        diagnostics.forFeed('feeds/muni');

        diagnostics.fromError('warn', 'GTFS-LOADER', new MissingFileError('stops.txt', 'feeds/muni'));
        diagnostics.fromError('error', 'FEEDS', 'plain string');

        expect(diagnostics.entries).toEqual([
            { level: 'warn', code: 'missing_file', scope: 'GTFS-LOADER', message: 'stops.txt not found in feeds/muni', feed: 'feeds/muni' },
            { level: 'error', code: 'unexpected', scope: 'FEEDS', message: 'plain string', feed: 'feeds/muni' },
        ]);
    });
});
