import { describe, it, expect, vi } from 'vitest';
import { createLogger, parseLogLevel } from '../../lib/logger';

function entries(write: ReturnType<typeof vi.fn>): Array<Record<string, unknown>> {
    return write.mock.calls.map(([line]) => JSON.parse(String(line)) as Record<string, unknown>);
}

describe('logger', () => {
    describe('createLogger', () => {
        it('should write one JSON line per entry', () => {
            const write = vi.fn();
            createLogger('station', { write }).info('Polling started', { pollIntervalMs: 100 });

            expect(write).toHaveBeenCalledTimes(1);
            const [entry] = entries(write);
            expect(entry).toMatchObject({
                level: 'INFO',
                scope: 'station',
                message: 'Polling started',
                pollIntervalMs: 100
            });
            expect(typeof entry.timestamp).toBe('string');
        });

        it('should drop entries below the minimum level', () => {
            const write = vi.fn();
            const log = createLogger('station', { minLevel: 'WARN', write });
            log.debug('a');
            log.info('b');
            log.warn('c');
            log.error('d');

            expect(entries(write).map((entry) => entry.level)).toEqual(['WARN', 'ERROR']);
        });

        it('should default to INFO', () => {
            const write = vi.fn();
            const log = createLogger('station', { write });
            log.debug('hidden');
            log.info('shown');
            expect(entries(write).map((entry) => entry.message)).toEqual(['shown']);
        });

        it('should extend the scope for children and share the writer', () => {
            const write = vi.fn();
            const log = createLogger('station', { minLevel: 'ERROR', write });
            const child = log.child('rain');
            child.warn('filtered');
            child.error('Tick failed');

            expect(entries(write)).toEqual([
                expect.objectContaining({ scope: 'station:rain', message: 'Tick failed' })
            ]);
        });
    });

    describe('parseLogLevel', () => {
        it('should accept any case and the WARNING alias', () => {
            expect(parseLogLevel('debug', 'INFO')).toBe('DEBUG');
            expect(parseLogLevel(' Warning ', 'INFO')).toBe('WARN');
            expect(parseLogLevel('ERROR', 'INFO')).toBe('ERROR');
        });

        it('should fall back on unknown values', () => {
            expect(parseLogLevel(undefined, 'WARN')).toBe('WARN');
            expect(parseLogLevel('verbose', 'INFO')).toBe('INFO');
        });
    });
});
