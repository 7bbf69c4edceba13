import { afterEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createLogger, setLogSink, type LogLevel } from './log';

describe('createLogger', () => {
    afterEach(() => setLogSink(null));

    it('prefixes lines with the component tag', () => {
        const lines: [LogLevel, string][] = [];
        setLogSink((level, line) => lines.push([level, line]));

        const log = createLogger('CATALOG');
        log.info('Fetched 3 scenes');
        log.warn('Rate limited');
        log.error('Search failed', new Error('HTTP 503'));
        log.error('Plain failure');

        assert.deepEqual(lines, [
            ['info', '[CATALOG] Fetched 3 scenes'],
            ['warn', '[CATALOG] Rate limited'],
            ['error', '[CATALOG] Search failed: HTTP 503'],
            ['error', '[CATALOG] Plain failure']
        ]);
    });

    it('reports elapsed time through the same sink', () => {
        const lines: string[] = [];
        setLogSink((_level, line) => lines.push(line));

        const done = createLogger('AGG').time('Processing 2024-05-01');
        const elapsed = done();

        assert.equal(lines.length, 1);
        assert.equal(lines[0], `[AGG] Processing 2024-05-01: ${elapsed}ms`);
    });
});
