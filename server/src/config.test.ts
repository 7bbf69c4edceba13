import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig, parseBbox } from './config';
import { ValidationError } from './errors';

describe('loadConfig', () => {
    it('fills defaults from an empty environment', () => {
        const config = loadConfig({});

        assert.equal(config.port, 3001);
        assert.equal(config.scheduler.enabled, true);
        assert.equal(config.scheduler.intervalHours, 6);
        assert.equal(config.scheduler.maxRunMs, 30 * 60_000);
        assert.equal(config.scheduler.historicalBackfill, false);
        assert.equal(config.pipeline.maxCloudCoverage, 30);
        assert.deepEqual(config.pipeline.indexTypes, ['vegetation', 'water', 'built_up', 'moisture']);
        assert.equal(config.provider.maxAttempts, 5);
        assert.equal(config.pipeline.aoi.type, 'Polygon');
        assert.deepEqual(config.pipeline.aoi.coordinates[0][0], [17.4, 48.25]);
    });

    it('reads overrides', () => {
        const config = loadConfig({
            SCHEDULER_ENABLED: 'false',
            SCHEDULER_INTERVAL_HOURS: '12',
            PROCESS_HISTORICAL_DATA: 'yes',
            MAX_CLOUD_COVERAGE: '45.5',
            INDEX_TYPES: 'NDVI, water,ndvi',
            PROVIDER_BASE_URL: 'https://catalog.test/stac/'
        });

        assert.equal(config.scheduler.enabled, false);
        assert.equal(config.scheduler.intervalHours, 12);
        assert.equal(config.scheduler.historicalBackfill, true);
        assert.equal(config.pipeline.maxCloudCoverage, 45.5);
        assert.deepEqual(config.pipeline.indexTypes, ['vegetation', 'water']);
        assert.equal(config.provider.baseUrl, 'https://catalog.test/stac');
    });

    it('rejects an interval outside 1..24 hours', () => {
        assert.throws(() => loadConfig({ SCHEDULER_INTERVAL_HOURS: '36' }), ValidationError);
        assert.throws(() => loadConfig({ SCHEDULER_INTERVAL_HOURS: '1.5' }), /SCHEDULER_INTERVAL_HOURS/);
    });

    it('rejects an unknown index type', () => {
        assert.throws(() => loadConfig({ INDEX_TYPES: 'ndvi,evi' }), /Unsupported index type: evi/);
        assert.throws(() => loadConfig({ INDEX_TYPES: 'constructor' }), /Unsupported index type: constructor/);
        assert.throws(() => loadConfig({ INDEX_TYPES: 'ndvi,__proto__' }), /Unsupported index type: __proto__/);
    });
});

describe('parseBbox', () => {
    it('parses four comma separated numbers', () => {
        assert.deepEqual(parseBbox('17.5, 48.3,17.6,48.4'), [17.5, 48.3, 17.6, 48.4]);
    });

    it('rejects inverted or malformed boxes', () => {
        assert.throws(() => parseBbox('17.6,48.3,17.5,48.4'), /max must be greater than min/);
        assert.throws(() => parseBbox('17.6,48.3,17.5'), ValidationError);
        assert.throws(() => parseBbox('17.6,95,17.7,96'), /outside WGS84/);
    });
});
