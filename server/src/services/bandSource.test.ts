import { before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { makeScene, silenceLogs } from '../testUtils';
import { GeoTiffBandSource, targetSize } from './bandSource';

before(silenceLogs);

describe('targetSize', () => {
    it('shrinks the longer side to the limit', () => {
        assert.deepEqual(targetSize(10980, 5490, 1024), { width: 1024, height: 512 });
    });

    it('never upsamples', () => {
        assert.deepEqual(targetSize(300, 200, 1024), { width: 300, height: 200 });
    });
});

describe('GeoTiffBandSource', () => {
    it('returns null without downloading when a band asset is missing', async () => {
        const requested: string[] = [];
        const source = new GeoTiffBandSource(async href => {
            requested.push(href);
            return new ArrayBuffer(0);
        });

        const scene = makeScene({ assets: { B04: 'https://data.test/B04.tif' } });

        assert.equal(await source.fetchBands(scene, 'vegetation'), null);
        assert.deepEqual(requested, []);
    });

    it('downloads the two bands the index needs', async () => {
        const requested: string[] = [];
        const source = new GeoTiffBandSource(async href => {
            requested.push(href);
            throw new Error('offline');
        });
        const scene = makeScene({ assets: { B03: 'https://data.test/B03.tif', B08: 'https://data.test/B08.tif', B04: 'https://data.test/B04.tif' } });

        await assert.rejects(source.fetchBands(scene, 'water'), /offline/);
        assert.deepEqual(requested.sort(), ['https://data.test/B03.tif', 'https://data.test/B08.tif']);
    });
});
