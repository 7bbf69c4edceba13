import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { UnsupportedIndex, ValidationError } from '../errors';
import { bodyString, forceFlag, indexTypeParam, intParam, optionalDate, optionalIndexType, optionalNumber, requiredDate, tileParams } from './params';

describe('query parameters', () => {
    it('reads index types by tag or acronym', () => {
        assert.equal(indexTypeParam('ndvi'), 'vegetation');
        assert.equal(indexTypeParam(' NDBI '), 'built_up');
        assert.equal(indexTypeParam(undefined, 'water'), 'water');
        assert.equal(optionalIndexType(''), undefined);
        assert.throws(() => indexTypeParam(undefined), ValidationError);
        assert.throws(() => indexTypeParam('evi'), UnsupportedIndex);
        assert.throws(() => indexTypeParam('constructor'), UnsupportedIndex);
        assert.throws(() => indexTypeParam('__proto__'), UnsupportedIndex);
        assert.throws(() => optionalIndexType('toString'), UnsupportedIndex);
        assert.throws(() => indexTypeParam(['ndvi', 'ndwi']), ValidationError);
    });

    it('accepts only real calendar dates', () => {
        assert.equal(requiredDate('2024-06-15', 'date'), '2024-06-15');
        assert.equal(optionalDate(undefined, 'date_from'), undefined);
        assert.throws(() => requiredDate('2024-02-30', 'date'), /date must be a date as YYYY-MM-DD, got "2024-02-30"/);
        assert.throws(() => requiredDate(undefined, 'date'), /date is required/);
    });

    it('bounds integers and numbers', () => {
        assert.equal(intParam(undefined, 'limit', 20, 1, 200), 20);
        assert.equal(intParam('50', 'limit', 20, 1, 200), 50);
        assert.throws(() => intParam('0', 'limit', 20, 1, 200), /limit must be an integer between 1 and 200, got "0"/);
        assert.throws(() => intParam('2.5', 'limit', 20, 1, 200), ValidationError);
        assert.equal(optionalNumber('12.5', 'max_cloud', 0, 100), 12.5);
        assert.throws(() => optionalNumber('101', 'max_cloud', 0, 100), ValidationError);
    });

    it('parses tile coordinates within the zoom level', () => {
        assert.deepEqual(tileParams('12', '2248', '1420'), { z: 12, x: 2248, y: 1420 });
        assert.throws(() => tileParams('2', '4', '0'), /Invalid tile 2\/4\/0/);
        assert.throws(() => tileParams('1', '-0', '0'), ValidationError);
        assert.throws(() => tileParams('1', '1e0', '0'), ValidationError);
    });
});

describe('body fields', () => {
    it('reads the force flag', () => {
        assert.equal(forceFlag(undefined), false);
        assert.equal(forceFlag({}), false);
        assert.equal(forceFlag({ force: true }), true);
        assert.throws(() => forceFlag({ force: 'yes' }), /force must be true or false/);
    });

    it('requires non-empty strings', () => {
        assert.equal(bodyString({ product_id: ' S2A_1 ' }, 'product_id'), 'S2A_1');
        assert.throws(() => bodyString({ product_id: 7 }, 'product_id'), /product_id is required/);
        assert.throws(() => bodyString(null, 'index_type'), /index_type is required/);
    });
});
