import { before, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { openDatabase } from '../db';
import { MetadataStore, type SceneWithResult } from '../db/store';
import { makeDescriptor, memoryStore, silenceLogs, squarePolygon } from '../testUtils';
import type { IndexType, Region } from '../types';
import { calculateApproximate } from './indexCalculator';
import { aggregateMeans, RegionAggregator } from './regionAggregator';

const TRNAVA: Region = { name: 'Trnava', polygon: squarePolygon(17.53, 48.34, 17.65, 48.40) };
const FAR_AWAY: Region = { name: 'Elsewhere', polygon: squarePolygon(20, 40, 20.1, 40.1) };

before(silenceLogs);

describe('aggregateMeans', () => {
    it('returns null for no samples', () => {
        assert.equal(aggregateMeans([]), null);
    });

    it('uses the population standard deviation', () => {
        assert.deepEqual(aggregateMeans([0.2, 0.4]), { mean: 0.3, min: 0.2, max: 0.4, std: 0.1, sample_count: 2 });
    });
});

describe('RegionAggregator', () => {
    let store: MetadataStore;
    let aggregator: RegionAggregator;

    const saveResult = (productId: string, mean: number, footprint = squarePolygon(17.5, 48.3, 17.7, 48.45)) => {
        const scene = store.upsertScene(makeDescriptor({ product_id: productId, footprint }));
        store.saveIndexResult({ ...calculateApproximate(scene, 'vegetation', 1000), mean });
    };

    beforeEach(() => {
        store = memoryStore();
        aggregator = new RegionAggregator(store, [TRNAVA, FAR_AWAY]);
    });

    it('aggregates the means of intersecting scenes', () => {
        saveResult('A', 0.2);
        saveResult('B', 0.4);
        saveResult('OUTSIDE', 0.9, squarePolygon(10, 40, 11, 41));

        const aggregate = aggregator.aggregate(TRNAVA, '2024-06-15', 'vegetation', 5000);

        assert.deepEqual(aggregate, { mean: 0.3, min: 0.2, max: 0.4, std: 0.1, sample_count: 2 });
        assert.deepEqual(store.getRegionStatistic('Trnava', '2024-06-15')?.indices.vegetation, aggregate);
    });

    it('writes nothing when no scene result qualifies', () => {
        saveResult('A', 0.2);

        assert.equal(aggregator.aggregate(FAR_AWAY, '2024-06-15', 'vegetation'), null);
        assert.equal(aggregator.aggregate(TRNAVA, '2024-06-15', 'water'), null);
        assert.equal(store.getRegionStatistic('Elsewhere', '2024-06-15'), null);
        assert.equal(store.getRegionStatistic('Trnava', '2024-06-15'), null);
    });

    it('is idempotent over repeated runs', () => {
        saveResult('A', 0.2);
        saveResult('B', 0.4);

        aggregator.aggregateAll(['2024-06-15'], ['vegetation'], 1000);
        const first = store.getRegionStatistic('Trnava', '2024-06-15');
        aggregator.aggregateAll(['2024-06-15'], ['vegetation'], 1000);

        assert.deepEqual(store.getRegionStatistic('Trnava', '2024-06-15'), first);
        assert.equal(store.regionTimeSeries('Trnava', 'vegetation').length, 1);
    });

    it('reports one outcome per written statistic', () => {
        saveResult('A', 0.5);

        const outcomes = aggregator.aggregateAll(['2024-06-15', '2024-06-16'], ['vegetation', 'water']);

        assert.deepEqual(outcomes.map(o => `${o.region}/${o.date}/${o.index_type}`), ['Trnava/2024-06-15/vegetation']);
    });

    it('reports a failing statistic through the callback and carries on', () => {
        class UnreadableWater extends MetadataStore {
            indexResultsOnDate(date: string, indexType: IndexType, bbox?: [number, number, number, number]): SceneWithResult[] {
                if (indexType === 'water') throw new Error('water column unreadable');
                return super.indexResultsOnDate(date, indexType, bbox);
            }
        }
        store = new UnreadableWater(openDatabase(':memory:'));
        aggregator = new RegionAggregator(store, [TRNAVA]);
        saveResult('A', 0.5);
        const failures: string[] = [];

        const outcomes = aggregator.aggregateAll(['2024-06-15'], ['water', 'vegetation'], 1000, (e, scope) => {
            failures.push(`${scope}: ${e instanceof Error ? e.message : String(e)}`);
        });

        assert.deepEqual(failures, ['region:Trnava/2024-06-15/water: water column unreadable']);
        assert.deepEqual(outcomes.map(o => o.index_type), ['vegetation']);
        assert.throws(() => aggregator.aggregateAll(['2024-06-15'], ['water']), /water column unreadable/);
    });

    it('finds regions by name regardless of case', () => {
        assert.equal(aggregator.findRegion('trnava'), TRNAVA);
        assert.equal(aggregator.findRegion('Nowhere'), undefined);
    });
});
