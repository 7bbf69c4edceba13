import type { MetadataStore } from '../db/store';
import { intersects, polygonBbox } from '../geo';
import { createLogger } from '../log';
import type { IndexAggregate, IndexType, Region } from '../types';

const log = createLogger('AGG');

const round4 = (v: number) => Math.round(v * 10_000) / 10_000;

/**
 * Mean, min, max and population standard deviation over per-scene means.
 */
export function aggregateMeans(means: number[]): IndexAggregate | null {
    if (means.length === 0) return null;
    const n = means.length;
    const mean = means.reduce((sum, v) => sum + v, 0) / n;
    const variance = means.reduce((sum, v) => sum + (v - mean) ** 2, 0) / n;
    return {
        mean: round4(mean),
        min: round4(Math.min(...means)),
        max: round4(Math.max(...means)),
        std: round4(Math.sqrt(variance)),
        sample_count: n
    };
}

export interface AggregationOutcome {
    region: string;
    date: string;
    index_type: IndexType;
    aggregate: IndexAggregate;
}

export class RegionAggregator {
    constructor(private readonly store: MetadataStore, readonly regions: Region[]) {}

    /**
     * Recomputes one (region, date, index) statistic from the index results of scenes whose footprint
     * intersects the region. Writes nothing when no result qualifies.
     */
    aggregate(region: Region, date: string, indexType: IndexType, now = Date.now()): IndexAggregate | null {
        const candidates = this.store.indexResultsOnDate(date, indexType, polygonBbox(region.polygon));
        const means = candidates.filter(c => intersects(c.scene.footprint, region.polygon)).map(c => c.result.mean);
        const aggregate = aggregateMeans(means);
        if (!aggregate) return null;

        this.store.upsertRegionStatistic(region.name, date, region.polygon, indexType, aggregate, now);
        return aggregate;
    }

    /**
     * Every configured region for the given dates and index types. With `onError`, a failing statistic is
     * reported under its `region:<name>/<date>/<index>` scope and the rest still run; without it the
     * first failure propagates.
     */
    aggregateAll(dates: Iterable<string>, indexTypes: IndexType[], now = Date.now(), onError?: (e: unknown, scope: string) => void): AggregationOutcome[] {
        const outcomes: AggregationOutcome[] = [];
        for (const date of dates) {
            for (const region of this.regions) {
                for (const indexType of indexTypes) {
                    try {
                        const aggregate = this.aggregate(region, date, indexType, now);
                        if (aggregate) outcomes.push({ region: region.name, date, index_type: indexType, aggregate });
                    } catch (e) {
                        if (!onError) throw e;
                        onError(e, `region:${region.name}/${date}/${indexType}`);
                    }
                }
            }
        }
        log.info(`Updated ${outcomes.length} region statistics`);
        return outcomes;
    }

    findRegion(name: string): Region | undefined {
        return this.regions.find(r => r.name.toLowerCase() === name.toLowerCase());
    }
}
