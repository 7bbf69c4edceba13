import type { PipelineConfig } from '../config';
import { DAY_MS } from '../constants';
import type { MetadataStore } from '../db/store';
import { describeError, isPipelineError, NotFound, ProviderUnavailable, RunCancelled, StorageUnavailable, toRunError } from '../errors';
import { parseIndexType } from '../indexTypes';
import { createLogger } from '../log';
import type { BandPair, IndexType, Scene, SceneDescriptor, StoredIndexResult } from '../types';
import type { BandSource } from './bandSource';
import type { CatalogClient } from './catalogService';
import { calculateIndex } from './indexCalculator';
import type { RegionAggregator } from './regionAggregator';
import type { RunContext, RunExecutor, RunProgress } from './scheduler';

const log = createLogger('PIPELINE');

export interface PipelineOptions extends PipelineConfig {
    historicalBackfill: boolean;
}

export interface PipelineDeps {
    store: MetadataStore;
    catalog: CatalogClient;
    aggregator: RegionAggregator;
    /** Null when band download is switched off; every result is then estimated. */
    bands: BandSource | null;
    now?: () => number;
}

function checkpoint(signal: AbortSignal): void {
    if (!signal.aborted) return;
    throw signal.reason instanceof Error ? signal.reason : new RunCancelled();
}

/**
 * Records a scene- or region-local failure on the run. Storage failures and cancellation abort the run instead.
 */
function recordError(progress: RunProgress, e: unknown, scope: string): void {
    if (e instanceof StorageUnavailable || e instanceof RunCancelled) throw e;
    log.warn(`${scope}: ${describeError(e)}`);
    progress.errors.push(toRunError(e, scope));
    progress.counts.errors = progress.errors.length;
}

/**
 * search → dedup → ingest → per-scene indices → region rollups, for one run.
 */
export class PipelineService implements RunExecutor {
    private readonly store: MetadataStore;
    private readonly catalog: CatalogClient;
    private readonly aggregator: RegionAggregator;
    private readonly bands: BandSource | null;
    private readonly now: () => number;

    constructor(private readonly options: PipelineOptions, deps: PipelineDeps) {
        this.store = deps.store;
        this.catalog = deps.catalog;
        this.aggregator = deps.aggregator;
        this.bands = deps.bands;
        this.now = deps.now ?? Date.now;
    }

    /** Historical window until a run has succeeded (when backfill is on), the short lookback after. */
    dateWindow(now: number): { from: Date; to: Date; days: number } {
        const historical = this.options.historicalBackfill && this.store.runTotals().succeeded === 0;
        const days = historical ? this.options.historicalDays : this.options.lookbackDays;
        return { from: new Date(now - days * DAY_MS), to: new Date(now), days };
    }

    async execute(ctx: RunContext): Promise<void> {
        const { signal, progress } = ctx;
        const { from, to, days } = this.dateWindow(this.now());
        log.info(`Run ${ctx.runId}: searching the last ${days} day(s)`);

        let found: SceneDescriptor[] = [];
        try {
            found = await this.catalog.search(this.options.aoi, from, to, this.options.maxCloudCoverage, signal);
        } catch (e) {
            recordError(progress, e, 'search');
            if (e instanceof ProviderUnavailable) {
                found = e.partial;
                if (found.length > 0) log.info(`Continuing with ${found.length} scene(s) fetched before the provider failed`);
            }
        }
        progress.counts.scenes_found = found.length;
        checkpoint(signal);

        const scenes = this.catalog.ingest(this.catalog.filterNew(found));
        progress.counts.scenes_ingested = scenes.length;
        log.info(`Run ${ctx.runId}: ${found.length} found, ${scenes.length} new`);

        const dates = new Set<string>();
        const { sceneConcurrency } = this.options;
        for (let i = 0; i < scenes.length; i += sceneConcurrency) {
            checkpoint(signal);
            const chunk = scenes.slice(i, i + sceneConcurrency);
            const written = await Promise.all(chunk.map(scene => this.processScene(scene, progress, signal)));
            chunk.forEach((scene, j) => {
                if (written[j] > 0) {
                    progress.counts.scenes_processed++;
                    dates.add(scene.acquisition_date);
                }
            });
        }

        checkpoint(signal);
        this.aggregateDates([...dates].sort(), this.options.indexTypes, progress);
        log.info(`Run ${ctx.runId}: processed ${progress.counts.scenes_processed} scene(s), ${progress.counts.errors} error(s)`);
    }

    /**
     * Recomputes one scene's index even when a result exists, then refreshes that date's region statistics.
     */
    async recompute(productId: string, rawIndexType: string): Promise<StoredIndexResult> {
        const indexType = parseIndexType(rawIndexType);
        const scene = this.store.getSceneByProductId(productId);
        if (!scene) throw new NotFound(`Scene ${productId} not found`);

        const bands = await this.loadBands(scene, indexType);
        this.store.saveIndexResult(calculateIndex(scene, indexType, bands, this.now()), true);

        const progress: RunProgress = { counts: { scenes_found: 0, scenes_ingested: 0, scenes_processed: 1, errors: 0 }, errors: [] };
        this.aggregateDates([scene.acquisition_date], [indexType], progress);
        if (progress.errors.length > 0) log.warn(`Recompute of ${productId}: ${progress.errors.length} region rollup(s) failed`);

        const stored = this.store.getIndexResult(scene.id, indexType);
        if (!stored) throw new StorageUnavailable(`Index result for ${productId} was not persisted`);
        log.info(`Recomputed ${indexType} for ${productId}`);
        return stored;
    }

    /** Returns the number of index results written for the scene. */
    private async processScene(scene: Scene, progress: RunProgress, signal: AbortSignal): Promise<number> {
        let written = 0;
        for (const indexType of this.options.indexTypes) {
            const scope = `scene:${scene.product_id}/${indexType}`;
            try {
                const bands = await this.loadBands(scene, indexType, signal, progress);
                if (this.store.saveIndexResult(calculateIndex(scene, indexType, bands, this.now()))) written++;
            } catch (e) {
                recordError(progress, e, scope);
            }
        }
        return written;
    }

    /**
     * Band rasters for exact mode. During a run a failed download is recorded and the scene falls back to
     * estimation; outside a run (recompute) the failure goes to the caller so no stored result is replaced.
     */
    private async loadBands(scene: Scene, indexType: IndexType, signal?: AbortSignal, progress?: RunProgress): Promise<BandPair | null> {
        if (!this.bands) return null;
        try {
            return await this.bands.fetchBands(scene, indexType, signal);
        } catch (e) {
            const scope = `bands:${scene.product_id}/${indexType}`;
            if (!progress) {
                if (isPipelineError(e)) throw e;
                throw new ProviderUnavailable(`Bands for ${scene.product_id}/${indexType} unavailable: ${describeError(e)}`, { cause: e });
            }
            recordError(progress, e, scope);
            return null;
        }
    }

    private aggregateDates(dates: string[], indexTypes: IndexType[], progress: RunProgress): void {
        this.aggregator.aggregateAll(dates, indexTypes, this.now(), (e, scope) => recordError(progress, e, scope));
    }
}
