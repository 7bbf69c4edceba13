import { Router, type Request, type RequestHandler, type Response } from 'express';
import type { Feature, FeatureCollection, Polygon } from 'geojson';
import type { MetadataStore } from '../db/store';
import { NotFound } from '../errors';
import { bboxToPolygon } from '../geo';
import { createLogger } from '../log';
import type { IndexType, RegionStatistic } from '../types';
import type { PipelineService } from '../services/pipelineService';
import type { RegionAggregator } from '../services/regionAggregator';
import type { Scheduler } from '../services/scheduler';
import type { TileRenderer } from '../services/tileRenderer';
import { bodyString, forceFlag, indexTypeParam, intParam, optionalDate, optionalIndexType, optionalNumber, optionalString, requiredDate, requiredString, tileParams } from './params';

const log = createLogger('SERVER');

export interface ApiDeps {
    store: MetadataStore;
    scheduler: Scheduler;
    pipeline: PipelineService;
    aggregator: RegionAggregator;
    tiles: TileRenderer;
}

export interface Envelope<T> {
    success: true;
    message: string;
    data: T;
    meta?: Record<string, unknown>;
    timestamp: number;
}

export function send<T>(res: Response, data: T, message: string, meta?: Record<string, unknown>, status = 200): void {
    const body: Envelope<T> = { success: true, message, data, timestamp: Date.now() };
    if (meta) body.meta = meta;
    res.status(status).json(body);
}

/** Routes sync and async handler failures to the error middleware. */
const handle = (fn: (req: Request, res: Response) => void | Promise<void>): RequestHandler => (req, res, next) => {
    Promise.resolve()
        .then(() => fn(req, res))
        .catch(next);
};

function statisticFeature(stat: RegionStatistic, indexType: IndexType, polygon: Polygon): Feature<Polygon> {
    return {
        type: 'Feature',
        geometry: polygon,
        properties: {
            region_name: stat.region_name,
            date: stat.date,
            index_type: indexType,
            ...stat.indices[indexType],
            updated_at: stat.updated_at
        }
    };
}

export function createApiRouter({ store, scheduler, pipeline, aggregator, tiles }: ApiDeps): Router {
    const router = Router();

    router.get('/health', (req, res) => {
        send(res, { status: 'online', server_time: Date.now(), uptime_s: Math.round(process.uptime()) }, 'OK');
    });

    // --- Scheduler ---

    router.get('/scheduler/status', handle((req, res) => {
        send(res, scheduler.status(), 'Scheduler status');
    }));

    router.post('/scheduler/trigger', handle(async (req, res) => {
        const ticket = await scheduler.triggerRun(forceFlag(req.body));
        send(res, { run_id: ticket.run_id }, `Run ${ticket.run_id} started`, undefined, 202);
    }));

    router.post('/scheduler/cancel', handle((req, res) => {
        const runId = scheduler.activeRunId();
        const cancelled = scheduler.cancel();
        send(res, { cancelled, run_id: runId }, cancelled ? `Run ${runId} asked to stop` : 'No run in progress');
    }));

    router.get('/scheduler/runs', handle((req, res) => {
        const runs = store.listRuns(intParam(req.query.limit, 'limit', 20, 1, 200));
        send(res, runs, 'Run history', { count: runs.length });
    }));

    // --- Scenes and indices ---

    router.post('/indices/recompute', handle(async (req, res) => {
        const productId = bodyString(req.body, 'product_id');
        const result = await pipeline.recompute(productId, bodyString(req.body, 'index_type'));
        send(res, result, `Recomputed ${result.index_type} for ${productId}`);
    }));

    router.get('/scenes', handle((req, res) => {
        const scenes = store.listScenes({
            dateFrom: optionalDate(req.query.date_from, 'date_from'),
            dateTo: optionalDate(req.query.date_to, 'date_to'),
            maxCloud: optionalNumber(req.query.max_cloud, 'max_cloud', 0, 100),
            limit: intParam(req.query.limit, 'limit', 100, 1, 1000)
        });
        send(res, scenes, 'Scenes', { count: scenes.length });
    }));

    router.get('/scenes/:productId/indices', handle((req, res) => {
        const scene = store.getSceneByProductId(req.params.productId);
        if (!scene) throw new NotFound(`Scene ${req.params.productId} not found`);
        const results = store.listIndexResults(scene.id);
        send(res, results, `Index results for ${scene.product_id}`, { count: results.length, scene_id: scene.id });
    }));

    // --- Tiles ---

    router.get('/tiles/:z/:x/:y.png', handle(async (req, res) => {
        const { z, x, y } = tileParams(req.params.z, req.params.x, req.params.y);
        const date = requiredDate(req.query.date, 'date');
        const tile = await tiles.renderTile(z, x, y, date, indexTypeParam(req.query.index_type, 'vegetation'));
        res.set({
            'Content-Type': 'image/png',
            'Cache-Control': tile.source ? 'public, max-age=300' : 'no-cache',
            'X-Tile-Source': tile.source ?? 'none',
            'X-Tile-Cache': tile.cached ? 'hit' : 'miss'
        });
        res.send(tile.png);
    }));

    // --- Regions ---

    router.get('/regions/statistics', handle((req, res) => {
        const date = requiredDate(req.query.date, 'date');
        const indexType = indexTypeParam(req.query.index_type, 'vegetation');
        const regionName = optionalString(req.query.region_name, 'region_name');
        const stats = store.regionStatisticsOn(date, indexType, regionName && (aggregator.findRegion(regionName)?.name ?? regionName));
        if (stats.length === 0) throw new NotFound(`No region statistics for ${indexType} on ${date}`);

        const collection: FeatureCollection<Polygon> = {
            type: 'FeatureCollection',
            features: stats.map(stat => statisticFeature(stat, indexType, aggregator.findRegion(stat.region_name)?.polygon ?? bboxToPolygon(stat.bbox)))
        };
        send(res, collection, `Statistics for ${stats.length} region(s)`, { date, index_type: indexType });
    }));

    router.get('/regions/dates', handle((req, res) => {
        const regionName = optionalString(req.query.region_name, 'region_name');
        const dates = store.availableDates(optionalIndexType(req.query.index_type), regionName && (aggregator.findRegion(regionName)?.name ?? regionName));
        send(res, dates, 'Available dates', { count: dates.length });
    }));

    router.get('/regions/:name/timeseries', handle((req, res) => {
        const region = aggregator.findRegion(requiredString(req.params.name, 'name'));
        if (!region) throw new NotFound(`Region ${req.params.name} not found`);
        const indexType = indexTypeParam(req.query.index_type, 'vegetation');
        const points = store.regionTimeSeries(region.name, indexType, intParam(req.query.limit, 'limit', 365, 1, 3650));
        send(res, points, `${indexType} time series for ${region.name}`, { region_name: region.name, index_type: indexType, count: points.length });
    }));

    router.use(handle(req => {
        log.warn(`No route for ${req.method} ${req.originalUrl}`);
        throw new NotFound(`No route for ${req.method} ${req.path}`);
    }));

    return router;
}
