import { createApp } from './app';
import { loadConfig } from './config';
import { openDatabase } from './db';
import { MetadataStore } from './db/store';
import { createLogger } from './log';
import { loadRegions } from './regions';
import { GeoTiffBandSource } from './services/bandSource';
import { CatalogClient } from './services/catalogService';
import { PipelineService } from './services/pipelineService';
import { RegionAggregator } from './services/regionAggregator';
import { Scheduler } from './services/scheduler';
import { TileRenderer } from './services/tileRenderer';

const log = createLogger('SERVER');

function main() {
    const config = loadConfig();
    const db = openDatabase(config.dbPath);
    const store = new MetadataStore(db);
    const regions = loadRegions(config.regionsFile);
    log.info(`Loaded ${regions.length} region(s) from ${config.regionsFile}`);

    const catalog = new CatalogClient(config.provider, store);
    const bands = config.pipeline.fetchBands ? new GeoTiffBandSource((href, signal) => catalog.download(href, signal)) : null;
    if (!bands) log.info('Band download off; index results will be estimated');

    const aggregator = new RegionAggregator(store, regions);
    const tiles = new TileRenderer(store, regions, { cacheSize: config.tileCacheSize });
    const pipeline = new PipelineService({ ...config.pipeline, historicalBackfill: config.scheduler.historicalBackfill }, { store, catalog, aggregator, bands });
    const scheduler = new Scheduler(store, pipeline, config.scheduler);

    const app = createApp({ store, scheduler, pipeline, aggregator, tiles });
    const server = app.listen(config.port, () => {
        log.info(`Running on http://localhost:${config.port}`);
    });
    scheduler.start();

    let closing = false;
    const shutdown = (signal: string) => {
        if (closing) return;
        closing = true;
        log.info(`${signal} received, shutting down`);
        server.close();
        scheduler.shutdown()
            .then(() => {
                tiles.close();
                db.close();
                process.exit(0);
            })
            .catch(e => {
                log.error('Shutdown failed', e);
                process.exit(1);
            });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
    main();
} catch (e) {
    log.error('Startup failed', e);
    process.exit(1);
}
