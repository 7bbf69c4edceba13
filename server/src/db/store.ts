import type Database from 'better-sqlite3';
import type { Polygon } from 'geojson';
import { INDEX_TYPES } from '../constants';
import { AlreadyRunning, isPipelineError, StorageUnavailable } from '../errors';
import { polygonBbox } from '../geo';
import { toUtcDate } from '../time';
import type {
    IndexAggregate,
    IndexResult,
    IndexType,
    PipelineRun,
    RegionStatistic,
    RunCounts,
    RunErrorRecord,
    RunStatus,
    RunTrigger,
    Scene,
    SceneDescriptor,
    StoredIndexResult,
    TimeSeriesPoint
} from '../types';

interface SceneRow {
    id: number;
    product_id: string;
    acquired_at: number;
    acquisition_date: string;
    cloud_coverage: number;
    footprint: string;
    center_lon: number;
    center_lat: number;
    assets: string;
    metadata: string;
    ingested_at: number;
    updated_at: number;
}

interface IndexRow {
    id: number;
    scene_id: number;
    index_type: IndexType;
    mean: number;
    min: number;
    max: number;
    std: number;
    median: number;
    category: string;
    coverage_pct: number;
    quality_score: number;
    quality: IndexResult['quality'];
    valid_pixels: number | null;
    total_pixels: number | null;
    metadata: string;
    calculated_at: number;
}

interface RunRow {
    id: number;
    trigger: RunTrigger;
    status: RunStatus;
    started_at: number;
    finished_at: number | null;
    scenes_found: number;
    scenes_ingested: number;
    scenes_processed: number;
    errors: number;
    error_details: string;
}

type RegionRow = Record<string, string | number | null>;

export interface IndexResultWritten {
    scene_id: number;
    date: string;
    index_type: IndexType;
}

export interface RegionStatisticWritten {
    region_name: string;
    date: string;
    index_type: IndexType;
}

export interface SceneFilter {
    dateFrom?: string;
    dateTo?: string;
    maxCloud?: number;
    limit?: number;
}

export interface SceneWithResult {
    scene: Scene;
    result: StoredIndexResult;
}

const ID_CHUNK = 500;

const toScene = (row: SceneRow): Scene => ({
    id: row.id,
    product_id: row.product_id,
    acquired_at: row.acquired_at,
    acquisition_date: row.acquisition_date,
    cloud_coverage: row.cloud_coverage,
    footprint: JSON.parse(row.footprint),
    center: { lon: row.center_lon, lat: row.center_lat },
    assets: JSON.parse(row.assets),
    metadata: JSON.parse(row.metadata),
    ingested_at: row.ingested_at,
    updated_at: row.updated_at
});

const toIndexResult = (row: IndexRow): StoredIndexResult => ({ ...row, metadata: JSON.parse(row.metadata) });

const toRun = (row: RunRow): PipelineRun => ({ ...row, error_details: JSON.parse(row.error_details) });

const numberAt = (row: RegionRow, key: string): number | null => {
    const v = row[key];
    return typeof v === 'number' ? v : null;
};

function toRegionStatistic(row: RegionRow): RegionStatistic {
    const indices: Partial<Record<IndexType, IndexAggregate>> = {};
    for (const t of INDEX_TYPES) {
        const mean = numberAt(row, `${t}_mean`);
        if (mean === null) continue;
        indices[t] = {
            mean,
            min: numberAt(row, `${t}_min`) ?? mean,
            max: numberAt(row, `${t}_max`) ?? mean,
            std: numberAt(row, `${t}_std`) ?? 0,
            sample_count: numberAt(row, `${t}_sample_count`) ?? 0
        };
    }
    return {
        region_name: String(row.region_name),
        date: String(row.date),
        bbox: JSON.parse(String(row.bbox)),
        indices,
        updated_at: numberAt(row, 'updated_at') ?? 0
    };
}

/**
 * Table-level access to scenes, index results, region statistics and pipeline runs.
 * Every write is one statement or one transaction; any SQLite failure surfaces as StorageUnavailable.
 */
export class MetadataStore {
    private readonly indexListeners = new Set<(e: IndexResultWritten) => void>();
    private readonly regionListeners = new Set<(e: RegionStatisticWritten) => void>();

    constructor(private readonly db: Database.Database) {}

    private guard<T>(op: string, fn: () => T): T {
        try {
            return fn();
        } catch (e) {
            if (isPipelineError(e)) throw e;
            throw new StorageUnavailable(`Storage failure during ${op}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
        }
    }

    onIndexResultWritten(listener: (e: IndexResultWritten) => void): () => void {
        this.indexListeners.add(listener);
        return () => this.indexListeners.delete(listener);
    }

    onRegionStatisticWritten(listener: (e: RegionStatisticWritten) => void): () => void {
        this.regionListeners.add(listener);
        return () => this.regionListeners.delete(listener);
    }

    // --- Scenes ---

    /**
     * Inserts a scene, or refreshes the metadata of the existing row with the same product id.
     */
    upsertScene(scene: SceneDescriptor, now = Date.now()): Scene {
        return this.guard('upsertScene', () => {
            const [minLon, minLat, maxLon, maxLat] = polygonBbox(scene.footprint);
            const row = this.db.prepare<unknown[], SceneRow>(`
                INSERT INTO scenes (product_id, acquired_at, acquisition_date, cloud_coverage, footprint,
                    min_lon, min_lat, max_lon, max_lat, center_lon, center_lat, assets, metadata, ingested_at, updated_at)
                VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
                ON CONFLICT(product_id) DO UPDATE SET
                    assets = excluded.assets,
                    metadata = excluded.metadata,
                    updated_at = excluded.updated_at
                RETURNING *
            `).get(
                scene.product_id,
                scene.acquired_at,
                toUtcDate(scene.acquired_at),
                scene.cloud_coverage,
                JSON.stringify(scene.footprint),
                minLon, minLat, maxLon, maxLat,
                scene.center.lon,
                scene.center.lat,
                JSON.stringify(scene.assets),
                JSON.stringify(scene.metadata),
                now,
                now
            );
            if (!row) throw new StorageUnavailable(`Upsert of scene ${scene.product_id} returned no row`);
            return toScene(row);
        });
    }

    existingProductIds(productIds: string[]): Set<string> {
        return this.guard('existingProductIds', () => {
            const found = new Set<string>();
            for (let i = 0; i < productIds.length; i += ID_CHUNK) {
                const chunk = productIds.slice(i, i + ID_CHUNK);
                const placeholders = chunk.map(() => '?').join(', ');
                const rows = this.db.prepare<string[], { product_id: string }>(
                    `SELECT product_id FROM scenes WHERE product_id IN (${placeholders})`
                ).all(...chunk);
                rows.forEach(r => found.add(r.product_id));
            }
            return found;
        });
    }

    getSceneByProductId(productId: string): Scene | null {
        return this.guard('getSceneByProductId', () => {
            const row = this.db.prepare<[string], SceneRow>('SELECT * FROM scenes WHERE product_id = ?').get(productId);
            return row ? toScene(row) : null;
        });
    }

    countScenes(): number {
        return this.guard('countScenes', () => {
            const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM scenes').get();
            return row?.n ?? 0;
        });
    }

    listScenes(filter: SceneFilter = {}): Scene[] {
        return this.guard('listScenes', () => {
            const where: string[] = [];
            const params: (string | number)[] = [];
            if (filter.dateFrom) {
                where.push('acquisition_date >= ?');
                params.push(filter.dateFrom);
            }
            if (filter.dateTo) {
                where.push('acquisition_date <= ?');
                params.push(filter.dateTo);
            }
            if (filter.maxCloud !== undefined) {
                where.push('cloud_coverage <= ?');
                params.push(filter.maxCloud);
            }
            params.push(filter.limit ?? 100);
            const sql = `SELECT * FROM scenes ${where.length ? `WHERE ${where.join(' AND ')}` : ''} ORDER BY acquired_at DESC, id DESC LIMIT ?`;
            return this.db.prepare<(string | number)[], SceneRow>(sql).all(...params).map(toScene);
        });
    }

    /**
     * Scenes acquired on a UTC date whose bounding box overlaps the given one.
     */
    scenesOnDate(date: string, bbox?: [number, number, number, number]): Scene[] {
        return this.guard('scenesOnDate', () => {
            if (!bbox) {
                return this.db.prepare<[string], SceneRow>('SELECT * FROM scenes WHERE acquisition_date = ? ORDER BY acquired_at, id')
                    .all(date).map(toScene);
            }
            const [minLon, minLat, maxLon, maxLat] = bbox;
            return this.db.prepare<unknown[], SceneRow>(`
                SELECT * FROM scenes
                WHERE acquisition_date = ? AND max_lon >= ? AND min_lon <= ? AND max_lat >= ? AND min_lat <= ?
                ORDER BY acquired_at, id
            `).all(date, minLon, maxLon, minLat, maxLat).map(toScene);
        });
    }

    // --- Index results ---

    /**
     * Stores a result. An existing (scene, index) row is only replaced when `force` is set.
     * Returns whether a row was written.
     */
    saveIndexResult(result: IndexResult, force = false): boolean {
        const written = this.guard('saveIndexResult', () => {
            const conflict = force
                ? `DO UPDATE SET mean = excluded.mean, min = excluded.min, max = excluded.max, std = excluded.std,
                    median = excluded.median, category = excluded.category, coverage_pct = excluded.coverage_pct,
                    quality_score = excluded.quality_score, quality = excluded.quality, valid_pixels = excluded.valid_pixels,
                    total_pixels = excluded.total_pixels, metadata = excluded.metadata, calculated_at = excluded.calculated_at`
                : 'DO NOTHING';
            const info = this.db.prepare(`
                INSERT INTO index_results (scene_id, index_type, mean, min, max, std, median, category, coverage_pct,
                    quality_score, quality, valid_pixels, total_pixels, metadata, calculated_at)
                VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
                ON CONFLICT(scene_id, index_type) ${conflict}
            `).run(
                result.scene_id, result.index_type, result.mean, result.min, result.max, result.std, result.median,
                result.category, result.coverage_pct, result.quality_score, result.quality, result.valid_pixels,
                result.total_pixels, JSON.stringify(result.metadata), result.calculated_at
            );
            if (info.changes === 0) return null;
            const scene = this.db.prepare<[number], { acquisition_date: string }>('SELECT acquisition_date FROM scenes WHERE id = ?')
                .get(result.scene_id);
            return scene?.acquisition_date ?? null;
        });
        if (written === null) return false;
        const event: IndexResultWritten = { scene_id: result.scene_id, date: written, index_type: result.index_type };
        this.indexListeners.forEach(l => l(event));
        return true;
    }

    getIndexResult(sceneId: number, indexType: IndexType): StoredIndexResult | null {
        return this.guard('getIndexResult', () => {
            const row = this.db.prepare<[number, string], IndexRow>('SELECT * FROM index_results WHERE scene_id = ? AND index_type = ?')
                .get(sceneId, indexType);
            return row ? toIndexResult(row) : null;
        });
    }

    listIndexResults(sceneId: number): StoredIndexResult[] {
        return this.guard('listIndexResults', () =>
            this.db.prepare<[number], IndexRow>('SELECT * FROM index_results WHERE scene_id = ? ORDER BY index_type').all(sceneId).map(toIndexResult)
        );
    }

    /**
     * Index results of one type for scenes acquired on a date, paired with their scene.
     */
    indexResultsOnDate(date: string, indexType: IndexType, bbox?: [number, number, number, number]): SceneWithResult[] {
        const scenes = this.scenesOnDate(date, bbox);
        if (scenes.length === 0) return [];
        return this.guard('indexResultsOnDate', () => {
            const stmt = this.db.prepare<[number, string], IndexRow>('SELECT * FROM index_results WHERE scene_id = ? AND index_type = ?');
            const pairs: SceneWithResult[] = [];
            for (const scene of scenes) {
                const row = stmt.get(scene.id, indexType);
                if (row) pairs.push({ scene, result: toIndexResult(row) });
            }
            return pairs;
        });
    }

    // --- Region statistics ---

    upsertRegionStatistic(regionName: string, date: string, polygon: Polygon, indexType: IndexType, agg: IndexAggregate, now = Date.now()): void {
        this.guard('upsertRegionStatistic', () => {
            const t = indexType;
            this.db.prepare(`
                INSERT INTO region_statistics (region_name, date, bbox, ${t}_mean, ${t}_min, ${t}_max, ${t}_std, ${t}_sample_count, updated_at)
                VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
                ON CONFLICT(region_name, date) DO UPDATE SET
                    bbox = excluded.bbox,
                    ${t}_mean = excluded.${t}_mean,
                    ${t}_min = excluded.${t}_min,
                    ${t}_max = excluded.${t}_max,
                    ${t}_std = excluded.${t}_std,
                    ${t}_sample_count = excluded.${t}_sample_count,
                    updated_at = excluded.updated_at
            `).run(regionName, date, JSON.stringify(polygonBbox(polygon)), agg.mean, agg.min, agg.max, agg.std, agg.sample_count, now);
        });
        const event: RegionStatisticWritten = { region_name: regionName, date, index_type: indexType };
        this.regionListeners.forEach(l => l(event));
    }

    getRegionStatistic(regionName: string, date: string): RegionStatistic | null {
        return this.guard('getRegionStatistic', () => {
            const row = this.db.prepare<[string, string], RegionRow>('SELECT * FROM region_statistics WHERE region_name = ? AND date = ?')
                .get(regionName, date);
            return row ? toRegionStatistic(row) : null;
        });
    }

    regionStatisticsOn(date: string, indexType: IndexType, regionName?: string): RegionStatistic[] {
        return this.guard('regionStatisticsOn', () => {
            const sql = `SELECT * FROM region_statistics WHERE date = ? AND ${indexType}_mean IS NOT NULL${regionName ? ' AND region_name = ?' : ''} ORDER BY region_name`;
            const params = regionName ? [date, regionName] : [date];
            return this.db.prepare<string[], RegionRow>(sql).all(...params).map(toRegionStatistic);
        });
    }

    /**
     * Most recent `limit` points, returned oldest first.
     */
    regionTimeSeries(regionName: string, indexType: IndexType, limit = 365): TimeSeriesPoint[] {
        return this.guard('regionTimeSeries', () => {
            const t = indexType;
            const rows = this.db.prepare<[string, number], TimeSeriesPoint>(`
                SELECT date, ${t}_mean AS mean, ${t}_min AS min, ${t}_max AS max
                FROM region_statistics
                WHERE region_name = ? AND ${t}_mean IS NOT NULL
                ORDER BY date DESC
                LIMIT ?
            `).all(regionName, limit);
            return rows.reverse();
        });
    }

    availableDates(indexType?: IndexType, regionName?: string): string[] {
        return this.guard('availableDates', () => {
            const where: string[] = [];
            const params: string[] = [];
            if (indexType) where.push(`${indexType}_mean IS NOT NULL`);
            if (regionName) {
                where.push('region_name = ?');
                params.push(regionName);
            }
            const sql = `SELECT DISTINCT date FROM region_statistics ${where.length ? `WHERE ${where.join(' AND ')}` : ''} ORDER BY date`;
            return this.db.prepare<string[], { date: string }>(sql).all(...params).map(r => r.date);
        });
    }

    // --- Pipeline runs ---

    /**
     * Atomic check-and-set of the single running run.
     */
    beginRun(trigger: RunTrigger, now = Date.now()): number {
        return this.guard('beginRun', () => {
            const begin = this.db.transaction(() => {
                const running = this.db.prepare<[], { id: number }>("SELECT id FROM pipeline_runs WHERE status = 'running'").get();
                if (running) throw new AlreadyRunning(running.id);
                const info = this.db.prepare("INSERT INTO pipeline_runs (trigger, status, started_at) VALUES (?, 'running', ?)").run(trigger, now);
                return Number(info.lastInsertRowid);
            });
            return begin.immediate();
        });
    }

    /**
     * Closes a running run. Returns false when the run was already closed.
     */
    finishRun(id: number, status: Exclude<RunStatus, 'running'>, counts: RunCounts, errors: RunErrorRecord[], now = Date.now()): boolean {
        return this.guard('finishRun', () => {
            const info = this.db.prepare(`
                UPDATE pipeline_runs
                SET status = ?, finished_at = ?, scenes_found = ?, scenes_ingested = ?, scenes_processed = ?, errors = ?, error_details = ?
                WHERE id = ? AND status = 'running'
            `).run(status, now, counts.scenes_found, counts.scenes_ingested, counts.scenes_processed, counts.errors, JSON.stringify(errors), id);
            return info.changes > 0;
        });
    }

    /**
     * Marks runs left "running" for longer than the grace period as failed.
     */
    resetStaleRuns(graceMs: number, now = Date.now()): number {
        return this.guard('resetStaleRuns', () => {
            const stale = this.db.prepare<[number], RunRow>("SELECT * FROM pipeline_runs WHERE status = 'running' AND started_at < ?")
                .all(now - graceMs);
            const close = this.db.prepare("UPDATE pipeline_runs SET status = 'failed', finished_at = ?, errors = ?, error_details = ? WHERE id = ?");
            const resetAll = this.db.transaction((rows: RunRow[]) => {
                for (const row of rows) {
                    const details: RunErrorRecord[] = [
                        ...JSON.parse(row.error_details),
                        { code: 'RUN_CANCELLED', message: 'Run was still marked running after the grace period; treated as crashed', scope: 'run' }
                    ];
                    close.run(now, row.errors + 1, JSON.stringify(details), row.id);
                }
            });
            resetAll(stale);
            return stale.length;
        });
    }

    getRun(id: number): PipelineRun | null {
        return this.guard('getRun', () => {
            const row = this.db.prepare<[number], RunRow>('SELECT * FROM pipeline_runs WHERE id = ?').get(id);
            return row ? toRun(row) : null;
        });
    }

    latestRun(): PipelineRun | null {
        return this.listRuns(1)[0] ?? null;
    }

    listRuns(limit = 20): PipelineRun[] {
        return this.guard('listRuns', () =>
            this.db.prepare<[number], RunRow>('SELECT * FROM pipeline_runs ORDER BY started_at DESC, id DESC LIMIT ?').all(limit).map(toRun)
        );
    }

    runTotals(): { total: number; succeeded: number; failed: number } {
        return this.guard('runTotals', () => {
            const row = this.db.prepare<[], { total: number; succeeded: number | null; failed: number | null }>(`
                SELECT COUNT(*) AS total,
                    SUM(CASE WHEN status = 'succeeded' THEN 1 ELSE 0 END) AS succeeded,
                    SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) AS failed
                FROM pipeline_runs
            `).get();
            return { total: row?.total ?? 0, succeeded: row?.succeeded ?? 0, failed: row?.failed ?? 0 };
        });
    }
}
