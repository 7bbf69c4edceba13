import type { Polygon } from 'geojson';

export type IndexType = 'vegetation' | 'water' | 'built_up' | 'moisture';

export type ResultQuality = 'exact' | 'approximate';

export type RunStatus = 'running' | 'succeeded' | 'failed';

export type RunTrigger = 'timer' | 'manual' | 'startup';

export type BandName = 'B03' | 'B04' | 'B08' | 'B11';

/**
 * A scene as returned by the catalog, before it is persisted.
 */
export interface SceneDescriptor {
    product_id: string;
    acquired_at: number;
    cloud_coverage: number;
    footprint: Polygon;
    center: { lon: number; lat: number };
    assets: Partial<Record<BandName, string>>;
    metadata: Record<string, unknown>;
}

export interface Scene extends SceneDescriptor {
    id: number;
    acquisition_date: string; // YYYY-MM-DD (UTC)
    ingested_at: number;
    updated_at: number;
}

export interface SummaryStats {
    mean: number;
    min: number;
    max: number;
    std: number;
    median: number;
}

export interface IndexResult extends SummaryStats {
    scene_id: number;
    index_type: IndexType;
    category: string;
    coverage_pct: number;
    quality_score: number;
    quality: ResultQuality;
    valid_pixels: number | null;
    total_pixels: number | null;
    metadata: Record<string, unknown>;
    calculated_at: number;
}

export interface StoredIndexResult extends IndexResult {
    id: number;
}

/**
 * One index's column group inside a region statistic row.
 */
export interface IndexAggregate {
    mean: number;
    min: number;
    max: number;
    std: number;
    sample_count: number;
}

export interface RegionStatistic {
    region_name: string;
    date: string;
    bbox: [number, number, number, number];
    indices: Partial<Record<IndexType, IndexAggregate>>;
    updated_at: number;
}

export interface Region {
    name: string;
    polygon: Polygon;
}

export interface TimeSeriesPoint {
    date: string;
    mean: number;
    min: number;
    max: number;
}

export interface RunCounts {
    scenes_found: number;
    scenes_ingested: number;
    scenes_processed: number;
    errors: number;
}

export interface RunErrorRecord {
    code: string;
    message: string;
    scope: string;
}

export interface PipelineRun extends RunCounts {
    id: number;
    trigger: RunTrigger;
    status: RunStatus;
    started_at: number;
    finished_at: number | null;
    error_details: RunErrorRecord[];
}

export interface SchedulerStatus {
    enabled: boolean;
    running: boolean;
    interval: number; // hours
    last_run: number | null;
    next_run: number | null;
    total_runs: number;
    successful_runs: number;
    failed_runs: number;
}

export interface Raster {
    width: number;
    height: number;
    data: ArrayLike<number>;
    noData?: number | null;
}

/**
 * The two band rasters a normalized difference is computed from: (a - b) / (a + b).
 * `mask` marks valid pixels with a non-zero value (cloud and no-data masks).
 */
export interface BandPair {
    a: Raster;
    b: Raster;
    mask?: ArrayLike<number>;
}
