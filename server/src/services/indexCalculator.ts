import { APPROXIMATE_QUALITY_CAP, INDEX_DEFINITIONS, SEASONAL_FACTORS, type IndexDefinition } from '../constants';
import { BandMismatch } from '../errors';
import { assertNever } from '../indexTypes';
import { createLogger } from '../log';
import type { BandPair, IndexResult, IndexType, Scene, SummaryStats } from '../types';

const log = createLogger('INDEX');

const round = (v: number, digits: number) => {
    const f = 10 ** digits;
    return Math.round(v * f) / f;
};

const clamp = (v: number, lo: number, hi: number) => Math.min(hi, Math.max(lo, v));

/**
 * Resolves the band pair, label thresholds and estimation policy of an index variant.
 */
export function definitionFor(indexType: IndexType): IndexDefinition {
    switch (indexType) {
        case 'vegetation':
            return INDEX_DEFINITIONS.vegetation;
        case 'water':
            return INDEX_DEFINITIONS.water;
        case 'built_up':
            return INDEX_DEFINITIONS.built_up;
        case 'moisture':
            return INDEX_DEFINITIONS.moisture;
        default:
            return assertNever(indexType);
    }
}

/**
 * Buckets are [lower, upper); the last bucket also includes its upper bound.
 */
export function classify(indexType: IndexType, mean: number): string {
    const thresholds = definitionFor(indexType).thresholds;
    for (let i = 0; i < thresholds.length - 1; i++) {
        const [upper, label] = thresholds[i];
        if (mean < upper) return label;
    }
    return thresholds[thresholds.length - 1][1];
}

export const coveragePercent = (mean: number): number => (mean < 0 ? 0 : Math.min(100, mean * 100));

export interface NormalizedDifference {
    values: Float64Array; // valid pixels only, in raster order
    total: number;
}

/**
 * Per-pixel (a - b) / (a + b). Masked, no-data, non-finite and zero-sum pixels are dropped.
 */
export function normalizedDifference(bands: BandPair): NormalizedDifference {
    const { a, b, mask } = bands;
    if (a.width !== b.width || a.height !== b.height) {
        throw new BandMismatch(`Band rasters differ in size: ${a.width}x${a.height} vs ${b.width}x${b.height}`);
    }
    const total = a.width * a.height;
    if (a.data.length !== total || b.data.length !== total || (mask && mask.length !== total)) {
        throw new BandMismatch(`Raster data does not match its declared size of ${a.width}x${a.height}`);
    }

    const values = new Float64Array(total);
    let n = 0;
    for (let i = 0; i < total; i++) {
        if (mask && mask[i] === 0) continue;
        const av = a.data[i];
        const bv = b.data[i];
        if (!Number.isFinite(av) || !Number.isFinite(bv)) continue;
        if ((a.noData != null && av === a.noData) || (b.noData != null && bv === b.noData)) continue;
        const sum = av + bv;
        if (sum === 0) continue;
        const v = (av - bv) / sum;
        if (v < -1 || v > 1) continue;
        values[n++] = v;
    }
    return { values: values.subarray(0, n), total };
}

/**
 * Mean, min, max, population standard deviation and median, summed in raster order.
 */
export function summarize(values: Float64Array): SummaryStats {
    const n = values.length;
    if (n === 0) throw new RangeError('Cannot summarize an empty sample');
    let sum = 0;
    let min = Infinity;
    let max = -Infinity;
    for (let i = 0; i < n; i++) {
        const v = values[i];
        sum += v;
        if (v < min) min = v;
        if (v > max) max = v;
    }
    const mean = sum / n;
    let sq = 0;
    for (let i = 0; i < n; i++) sq += (values[i] - mean) ** 2;

    const sorted = Float64Array.from(values).sort();
    const mid = n >> 1;
    const median = n % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;

    return { mean, min, max, std: Math.sqrt(sq / n), median };
}

/**
 * Coarse seasonal/cloud estimate used when band data is unavailable.
 */
export function estimate(indexType: IndexType, cloudCoverage: number, month: number): SummaryStats {
    const p = definitionFor(indexType).estimation;
    const factor = p.seasonal ? SEASONAL_FACTORS[month] : 1;
    const mean = clamp(p.base * factor + p.cloudCoef * (cloudCoverage / 100), p.floor, p.ceil);
    return {
        mean,
        min: Math.max(p.floor, mean - 2 * p.std),
        max: Math.min(p.maxCeil, mean + 2 * p.std),
        std: p.std,
        median: mean
    };
}

function toResult(scene: Scene, indexType: IndexType, stats: SummaryStats, extra: Pick<IndexResult, 'quality' | 'quality_score' | 'valid_pixels' | 'total_pixels' | 'metadata'>, now: number): IndexResult {
    const mean = round(stats.mean, 4);
    return {
        scene_id: scene.id,
        index_type: indexType,
        mean,
        min: round(stats.min, 4),
        max: round(stats.max, 4),
        std: round(stats.std, 4),
        median: round(stats.median, 4),
        category: classify(indexType, mean),
        coverage_pct: round(coveragePercent(mean), 2),
        calculated_at: now,
        ...extra
    };
}

export function calculateApproximate(scene: Scene, indexType: IndexType, now = Date.now(), note?: string): IndexResult {
    const month = new Date(scene.acquired_at).getUTCMonth();
    const stats = estimate(indexType, scene.cloud_coverage, month);
    const quality = Math.min(APPROXIMATE_QUALITY_CAP, APPROXIMATE_QUALITY_CAP * (1 - scene.cloud_coverage / 100));
    return toResult(scene, indexType, stats, {
        quality: 'approximate',
        quality_score: round(clamp(quality, 0, 1), 2),
        valid_pixels: null,
        total_pixels: null,
        metadata: {
            calculation_method: 'metadata_estimation',
            product_id: scene.product_id,
            cloud_coverage: scene.cloud_coverage,
            month: month + 1,
            ...(note ? { note } : {})
        }
    }, now);
}

export function calculateExact(scene: Scene, indexType: IndexType, bands: BandPair, now = Date.now()): IndexResult {
    const { values, total } = normalizedDifference(bands);
    if (values.length === 0) {
        log.warn(`No valid pixels for ${definitionFor(indexType).acronym} on ${scene.product_id}; estimating instead`);
        return calculateApproximate(scene, indexType, now, 'no valid pixels in band data');
    }
    const stats = summarize(values);
    const quality = (values.length / total) * (1 - scene.cloud_coverage / 100);
    return toResult(scene, indexType, stats, {
        quality: 'exact',
        quality_score: round(clamp(quality, 0, 1), 2),
        valid_pixels: values.length,
        total_pixels: total,
        metadata: {
            calculation_method: 'band_processing',
            product_id: scene.product_id,
            bands: definitionFor(indexType).bands
        }
    }, now);
}

/**
 * Exact mode when band rasters are supplied, metadata estimation otherwise.
 */
export function calculateIndex(scene: Scene, indexType: IndexType, bands?: BandPair | null, now = Date.now()): IndexResult {
    const result = bands ? calculateExact(scene, indexType, bands, now) : calculateApproximate(scene, indexType, now);
    log.info(`${definitionFor(indexType).acronym} for ${scene.product_id}: mean=${result.mean.toFixed(4)}, category=${result.category}, ${result.quality}`);
    return result;
}
