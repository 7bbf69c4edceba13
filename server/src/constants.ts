import type { BandName, IndexType } from './types';

export const INDEX_TYPES: readonly IndexType[] = ['vegetation', 'water', 'built_up', 'moisture'];

// Conventional acronyms accepted on the HTTP surface
export const INDEX_ACRONYMS: ReadonlyMap<string, IndexType> = new Map<string, IndexType>([
    ['ndvi', 'vegetation'],
    ['ndwi', 'water'],
    ['ndbi', 'built_up'],
    ['ndmi', 'moisture'],
    ['moisture', 'moisture']
]);

export type Rgb = [number, number, number];

export interface EstimationPolicy {
    base: number;
    cloudCoef: number;
    std: number;
    floor: number;
    ceil: number;
    maxCeil: number;
    seasonal: boolean;
}

export interface IndexDefinition {
    acronym: string;
    /** Normalized difference is (a - b) / (a + b). */
    bands: { a: BandName; b: BandName };
    range: [number, number];
    /** Ascending (exclusive upper bound, label); the last bucket also takes the range maximum. */
    thresholds: [number, string][];
    ramp: [number, Rgb][];
    estimation: EstimationPolicy;
}

export const INDEX_DEFINITIONS: Record<IndexType, IndexDefinition> = {
    vegetation: {
        acronym: 'NDVI',
        bands: { a: 'B08', b: 'B04' },
        range: [-1, 1],
        thresholds: [[0, 'bare_soil'], [0.2, 'sparse'], [0.5, 'moderate'], [1, 'dense']],
        ramp: [
            [-0.2, [128, 77, 26]],
            [0, [204, 179, 102]],
            [0.2, [230, 230, 153]],
            [0.4, [153, 204, 77]],
            [0.6, [77, 179, 51]],
            [1, [26, 128, 26]]
        ],
        estimation: { base: 0.6, cloudCoef: -0.3, std: 0.15, floor: -0.2, ceil: 1, maxCeil: 1, seasonal: true }
    },
    water: {
        acronym: 'NDWI',
        bands: { a: 'B03', b: 'B08' },
        range: [-1, 1],
        thresholds: [[0, 'no_water'], [0.2, 'low'], [0.5, 'moderate'], [1, 'high']],
        ramp: [
            [-0.5, [128, 77, 26]],
            [-0.2, [204, 179, 128]],
            [0, [128, 204, 230]],
            [0.2, [77, 128, 230]],
            [0.5, [0, 0, 204]],
            [1, [0, 0, 128]]
        ],
        estimation: { base: 0.2, cloudCoef: 0.15, std: 0.12, floor: -0.3, ceil: 0.5, maxCeil: 0.8, seasonal: false }
    },
    built_up: {
        acronym: 'NDBI',
        bands: { a: 'B11', b: 'B08' },
        range: [-1, 1],
        thresholds: [[0, 'natural'], [0.2, 'light_urban'], [0.4, 'dense_urban'], [1, 'very_dense_urban']],
        ramp: [
            [-0.5, [0, 0, 204]],
            [-0.2, [26, 128, 26]],
            [0, [204, 179, 128]],
            [0.2, [153, 77, 26]],
            [0.4, [128, 51, 26]],
            [1, [128, 0, 0]]
        ],
        estimation: { base: 0.05, cloudCoef: -0.05, std: 0.1, floor: -0.5, ceil: 0.6, maxCeil: 0.6, seasonal: false }
    },
    moisture: {
        acronym: 'NDMI',
        bands: { a: 'B08', b: 'B11' },
        range: [-1, 1],
        thresholds: [[-0.4, 'high_stress'], [0, 'moderate_stress'], [0.2, 'normal'], [1, 'high_moisture']],
        ramp: [
            [-0.8, [128, 0, 0]],
            [-0.6, [204, 51, 51]],
            [-0.4, [230, 128, 128]],
            [-0.2, [255, 255, 0]],
            [0, [153, 230, 153]],
            [0.2, [0, 255, 255]],
            [1, [0, 0, 128]]
        ],
        estimation: { base: 0.1, cloudCoef: 0.1, std: 0.12, floor: -0.6, ceil: 0.6, maxCeil: 0.6, seasonal: true }
    }
};

// Northern temperate growing season, January first. Placeholder policy, not a fitted model.
export const SEASONAL_FACTORS = [0.45, 0.5, 0.6, 0.8, 1.0, 1.1, 1.1, 1.05, 0.9, 0.75, 0.55, 0.45];

export const APPROXIMATE_QUALITY_CAP = 0.5;

export const TILE_SIZE = 256;
export const TILE_ALPHA = 200;

// Token refresh margin before the provider-reported expiry
export const TOKEN_EXPIRY_MARGIN_MS = 300_000;

export const DAY_MS = 86_400_000;
export const HOUR_MS = 3_600_000;

// Slack on the interval gate so a timer tick a few ms early is still due
export const INTERVAL_GATE_SLACK_MS = 5 * 60_000;
