import path from 'path';
import { bboxPolygon } from '@turf/turf';
import type { Polygon } from 'geojson';
import { INDEX_TYPES } from './constants';
import { ValidationError } from './errors';
import { parseIndexType } from './indexTypes';
import type { IndexType } from './types';

export interface ProviderConfig {
    baseUrl: string;
    tokenUrl: string;
    clientId: string;
    clientSecret: string;
    collection: string;
    pageSize: number;
    maxItems: number;
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    requestTimeoutMs: number;
    searchTimeoutMs: number;
}

export interface SchedulerConfig {
    enabled: boolean;
    intervalHours: number;
    maxRunMs: number;
    staleRunGraceMs: number;
    historicalBackfill: boolean;
}

export interface PipelineConfig {
    aoi: Polygon;
    maxCloudCoverage: number;
    lookbackDays: number;
    historicalDays: number;
    indexTypes: IndexType[];
    fetchBands: boolean;
    sceneConcurrency: number;
}

export interface AppConfig {
    port: number;
    dbPath: string;
    regionsFile: string;
    tileCacheSize: number;
    scheduler: SchedulerConfig;
    pipeline: PipelineConfig;
    provider: ProviderConfig;
}

type Env = Record<string, string | undefined>;

const DEFAULT_AOI_BBOX = '17.4,48.25,17.9,48.55';

function readInt(env: Env, key: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = Number(raw);
    if (!Number.isInteger(n) || n < min || n > max) {
        throw new ValidationError(`${key} must be an integer between ${min} and ${max}, got "${raw}"`);
    }
    return n;
}

function readNumber(env: Env, key: string, fallback: number, min: number, max: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = Number(raw);
    if (!Number.isFinite(n) || n < min || n > max) {
        throw new ValidationError(`${key} must be a number between ${min} and ${max}, got "${raw}"`);
    }
    return n;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
    const raw = env[key]?.trim().toLowerCase();
    if (raw === undefined || raw === '') return fallback;
    if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
    if (['0', 'false', 'no', 'off'].includes(raw)) return false;
    throw new ValidationError(`${key} must be a boolean, got "${env[key]}"`);
}

export function parseBbox(raw: string, key = 'bbox'): [number, number, number, number] {
    const parts = raw.split(',').map(p => Number(p.trim()));
    if (parts.length !== 4 || parts.some(p => !Number.isFinite(p))) {
        throw new ValidationError(`${key} must be "min_lon,min_lat,max_lon,max_lat"`);
    }
    const [minLon, minLat, maxLon, maxLat] = parts;
    if (minLon < -180 || maxLon > 180 || minLat < -90 || maxLat > 90) {
        throw new ValidationError(`${key} is outside WGS84 bounds`);
    }
    if (maxLon <= minLon || maxLat <= minLat) {
        throw new ValidationError(`${key} max must be greater than min`);
    }
    return [minLon, minLat, maxLon, maxLat];
}

function readIndexTypes(env: Env): IndexType[] {
    const raw = env.INDEX_TYPES;
    if (!raw || raw.trim() === '') return [...INDEX_TYPES];
    const parsed = raw.split(',').map(parseIndexType);
    return [...new Set(parsed)];
}

/**
 * Builds the configuration every component receives. Nothing else reads the environment.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const aoiBbox = parseBbox(env.AOI_BBOX ?? DEFAULT_AOI_BBOX, 'AOI_BBOX');
    const baseUrl = (env.PROVIDER_BASE_URL ?? 'https://sh.dataspace.copernicus.eu/api/v1/catalog/1.0.0').replace(/\/+$/, '');

    return {
        port: readInt(env, 'PORT', 3001, 1, 65535),
        dbPath: env.DB_PATH ?? path.resolve(process.cwd(), 'indices.db'),
        regionsFile: env.REGIONS_FILE ?? path.resolve(process.cwd(), 'server/data/regions.json'),
        tileCacheSize: readInt(env, 'TILE_CACHE_SIZE', 1000, 1),
        scheduler: {
            enabled: readBool(env, 'SCHEDULER_ENABLED', true),
            intervalHours: readInt(env, 'SCHEDULER_INTERVAL_HOURS', 6, 1, 24),
            maxRunMs: readInt(env, 'MAX_RUN_MINUTES', 30, 1) * 60_000,
            staleRunGraceMs: readInt(env, 'STALE_RUN_GRACE_MINUTES', 60, 1) * 60_000,
            historicalBackfill: readBool(env, 'PROCESS_HISTORICAL_DATA', false)
        },
        pipeline: {
            aoi: bboxPolygon(aoiBbox).geometry,
            maxCloudCoverage: readNumber(env, 'MAX_CLOUD_COVERAGE', 30, 0, 100),
            lookbackDays: readInt(env, 'LOOKBACK_DAYS', 3, 1, 366),
            historicalDays: readInt(env, 'HISTORICAL_DAYS', 30, 1, 3660),
            indexTypes: readIndexTypes(env),
            fetchBands: readBool(env, 'FETCH_BANDS', false),
            sceneConcurrency: readInt(env, 'SCENE_CONCURRENCY', 4, 1, 64)
        },
        provider: {
            baseUrl,
            tokenUrl: env.PROVIDER_TOKEN_URL ?? 'https://identity.dataspace.copernicus.eu/auth/realms/CDSE/protocol/openid-connect/token',
            clientId: env.PROVIDER_CLIENT_ID ?? '',
            clientSecret: env.PROVIDER_CLIENT_SECRET ?? '',
            collection: env.PROVIDER_COLLECTION ?? 'sentinel-2-l2a',
            pageSize: readInt(env, 'PROVIDER_PAGE_SIZE', 50, 1, 1000),
            maxItems: readInt(env, 'PROVIDER_MAX_ITEMS', 500, 1),
            maxAttempts: readInt(env, 'PROVIDER_MAX_ATTEMPTS', 5, 1, 20),
            baseDelayMs: readInt(env, 'PROVIDER_BASE_DELAY_MS', 1000, 0),
            maxDelayMs: readInt(env, 'PROVIDER_MAX_DELAY_MS', 30_000, 0),
            requestTimeoutMs: readInt(env, 'PROVIDER_REQUEST_TIMEOUT_MS', 30_000, 1),
            searchTimeoutMs: readInt(env, 'PROVIDER_SEARCH_TIMEOUT_MS', 120_000, 1)
        }
    };
}
