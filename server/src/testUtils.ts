import type { Polygon } from 'geojson';
import { openDatabase } from './db';
import { MetadataStore } from './db/store';
import { setLogSink } from './log';
import type { Scene, SceneDescriptor } from './types';

export const silenceLogs = () => setLogSink(() => undefined);

export const squarePolygon = (minLon: number, minLat: number, maxLon: number, maxLat: number): Polygon => ({
    type: 'Polygon',
    coordinates: [[[minLon, minLat], [maxLon, minLat], [maxLon, maxLat], [minLon, maxLat], [minLon, minLat]]]
});

export const JUNE_15 = Date.UTC(2024, 5, 15, 10, 0, 0);

export function makeDescriptor(overrides: Partial<SceneDescriptor> = {}): SceneDescriptor {
    return {
        product_id: 'S2A_TEST_0001',
        acquired_at: JUNE_15,
        cloud_coverage: 10,
        footprint: squarePolygon(17.5, 48.3, 17.7, 48.45),
        center: { lon: 17.6, lat: 48.375 },
        assets: {},
        metadata: { platform: 'sentinel-2a' },
        ...overrides
    };
}

export function makeScene(overrides: Partial<Scene> = {}): Scene {
    return {
        ...makeDescriptor(),
        id: 1,
        acquisition_date: '2024-06-15',
        ingested_at: JUNE_15,
        updated_at: JUNE_15,
        ...overrides
    };
}

export function memoryStore(): MetadataStore {
    return new MetadataStore(openDatabase(':memory:'));
}
