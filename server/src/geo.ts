import { bbox as turfBbox, bboxPolygon, booleanIntersects, booleanPointInPolygon, centroid, point } from '@turf/turf';
import type { Polygon } from 'geojson';

export type Bbox = [number, number, number, number];

export function polygonBbox(polygon: Polygon): Bbox {
    const [minLon, minLat, maxLon, maxLat] = turfBbox(polygon);
    return [minLon, minLat, maxLon, maxLat];
}

export function polygonCenter(polygon: Polygon): { lon: number; lat: number } {
    const [lon, lat] = centroid(polygon).geometry.coordinates;
    return { lon, lat };
}

export const intersects = (a: Polygon, b: Polygon): boolean => booleanIntersects(a, b);

export const containsPoint = (polygon: Polygon, lon: number, lat: number): boolean => booleanPointInPolygon(point([lon, lat]), polygon);

export const bboxToPolygon = (bbox: Bbox): Polygon => bboxPolygon(bbox).geometry;

const lonOf = (x: number, n: number) => (x / n) * 360 - 180;
const latOf = (y: number, n: number) => (Math.atan(Math.sinh(Math.PI * (1 - (2 * y) / n))) * 180) / Math.PI;

/**
 * WGS84 bounds of an XYZ (Web Mercator) tile as [min_lon, min_lat, max_lon, max_lat].
 */
export function tileBounds(z: number, x: number, y: number): Bbox {
    const n = 2 ** z;
    return [lonOf(x, n), latOf(y + 1, n), lonOf(x + 1, n), latOf(y, n)];
}

/**
 * Lon/lat of the centre of pixel (px, py) in a tile rendered `size` pixels wide.
 */
export function pixelCenter(z: number, x: number, y: number, px: number, py: number, size: number): [number, number] {
    const n = 2 ** z;
    return [lonOf(x + (px + 0.5) / size, n), latOf(y + (py + 0.5) / size, n)];
}

export function isValidTile(z: number, x: number, y: number): boolean {
    if (!Number.isInteger(z) || !Number.isInteger(x) || !Number.isInteger(y)) return false;
    if (z < 0 || z > 24) return false;
    const n = 2 ** z;
    return x >= 0 && x < n && y >= 0 && y < n;
}

/** Squared planar distance in degrees; good enough to rank nearby scenes. */
export const distance2 = (a: { lon: number; lat: number }, b: { lon: number; lat: number }): number =>
    (a.lon - b.lon) ** 2 + (a.lat - b.lat) ** 2;
