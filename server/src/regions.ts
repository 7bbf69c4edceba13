import fs from 'fs';
import type { Polygon } from 'geojson';
import { ValidationError } from './errors';
import type { Region } from './types';

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === 'object' && v !== null && !Array.isArray(v);

const isPosition = (v: unknown): v is [number, number] =>
    Array.isArray(v) && v.length >= 2 && typeof v[0] === 'number' && typeof v[1] === 'number';

function toPolygon(geometry: unknown, name: string): Polygon {
    if (!isRecord(geometry) || geometry.type !== 'Polygon' || !Array.isArray(geometry.coordinates)) {
        throw new ValidationError(`Region "${name}" must have a Polygon geometry`);
    }
    const rings: [number, number][][] = [];
    for (const ring of geometry.coordinates) {
        if (!Array.isArray(ring) || ring.length < 4 || !ring.every(isPosition)) {
            throw new ValidationError(`Region "${name}" has an invalid ring`);
        }
        rings.push(ring.map(([lon, lat]) => [lon, lat]));
    }
    if (rings.length === 0) throw new ValidationError(`Region "${name}" has no rings`);
    return { type: 'Polygon', coordinates: rings };
}

/**
 * Reads named region polygons from a GeoJSON FeatureCollection whose features carry a `name` property.
 */
export function parseRegions(json: unknown): Region[] {
    if (!isRecord(json) || json.type !== 'FeatureCollection' || !Array.isArray(json.features)) {
        throw new ValidationError('Regions file must be a GeoJSON FeatureCollection');
    }
    const seen = new Set<string>();
    return json.features.map((feature, i) => {
        const props = isRecord(feature) && isRecord(feature.properties) ? feature.properties : {};
        const name = typeof props.name === 'string' ? props.name.trim() : '';
        if (!name) throw new ValidationError(`Region feature #${i} has no name`);
        if (seen.has(name)) throw new ValidationError(`Duplicate region name "${name}"`);
        seen.add(name);
        return { name, polygon: toPolygon(isRecord(feature) ? feature.geometry : null, name) };
    });
}

export function loadRegions(file: string): Region[] {
    return parseRegions(JSON.parse(fs.readFileSync(file, 'utf8')));
}
