import type { Polygon } from 'geojson';
import sharp from 'sharp';
import { TILE_ALPHA, TILE_SIZE, type Rgb } from '../constants';
import type { MetadataStore } from '../db/store';
import { ValidationError } from '../errors';
import { bboxToPolygon, containsPoint, distance2, intersects, isValidTile, pixelCenter, polygonBbox, tileBounds } from '../geo';
import { createLogger } from '../log';
import { isIsoDate } from '../time';
import type { IndexType, Region } from '../types';
import { definitionFor } from './indexCalculator';

const log = createLogger('TILES');

/**
 * Piecewise-linear interpolation over ascending ramp stops, clamped to the end colours.
 */
export function rampColor(ramp: [number, Rgb][], value: number): Rgb {
    const [firstValue, firstColor] = ramp[0];
    if (value <= firstValue) return firstColor;
    for (let i = 1; i < ramp.length; i++) {
        const [upper, to] = ramp[i];
        if (value <= upper) {
            const [lower, from] = ramp[i - 1];
            const t = (value - lower) / (upper - lower);
            const mix = (c: number) => Math.round(from[c] + t * (to[c] - from[c]));
            return [mix(0), mix(1), mix(2)];
        }
    }
    return ramp[ramp.length - 1][1];
}

interface Fill {
    polygon: Polygon;
    value: number;
}

interface CacheEntry {
    png: Buffer;
    source: string;
    date: string;
    indexType: IndexType;
}

export interface TileResult {
    png: Buffer;
    /** `region:<names>` or `scene:<product id>`; null for an empty tile. */
    source: string | null;
    cached: boolean;
}

export interface TileRendererOptions {
    cacheSize: number;
}

/**
 * Renders XYZ PNG tiles of one index on one date, coloured by region statistics where a region with
 * data overlaps the tile and by the nearest scene result otherwise.
 */
export class TileRenderer {
    private readonly cache = new Map<string, CacheEntry>();
    // Bumped on every write to a (date, index) pair so renders that raced a write are not cached
    private readonly generations = new Map<string, number>();
    private transparent: Promise<Buffer> | null = null;
    private readonly unsubscribe: (() => void)[];

    constructor(private readonly store: MetadataStore, private readonly regions: Region[], private readonly options: TileRendererOptions) {
        this.unsubscribe = [
            store.onRegionStatisticWritten(e => this.invalidate(e.date, e.index_type)),
            store.onIndexResultWritten(e => this.invalidate(e.date, e.index_type))
        ];
    }

    static key(z: number, x: number, y: number, date: string, indexType: IndexType): string {
        return `${z}/${x}/${y}/${date}/${indexType}`;
    }

    /** Drops every cached tile of the (date, index) pair; any new value may change which source wins. */
    invalidate(date: string, indexType: IndexType): number {
        const pair = `${date}/${indexType}`;
        this.generations.set(pair, (this.generations.get(pair) ?? 0) + 1);
        let dropped = 0;
        for (const [key, entry] of this.cache) {
            if (entry.date === date && entry.indexType === indexType) {
                this.cache.delete(key);
                dropped++;
            }
        }
        if (dropped > 0) log.info(`Invalidated ${dropped} cached tiles for ${indexType} on ${date}`);
        return dropped;
    }

    cacheStats() {
        return { size: this.cache.size, max: this.options.cacheSize };
    }

    close(): void {
        this.unsubscribe.forEach(fn => fn());
        this.cache.clear();
    }

    async renderTile(z: number, x: number, y: number, date: string, indexType: IndexType): Promise<TileResult> {
        if (!isValidTile(z, x, y)) throw new ValidationError(`Invalid tile coordinates ${z}/${x}/${y}`);
        if (!isIsoDate(date)) throw new ValidationError(`Invalid date "${date}", expected YYYY-MM-DD`);

        const key = TileRenderer.key(z, x, y, date, indexType);
        const hit = this.cache.get(key);
        if (hit) {
            // Re-insert to keep the map in least-recently-used order
            this.cache.delete(key);
            this.cache.set(key, hit);
            return { png: hit.png, source: hit.source, cached: true };
        }

        const generation = this.generations.get(`${date}/${indexType}`) ?? 0;
        const resolved = this.resolveFills(z, x, y, date, indexType);
        if (!resolved) return { png: await this.transparentTile(), source: null, cached: false };

        const png = await this.rasterize(z, x, y, indexType, resolved.fills);
        if ((this.generations.get(`${date}/${indexType}`) ?? 0) === generation) {
            this.remember(key, { png, source: resolved.source, date, indexType });
        }
        return { png, source: resolved.source, cached: false };
    }

    private resolveFills(z: number, x: number, y: number, date: string, indexType: IndexType): { fills: Fill[]; source: string } | null {
        const bounds = tileBounds(z, x, y);
        const tile = bboxToPolygon(bounds);

        const regionFills: { name: string; fill: Fill }[] = [];
        for (const region of this.regions) {
            if (!intersects(region.polygon, tile)) continue;
            const aggregate = this.store.getRegionStatistic(region.name, date)?.indices[indexType];
            if (aggregate) regionFills.push({ name: region.name, fill: { polygon: region.polygon, value: aggregate.mean } });
        }
        if (regionFills.length > 0) {
            return { fills: regionFills.map(r => r.fill), source: `region:${regionFills.map(r => r.name).join(',')}` };
        }

        const center = { lon: (bounds[0] + bounds[2]) / 2, lat: (bounds[1] + bounds[3]) / 2 };
        const candidates = this.store.indexResultsOnDate(date, indexType, bounds).filter(c => intersects(c.scene.footprint, tile));
        if (candidates.length === 0) return null;
        const nearest = candidates.reduce((best, c) => (distance2(c.scene.center, center) < distance2(best.scene.center, center) ? c : best));
        return { fills: [{ polygon: nearest.scene.footprint, value: nearest.result.mean }], source: `scene:${nearest.scene.product_id}` };
    }

    private async rasterize(z: number, x: number, y: number, indexType: IndexType, fills: Fill[]): Promise<Buffer> {
        const { ramp } = definitionFor(indexType);
        const pixels = Buffer.alloc(TILE_SIZE * TILE_SIZE * 4);

        for (const { polygon, value } of fills) {
            const [r, g, b] = rampColor(ramp, value);
            const [minLon, minLat, maxLon, maxLat] = polygonBbox(polygon);
            for (let py = 0; py < TILE_SIZE; py++) {
                for (let px = 0; px < TILE_SIZE; px++) {
                    const [lon, lat] = pixelCenter(z, x, y, px, py, TILE_SIZE);
                    if (lon < minLon || lon > maxLon || lat < minLat || lat > maxLat) continue;
                    if (!containsPoint(polygon, lon, lat)) continue;
                    const i = (py * TILE_SIZE + px) * 4;
                    pixels[i] = r;
                    pixels[i + 1] = g;
                    pixels[i + 2] = b;
                    pixels[i + 3] = TILE_ALPHA;
                }
            }
        }
        return encodePng(pixels);
    }

    private remember(key: string, entry: CacheEntry): void {
        this.cache.set(key, entry);
        while (this.cache.size > this.options.cacheSize) {
            const oldest = this.cache.keys().next();
            if (oldest.done) break;
            this.cache.delete(oldest.value);
        }
    }

    private transparentTile(): Promise<Buffer> {
        if (!this.transparent) this.transparent = encodePng(Buffer.alloc(TILE_SIZE * TILE_SIZE * 4));
        return this.transparent;
    }
}

function encodePng(pixels: Buffer): Promise<Buffer> {
    return sharp(pixels, { raw: { width: TILE_SIZE, height: TILE_SIZE, channels: 4 } }).png().toBuffer();
}
