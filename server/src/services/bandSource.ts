import { fromArrayBuffer, type GeoTIFFImage } from 'geotiff';
import { BandMismatch } from '../errors';
import { createLogger } from '../log';
import type { BandPair, IndexType, Raster, Scene } from '../types';
import { definitionFor } from './indexCalculator';

const log = createLogger('BANDS');

/**
 * Supplies the two band rasters an index needs, or null when the scene has no usable assets.
 */
export interface BandSource {
    fetchBands(scene: Scene, indexType: IndexType, signal?: AbortSignal): Promise<BandPair | null>;
}

export type Download = (href: string, signal?: AbortSignal) => Promise<ArrayBuffer>;

/** Scales (width, height) so the longer side is at most `maxSize`, keeping the aspect ratio. */
export function targetSize(width: number, height: number, maxSize: number): { width: number; height: number } {
    const scale = Math.min(1, maxSize / Math.max(width, height));
    return { width: Math.max(1, Math.round(width * scale)), height: Math.max(1, Math.round(height * scale)) };
}

async function openImage(buffer: ArrayBuffer): Promise<GeoTIFFImage> {
    const tiff = await fromArrayBuffer(buffer);
    return tiff.getImage();
}

export async function readBand(image: GeoTIFFImage, size: { width: number; height: number }): Promise<Raster> {
    const rasters = await image.readRasters({ samples: [0], width: size.width, height: size.height, resampleMethod: 'bilinear' });
    const band = rasters[0];
    if (typeof band === 'number') throw new BandMismatch('GeoTIFF returned interleaved samples');
    return { width: rasters.width, height: rasters.height, data: band, noData: image.getGDALNoData() };
}

/**
 * Downloads the band assets of a scene as GeoTIFF/COG and resamples both onto a common grid.
 * Bands at different resolutions (10 m vs 20 m) are read at the coarser one.
 */
export class GeoTiffBandSource implements BandSource {
    constructor(private readonly download: Download, private readonly maxSize = 1024) {}

    async fetchBands(scene: Scene, indexType: IndexType, signal?: AbortSignal): Promise<BandPair | null> {
        const { bands, acronym } = definitionFor(indexType);
        const hrefA = scene.assets[bands.a];
        const hrefB = scene.assets[bands.b];
        if (!hrefA || !hrefB) {
            log.warn(`${scene.product_id} has no ${bands.a}/${bands.b} assets for ${acronym}`);
            return null;
        }

        const done = log.time(`Read ${bands.a}/${bands.b} for ${scene.product_id}`);
        const [bufA, bufB] = await Promise.all([this.download(hrefA, signal), this.download(hrefB, signal)]);
        const [imageA, imageB] = await Promise.all([openImage(bufA), openImage(bufB)]);
        const size = targetSize(
            Math.min(imageA.getWidth(), imageB.getWidth()),
            Math.min(imageA.getHeight(), imageB.getHeight()),
            this.maxSize
        );
        const [a, b] = await Promise.all([readBand(imageA, size), readBand(imageB, size)]);
        done();
        return { a, b };
    }
}
