import type { Polygon } from 'geojson';
import type { ProviderConfig } from '../config';
import { TOKEN_EXPIRY_MARGIN_MS } from '../constants';
import type { MetadataStore } from '../db/store';
import { AuthExpired, describeError, isPipelineError, ProviderUnavailable, RunCancelled } from '../errors';
import { polygonCenter } from '../geo';
import { createLogger } from '../log';
import type { BandName, Scene, SceneDescriptor } from '../types';

const log = createLogger('CATALOG');

const BAND_NAMES: BandName[] = ['B03', 'B04', 'B08', 'B11'];

export interface CatalogDeps {
    fetch?: typeof fetch;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
    now?: () => number;
}

export interface RequestOptions {
    signal?: AbortSignal;
    deadline?: number;
}

/** A 429 or 5xx response, worth another attempt. */
class RetryableResponse extends Error {
    constructor(readonly status: number, readonly retryAfterMs: number | null) {
        super(`HTTP ${status}`);
    }
}

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === 'object' && v !== null && !Array.isArray(v);

export function parseRetryAfter(header: string | null, now: number): number | null {
    if (!header) return null;
    const seconds = Number(header);
    if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
    const at = Date.parse(header);
    return Number.isNaN(at) ? null : Math.max(0, at - now);
}

function toPolygon(geometry: unknown): Polygon | null {
    if (!isRecord(geometry) || !Array.isArray(geometry.coordinates)) return null;
    if (geometry.type === 'Polygon') {
        return { type: 'Polygon', coordinates: geometry.coordinates };
    }
    // Multi-part footprints keep their first part
    if (geometry.type === 'MultiPolygon' && Array.isArray(geometry.coordinates[0])) {
        return { type: 'Polygon', coordinates: geometry.coordinates[0] };
    }
    return null;
}

function assetHrefs(assets: unknown): Partial<Record<BandName, string>> {
    const hrefs: Partial<Record<BandName, string>> = {};
    if (!isRecord(assets)) return hrefs;
    for (const band of BAND_NAMES) {
        const asset = [assets[band], assets[`${band}_10m`], assets[`${band}_20m`]].find(isRecord);
        if (asset && typeof asset.href === 'string') hrefs[band] = asset.href;
    }
    return hrefs;
}

/**
 * Maps one STAC item to a scene descriptor, or null when it lacks an id, time, cloud cover or footprint.
 */
export function parseFeature(feature: unknown): SceneDescriptor | null {
    if (!isRecord(feature) || typeof feature.id !== 'string' || !isRecord(feature.properties)) return null;
    const props = feature.properties;
    const acquiredAt = typeof props.datetime === 'string' ? Date.parse(props.datetime) : NaN;
    const cloud = props['eo:cloud_cover'];
    const footprint = toPolygon(feature.geometry);
    if (Number.isNaN(acquiredAt) || typeof cloud !== 'number' || cloud < 0 || cloud > 100 || !footprint) return null;

    return {
        product_id: feature.id,
        acquired_at: acquiredAt,
        cloud_coverage: cloud,
        footprint,
        center: polygonCenter(footprint),
        assets: assetHrefs(feature.assets),
        metadata: { ...props }
    };
}

const byAcquisition = (a: SceneDescriptor, b: SceneDescriptor) =>
    a.acquired_at - b.acquired_at || (a.product_id < b.product_id ? -1 : a.product_id > b.product_id ? 1 : 0);

/** Frees the connection behind a response whose body will not be read. */
async function discard(res: Response): Promise<void> {
    if (!res.body || res.bodyUsed) return;
    await res.body.cancel();
}

/**
 * Client for the imagery provider's catalog: token caching, paged STAC search and retrying requests.
 */
export class CatalogClient {
    private token: { value: string; expiresAt: number } | null = null;
    private readonly fetchImpl: typeof fetch;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly random: () => number;
    private readonly now: () => number;

    constructor(private readonly config: ProviderConfig, private readonly store: MetadataStore, deps: CatalogDeps = {}) {
        this.fetchImpl = deps.fetch ?? fetch;
        this.sleep = deps.sleep ?? (ms => new Promise(r => setTimeout(r, ms)));
        this.random = deps.random ?? Math.random;
        this.now = deps.now ?? Date.now;
    }

    /**
     * Exponential backoff plus up to one base delay of jitter, raised to any Retry-After, capped at the maximum.
     */
    backoffDelay(attempt: number, retryAfterMs: number | null = null): number {
        const { baseDelayMs, maxDelayMs } = this.config;
        const exp = baseDelayMs * 2 ** (attempt - 1) + this.random() * baseDelayMs;
        return Math.min(maxDelayMs, Math.max(exp, retryAfterMs ?? 0));
    }

    async getAccessToken(): Promise<string> {
        if (this.token && this.now() < this.token.expiresAt) return this.token.value;

        const res = await this.fetchImpl(this.config.tokenUrl, {
            method: 'POST',
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            body: new URLSearchParams({
                grant_type: 'client_credentials',
                client_id: this.config.clientId,
                client_secret: this.config.clientSecret
            }),
            signal: AbortSignal.timeout(this.config.requestTimeoutMs)
        });
        if (!res.ok) await discard(res);
        if (res.status === 429 || res.status >= 500) {
            throw new RetryableResponse(res.status, parseRetryAfter(res.headers.get('retry-after'), this.now()));
        }
        if (!res.ok) throw new AuthExpired(`Token endpoint rejected the client credentials (HTTP ${res.status})`);

        const body: unknown = await res.json();
        if (!isRecord(body) || typeof body.access_token !== 'string') {
            throw new ProviderUnavailable('Token endpoint returned no access_token');
        }
        const expiresIn = typeof body.expires_in === 'number' ? body.expires_in : 3600;
        this.token = {
            value: body.access_token,
            expiresAt: this.now() + Math.max(0, expiresIn * 1000 - TOKEN_EXPIRY_MARGIN_MS)
        };
        log.info('Obtained provider access token');
        return this.token.value;
    }

    /**
     * Authorized request with retry on 429/5xx/network failures and a single re-authentication on 401.
     */
    async request(url: string, init: RequestInit, options: RequestOptions = {}): Promise<Response> {
        const { maxAttempts, requestTimeoutMs } = this.config;
        let attempt = 0;
        let reauthenticated = false;

        while (true) {
            if (options.signal?.aborted) throw new RunCancelled('Run cancelled while waiting on the provider');
            attempt++;
            let retryAfter: number | null = null;
            let lastError: unknown;

            try {
                const headers = new Headers(init.headers);
                headers.set('Authorization', `Bearer ${await this.getAccessToken()}`);
                const res = await this.fetchImpl(url, { ...init, headers, signal: AbortSignal.timeout(requestTimeoutMs) });
                if (!res.ok) await discard(res);
                if (res.status === 401) {
                    if (!reauthenticated) {
                        reauthenticated = true;
                        this.token = null;
                        attempt--;
                        log.warn('Access token rejected, re-authenticating once');
                        continue;
                    }
                    throw new AuthExpired();
                }
                if (res.status === 429 || res.status >= 500) {
                    throw new RetryableResponse(res.status, parseRetryAfter(res.headers.get('retry-after'), this.now()));
                }
                if (!res.ok) throw new ProviderUnavailable(`Provider returned HTTP ${res.status} for ${url}`);
                return res;
            } catch (e) {
                if (e instanceof AuthExpired) {
                    throw new ProviderUnavailable(`Provider authorization failed: ${e.message}`, { cause: e });
                }
                if (isPipelineError(e)) throw e;
                lastError = e;
                if (e instanceof RetryableResponse) retryAfter = e.retryAfterMs;
            }

            if (attempt >= maxAttempts) {
                throw new ProviderUnavailable(`Provider unavailable after ${attempt} attempts: ${describeError(lastError)}`, { cause: lastError });
            }
            const delay = this.backoffDelay(attempt, retryAfter);
            if (options.deadline !== undefined && this.now() + delay > options.deadline) {
                throw new ProviderUnavailable(`Provider call deadline exceeded after ${attempt} attempts: ${describeError(lastError)}`, { cause: lastError });
            }
            log.warn(`Attempt ${attempt} failed (${describeError(lastError)}), retrying in ${Math.round(delay)}ms`);
            await this.sleep(delay);
        }
    }

    /**
     * Pages through the catalog until exhausted or the configured item cap is reached.
     * On ProviderUnavailable the error carries the scenes fetched so far.
     */
    async search(aoi: Polygon, dateFrom: Date, dateTo: Date, maxCloudCoverage: number, signal?: AbortSignal): Promise<SceneDescriptor[]> {
        const { baseUrl, collection, pageSize, maxItems, searchTimeoutMs } = this.config;
        const deadline = this.now() + searchTimeoutMs;
        const found = new Map<string, SceneDescriptor>();
        let next: unknown = undefined;
        let page = 0;

        log.info(`Searching ${collection} ${dateFrom.toISOString()} .. ${dateTo.toISOString()}, cloud <= ${maxCloudCoverage}%`);

        try {
            while (found.size < maxItems) {
                page++;
                const body: Record<string, unknown> = {
                    collections: [collection],
                    intersects: aoi,
                    datetime: `${dateFrom.toISOString()}/${dateTo.toISOString()}`,
                    limit: Math.min(pageSize, maxItems - found.size),
                    filter: `eo:cloud_cover <= ${maxCloudCoverage}`,
                    'filter-lang': 'cql2-text'
                };
                if (next !== undefined) body.next = next;

                const res = await this.request(`${baseUrl}/search`, {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json', Accept: 'application/geo+json' },
                    body: JSON.stringify(body)
                }, { signal, deadline });
                const json: unknown = await res.json();
                const features = isRecord(json) && Array.isArray(json.features) ? json.features : [];

                let skipped = 0;
                for (const feature of features) {
                    const scene = parseFeature(feature);
                    if (!scene || scene.cloud_coverage > maxCloudCoverage) {
                        skipped++;
                        continue;
                    }
                    if (found.size < maxItems) found.set(scene.product_id, scene);
                }
                if (skipped > 0) log.warn(`Page ${page}: skipped ${skipped} unusable or too cloudy items`);

                next = isRecord(json) && isRecord(json.context) ? json.context.next : undefined;
                if (next === undefined || next === null || features.length === 0) break;
            }
        } catch (e) {
            if (e instanceof ProviderUnavailable) {
                const partial = [...found.values()].sort(byAcquisition);
                throw new ProviderUnavailable(e.message, { cause: e.cause, partial });
            }
            throw e;
        }

        const scenes = [...found.values()].sort(byAcquisition);
        log.info(`Found ${scenes.length} scenes in ${page} page(s)`);
        return scenes;
    }

    async download(href: string, signal?: AbortSignal): Promise<ArrayBuffer> {
        const res = await this.request(href, { method: 'GET' }, { signal });
        return res.arrayBuffer();
    }

    /**
     * Drops scenes already stored (and duplicates within the batch). Repeated runs stay idempotent through this.
     */
    filterNew(scenes: SceneDescriptor[]): SceneDescriptor[] {
        const unique = new Map(scenes.map(s => [s.product_id, s]));
        const existing = this.store.existingProductIds([...unique.keys()]);
        return [...unique.values()].filter(s => !existing.has(s.product_id));
    }

    ingest(scenes: SceneDescriptor[]): Scene[] {
        return scenes.map(s => this.store.upsertScene(s, this.now()));
    }
}
