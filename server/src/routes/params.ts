import { ValidationError } from '../errors';
import { isValidTile } from '../geo';
import { parseIndexType } from '../indexTypes';
import { isIsoDate } from '../time';
import type { IndexType } from '../types';

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === 'object' && v !== null && !Array.isArray(v);

/** Express query values may be arrays or nested objects; only a single string is accepted. */
function single(value: unknown, key: string): string | undefined {
    if (value === undefined) return undefined;
    if (typeof value !== 'string') throw new ValidationError(`${key} must be given once as plain text`);
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
}

export function requiredString(value: unknown, key: string): string {
    const v = single(value, key);
    if (v === undefined) throw new ValidationError(`${key} is required`);
    return v;
}

export const optionalString = (value: unknown, key: string): string | undefined => single(value, key);

export function optionalDate(value: unknown, key: string): string | undefined {
    const v = single(value, key);
    if (v !== undefined && !isIsoDate(v)) throw new ValidationError(`${key} must be a date as YYYY-MM-DD, got "${v}"`);
    return v;
}

export function requiredDate(value: unknown, key: string): string {
    const v = optionalDate(value, key);
    if (v === undefined) throw new ValidationError(`${key} is required`);
    return v;
}

/** Tag or acronym; falls back when the parameter is absent, throws when there is no fallback. */
export function indexTypeParam(value: unknown, fallback?: IndexType): IndexType {
    const v = single(value, 'index_type');
    if (v === undefined) {
        if (fallback) return fallback;
        throw new ValidationError('index_type is required');
    }
    return parseIndexType(v);
}

export function optionalIndexType(value: unknown): IndexType | undefined {
    const v = single(value, 'index_type');
    return v === undefined ? undefined : parseIndexType(v);
}

export function intParam(value: unknown, key: string, fallback: number, min: number, max: number): number {
    const v = single(value, key);
    if (v === undefined) return fallback;
    const n = Number(v);
    if (!Number.isInteger(n) || n < min || n > max) {
        throw new ValidationError(`${key} must be an integer between ${min} and ${max}, got "${v}"`);
    }
    return n;
}

export function optionalNumber(value: unknown, key: string, min: number, max: number): number | undefined {
    const v = single(value, key);
    if (v === undefined) return undefined;
    const n = Number(v);
    if (!Number.isFinite(n) || n < min || n > max) {
        throw new ValidationError(`${key} must be a number between ${min} and ${max}, got "${v}"`);
    }
    return n;
}

export function tileParams(z: string, x: string, y: string): { z: number; x: number; y: number } {
    const coords = { z: Number(z), x: Number(x), y: Number(y) };
    if (![z, x, y].every(s => /^\d+$/.test(s)) || !isValidTile(coords.z, coords.x, coords.y)) {
        throw new ValidationError(`Invalid tile ${z}/${x}/${y}`);
    }
    return coords;
}

/** `force` from a JSON body; absent means false. */
export function forceFlag(body: unknown): boolean {
    if (!isRecord(body) || body.force === undefined) return false;
    if (typeof body.force !== 'boolean') throw new ValidationError('force must be true or false');
    return body.force;
}

export function bodyString(body: unknown, key: string): string {
    const v = isRecord(body) ? body[key] : undefined;
    if (typeof v !== 'string' || v.trim() === '') throw new ValidationError(`${key} is required`);
    return v.trim();
}
