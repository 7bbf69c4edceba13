import { INDEX_ACRONYMS, INDEX_TYPES } from './constants';
import { UnsupportedIndex } from './errors';
import type { IndexType } from './types';

export function isIndexType(value: string): value is IndexType {
    return INDEX_TYPES.some(t => t === value);
}

/**
 * Accepts the variant tag (`built_up`) or the usual acronym (`NDBI`), any case.
 */
export function parseIndexType(raw: string): IndexType {
    const value = raw.trim().toLowerCase().replace('-', '_');
    if (isIndexType(value)) return value;
    const fromAcronym = INDEX_ACRONYMS.get(value);
    if (fromAcronym) return fromAcronym;
    throw new UnsupportedIndex(raw);
}

export function assertNever(value: never): never {
    throw new UnsupportedIndex(String(value));
}
