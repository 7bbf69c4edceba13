import { DAY_MS } from './constants';

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/** Calendar date (UTC) of an epoch-ms timestamp, as YYYY-MM-DD. */
export const toUtcDate = (ms: number): string => new Date(ms).toISOString().slice(0, 10);

export function isIsoDate(value: string): boolean {
    if (!DATE_RE.test(value)) return false;
    const ms = Date.parse(`${value}T00:00:00Z`);
    return !Number.isNaN(ms) && toUtcDate(ms) === value;
}

export const startOfUtcDay = (date: string): number => Date.parse(`${date}T00:00:00Z`);

export const endOfUtcDay = (date: string): number => startOfUtcDay(date) + DAY_MS - 1;
