import type { RunErrorRecord, SceneDescriptor } from './types';

export type ErrorCode =
    | 'PROVIDER_UNAVAILABLE'
    | 'AUTH_EXPIRED'
    | 'BAND_MISMATCH'
    | 'UNSUPPORTED_INDEX'
    | 'ALREADY_RUNNING'
    | 'RUN_NOT_DUE'
    | 'RUN_TIMEOUT'
    | 'RUN_CANCELLED'
    | 'STORAGE_UNAVAILABLE'
    | 'NOT_FOUND'
    | 'VALIDATION';

export class PipelineError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export class ProviderUnavailable extends PipelineError {
    /** Scenes fetched before the provider gave up. */
    readonly partial: SceneDescriptor[];

    constructor(message: string, options?: { cause?: unknown; partial?: SceneDescriptor[] }) {
        super('PROVIDER_UNAVAILABLE', message, options);
        this.partial = options?.partial ?? [];
    }
}

export class AuthExpired extends PipelineError {
    constructor(message = 'Provider rejected the access token', options?: { cause?: unknown }) {
        super('AUTH_EXPIRED', message, options);
    }
}

export class BandMismatch extends PipelineError {
    constructor(message: string) {
        super('BAND_MISMATCH', message);
    }
}

export class UnsupportedIndex extends PipelineError {
    constructor(readonly value: string) {
        super('UNSUPPORTED_INDEX', `Unsupported index type: ${value}`);
    }
}

export class AlreadyRunning extends PipelineError {
    constructor(readonly activeRunId: number | null = null) {
        super('ALREADY_RUNNING', activeRunId === null ? 'A pipeline run is already in progress' : `Pipeline run ${activeRunId} is already in progress`);
    }
}

export class RunNotDue extends PipelineError {
    constructor(readonly dueAt: number) {
        super('RUN_NOT_DUE', `Next run is not due before ${new Date(dueAt).toISOString()}`);
    }
}

export class RunTimeout extends PipelineError {
    constructor(limitMs: number) {
        super('RUN_TIMEOUT', `Run exceeded the maximum duration of ${limitMs} ms`);
    }
}

export class RunCancelled extends PipelineError {
    constructor(message = 'Run was cancelled') {
        super('RUN_CANCELLED', message);
    }
}

export class StorageUnavailable extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('STORAGE_UNAVAILABLE', message, options);
    }
}

export class NotFound extends PipelineError {
    constructor(message: string) {
        super('NOT_FOUND', message);
    }
}

export class ValidationError extends PipelineError {
    constructor(message: string) {
        super('VALIDATION', message);
    }
}

export const isPipelineError = (e: unknown): e is PipelineError => e instanceof PipelineError;

export function describeError(e: unknown): string {
    if (e instanceof Error) return e.message;
    return String(e);
}

export function toRunError(e: unknown, scope: string): RunErrorRecord {
    return {
        code: isPipelineError(e) ? e.code : 'UNKNOWN',
        message: describeError(e),
        scope
    };
}

export function httpStatusFor(e: unknown): number {
    if (!isPipelineError(e)) return 500;
    switch (e.code) {
        case 'ALREADY_RUNNING':
        case 'RUN_NOT_DUE':
            return 409;
        case 'NOT_FOUND':
            return 404;
        case 'VALIDATION':
        case 'UNSUPPORTED_INDEX':
        case 'BAND_MISMATCH':
            return 400;
        case 'PROVIDER_UNAVAILABLE':
        case 'AUTH_EXPIRED':
        case 'STORAGE_UNAVAILABLE':
            return 503;
        case 'RUN_TIMEOUT':
        case 'RUN_CANCELLED':
            return 500;
    }
}
