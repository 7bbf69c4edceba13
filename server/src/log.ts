export type LogLevel = 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
};

let sink: LogSink = consoleSink;

export const setLogSink = (next: LogSink | null) => {
    sink = next ?? consoleSink;
};

export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string, err?: unknown): void;
    /** Starts a timer; calling the returned function logs the label with the elapsed time. */
    time(label: string): () => number;
}

export function createLogger(tag: string): Logger {
    const emit = (level: LogLevel, message: string) => sink(level, `[${tag}] ${message}`);
    return {
        info: message => emit('info', message),
        warn: message => emit('warn', message),
        error: (message, err) => emit('error', err === undefined ? message : `${message}: ${err instanceof Error ? err.message : String(err)}`),
        time: label => {
            const started = Date.now();
            return () => {
                const elapsed = Date.now() - started;
                emit('info', `${label}: ${elapsed}ms`);
                return elapsed;
            };
        }
    };
}
