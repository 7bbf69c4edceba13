import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import { describeError, httpStatusFor, isPipelineError } from './errors';
import { createLogger } from './log';
import { createApiRouter, type ApiDeps } from './routes/api';

const log = createLogger('SERVER');

export interface ErrorBody {
    success: false;
    error: string;
    message: string;
    status_code: number;
}

const isBodyParseError = (e: unknown): boolean => e instanceof SyntaxError && 'body' in e;

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
    if (res.headersSent) {
        next(err);
        return;
    }
    const malformed = isBodyParseError(err);
    const status = malformed ? 400 : httpStatusFor(err);
    const body: ErrorBody = {
        success: false,
        error: malformed ? 'VALIDATION' : isPipelineError(err) ? err.code : 'INTERNAL',
        message: malformed ? 'Request body is not valid JSON' : describeError(err),
        status_code: status
    };
    if (status >= 500) log.error(`${req.method} ${req.originalUrl} failed`, err);
    else log.warn(`${req.method} ${req.originalUrl}: ${body.error} ${body.message}`);
    res.status(status).json(body);
};

export function createApp(deps: ApiDeps): express.Express {
    const app = express();
    app.use(cors());
    app.use(express.json());
    app.use('/api', createApiRouter(deps));
    app.use(errorHandler);
    return app;
}
