import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import logger from '../../logger';

export const REQUEST_ID_HEADER = 'X-Request-ID';

/**
 * Reuses the caller's X-Request-ID or assigns a new one, and echoes it on the response.
 */
export const requestId = (req: Request, res: Response, next: NextFunction) => {
    const id = req.get(REQUEST_ID_HEADER) || randomUUID();
    res.locals.requestId = id;
    res.setHeader(REQUEST_ID_HEADER, id);
    next();
};

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    res.on('finish', () => {
        logger.info(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
            method: req.method,
            path: req.originalUrl,
            statusCode: res.statusCode,
            latency: Date.now() - startTime,
            requestId: requestIdOf(res),
        });
    });

    next();
};

export function requestIdOf(res: Response): string | undefined {
    const id: unknown = res.locals.requestId;
    return typeof id === 'string' ? id : undefined;
}
