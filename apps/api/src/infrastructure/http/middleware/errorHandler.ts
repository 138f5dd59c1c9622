import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { AppError } from '../../../domain/errors/AppError';
import logger from '../../logger';
import { requestIdOf } from './requestContext';

export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
) => {
    if (res.headersSent) {
        return next(err);
    }

    if (err instanceof AppError) {
        logger.log(err.statusCode >= 500 ? 'error' : 'warn', err.message, {
            code: err.code,
            path: req.path,
            requestId: requestIdOf(res),
        });

        return res.status(err.statusCode).json({
            status: 'error',
            code: err.code,
            message: err.message,
        });
    }

    if (err instanceof ZodError) {
        return res.status(400).json({
            status: 'fail',
            message: 'Validation Error',
            errors: err.issues,
        });
    }

    if (err instanceof multer.MulterError) {
        return res.status(400).json({
            status: 'fail',
            code: err.code,
            message: err.message,
        });
    }

    logger.error(err.message, { stack: err.stack, path: req.path, requestId: requestIdOf(res) });

    // Fallback for unhandled errors
    return res.status(500).json({
        status: 'error',
        message: 'Internal Server Error',
    });
};
