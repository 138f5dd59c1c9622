import { NextFunction, Request, Response, Router } from 'express';
import type { HealthResponseDto } from '@docvector/types';
import { Controller } from '../interfaces/Controller';
import logger from '../../logger';

export class HealthController implements Controller {
    public path = '/health';
    public router = Router();

    constructor(
        private checkDatabase: () => Promise<void>,
        private openaiApiKeySet: boolean
    ) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.get(`${this.path}`, this.getHealth.bind(this));
    }

    /**
     * 200 when the database answers, 503 "degraded" otherwise
     */
    async getHealth(_req: Request, res: Response, next: NextFunction) {
        try {
            const health: HealthResponseDto = {
                status: 'ok',
                database: { status: 'ok' },
                openaiApiKeySet: this.openaiApiKeySet,
            };

            try {
                await this.checkDatabase();
            } catch (error) {
                logger.warn('Health check could not reach the database', {
                    error: error instanceof Error ? error.message : String(error),
                });
                health.status = 'degraded';
                health.database = { status: 'error', detail: 'Database connection failed' };
            }

            res.status(health.status === 'ok' ? 200 : 503).json(health);
        } catch (error) {
            next(error);
        }
    }
}
