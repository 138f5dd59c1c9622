import 'dotenv/config';
import { App } from './app';
import { loadConfig } from './application/config/appConfig';
import { Core } from './infrastructure/Core';
import logger from './infrastructure/logger';

const config = loadConfig();
const core = new Core(config);
const server = new App(config, core).listen();

const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
        core.close()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error('Failed to close database pool', {
                    error: error instanceof Error ? error.message : String(error),
                });
                process.exit(1);
            });
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
