import 'dotenv/config';
import { loadConfig } from '../src/application/config/appConfig';
import { createDatabase } from '../src/infrastructure/db';
import { fileChunks, files, vectorStores } from '../src/infrastructure/db/schema';
import logger from '../src/infrastructure/logger';

async function reset() {
    const { databaseUrl } = loadConfig();
    if (!databaseUrl) {
        throw new Error('DATABASE_URL is required');
    }

    const { db, pool } = createDatabase(databaseUrl);
    logger.info('Cleaning database...');

    try {
        // Delete in order to respect foreign key constraints
        await db.delete(fileChunks);
        await db.delete(files);
        await db.delete(vectorStores);
        logger.info('Database cleaned');
    } finally {
        await pool.end();
    }
}

reset().catch((error: unknown) => {
    logger.error('Error cleaning database', { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
});
