import { drizzle, NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import * as schema from "./schema";
import logger from '../logger';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
    db: Database;
    pool: Pool;
}

export function createDatabase(connectionString: string): DatabaseHandle {
    const pool = new Pool({
        connectionString,
        min: 2,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
        logger.error('Unexpected database pool error', { error: err.message });
    });

    pool.on('connect', () => {
        logger.debug('New database connection established');
    });

    return { db: drizzle(pool, { schema }), pool };
}
