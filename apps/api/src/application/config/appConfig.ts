import { z } from 'zod';

const TOKENIZER_ENCODINGS = ['cl100k_base', 'o200k_base', 'p50k_base', 'r50k_base'] as const;

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(6060),
    DATABASE_URL: z.string().min(1).optional(),
    OPENAI_API_KEY: z.string().default(''),
    OPENAI_BASE_URL: z.string().url().optional(),
    EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
    TOKENIZER_ENCODING: z.enum(TOKENIZER_ENCODINGS).default('cl100k_base'),
    CHUNK_SIZE: z.coerce.number().int().positive().default(800),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
    EMBEDDING_MAX_BATCH_SIZE: z.coerce.number().int().min(1).max(2048).default(2048),
    EMBEDDING_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(5),
    EMBEDDING_INITIAL_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
    EMBEDDING_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).default(60000),
    CORS_ORIGIN: z.string().default('*'),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
}).refine(env => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
});

export interface AppConfig {
    port: number;
    databaseUrl?: string;
    corsOrigin: string;
    logLevel: string;
    openai: {
        apiKey: string;
        baseURL?: string;
        timeoutMs: number;
    };
    embedding: {
        model: string;
        maxBatchSize: number;
        maxAttempts: number;
        initialBackoffMs: number;
    };
    chunking: {
        encoding: typeof TOKENIZER_ENCODINGS[number];
        chunkSize: number;
        overlap: number;
    };
}

export class ConfigurationError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigurationError';
    }
}

/**
 * Reads the service configuration from environment variables.
 * Throws a ConfigurationError naming every invalid key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    // Empty strings count as unset
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );
    const parsed = envSchema.safeParse(present);

    if (!parsed.success) {
        throw new ConfigurationError(
            parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
        );
    }

    const values = parsed.data;
    return Object.freeze({
        port: values.PORT,
        databaseUrl: values.DATABASE_URL,
        corsOrigin: values.CORS_ORIGIN,
        logLevel: values.LOG_LEVEL,
        openai: {
            apiKey: values.OPENAI_API_KEY,
            baseURL: values.OPENAI_BASE_URL,
            timeoutMs: values.EMBEDDING_REQUEST_TIMEOUT_MS,
        },
        embedding: {
            model: values.EMBEDDING_MODEL,
            maxBatchSize: values.EMBEDDING_MAX_BATCH_SIZE,
            maxAttempts: values.EMBEDDING_MAX_ATTEMPTS,
            initialBackoffMs: values.EMBEDDING_INITIAL_BACKOFF_MS,
        },
        chunking: {
            encoding: values.TOKENIZER_ENCODING,
            chunkSize: values.CHUNK_SIZE,
            overlap: values.CHUNK_OVERLAP,
        },
    });
}
