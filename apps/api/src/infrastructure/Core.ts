import OpenAI from 'openai';
import { sql } from 'drizzle-orm';
import { DrizzleRepositoryProvider } from './repositories/RepositoryProvider';
import { SConstructor, UseCaseProvider } from '../application/useCases/UseCaseProvider';
import { AppConfig, ConfigurationError } from '../application/config/appConfig';
import { createDatabase, DatabaseHandle } from './db';
import { ChunkRepository } from '../domain/entities/ChunkRepository';
import { FileRepository } from '../domain/entities/FileRepository';
import { VectorStoreRepository } from '../domain/entities/VectorStoreRepository';
import { DrizzleChunkRepository } from './repositories/DrizzleChunkRepository';
import { DrizzleFileRepository } from './repositories/DrizzleFileRepository';
import { DrizzleVectorStoreRepository } from './repositories/DrizzleVectorStoreRepository';
import { OpenAIEmbeddingProvider } from './providers/OpenAIEmbeddingProvider';
import { TiktokenTokenizer } from './providers/TiktokenTokenizer';
import { ChunkingService } from '../application/services/ChunkingService';
import { EmbeddingClient } from '../application/services/EmbeddingClient';
import { Retriever } from '../application/services/Retriever';
import { CreateVectorStore, DeleteVectorStore, GetVectorStores } from '../application/useCases/VectorStores';
import { IngestFile } from '../application/useCases/IngestFile';
import { GetFiles } from '../application/useCases/GetFiles';
import { DeleteFile } from '../application/useCases/DeleteFile';
import { SearchVectorStore } from '../application/useCases/SearchVectorStore';
import logger from './logger';

export class Core {
    public repositories = new DrizzleRepositoryProvider();
    public useCases = new UseCaseProvider();
    private database: DatabaseHandle;
    private chunkingService: ChunkingService;
    private embeddingClient: EmbeddingClient;

    constructor(private config: AppConfig) {
        if (!config.databaseUrl) {
            throw new ConfigurationError(['DATABASE_URL: Required']);
        }
        logger.level = config.logLevel;

        this.database = createDatabase(config.databaseUrl);

        const openai = new OpenAI({
            apiKey: config.openai.apiKey,
            baseURL: config.openai.baseURL,
            timeout: config.openai.timeoutMs,
            // EmbeddingClient owns the retry policy
            maxRetries: 0,
        });
        this.chunkingService = new ChunkingService(new TiktokenTokenizer(config.chunking.encoding));
        this.embeddingClient = new EmbeddingClient(
            new OpenAIEmbeddingProvider(openai, config.embedding.model),
            {
                maxBatchSize: config.embedding.maxBatchSize,
                maxAttempts: config.embedding.maxAttempts,
                initialBackoffMs: config.embedding.initialBackoffMs,
            }
        );

        this.initializeRepositories();
        this.initializeServices();
    }

    private initializeRepositories() {
        const { db } = this.database;
        this.repositories.register(VectorStoreRepository, () => new DrizzleVectorStoreRepository(db));
        this.repositories.register(FileRepository, () => new DrizzleFileRepository(db));
        this.repositories.register(ChunkRepository, () => new DrizzleChunkRepository(db));
    }

    private initializeServices() {
        this.useCases.register(CreateVectorStore, () => new CreateVectorStore(this.repositories));
        this.useCases.register(GetVectorStores, () => new GetVectorStores(this.repositories));
        this.useCases.register(DeleteVectorStore, () => new DeleteVectorStore(this.repositories));
        this.useCases.register(IngestFile, () => new IngestFile(
            this.repositories,
            this.chunkingService,
            this.embeddingClient,
            { chunkSize: this.config.chunking.chunkSize, overlap: this.config.chunking.overlap }
        ));
        this.useCases.register(GetFiles, () => new GetFiles(this.repositories));
        this.useCases.register(DeleteFile, () => new DeleteFile(this.repositories));
        this.useCases.register(SearchVectorStore, () => new SearchVectorStore(
            this.repositories,
            new Retriever(this.repositories.get(ChunkRepository), this.embeddingClient)
        ));
    }

    public getUseCase<T>(serviceType: SConstructor<T>): T {
        return this.useCases.get(serviceType);
    }

    public get openaiApiKeySet(): boolean {
        return this.config.openai.apiKey.length > 0;
    }

    public async checkDatabase(): Promise<void> {
        await this.database.db.execute(sql`SELECT 1`);
    }

    public async close(): Promise<void> {
        await this.database.pool.end();
    }
}
