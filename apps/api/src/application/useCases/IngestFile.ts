import { randomUUID } from 'crypto';
import type { Metadata } from '@docvector/types';
import { ChunkingService } from '../services/ChunkingService';
import { EmbeddingClient } from '../services/EmbeddingClient';
import { Chunk } from '../../domain/entities/Chunk';
import { ChunkRepository } from '../../domain/entities/ChunkRepository';
import { FileChunk } from '../../domain/entities/FileChunk';
import { FileRepository } from '../../domain/entities/FileRepository';
import { StoredFile } from '../../domain/entities/StoredFile';
import { VectorStoreRepository } from '../../domain/entities/VectorStoreRepository';
import { InvalidArgumentError, NotFoundError } from '../../domain/errors/AppError';
import { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import logger from '../../infrastructure/logger';

const UPLOADABLE_EXTENSIONS = ['.txt', '.md'];

export interface IngestFileInput {
    vectorStoreId: string;
    filename: string;
    text: string;
    metadata?: Metadata;
    attributes?: Metadata;
    chunkSize?: number;
    overlap?: number;
}

export interface ChunkingDefaults {
    chunkSize: number;   // default 800 tokens
    overlap: number;     // default 200 tokens
}

export class IngestFile {
    constructor(
        private repositories: RepositoryProvider,
        private chunkingService: ChunkingService,
        private embeddingClient: EmbeddingClient,
        private defaults: ChunkingDefaults
    ) {}

    async execute(input: IngestFileInput, options: { signal?: AbortSignal } = {}): Promise<StoredFile> {
        const startTime = Date.now();
        await this.ensureVectorStore(input.vectorStoreId);

        const { chunkSize, overlap } = this.resolveChunking(input);
        const chunks = this.chunkingService.split(input.text, chunkSize, overlap, options);

        const fileRepository = this.repositories.get(FileRepository);
        const file = await fileRepository.create({
            vectorStoreId: input.vectorStoreId,
            filename: input.filename,
            attributes: input.attributes ?? null,
        });

        try {
            await this.embedAndStore(file, chunks, input.metadata ?? null, options.signal);
            await fileRepository.updateStatus(file.id, { status: 'completed', chunkCount: chunks.length });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error('File ingestion failed', { fileId: file.id, error: message });
            await fileRepository.updateStatus(file.id, { status: 'failed', error: message })
                .catch((statusError: unknown) => logger.error('Could not mark file as failed', {
                    fileId: file.id,
                    error: statusError instanceof Error ? statusError.message : String(statusError),
                }));
            throw error;
        }

        logger.info('File ingested', {
            fileId: file.id,
            vectorStoreId: input.vectorStoreId,
            chunks: chunks.length,
            latency: Date.now() - startTime,
        });

        return new StoredFile(
            file.id,
            file.vectorStoreId,
            file.filename,
            'completed',
            chunks.length,
            file.attributes,
            null,
            file.createdAt
        );
    }

    private async ensureVectorStore(vectorStoreId: string): Promise<void> {
        const store = await this.repositories.get(VectorStoreRepository).findById(vectorStoreId);
        if (!store) {
            throw new NotFoundError('Vector store not found');
        }
    }

    /**
     * Overrides win; an unset overlap falls back to the default, capped at a quarter of the chunk size.
     */
    private resolveChunking(input: IngestFileInput): ChunkingDefaults {
        const chunkSize = input.chunkSize ?? this.defaults.chunkSize;
        const overlap = input.overlap ?? Math.min(this.defaults.overlap, Math.floor(chunkSize / 4));
        return { chunkSize, overlap };
    }

    private async embedAndStore(
        file: StoredFile,
        chunks: Chunk[],
        metadata: Metadata | null,
        signal?: AbortSignal
    ): Promise<void> {
        if (chunks.length === 0) {
            return;
        }

        const embeddings = await this.embeddingClient.embedBatch(
            chunks.map(chunk => chunk.text),
            undefined,
            { signal }
        );

        const createdAt = new Date();
        const fileChunks = chunks.map((chunk, i) => new FileChunk(
            randomUUID(),
            file.id,
            file.vectorStoreId,
            chunk.index,
            chunk.text,
            chunk.tokenCount,
            embeddings[i],
            metadata,
            createdAt
        ));

        await this.repositories.get(ChunkRepository).saveBatch(fileChunks);
    }
}

export function assertUploadableFilename(filename: string): void {
    const lower = filename.toLowerCase();
    if (!UPLOADABLE_EXTENSIONS.some(extension => lower.endsWith(extension))) {
        throw new InvalidArgumentError(
            `Unsupported file type: ${filename}. Only ${UPLOADABLE_EXTENSIONS.join(' and ')} files are accepted.`
        );
    }
}
