import { ChunkRepository, type NearestNeighborCandidate } from '../../domain/entities/ChunkRepository';
import { SearchResult } from '../../domain/entities/SearchResult';
import { AppError, BackendUnavailableError, CancelledError, InvalidArgumentError } from '../../domain/errors/AppError';
import { EmbeddingClient } from './EmbeddingClient';
import logger from '../../infrastructure/logger';

export const MIN_RESULTS = 1;
export const MAX_RESULTS = 100;

export interface SearchParams {
    vectorStoreId: string;
    query: string;
    maxResults: number;
    filter?: Readonly<Record<string, string>>;
    scoreThreshold?: number;
}

export interface SearchOptions {
    signal?: AbortSignal;
}

export class Retriever {
    constructor(
        private chunkRepository: ChunkRepository,
        private embeddingClient: EmbeddingClient
    ) {}

    /**
     * Ranks stored chunks of one vector store against a query.
     * Results keep the store's ascending-distance order; threshold and filter are
     * applied before the result cap.
     */
    async search(params: SearchParams, options: SearchOptions = {}): Promise<SearchResult[]> {
        this.validate(params);
        const startTime = Date.now();

        const queryVector = await this.embeddingClient.embedQuery(params.query, undefined, options);

        const maxDistance = params.scoreThreshold === undefined ? undefined : 1 - params.scoreThreshold;
        const filter = params.filter && Object.keys(params.filter).length > 0 ? params.filter : undefined;

        let candidates: NearestNeighborCandidate[];
        try {
            candidates = await this.chunkRepository.nearestNeighbors({
                vectorStoreId: params.vectorStoreId,
                vector: queryVector,
                limit: params.maxResults,
                filter,
                maxDistance,
            });
        } catch (error) {
            if (error instanceof AppError) {
                throw error;
            }
            throw new BackendUnavailableError('Nearest-neighbor lookup failed', { cause: error });
        }

        if (options.signal?.aborted) {
            throw new CancelledError('Search cancelled', { cause: options.signal.reason });
        }

        const results = candidates
            .filter(candidate => this.meetsThreshold(candidate, params.scoreThreshold))
            .filter(candidate => filter === undefined || this.matchesFilter(candidate.metadata, filter))
            .slice(0, params.maxResults)
            .map(candidate => this.toSearchResult(candidate));

        logger.info('Search completed', {
            vectorStoreId: params.vectorStoreId,
            results: results.length,
            candidates: candidates.length,
            latency: Date.now() - startTime,
        });

        return results;
    }

    private validate(params: SearchParams): void {
        if (params.query.trim().length === 0) {
            throw new InvalidArgumentError('query cannot be empty');
        }
        if (!Number.isInteger(params.maxResults) || params.maxResults < MIN_RESULTS || params.maxResults > MAX_RESULTS) {
            throw new InvalidArgumentError(
                `maxResults must be an integer between ${MIN_RESULTS} and ${MAX_RESULTS}, got ${params.maxResults}`
            );
        }
        const threshold = params.scoreThreshold;
        if (threshold !== undefined && (Number.isNaN(threshold) || threshold < 0 || threshold > 1)) {
            throw new InvalidArgumentError(`scoreThreshold must be between 0 and 1, got ${threshold}`);
        }
    }

    // Compared on the derived score: 1 - (1 - t) is not always t in floating point.
    private meetsThreshold(candidate: NearestNeighborCandidate, scoreThreshold: number | undefined): boolean {
        return scoreThreshold === undefined || 1 - candidate.distance >= scoreThreshold;
    }

    private matchesFilter(metadata: Record<string, unknown>, filter: Readonly<Record<string, string>>): boolean {
        return Object.entries(filter).every(([key, expected]) => metadataText(metadata[key]) === expected);
    }

    private toSearchResult(candidate: NearestNeighborCandidate): SearchResult {
        return new SearchResult(
            candidate.chunkId,
            candidate.fileId,
            candidate.filename,
            candidate.chunkIndex,
            candidate.content,
            candidate.distance,
            1 - candidate.distance,
            candidate.metadata
        );
    }
}

/**
 * Text form of a JSON metadata value, as Postgres' `->>` operator renders it
 */
export function metadataText(value: unknown): string | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return JSON.stringify(value);
}
