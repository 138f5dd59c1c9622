import type { EmbeddingProvider } from '../providers/EmbeddingProvider';
import { classifyFailure, EmbeddingProviderError } from '../../domain/errors/ProviderFailure';
import { CancelledError, EmbeddingServiceError } from '../../domain/errors/AppError';
import { delay, type DelayFn } from '../utils/delay';
import logger from '../../infrastructure/logger';

export interface EmbeddingClientConfig {
    maxBatchSize: number;    // provider limit, 2048 for OpenAI
    maxAttempts: number;     // default 5
    initialBackoffMs: number;
    backoffFactor: number;
}

export const DEFAULT_EMBEDDING_CLIENT_CONFIG: EmbeddingClientConfig = {
    maxBatchSize: 2048,
    maxAttempts: 5,
    initialBackoffMs: 1000,
    backoffFactor: 2,
};

export interface EmbedOptions {
    signal?: AbortSignal;
}

/**
 * Per-call retry bookkeeping. Lives for one batch request only.
 */
interface RetryState {
    attempt: number;
    backoffMs: number;
    lastFailure?: EmbeddingProviderError;
}

export class EmbeddingClient {
    private config: EmbeddingClientConfig;

    constructor(
        private provider: EmbeddingProvider,
        config?: Partial<EmbeddingClientConfig>,
        private wait: DelayFn = delay
    ) {
        this.config = { ...DEFAULT_EMBEDDING_CLIENT_CONFIG, ...config };
    }

    get defaultModel(): string {
        return this.provider.defaultModel;
    }

    /**
     * Embeds texts in order, one provider call per batch of at most `maxBatchSize`.
     * Either every vector is returned or the call fails; there are no partial results.
     */
    async embedBatch(texts: string[], model?: string, options: EmbedOptions = {}): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        const resolvedModel = model ?? this.provider.defaultModel;
        const vectors: number[][] = [];

        for (let batchStart = 0; batchStart < texts.length; batchStart += this.config.maxBatchSize) {
            const batch = texts.slice(batchStart, batchStart + this.config.maxBatchSize);
            const embeddings = await this.callWithRetry(batch, resolvedModel, options.signal);
            this.assertConsistent(batch, embeddings, vectors[0]?.length);
            vectors.push(...embeddings);
        }

        return vectors;
    }

    async embedQuery(text: string, model?: string, options: EmbedOptions = {}): Promise<number[]> {
        const [vector] = await this.embedBatch([text], model, options);
        return vector;
    }

    private async callWithRetry(batch: string[], model: string, signal?: AbortSignal): Promise<number[][]> {
        const state: RetryState = { attempt: 0, backoffMs: this.config.initialBackoffMs };

        while (state.attempt < this.config.maxAttempts) {
            if (signal?.aborted) {
                throw new CancelledError('Embedding request cancelled', { cause: signal.reason });
            }
            state.attempt++;

            try {
                return await this.provider.embed(batch, model, { signal });
            } catch (error) {
                const failure = this.toProviderError(error);

                switch (classifyFailure(failure.kind)) {
                    case 'cancelled':
                        throw new CancelledError('Embedding request cancelled', { cause: failure });
                    case 'fatal':
                        throw this.serviceError(failure, state.attempt);
                    case 'retryable':
                        state.lastFailure = failure;
                        break;
                }
            }

            if (state.attempt >= this.config.maxAttempts) {
                break;
            }

            logger.warn('Embedding request failed, retrying', {
                kind: state.lastFailure?.kind,
                attempt: state.attempt,
                maxAttempts: this.config.maxAttempts,
                delayMs: state.backoffMs,
            });

            try {
                await this.wait(state.backoffMs, signal);
            } catch (error) {
                throw new CancelledError('Embedding request cancelled', { cause: error });
            }
            state.backoffMs *= this.config.backoffFactor;
        }

        const lastFailure = state.lastFailure ?? new EmbeddingProviderError('unexpected', 'No attempt was made');
        throw this.serviceError(lastFailure, state.attempt);
    }

    private toProviderError(error: unknown): EmbeddingProviderError {
        if (error instanceof EmbeddingProviderError) {
            return error;
        }
        const message = error instanceof Error ? error.message : String(error);
        return new EmbeddingProviderError('unexpected', message, undefined, { cause: error });
    }

    private serviceError(failure: EmbeddingProviderError, attempts: number): EmbeddingServiceError {
        logger.error('Embedding request failed', { kind: failure.kind, attempts, message: failure.message });
        return new EmbeddingServiceError(
            `Embedding service failed after ${attempts} attempt(s): ${failure.message}`,
            failure.kind,
            attempts,
            { cause: failure }
        );
    }

    private assertConsistent(batch: string[], embeddings: number[][], dimensions: number | undefined): void {
        if (embeddings.length !== batch.length) {
            throw new EmbeddingServiceError(
                `Embedding provider returned ${embeddings.length} vectors for ${batch.length} inputs`,
                'unexpected',
                1
            );
        }

        const expected = dimensions ?? embeddings[0].length;
        if (embeddings.some(vector => vector.length !== expected)) {
            throw new EmbeddingServiceError(
                `Embedding provider returned vectors of mixed dimensions (expected ${expected})`,
                'unexpected',
                1
            );
        }
    }
}
