import OpenAI, {
    APIConnectionError,
    APIConnectionTimeoutError,
    APIError,
    APIUserAbortError,
} from 'openai';
import type { EmbeddingProvider, EmbeddingRequestOptions } from '../../application/providers/EmbeddingProvider';
import { EmbeddingProviderError, failureKindFromStatus } from '../../domain/errors/ProviderFailure';
import { EMBEDDING_DIMENSIONS } from '../db/schema';

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
    constructor(
        private openai: OpenAI,
        public readonly defaultModel: string = 'text-embedding-3-small'
    ) {}

    async embed(texts: string[], model: string, options: EmbeddingRequestOptions = {}): Promise<number[][]> {
        try {
            const response = await this.openai.embeddings.create(
                {
                    input: texts,
                    model,
                    encoding_format: 'float',
                    // Only the text-embedding-3 family accepts a dimensions override
                    ...(model.startsWith('text-embedding-3') ? { dimensions: EMBEDDING_DIMENSIONS } : {}),
                },
                { signal: options.signal }
            );

            return [...response.data]
                .sort((a, b) => a.index - b.index)
                .map(item => item.embedding);
        } catch (error) {
            throw toProviderError(error);
        }
    }
}

/**
 * Classifies an OpenAI SDK failure. Subclass checks come first: the timeout and
 * abort errors both extend APIConnectionError or APIError.
 */
export function toProviderError(error: unknown): EmbeddingProviderError {
    if (error instanceof EmbeddingProviderError) {
        return error;
    }
    if (error instanceof APIUserAbortError) {
        return new EmbeddingProviderError('aborted', error.message, undefined, { cause: error });
    }
    if (error instanceof APIConnectionTimeoutError) {
        return new EmbeddingProviderError('timeout', error.message, undefined, { cause: error });
    }
    if (error instanceof APIConnectionError) {
        return new EmbeddingProviderError('connection', error.message, undefined, { cause: error });
    }
    if (error instanceof APIError && error.status !== undefined) {
        return new EmbeddingProviderError(failureKindFromStatus(error.status), error.message, error.status, { cause: error });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new EmbeddingProviderError('unexpected', message, undefined, { cause: error });
}
