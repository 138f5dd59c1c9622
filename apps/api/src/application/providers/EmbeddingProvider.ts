export interface EmbeddingRequestOptions {
    signal?: AbortSignal;
}

/**
 * External embedding model. One call embeds at most the provider's batch limit.
 * Implementations throw `EmbeddingProviderError` with a classified kind on failure.
 */
export interface EmbeddingProvider {
    readonly defaultModel: string;
    embed(texts: string[], model: string, options?: EmbeddingRequestOptions): Promise<number[][]>;
}
