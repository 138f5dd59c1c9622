import { describe, it, expect, vi, type Mock } from 'vitest';
import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError, APIUserAbortError } from 'openai';
import { OpenAIEmbeddingProvider, toProviderError } from '../src/infrastructure/providers/OpenAIEmbeddingProvider';
import { EmbeddingProviderError } from '../src/domain/errors/ProviderFailure';

const openAIWith = (create: Mock) => ({ embeddings: { create } }) as unknown as OpenAI;

describe('OpenAIEmbeddingProvider', () => {
    it('should request float embeddings and return them in input order', async () => {
        const create = vi.fn().mockResolvedValue({
            data: [
                { index: 1, embedding: [0.2], object: 'embedding' },
                { index: 0, embedding: [0.1], object: 'embedding' },
            ],
        });
        const controller = new AbortController();
        const provider = new OpenAIEmbeddingProvider(openAIWith(create));

        const vectors = await provider.embed(['first', 'second'], 'text-embedding-3-small', { signal: controller.signal });

        expect(vectors).toEqual([[0.1], [0.2]]);
        expect(create).toHaveBeenCalledWith(
            { input: ['first', 'second'], model: 'text-embedding-3-small', encoding_format: 'float', dimensions: 1536 },
            { signal: controller.signal }
        );
    });

    it('should not send dimensions to older models', async () => {
        const create = vi.fn().mockResolvedValue({ data: [{ index: 0, embedding: [0.1] }] });
        const provider = new OpenAIEmbeddingProvider(openAIWith(create), 'text-embedding-ada-002');

        await provider.embed(['first'], provider.defaultModel);

        expect(create.mock.calls[0][0]).toEqual({
            input: ['first'],
            model: 'text-embedding-ada-002',
            encoding_format: 'float',
        });
    });

    it('should throw classified errors', async () => {
        const create = vi.fn().mockRejectedValue(APIError.generate(429, { message: 'Rate limit reached' }, 'Rate limit reached', {}));
        const provider = new OpenAIEmbeddingProvider(openAIWith(create));

        const error = await provider.embed(['first'], 'text-embedding-3-small').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(EmbeddingProviderError);
        expect(error).toMatchObject({ kind: 'rate_limited', status: 429 });
    });
});

describe('toProviderError', () => {
    it.each([
        [401, 'authentication'],
        [403, 'authentication'],
        [400, 'invalid_request'],
        [500, 'server_unavailable'],
        [503, 'server_unavailable'],
        [418, 'unexpected'],
    ])('should map HTTP %i to %s', (status, kind) => {
        const error = APIError.generate(status, { message: 'failure' }, 'failure', {});

        expect(toProviderError(error)).toMatchObject({ kind, status });
    });

    it('should map client-side timeouts', () => {
        expect(toProviderError(new APIConnectionTimeoutError()).kind).toBe('timeout');
    });

    it('should map connection failures', () => {
        expect(toProviderError(new APIConnectionError({ message: 'socket hang up' })).kind).toBe('connection');
    });

    it('should map user aborts', () => {
        expect(toProviderError(new APIUserAbortError()).kind).toBe('aborted');
    });

    it('should map anything else to unexpected and keep the cause', () => {
        const cause = new TypeError('Cannot read properties of undefined');
        const error = toProviderError(cause);

        expect(error.kind).toBe('unexpected');
        expect(error.cause).toBe(cause);
    });
});
