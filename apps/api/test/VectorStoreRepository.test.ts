import { describe, it, expect, vi, type Mock } from 'vitest';
import { DrizzleVectorStoreRepository } from '../src/infrastructure/repositories/DrizzleVectorStoreRepository';
import type { Database } from '../src/infrastructure/db';

// Each builder method returns the chain; `terminal` resolves the query
const chainResolving = (terminal: string, rows: unknown[]) => {
    const chain: Record<string, Mock> = {};
    for (const method of ['from', 'where', 'orderBy', 'offset', 'limit', 'groupBy', 'values', 'returning']) {
        chain[method] = method === terminal ? vi.fn().mockResolvedValue(rows) : vi.fn(() => chain);
    }
    return chain;
};

const storeRow = (id: string, name: string) => ({
    id,
    name,
    metadata: null,
    createdAt: new Date('2024-01-15T10:00:00Z'),
    updatedAt: new Date('2024-01-15T10:00:00Z'),
});

describe('DrizzleVectorStoreRepository', () => {
    it('should page stores and attach file counts', async () => {
        const storesQuery = chainResolving('limit', [storeRow('s1', 'one'), storeRow('s2', 'two'), storeRow('s3', 'three')]);
        const countsQuery = chainResolving('groupBy', [
            { vectorStoreId: 's1', status: 'completed', count: 2 },
            { vectorStoreId: 's1', status: 'failed', count: '1' },
        ]);
        const select = vi.fn()
            .mockReturnValueOnce(storesQuery)
            .mockReturnValueOnce(countsQuery);
        const repository = new DrizzleVectorStoreRepository({ select } as unknown as Database);

        const { stores, hasMore } = await repository.list({ limit: 2, offset: 0, order: 'desc' });

        expect(storesQuery.limit).toHaveBeenCalledWith(3);
        expect(storesQuery.offset).toHaveBeenCalledWith(0);
        expect(hasMore).toBe(true);
        expect(stores.map(s => s.id)).toEqual(['s1', 's2']);
        expect(stores[0].fileCounts).toEqual({ inProgress: 0, completed: 2, failed: 1, total: 3 });
        expect(stores[1].fileCounts).toEqual({ inProgress: 0, completed: 0, failed: 0, total: 0 });
    });

    it('should report no further page when the extra row is absent', async () => {
        const select = vi.fn()
            .mockReturnValueOnce(chainResolving('limit', [storeRow('s1', 'one')]))
            .mockReturnValueOnce(chainResolving('groupBy', []));
        const repository = new DrizzleVectorStoreRepository({ select } as unknown as Database);

        const { hasMore } = await repository.list({ limit: 2, offset: 0, order: 'asc' });

        expect(hasMore).toBe(false);
    });

    it('should return undefined for a missing store without counting files', async () => {
        const select = vi.fn().mockReturnValueOnce(chainResolving('where', []));
        const repository = new DrizzleVectorStoreRepository({ select } as unknown as Database);

        await expect(repository.findById('missing')).resolves.toBeUndefined();
        expect(select).toHaveBeenCalledTimes(1);
    });

    it('should create a store with empty counts', async () => {
        const insert = vi.fn().mockReturnValue(chainResolving('returning', [storeRow('s1', 'docs')]));
        const repository = new DrizzleVectorStoreRepository({ insert } as unknown as Database);

        const store = await repository.create('docs', null);

        expect(store.id).toBe('s1');
        expect(store.fileCounts.total).toBe(0);
    });

    it('should report whether a row was deleted', async () => {
        const del = vi.fn()
            .mockReturnValueOnce(chainResolving('returning', [{ id: 's1' }]))
            .mockReturnValueOnce(chainResolving('returning', []));
        const repository = new DrizzleVectorStoreRepository({ delete: del } as unknown as Database);

        await expect(repository.delete('s1')).resolves.toBe(true);
        await expect(repository.delete('s1')).resolves.toBe(false);
    });
});
