import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { cosineDistance, sql, SQL } from 'drizzle-orm';
import { PgDialect } from 'drizzle-orm/pg-core';
import { DrizzleChunkRepository } from '../src/infrastructure/repositories/DrizzleChunkRepository';
import { fileChunks } from '../src/infrastructure/db/schema';
import { FileChunk } from '../src/domain/entities/FileChunk';
import type { Database } from '../src/infrastructure/db';

const render = (condition: SQL | undefined) => {
    if (!condition) {
        throw new Error('expected a condition');
    }
    return new PgDialect().sqlToQuery(condition);
};

describe('DrizzleChunkRepository', () => {
    let selectChain: {
        from: Mock;
        leftJoin: Mock;
        where: Mock;
        orderBy: Mock;
        limit: Mock;
    };
    let mockValues: Mock;
    let mockDb: { select: Mock; insert: Mock; delete: Mock };
    let repository: DrizzleChunkRepository;

    beforeEach(() => {
        selectChain = {
            from: vi.fn(),
            leftJoin: vi.fn(),
            where: vi.fn(),
            orderBy: vi.fn(),
            limit: vi.fn().mockResolvedValue([]),
        };
        selectChain.from.mockReturnValue(selectChain);
        selectChain.leftJoin.mockReturnValue(selectChain);
        selectChain.where.mockReturnValue(selectChain);
        selectChain.orderBy.mockReturnValue(selectChain);

        mockValues = vi.fn().mockResolvedValue(undefined);
        mockDb = {
            select: vi.fn().mockReturnValue(selectChain),
            insert: vi.fn().mockReturnValue({ values: mockValues }),
            delete: vi.fn().mockReturnValue({ where: vi.fn().mockResolvedValue(undefined) }),
        };

        repository = new DrizzleChunkRepository(mockDb as unknown as Database);
    });

    describe('saveBatch', () => {
        it('should insert all chunks in one statement', async () => {
            const createdAt = new Date('2024-01-15T10:00:00Z');
            const chunks = [
                new FileChunk('c1', 'f1', 's1', 0, 'first', 1, [0.1, 0.2], { lang: 'en' }, createdAt),
                new FileChunk('c2', 'f1', 's1', 1, 'second', 1, [0.3, 0.4], null, createdAt),
            ];

            await repository.saveBatch(chunks);

            expect(mockDb.insert).toHaveBeenCalledTimes(1);
            expect(mockValues).toHaveBeenCalledWith([
                {
                    id: 'c1', fileId: 'f1', vectorStoreId: 's1', chunkIndex: 0, content: 'first',
                    tokenCount: 1, embedding: [0.1, 0.2], metadata: { lang: 'en' }, createdAt,
                },
                {
                    id: 'c2', fileId: 'f1', vectorStoreId: 's1', chunkIndex: 1, content: 'second',
                    tokenCount: 1, embedding: [0.3, 0.4], metadata: null, createdAt,
                },
            ]);
        });

        it('should skip the insert for an empty batch', async () => {
            await repository.saveBatch([]);

            expect(mockDb.insert).not.toHaveBeenCalled();
        });
    });

    describe('nearestNeighbors', () => {
        it('should map rows to candidates with numeric distances', async () => {
            selectChain.limit.mockResolvedValue([
                { id: 'c1', fileId: 'f1', filename: 'guide.md', chunkIndex: 2, content: 'text', metadata: null, distance: '0.25' },
                { id: 'c2', fileId: 'f1', filename: null, chunkIndex: 3, content: 'more', metadata: { lang: 'en' }, distance: 0.5 },
            ]);

            const candidates = await repository.nearestNeighbors({ vectorStoreId: 's1', vector: [1, 0], limit: 7 });

            expect(selectChain.limit).toHaveBeenCalledWith(7);
            expect(candidates).toEqual([
                { chunkId: 'c1', fileId: 'f1', filename: 'guide.md', chunkIndex: 2, content: 'text', metadata: {}, distance: 0.25 },
                { chunkId: 'c2', fileId: 'f1', filename: null, chunkIndex: 3, content: 'more', metadata: { lang: 'en' }, distance: 0.5 },
            ]);
        });

        it('should propagate database errors', async () => {
            selectChain.limit.mockRejectedValue(new Error('connection refused'));

            await expect(repository.nearestNeighbors({ vectorStoreId: 's1', vector: [1, 0], limit: 5 }))
                .rejects.toThrow('connection refused');
        });
    });

    describe('nearestNeighborConditions', () => {
        const distance = sql<number>`${cosineDistance(fileChunks.embedding, [1, 0])}`;

        it('should scope to the vector store and skip chunks without embeddings', () => {
            const query = render(repository.nearestNeighborConditions(
                { vectorStoreId: 'store-1', vector: [1, 0], limit: 5 },
                distance
            ));

            expect(query.params).toEqual(['store-1']);
            expect(query.sql).toContain('is not null');
            expect(query.sql).not.toContain('<=>');
        });

        it('should push metadata predicates and the distance cutoff into the query', () => {
            const query = render(repository.nearestNeighborConditions(
                { vectorStoreId: 'store-1', vector: [1, 0], limit: 5, filter: { lang: 'en' }, maxDistance: 0.25 },
                distance
            ));

            expect(query.params).toEqual(['store-1', 'lang', 'en', '[1,0]', 0.25]);
            expect(query.sql).toContain('->>');
            expect(query.sql).toContain('<=>');
        });
    });

    describe('deleteByFileId', () => {
        it('should delete the chunks of a file', async () => {
            await repository.deleteByFileId('f1');

            expect(mockDb.delete).toHaveBeenCalledWith(fileChunks);
        });
    });
});
