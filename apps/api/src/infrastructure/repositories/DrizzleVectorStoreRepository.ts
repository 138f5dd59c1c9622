import { asc, desc, eq, inArray, sql } from 'drizzle-orm';
import type { Metadata } from '@docvector/types';
import type { Database } from '../db';
import { files, vectorStores } from '../db/schema';
import { FileCounts, VectorStore } from '../../domain/entities/VectorStore';
import { ListVectorStoresOptions, VectorStoreRepository } from '../../domain/entities/VectorStoreRepository';

type VectorStoreRow = typeof vectorStores.$inferSelect;

const emptyCounts = (): FileCounts => ({ inProgress: 0, completed: 0, failed: 0, total: 0 });

export class DrizzleVectorStoreRepository extends VectorStoreRepository {
    constructor(private db: Database) {
        super();
    }

    async create(name: string, metadata: Metadata | null): Promise<VectorStore> {
        const [row] = await this.db
            .insert(vectorStores)
            .values({ name, metadata })
            .returning();

        return this.toEntity(row, emptyCounts());
    }

    async findById(id: string): Promise<VectorStore | undefined> {
        const result = await this.db.select().from(vectorStores).where(eq(vectorStores.id, id));
        if (result.length === 0) return undefined;

        const counts = await this.fileCounts([id]);
        return this.toEntity(result[0], counts.get(id) ?? emptyCounts());
    }

    async list(options: ListVectorStoresOptions): Promise<{ stores: VectorStore[]; hasMore: boolean }> {
        const order = options.order === 'asc' ? asc(vectorStores.createdAt) : desc(vectorStores.createdAt);

        // One extra row tells whether another page exists
        const rows = await this.db
            .select()
            .from(vectorStores)
            .orderBy(order)
            .offset(options.offset)
            .limit(options.limit + 1);

        const page = rows.slice(0, options.limit);
        const counts = await this.fileCounts(page.map(row => row.id));

        return {
            stores: page.map(row => this.toEntity(row, counts.get(row.id) ?? emptyCounts())),
            hasMore: rows.length > options.limit,
        };
    }

    async delete(id: string): Promise<boolean> {
        const deleted = await this.db
            .delete(vectorStores)
            .where(eq(vectorStores.id, id))
            .returning({ id: vectorStores.id });

        return deleted.length > 0;
    }

    private async fileCounts(storeIds: string[]): Promise<Map<string, FileCounts>> {
        const counts = new Map<string, FileCounts>();
        if (storeIds.length === 0) return counts;

        const rows = await this.db
            .select({
                vectorStoreId: files.vectorStoreId,
                status: files.status,
                count: sql<number>`count(*)::int`,
            })
            .from(files)
            .where(inArray(files.vectorStoreId, storeIds))
            .groupBy(files.vectorStoreId, files.status);

        for (const row of rows) {
            const current = counts.get(row.vectorStoreId) ?? emptyCounts();
            const count = Number(row.count);
            switch (row.status) {
                case 'in_progress':
                    current.inProgress += count;
                    break;
                case 'completed':
                    current.completed += count;
                    break;
                case 'failed':
                    current.failed += count;
                    break;
            }
            current.total += count;
            counts.set(row.vectorStoreId, current);
        }

        return counts;
    }

    private toEntity(row: VectorStoreRow, counts: FileCounts): VectorStore {
        return new VectorStore(row.id, row.name, row.metadata ?? null, counts, row.createdAt, row.updatedAt);
    }
}
