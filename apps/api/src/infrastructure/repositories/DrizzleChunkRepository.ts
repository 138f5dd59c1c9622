import { and, cosineDistance, eq, isNotNull, lte, sql, SQL } from 'drizzle-orm';
import type { Database } from '../db';
import { fileChunks, files } from '../db/schema';
import { FileChunk } from '../../domain/entities/FileChunk';
import {
    ChunkRepository,
    NearestNeighborCandidate,
    NearestNeighborQuery,
} from '../../domain/entities/ChunkRepository';

export class DrizzleChunkRepository extends ChunkRepository {
    constructor(private db: Database) {
        super();
    }

    async saveBatch(chunkList: FileChunk[]): Promise<void> {
        if (chunkList.length === 0) return;

        const values = chunkList.map(chunk => ({
            id: chunk.id,
            fileId: chunk.fileId,
            vectorStoreId: chunk.vectorStoreId,
            chunkIndex: chunk.chunkIndex,
            content: chunk.content,
            tokenCount: chunk.tokenCount,
            embedding: chunk.embedding,
            metadata: chunk.metadata,
            createdAt: chunk.createdAt,
        }));

        await this.db.insert(fileChunks).values(values);
    }

    async nearestNeighbors(query: NearestNeighborQuery): Promise<NearestNeighborCandidate[]> {
        // pgvector's <=> is cosine distance: 0 identical, 2 opposite
        const distance = sql<number>`${cosineDistance(fileChunks.embedding, query.vector)}`;

        const results = await this.db
            .select({
                id: fileChunks.id,
                fileId: fileChunks.fileId,
                filename: files.filename,
                chunkIndex: fileChunks.chunkIndex,
                content: fileChunks.content,
                metadata: fileChunks.metadata,
                distance: distance,
            })
            .from(fileChunks)
            .leftJoin(files, eq(files.id, fileChunks.fileId))
            .where(this.nearestNeighborConditions(query, distance))
            .orderBy(distance)
            .limit(query.limit);

        return results.map(row => ({
            chunkId: row.id,
            fileId: row.fileId,
            filename: row.filename,
            chunkIndex: row.chunkIndex,
            content: row.content,
            metadata: row.metadata ?? {},
            distance: Number(row.distance),
        }));
    }

    /**
     * Scope, metadata predicates and distance cutoff, all ANDed so they apply before LIMIT
     */
    nearestNeighborConditions(query: NearestNeighborQuery, distance: SQL<number>): SQL | undefined {
        const conditions: SQL[] = [
            eq(fileChunks.vectorStoreId, query.vectorStoreId),
            isNotNull(fileChunks.embedding),
        ];

        for (const [key, value] of Object.entries(query.filter ?? {})) {
            conditions.push(sql`${fileChunks.metadata} ->> ${key} = ${value}`);
        }

        if (query.maxDistance !== undefined) {
            conditions.push(lte(distance, query.maxDistance));
        }

        return and(...conditions);
    }

    async deleteByFileId(fileId: string): Promise<void> {
        await this.db.delete(fileChunks).where(eq(fileChunks.fileId, fileId));
    }
}
