import { FileChunk } from './FileChunk';

export interface NearestNeighborQuery {
    vectorStoreId: string;
    vector: number[];
    limit: number;
    /** Exact-match predicates over chunk metadata, combined with AND */
    filter?: Readonly<Record<string, string>>;
    /** Candidates farther than this cosine distance are excluded before the limit */
    maxDistance?: number;
}

export interface NearestNeighborCandidate {
    chunkId: string;
    fileId: string;
    filename: string | null;
    chunkIndex: number;
    content: string;
    metadata: Record<string, unknown>;
    distance: number;
}

export abstract class ChunkRepository {
    abstract saveBatch(chunks: FileChunk[]): Promise<void>;
    /** Candidates ordered by ascending cosine distance */
    abstract nearestNeighbors(query: NearestNeighborQuery): Promise<NearestNeighborCandidate[]>;
    abstract deleteByFileId(fileId: string): Promise<void>;
}
