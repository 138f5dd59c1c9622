import type { Metadata } from '@docvector/types';
import { VectorStore } from './VectorStore';

export interface ListVectorStoresOptions {
    limit: number;
    offset: number;
    order: 'asc' | 'desc';
}

export abstract class VectorStoreRepository {
    abstract create(name: string, metadata: Metadata | null): Promise<VectorStore>;
    abstract findById(id: string): Promise<VectorStore | undefined>;
    /** Returns up to `limit` stores and whether more exist past them */
    abstract list(options: ListVectorStoresOptions): Promise<{ stores: VectorStore[]; hasMore: boolean }>;
    abstract delete(id: string): Promise<boolean>;
}
