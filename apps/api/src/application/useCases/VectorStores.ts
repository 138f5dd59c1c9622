import type { Metadata } from '@docvector/types';
import { VectorStore } from '../../domain/entities/VectorStore';
import { ListVectorStoresOptions, VectorStoreRepository } from '../../domain/entities/VectorStoreRepository';
import { NotFoundError } from '../../domain/errors/AppError';
import { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';

export class CreateVectorStore {
    constructor(private repositories: RepositoryProvider) {}

    async execute(name: string, metadata?: Metadata): Promise<VectorStore> {
        return this.repositories.get(VectorStoreRepository).create(name, metadata ?? null);
    }
}

export class GetVectorStores {
    constructor(private repositories: RepositoryProvider) {}

    async executeList(options: ListVectorStoresOptions): Promise<{ stores: VectorStore[]; hasMore: boolean }> {
        return this.repositories.get(VectorStoreRepository).list(options);
    }

    async executeGetById(id: string): Promise<VectorStore> {
        const store = await this.repositories.get(VectorStoreRepository).findById(id);
        if (!store) {
            throw new NotFoundError('Vector store not found');
        }
        return store;
    }
}

export class DeleteVectorStore {
    constructor(private repositories: RepositoryProvider) {}

    async execute(id: string): Promise<string> {
        const deleted = await this.repositories.get(VectorStoreRepository).delete(id);
        if (!deleted) {
            throw new NotFoundError('Vector store not found');
        }
        return id;
    }
}
