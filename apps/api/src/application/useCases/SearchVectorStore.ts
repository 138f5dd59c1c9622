import { Retriever, SearchOptions, SearchParams } from '../services/Retriever';
import { SearchResult } from '../../domain/entities/SearchResult';
import { VectorStoreRepository } from '../../domain/entities/VectorStoreRepository';
import { NotFoundError } from '../../domain/errors/AppError';
import { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';

export class SearchVectorStore {
    constructor(
        private repositories: RepositoryProvider,
        private retriever: Retriever
    ) {}

    async execute(params: SearchParams, options?: SearchOptions): Promise<SearchResult[]> {
        const store = await this.repositories.get(VectorStoreRepository).findById(params.vectorStoreId);
        if (!store) {
            throw new NotFoundError('Vector store not found');
        }
        return this.retriever.search(params, options);
    }
}
