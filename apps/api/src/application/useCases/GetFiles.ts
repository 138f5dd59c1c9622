import { FileRepository } from '../../domain/entities/FileRepository';
import { StoredFile } from '../../domain/entities/StoredFile';
import { VectorStoreRepository } from '../../domain/entities/VectorStoreRepository';
import { NotFoundError } from '../../domain/errors/AppError';
import { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';

export class GetFiles {
    constructor(private repositories: RepositoryProvider) {}

    async executeGetAll(vectorStoreId: string): Promise<StoredFile[]> {
        const store = await this.repositories.get(VectorStoreRepository).findById(vectorStoreId);
        if (!store) {
            throw new NotFoundError('Vector store not found');
        }
        return this.repositories.get(FileRepository).listByVectorStore(vectorStoreId);
    }

    async executeGetById(vectorStoreId: string, fileId: string): Promise<StoredFile> {
        const file = await this.repositories.get(FileRepository).findById(vectorStoreId, fileId);
        if (!file) {
            throw new NotFoundError('File not found');
        }
        return file;
    }
}
