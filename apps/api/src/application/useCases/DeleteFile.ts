import { ChunkRepository } from '../../domain/entities/ChunkRepository';
import { FileRepository } from '../../domain/entities/FileRepository';
import { VectorStoreRepository } from '../../domain/entities/VectorStoreRepository';
import { NotFoundError } from '../../domain/errors/AppError';
import { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import logger from '../../infrastructure/logger';

export class DeleteFile {
    constructor(private repositories: RepositoryProvider) {}

    /**
     * Removes a file and its chunks from a vector store. Returns the deleted file id.
     */
    async execute(vectorStoreId: string, fileId: string): Promise<string> {
        const store = await this.repositories.get(VectorStoreRepository).findById(vectorStoreId);
        if (!store) {
            throw new NotFoundError('Vector store not found');
        }

        const fileRepository = this.repositories.get(FileRepository);
        const file = await fileRepository.findById(vectorStoreId, fileId);
        if (!file) {
            throw new NotFoundError('File not found');
        }

        await this.repositories.get(ChunkRepository).deleteByFileId(file.id);
        const deleted = await fileRepository.delete(vectorStoreId, file.id);
        if (!deleted) {
            throw new NotFoundError('File not found');
        }

        logger.info('File deleted', { fileId, vectorStoreId });
        return file.id;
    }
}
