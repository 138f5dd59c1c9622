import type { FileStatus, Metadata } from '@docvector/types';
import { StoredFile } from './StoredFile';

export interface NewFile {
    vectorStoreId: string;
    filename: string;
    attributes: Metadata | null;
}

export interface FileStatusUpdate {
    status: FileStatus;
    chunkCount?: number;
    error?: string | null;
}

export abstract class FileRepository {
    abstract create(file: NewFile): Promise<StoredFile>;
    abstract updateStatus(id: string, update: FileStatusUpdate): Promise<void>;
    abstract findById(vectorStoreId: string, id: string): Promise<StoredFile | undefined>;
    abstract listByVectorStore(vectorStoreId: string): Promise<StoredFile[]>;
    /** Returns false when no file with this id belongs to the store */
    abstract delete(vectorStoreId: string, id: string): Promise<boolean>;
}
