import type { FileStatus, Metadata } from '@docvector/types';

export class StoredFile {
    constructor(
        public readonly id: string,
        public readonly vectorStoreId: string,
        public readonly filename: string,
        public readonly status: FileStatus,
        public readonly chunkCount: number,
        public readonly attributes: Metadata | null,
        public readonly error: string | null,
        public readonly createdAt: Date
    ) {}
}
