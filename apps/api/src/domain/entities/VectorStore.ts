import type { Metadata } from '@docvector/types';

export interface FileCounts {
    inProgress: number;
    completed: number;
    failed: number;
    total: number;
}

export class VectorStore {
    constructor(
        public readonly id: string,
        public readonly name: string,
        public readonly metadata: Metadata | null,
        public readonly fileCounts: FileCounts,
        public readonly createdAt: Date,
        public readonly updatedAt: Date
    ) {}
}
