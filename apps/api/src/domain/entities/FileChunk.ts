export class FileChunk {
    constructor(
        public readonly id: string,
        public readonly fileId: string,
        public readonly vectorStoreId: string,
        public readonly chunkIndex: number,
        public readonly content: string,
        public readonly tokenCount: number,
        public readonly embedding: number[],
        public readonly metadata: Record<string, unknown> | null,
        public readonly createdAt: Date
    ) {}
}
