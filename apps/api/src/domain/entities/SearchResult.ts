export class SearchResult {
    constructor(
        public readonly chunkRef: string,
        public readonly fileId: string,
        public readonly filename: string | null,
        public readonly chunkIndex: number,
        public readonly content: string,
        public readonly distance: number,
        public readonly score: number,
        public readonly metadata: Readonly<Record<string, unknown>>
    ) {}
}
