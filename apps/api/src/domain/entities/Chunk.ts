/**
 * Contiguous slice of a source document produced by the chunker.
 * `text` equals `source.slice(startChar, endChar)`; its first `overlapLength`
 * characters repeat the tail of the previous chunk.
 */
export class Chunk {
    constructor(
        public readonly index: number,
        public readonly text: string,
        public readonly tokenCount: number,
        public readonly startChar: number,
        public readonly endChar: number,
        public readonly overlapLength: number
    ) {}

    get ownText(): string {
        return this.text.slice(this.overlapLength);
    }
}
