import { Chunk } from '../../domain/entities/Chunk';
import { CancelledError, InvalidConfigurationError } from '../../domain/errors/AppError';
import type { Tokenizer } from '../providers/Tokenizer';

// Tried in order: paragraph, line, word. The empty separator means character level.
const SEPARATORS = ['\n\n', '\n', ' ', ''] as const;

const WHITESPACE = /\s/;

interface Span {
    start: number;
    end: number;
}

export interface SplitOptions {
    signal?: AbortSignal;
}

export class ChunkingService {
    constructor(private tokenizer: Tokenizer) {}

    /**
     * Splits text into token-bounded chunks with overlap.
     *
     * A text that fits in `chunkSize` is returned as a single chunk. Otherwise it is cut
     * into segments of at most `chunkSize - overlap` tokens using the separator waterfall,
     * and each segment after the first is extended backwards over the previous chunk's
     * trailing `overlap` tokens. No chunk exceeds `chunkSize` tokens.
     */
    split(text: string, chunkSize: number, overlap: number, options: SplitOptions = {}): Chunk[] {
        this.validateConfiguration(chunkSize, overlap);
        this.throwIfCancelled(options.signal);

        const whole = this.trimSpan(text, { start: 0, end: text.length });
        if (whole.start === whole.end) {
            return [];
        }

        const wholeTokens = this.countTokens(text.slice(whole.start, whole.end));
        if (wholeTokens <= chunkSize) {
            return [new Chunk(0, text.slice(whole.start, whole.end), wholeTokens, whole.start, whole.end, 0)];
        }

        const segments = this.splitSpan(text, whole, 0, chunkSize - overlap, options.signal);
        return this.applyOverlap(text, segments, chunkSize, overlap);
    }

    countTokens(text: string): number {
        return text.length === 0 ? 0 : this.tokenizer.encode(text).length;
    }

    private validateConfiguration(chunkSize: number, overlap: number): void {
        if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
            throw new InvalidConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
        }
        if (!Number.isInteger(overlap) || overlap < 0) {
            throw new InvalidConfigurationError(`overlap must be a non-negative integer, got ${overlap}`);
        }
        if (overlap >= chunkSize) {
            throw new InvalidConfigurationError(
                `overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`
            );
        }
    }

    private throwIfCancelled(signal?: AbortSignal): void {
        if (signal?.aborted) {
            throw new CancelledError('Chunking cancelled', { cause: signal.reason });
        }
    }

    /**
     * Recursive separator waterfall over a trimmed span of the source.
     * Returns trimmed, non-empty spans of at most `budget` tokens, in source order.
     */
    private splitSpan(source: string, span: Span, level: number, budget: number, signal?: AbortSignal): Span[] {
        const segment = source.slice(span.start, span.end);
        if (this.countTokens(segment) <= budget) {
            return [span];
        }

        let separatorLevel = level;
        while (separatorLevel < SEPARATORS.length - 1 && !segment.includes(SEPARATORS[separatorLevel])) {
            separatorLevel++;
        }
        const separator = SEPARATORS[separatorLevel];
        if (separator === '') {
            return this.splitByCharacters(source, span, budget);
        }

        const result: Span[] = [];
        let current: Span | undefined;
        let currentTokens = 0;

        const flush = () => {
            if (!current) return;
            // Merging estimates token counts; re-measure before accepting the span.
            if (this.countTokens(source.slice(current.start, current.end)) > budget) {
                result.push(...this.splitSpan(source, current, separatorLevel + 1, budget, signal));
            } else {
                result.push(current);
            }
            current = undefined;
        };

        for (const piece of this.piecesOf(source, span, separator)) {
            if (separatorLevel === 0) {
                this.throwIfCancelled(signal);
            }

            const pieceTokens = this.countTokens(source.slice(piece.start, piece.end));
            if (pieceTokens > budget) {
                flush();
                result.push(...this.splitSpan(source, piece, separatorLevel + 1, budget, signal));
                continue;
            }

            if (!current) {
                current = piece;
                currentTokens = pieceTokens;
                continue;
            }

            // Tokenizers attach a leading separator to the following word, so the
            // separator and piece are measured together.
            const estimate = currentTokens + this.countTokens(source.slice(current.end, piece.end));
            const mergedTokens = estimate <= budget
                ? estimate
                : this.countTokens(source.slice(current.start, piece.end));

            if (mergedTokens <= budget) {
                current = { start: current.start, end: piece.end };
                currentTokens = mergedTokens;
            } else {
                flush();
                current = piece;
                currentTokens = pieceTokens;
            }
        }
        flush();

        return result;
    }

    private trimSpan(source: string, span: Span): Span {
        let { start, end } = span;
        while (start < end && WHITESPACE.test(source[start])) start++;
        while (end > start && WHITESPACE.test(source[end - 1])) end--;
        return { start, end };
    }

    /**
     * Pieces between occurrences of `separator`, trimmed, with empty pieces dropped
     */
    private piecesOf(source: string, span: Span, separator: string): Span[] {
        const pieces: Span[] = [];
        let start = span.start;

        while (start <= span.end) {
            const found = source.indexOf(separator, start);
            const end = found === -1 || found + separator.length > span.end ? span.end : found;
            const piece = this.trimSpan(source, { start, end });
            if (piece.start < piece.end) {
                pieces.push(piece);
            }
            if (end === span.end) break;
            start = end + separator.length;
        }

        return pieces;
    }

    /**
     * Last resort: cuts the longest prefix of whole code points that fits the budget.
     * Always advances by at least one code point.
     */
    private splitByCharacters(source: string, span: Span, budget: number): Span[] {
        const codePoints = Array.from(source.slice(span.start, span.end));
        const offsets = [0];
        for (const codePoint of codePoints) {
            offsets.push(offsets[offsets.length - 1] + codePoint.length);
        }

        const spans: Span[] = [];
        let from = 0;
        while (from < codePoints.length) {
            let low = from + 1;
            let high = codePoints.length;
            let best = from + 1;
            while (low <= high) {
                const mid = (low + high) >>> 1;
                const candidate = source.slice(span.start + offsets[from], span.start + offsets[mid]);
                if (this.countTokens(candidate) <= budget) {
                    best = mid;
                    low = mid + 1;
                } else {
                    high = mid - 1;
                }
            }

            const piece = this.trimSpan(source, {
                start: span.start + offsets[from],
                end: span.start + offsets[best],
            });
            if (piece.start < piece.end) {
                spans.push(piece);
            }
            from = best;
        }

        return spans;
    }

    private applyOverlap(source: string, segments: Span[], chunkSize: number, overlap: number): Chunk[] {
        const chunks: Chunk[] = [];

        segments.forEach((segment, index) => {
            const previous = chunks[index - 1];
            const carried = previous && overlap > 0
                ? this.carryOver(source, previous, segment, chunkSize, overlap)
                : undefined;

            const start = carried?.start ?? segment.start;
            const tokenCount = carried?.tokenCount ?? this.countTokens(source.slice(segment.start, segment.end));

            chunks.push(new Chunk(
                index,
                source.slice(start, segment.end),
                tokenCount,
                start,
                segment.end,
                segment.start - start
            ));
        });

        return chunks;
    }

    /**
     * Finds where the next chunk should start so it begins with the previous chunk's
     * trailing tokens, shrinking the carried tokens until the chunk fits `chunkSize`.
     */
    private carryOver(
        source: string,
        previous: Chunk,
        segment: Span,
        chunkSize: number,
        overlap: number
    ): { start: number; tokenCount: number } | undefined {
        const previousTokens = this.tokenizer.encode(previous.text);

        for (let take = Math.min(overlap, previousTokens.length); take > 0; take--) {
            const tail = this.tokenizer.decode(previousTokens.slice(previousTokens.length - take)).trimStart();
            // A tail that cuts through a multi-byte character does not decode to source text.
            if (tail.length === 0 || !previous.text.endsWith(tail)) {
                continue;
            }

            const start = previous.endChar - tail.length;
            const tokenCount = this.countTokens(source.slice(start, segment.end));
            if (tokenCount <= chunkSize) {
                return { start, tokenCount };
            }
        }

        return undefined;
    }
}
