import type { FileDto, SearchResultDto, VectorStoreDto } from '@docvector/types';
import { VectorStore } from '../../domain/entities/VectorStore';
import { StoredFile } from '../../domain/entities/StoredFile';
import { SearchResult } from '../../domain/entities/SearchResult';

const SCORE_DECIMALS = 1e6;

export function toVectorStoreDto(store: VectorStore): VectorStoreDto {
    return {
        id: store.id,
        name: store.name,
        metadata: store.metadata,
        fileCounts: { ...store.fileCounts },
        createdAt: store.createdAt.toISOString(),
        updatedAt: store.updatedAt.toISOString(),
    };
}

export function toFileDto(file: StoredFile): FileDto {
    return {
        id: file.id,
        vectorStoreId: file.vectorStoreId,
        filename: file.filename,
        status: file.status,
        chunkCount: file.chunkCount,
        attributes: file.attributes,
        error: file.error,
        createdAt: file.createdAt.toISOString(),
    };
}

// Score is rounded for display only; distance stays raw
export function toSearchResultDto(result: SearchResult): SearchResultDto {
    return {
        chunkId: result.chunkRef,
        fileId: result.fileId,
        filename: result.filename,
        chunkIndex: result.chunkIndex,
        content: result.content,
        score: Math.round(result.score * SCORE_DECIMALS) / SCORE_DECIMALS,
        distance: result.distance,
        metadata: { ...result.metadata },
    };
}
