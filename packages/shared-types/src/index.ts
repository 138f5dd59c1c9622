export * from './schemas';

export type MetadataValue = string | number | boolean | null;
export type Metadata = Record<string, MetadataValue>;

export type FileStatus = 'in_progress' | 'completed' | 'failed';

/**
 * Vector store as returned by the API
 */
export interface VectorStoreDto {
  id: string;
  name: string;
  metadata: Metadata | null;
  fileCounts: {
    inProgress: number;
    completed: number;
    failed: number;
    total: number;
  };
  createdAt: string;  // ISO string
  updatedAt: string;
}

export interface VectorStoreListDto {
  object: 'list';
  data: VectorStoreDto[];
  hasMore: boolean;
}

export interface FileDto {
  id: string;
  vectorStoreId: string;
  filename: string;
  status: FileStatus;
  chunkCount: number;
  attributes: Metadata | null;
  error: string | null;
  createdAt: string;
}

/**
 * One ranked chunk in a similarity search response
 */
export interface SearchResultDto {
  chunkId: string;
  fileId: string;
  filename: string | null;
  chunkIndex: number;
  content: string;
  score: number;
  distance: number;
  metadata: Record<string, unknown>;
}

export interface SearchResponseDto {
  object: 'list';
  data: SearchResultDto[];
  searchQuery: string;
}

export interface HealthResponseDto {
  status: 'ok' | 'degraded';
  database: { status: 'ok' | 'error'; detail?: string };
  openaiApiKeySet: boolean;
}

export interface ErrorResponseDto {
  status: 'error' | 'fail';
  code?: string;
  message: string;
}
