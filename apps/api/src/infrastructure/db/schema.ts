import { pgTable, uuid, text, timestamp, vector, integer, jsonb, index } from "drizzle-orm/pg-core";
import type { FileStatus, Metadata } from '@docvector/types';

export const EMBEDDING_DIMENSIONS = 1536;

export const vectorStores = pgTable("vector_stores", {
    id: uuid("id").primaryKey().defaultRandom(),
    name: text("name").notNull(),
    metadata: jsonb("metadata").$type<Metadata>(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});

export const files = pgTable("files", {
    id: uuid("id").primaryKey().defaultRandom(),
    vectorStoreId: uuid("vector_store_id").notNull().references(() => vectorStores.id, { onDelete: 'cascade' }),
    filename: text("filename").notNull(),
    status: text("status").$type<FileStatus>().notNull().default('in_progress'),
    chunkCount: integer("chunk_count").notNull().default(0),
    attributes: jsonb("attributes").$type<Metadata>(),
    error: text("error"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => ([
    index("idx_files_vector_store").on(table.vectorStoreId, table.createdAt),
]));

export const fileChunks = pgTable("file_chunks", {
    id: uuid("id").primaryKey().defaultRandom(),
    fileId: uuid("file_id").notNull().references(() => files.id, { onDelete: 'cascade' }),
    vectorStoreId: uuid("vector_store_id").notNull().references(() => vectorStores.id, { onDelete: 'cascade' }),
    chunkIndex: integer("chunk_index").notNull(),
    content: text("content").notNull(),
    tokenCount: integer("token_count").notNull().default(0),
    embedding: vector("embedding", { dimensions: EMBEDDING_DIMENSIONS }),
    metadata: jsonb("metadata").$type<Record<string, unknown>>(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => ([
    index("idx_file_chunks_file").on(table.fileId, table.chunkIndex),
    index("idx_file_chunks_vector_store").on(table.vectorStoreId),
    index("idx_file_chunks_embedding").using('hnsw', table.embedding.op('vector_cosine_ops')),
]));
