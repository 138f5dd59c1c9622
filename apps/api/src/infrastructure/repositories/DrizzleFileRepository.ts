import { and, desc, eq } from 'drizzle-orm';
import type { Database } from '../db';
import { files } from '../db/schema';
import { StoredFile } from '../../domain/entities/StoredFile';
import { FileRepository, FileStatusUpdate, NewFile } from '../../domain/entities/FileRepository';

type FileRow = typeof files.$inferSelect;

export class DrizzleFileRepository extends FileRepository {
    constructor(private db: Database) {
        super();
    }

    async create(file: NewFile): Promise<StoredFile> {
        const [row] = await this.db
            .insert(files)
            .values({
                vectorStoreId: file.vectorStoreId,
                filename: file.filename,
                attributes: file.attributes,
                status: 'in_progress',
            })
            .returning();

        return this.toEntity(row);
    }

    async updateStatus(id: string, update: FileStatusUpdate): Promise<void> {
        await this.db
            .update(files)
            .set({
                status: update.status,
                chunkCount: update.chunkCount,
                error: update.error,
            })
            .where(eq(files.id, id));
    }

    async findById(vectorStoreId: string, id: string): Promise<StoredFile | undefined> {
        const result = await this.db
            .select()
            .from(files)
            .where(and(eq(files.id, id), eq(files.vectorStoreId, vectorStoreId)));

        return result.length === 0 ? undefined : this.toEntity(result[0]);
    }

    async listByVectorStore(vectorStoreId: string): Promise<StoredFile[]> {
        const rows = await this.db
            .select()
            .from(files)
            .where(eq(files.vectorStoreId, vectorStoreId))
            .orderBy(desc(files.createdAt));

        return rows.map(row => this.toEntity(row));
    }

    async delete(vectorStoreId: string, id: string): Promise<boolean> {
        const deleted = await this.db
            .delete(files)
            .where(and(eq(files.id, id), eq(files.vectorStoreId, vectorStoreId)))
            .returning({ id: files.id });

        return deleted.length > 0;
    }

    private toEntity(row: FileRow): StoredFile {
        return new StoredFile(
            row.id,
            row.vectorStoreId,
            row.filename,
            row.status,
            row.chunkCount,
            row.attributes ?? null,
            row.error,
            row.createdAt
        );
    }
}
