import { describe, it, expect, beforeEach } from 'vitest';
import { CreateVectorStore, DeleteVectorStore, GetVectorStores } from '../src/application/useCases/VectorStores';
import { GetFiles } from '../src/application/useCases/GetFiles';
import { DeleteFile } from '../src/application/useCases/DeleteFile';
import { FileChunk } from '../src/domain/entities/FileChunk';
import { NotFoundError } from '../src/domain/errors/AppError';
import { createInMemoryRepositories } from './fakes/inMemoryRepositories';

describe('Vector store use cases', () => {
    let repositories: ReturnType<typeof createInMemoryRepositories>;

    beforeEach(() => {
        repositories = createInMemoryRepositories();
    });

    it('creates a store with metadata and empty file counts', async () => {
        const store = await new CreateVectorStore(repositories.provider).execute('handbook', { team: 'docs' });

        expect(store.name).toBe('handbook');
        expect(store.metadata).toEqual({ team: 'docs' });
        expect(store.fileCounts).toEqual({ inProgress: 0, completed: 0, failed: 0, total: 0 });
    });

    it('stores null metadata when none is given', async () => {
        const store = await new CreateVectorStore(repositories.provider).execute('handbook');

        expect(store.metadata).toBeNull();
    });

    it('gets a store by id', async () => {
        const created = await repositories.vectorStores.create('handbook', null);

        const store = await new GetVectorStores(repositories.provider).executeGetById(created.id);

        expect(store.id).toBe(created.id);
    });

    it('throws NotFoundError for a missing store', async () => {
        await expect(new GetVectorStores(repositories.provider).executeGetById('missing'))
            .rejects.toBeInstanceOf(NotFoundError);
    });

    it('lists stores with paging', async () => {
        await repositories.vectorStores.create('first', null);
        await repositories.vectorStores.create('second', null);
        await repositories.vectorStores.create('third', null);

        const page = await new GetVectorStores(repositories.provider)
            .executeList({ limit: 2, offset: 0, order: 'asc' });

        expect(page.stores.map(s => s.name)).toEqual(['first', 'second']);
        expect(page.hasMore).toBe(true);
    });

    it('deletes a store and reports missing ones', async () => {
        const created = await repositories.vectorStores.create('handbook', null);
        const deleteVectorStore = new DeleteVectorStore(repositories.provider);

        await expect(deleteVectorStore.execute(created.id)).resolves.toBe(created.id);
        await expect(deleteVectorStore.execute(created.id)).rejects.toBeInstanceOf(NotFoundError);
    });
});

describe('GetFiles', () => {
    it('lists the files of a store', async () => {
        const repositories = createInMemoryRepositories();
        const store = await repositories.vectorStores.create('handbook', null);
        const file = await repositories.files.create({ vectorStoreId: store.id, filename: 'a.md', attributes: null });
        await repositories.files.create({ vectorStoreId: 'other', filename: 'b.md', attributes: null });
        const getFiles = new GetFiles(repositories.provider);

        const files = await getFiles.executeGetAll(store.id);

        expect(files.map(f => f.filename)).toEqual(['a.md']);
        await expect(getFiles.executeGetById(store.id, file.id)).resolves.toMatchObject({ filename: 'a.md' });
    });

    it('throws NotFoundError for unknown stores and files', async () => {
        const repositories = createInMemoryRepositories();
        const store = await repositories.vectorStores.create('handbook', null);
        const getFiles = new GetFiles(repositories.provider);

        await expect(getFiles.executeGetAll('missing')).rejects.toBeInstanceOf(NotFoundError);
        await expect(getFiles.executeGetById(store.id, 'missing')).rejects.toBeInstanceOf(NotFoundError);
    });
});

describe('DeleteFile', () => {
    const chunk = (id: string, fileId: string, vectorStoreId: string) =>
        new FileChunk(id, fileId, vectorStoreId, 0, 'text', 1, [1, 0], null, new Date());

    it('removes the file and only its chunks', async () => {
        const repositories = createInMemoryRepositories();
        const store = await repositories.vectorStores.create('handbook', null);
        const doomed = await repositories.files.create({ vectorStoreId: store.id, filename: 'a.md', attributes: null });
        const kept = await repositories.files.create({ vectorStoreId: store.id, filename: 'b.md', attributes: null });
        await repositories.chunks.saveBatch([
            chunk('c1', doomed.id, store.id),
            chunk('c2', kept.id, store.id),
        ]);

        const id = await new DeleteFile(repositories.provider).execute(store.id, doomed.id);

        expect(id).toBe(doomed.id);
        expect(repositories.files.files.map(f => f.filename)).toEqual(['b.md']);
        expect(repositories.chunks.chunks.map(c => c.id)).toEqual(['c2']);
    });

    it('throws NotFoundError for an unknown store or a file of another store', async () => {
        const repositories = createInMemoryRepositories();
        const store = await repositories.vectorStores.create('handbook', null);
        const other = await repositories.vectorStores.create('archive', null);
        const file = await repositories.files.create({ vectorStoreId: other.id, filename: 'a.md', attributes: null });
        const deleteFile = new DeleteFile(repositories.provider);

        await expect(deleteFile.execute('missing', file.id)).rejects.toBeInstanceOf(NotFoundError);
        await expect(deleteFile.execute(store.id, file.id)).rejects.toBeInstanceOf(NotFoundError);
        expect(repositories.files.files).toHaveLength(1);
    });
});
