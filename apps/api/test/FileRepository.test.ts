import { describe, it, expect, vi, type Mock } from 'vitest';
import { DrizzleFileRepository } from '../src/infrastructure/repositories/DrizzleFileRepository';
import type { Database } from '../src/infrastructure/db';

const fileRow = {
    id: 'f1',
    vectorStoreId: 's1',
    filename: 'guide.md',
    status: 'in_progress' as const,
    chunkCount: 0,
    attributes: null,
    error: null,
    createdAt: new Date('2024-01-15T10:00:00Z'),
};

describe('DrizzleFileRepository', () => {
    it('should create files in progress', async () => {
        const values: Mock = vi.fn(() => ({ returning: vi.fn().mockResolvedValue([fileRow]) }));
        const insert = vi.fn().mockReturnValue({ values });
        const repository = new DrizzleFileRepository({ insert } as unknown as Database);

        const file = await repository.create({ vectorStoreId: 's1', filename: 'guide.md', attributes: null });

        expect(values).toHaveBeenCalledWith({
            vectorStoreId: 's1',
            filename: 'guide.md',
            attributes: null,
            status: 'in_progress',
        });
        expect(file.status).toBe('in_progress');
        expect(file.attributes).toBeNull();
    });

    it('should update status fields', async () => {
        const where = vi.fn().mockResolvedValue(undefined);
        const set: Mock = vi.fn(() => ({ where }));
        const update = vi.fn().mockReturnValue({ set });
        const repository = new DrizzleFileRepository({ update } as unknown as Database);

        await repository.updateStatus('f1', { status: 'completed', chunkCount: 4 });

        expect(set).toHaveBeenCalledWith({ status: 'completed', chunkCount: 4, error: undefined });
        expect(where).toHaveBeenCalledTimes(1);
    });

    it('should return undefined when the file is not in the store', async () => {
        const where = vi.fn().mockResolvedValue([]);
        const select = vi.fn().mockReturnValue({ from: vi.fn().mockReturnValue({ where }) });
        const repository = new DrizzleFileRepository({ select } as unknown as Database);

        await expect(repository.findById('s1', 'f1')).resolves.toBeUndefined();
    });

    it('should report whether a file was deleted', async () => {
        const returning = vi.fn()
            .mockResolvedValueOnce([{ id: 'f1' }])
            .mockResolvedValueOnce([]);
        const where = vi.fn().mockReturnValue({ returning });
        const remove = vi.fn().mockReturnValue({ where });
        const repository = new DrizzleFileRepository({ delete: remove } as unknown as Database);

        await expect(repository.delete('s1', 'f1')).resolves.toBe(true);
        await expect(repository.delete('s1', 'f1')).resolves.toBe(false);
        expect(where).toHaveBeenCalledTimes(2);
    });
});
