import { NextFunction, Request, Response, Router } from 'express';
import { createVectorStoreSchema, listVectorStoresQuerySchema, resourceIdSchema, VectorStoreListDto } from '@docvector/types';
import { Controller } from '../interfaces/Controller';
import { CreateVectorStore, DeleteVectorStore, GetVectorStores } from '../../../application/useCases/VectorStores';
import { toVectorStoreDto } from '../mappers';

export class VectorStoreController implements Controller {
    public path = '/v1/vector_stores';
    public router = Router();

    constructor(
        private createVectorStore: CreateVectorStore,
        private getVectorStores: GetVectorStores,
        private deleteVectorStore: DeleteVectorStore
    ) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.post(`${this.path}`, this.create.bind(this));
        this.router.get(`${this.path}`, this.list.bind(this));
        this.router.get(`${this.path}/:id`, this.getById.bind(this));
        this.router.delete(`${this.path}/:id`, this.delete.bind(this));
    }

    async create(req: Request, res: Response, next: NextFunction) {
        try {
            const { name, metadata } = createVectorStoreSchema.parse(req.body);
            const store = await this.createVectorStore.execute(name, metadata);
            res.status(201).json(toVectorStoreDto(store));
        } catch (error) {
            next(error);
        }
    }

    async list(req: Request, res: Response, next: NextFunction) {
        try {
            const query = listVectorStoresQuerySchema.parse(req.query);
            const { stores, hasMore } = await this.getVectorStores.executeList(query);
            const body: VectorStoreListDto = {
                object: 'list',
                data: stores.map(toVectorStoreDto),
                hasMore,
            };
            res.json(body);
        } catch (error) {
            next(error);
        }
    }

    async getById(req: Request, res: Response, next: NextFunction) {
        try {
            const store = await this.getVectorStores.executeGetById(resourceIdSchema.parse(req.params.id));
            res.json(toVectorStoreDto(store));
        } catch (error) {
            next(error);
        }
    }

    async delete(req: Request, res: Response, next: NextFunction) {
        try {
            const id = await this.deleteVectorStore.execute(resourceIdSchema.parse(req.params.id));
            res.json({ id, deleted: true });
        } catch (error) {
            next(error);
        }
    }
}
