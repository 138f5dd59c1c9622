import { NextFunction, Request, Response, Router } from 'express';
import { resourceIdSchema, searchRequestSchema, SearchResponseDto } from '@docvector/types';
import { Controller } from '../interfaces/Controller';
import { SearchVectorStore } from '../../../application/useCases/SearchVectorStore';
import { embeddingRateLimiter } from '../middleware/rateLimiter';
import { requestSignal } from '../requestSignal';
import { toSearchResultDto } from '../mappers';

export class SearchController implements Controller {
    public path = '/v1/vector_stores/:id/search';
    public router = Router();

    constructor(private searchVectorStore: SearchVectorStore) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.post(`${this.path}`, embeddingRateLimiter, this.handle.bind(this));
    }

    async handle(req: Request, res: Response, next: NextFunction) {
        const { signal, release } = requestSignal(res);
        try {
            const vectorStoreId = resourceIdSchema.parse(req.params.id);
            const { query, maxResults, filter, scoreThreshold } = searchRequestSchema.parse(req.body);
            const results = await this.searchVectorStore.execute(
                { vectorStoreId, query, maxResults, filter, scoreThreshold },
                { signal }
            );

            const body: SearchResponseDto = {
                object: 'list',
                data: results.map(toSearchResultDto),
                searchQuery: query,
            };
            res.json(body);
        } catch (error) {
            next(error);
        } finally {
            release();
        }
    }
}
