import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import { Server } from 'http';
import { errorHandler } from './infrastructure/http/middleware/errorHandler';
import { requestId, requestLogger } from './infrastructure/http/middleware/requestContext';
import { Core } from './infrastructure/Core';
import { AppConfig } from './application/config/appConfig';
import { VectorStoreController } from './infrastructure/http/controllers/VectorStoreController';
import { FileController } from './infrastructure/http/controllers/FileController';
import { SearchController } from './infrastructure/http/controllers/SearchController';
import { HealthController } from './infrastructure/http/controllers/HealthController';
import { CreateVectorStore, DeleteVectorStore, GetVectorStores } from './application/useCases/VectorStores';
import { IngestFile } from './application/useCases/IngestFile';
import { GetFiles } from './application/useCases/GetFiles';
import { DeleteFile } from './application/useCases/DeleteFile';
import { SearchVectorStore } from './application/useCases/SearchVectorStore';
import logger from './infrastructure/logger';

export class App {
    public app: express.Application;

    constructor(private config: AppConfig, private core: Core) {
        this.app = express();

        this.initializeMiddlewares();
        this.initializeControllers();
        this.initializeErrorHandling();
    }

    private initializeMiddlewares() {
        this.app.use(requestId);
        this.app.use(requestLogger);
        this.app.use(helmet());
        this.app.use(express.json({ limit: '10mb' }));

        const limiter = rateLimit({
            windowMs: 15 * 60 * 1000, // 15 minutes
            limit: 1000,
            standardHeaders: true,
            legacyHeaders: false,
        });
        this.app.use(limiter);

        this.app.use(cors({
            origin: this.config.corsOrigin,
            methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
            exposedHeaders: ['X-Request-ID'],
        }));
    }

    private initializeControllers() {
        const healthController = new HealthController(
            () => this.core.checkDatabase(),
            this.core.openaiApiKeySet,
        );
        const vectorStoreController = new VectorStoreController(
            this.core.getUseCase(CreateVectorStore),
            this.core.getUseCase(GetVectorStores),
            this.core.getUseCase(DeleteVectorStore),
        );
        const fileController = new FileController(
            this.core.getUseCase(IngestFile),
            this.core.getUseCase(GetFiles),
            this.core.getUseCase(DeleteFile),
        );
        const searchController = new SearchController(this.core.getUseCase(SearchVectorStore));
        const controllers = [
            healthController,
            vectorStoreController,
            fileController,
            searchController,
        ];
        controllers.forEach((controller) => {
            this.app.use('/', controller.router);
        });
    }

    private initializeErrorHandling() {
        this.app.use(errorHandler);
    }

    public listen(): Server {
        const port = this.config.port;
        return this.app.listen(port, () => {
            logger.info(`Server running on http://localhost:${port}`);
        });
    }
}
