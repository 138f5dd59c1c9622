import { NextFunction, Request, Response, Router } from 'express';
import multer from 'multer';
import { ingestTextSchema, resourceIdSchema, uploadFieldsSchema } from '@docvector/types';
import { Controller } from '../interfaces/Controller';
import { assertUploadableFilename, IngestFile, IngestFileInput } from '../../../application/useCases/IngestFile';
import { GetFiles } from '../../../application/useCases/GetFiles';
import { DeleteFile } from '../../../application/useCases/DeleteFile';
import { InvalidArgumentError } from '../../../domain/errors/AppError';
import { embeddingRateLimiter } from '../middleware/rateLimiter';
import { requestSignal } from '../requestSignal';
import { toFileDto } from '../mappers';

const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;
const DEFAULT_TEXT_FILENAME = 'untitled.txt';

export class FileController implements Controller {
    public path = '/v1/vector_stores/:id/files';
    public router = Router();
    private upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: MAX_UPLOAD_BYTES } });

    constructor(
        private ingestFile: IngestFile,
        private getFiles: GetFiles,
        private deleteFile: DeleteFile
    ) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.post(`${this.path}`, embeddingRateLimiter, this.upload.single('file'), this.create.bind(this));
        this.router.get(`${this.path}`, this.getAll.bind(this));
        this.router.get(`${this.path}/:fileId`, this.getById.bind(this));
        this.router.delete(`${this.path}/:fileId`, this.delete.bind(this));
    }

    async create(req: Request, res: Response, next: NextFunction) {
        const { signal, release } = requestSignal(res);
        try {
            const file = await this.ingestFile.execute(this.toIngestInput(req), { signal });
            res.status(201).json(toFileDto(file));
        } catch (error) {
            next(error);
        } finally {
            release();
        }
    }

    async getAll(req: Request, res: Response, next: NextFunction) {
        try {
            const files = await this.getFiles.executeGetAll(resourceIdSchema.parse(req.params.id));
            res.json({ object: 'list', data: files.map(toFileDto) });
        } catch (error) {
            next(error);
        }
    }

    async getById(req: Request, res: Response, next: NextFunction) {
        try {
            const file = await this.getFiles.executeGetById(
                resourceIdSchema.parse(req.params.id),
                resourceIdSchema.parse(req.params.fileId)
            );
            res.json(toFileDto(file));
        } catch (error) {
            next(error);
        }
    }

    async delete(req: Request, res: Response, next: NextFunction) {
        try {
            const id = await this.deleteFile.execute(
                resourceIdSchema.parse(req.params.id),
                resourceIdSchema.parse(req.params.fileId)
            );
            res.json({ id, deleted: true });
        } catch (error) {
            next(error);
        }
    }

    /**
     * Multipart uploads carry the document in `file`; JSON bodies carry it in `text`.
     */
    toIngestInput(req: Request): IngestFileInput {
        const vectorStoreId = resourceIdSchema.parse(req.params.id);

        if (req.file) {
            assertUploadableFilename(req.file.originalname);
            const fields = uploadFieldsSchema.parse(req.body ?? {});
            return {
                vectorStoreId,
                filename: req.file.originalname,
                text: decodeUtf8(req.file.buffer, req.file.originalname),
                metadata: fields.metadata,
                attributes: fields.attributes,
                chunkSize: fields.chunkSize,
                overlap: fields.overlap,
            };
        }

        const body = ingestTextSchema.parse(req.body);
        return {
            vectorStoreId,
            filename: body.filename ?? DEFAULT_TEXT_FILENAME,
            text: body.text,
            metadata: body.metadata,
            attributes: body.attributes,
            chunkSize: body.chunkSize,
            overlap: body.overlap,
        };
    }
}

function decodeUtf8(buffer: Buffer, filename: string): string {
    try {
        return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    } catch (error) {
        throw new InvalidArgumentError(`File '${filename}' is not valid UTF-8 text`, { cause: error });
    }
}
