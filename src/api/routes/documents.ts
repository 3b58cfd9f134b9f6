import express, { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import { DocumentService } from '../../services/documentService';
import { ValidationError } from '../../utils/errors';
import { listDocumentsQuerySchema, uploadQuerySchema, validateInput } from '../middleware/validation';

export interface DocumentRouteOptions {
    maxUploadBytes: number;
    maxListSize?: number;
    uploadRateLimiter?: RequestHandler;
}

export function createDocumentRoutes(documentService: DocumentService, options: DocumentRouteOptions): Router {
    const router = Router();
    const listQuerySchema = listDocumentsQuerySchema(options.maxListSize ?? 10000);
    const noopLimiter: RequestHandler = (_req, _res, next) => next();

    /**
     * Upload one file as the raw request body
     * POST /documents/upload?filename=report.pdf
     */
    router.post(
        '/upload',
        options.uploadRateLimiter ?? noopLimiter,
        express.raw({ type: 'application/octet-stream', limit: options.maxUploadBytes }),
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                const { filename } = validateInput(uploadQuerySchema, req.query, 'query');

                if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
                    throw new ValidationError(
                        'Request body must contain the file content as application/octet-stream',
                        'body'
                    );
                }

                const result = await documentService.uploadDocument(filename, req.body);
                res.status(200).json(result);
            } catch (error) {
                next(error);
            }
        }
    );

    /**
     * List indexed documents grouped by upload
     * GET /documents?top=N
     */
    router.get('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { top } = validateInput(listQuerySchema, req.query, 'query');
            const result = await documentService.listDocuments(top);
            res.status(200).json(result);
        } catch (error) {
            next(error);
        }
    });

    /**
     * Delete a document and all of its chunks
     * DELETE /documents/:id
     */
    router.delete('/:id', async (req, res, next) => {
        try {
            const result = await documentService.deleteDocument(req.params.id);
            res.status(200).json(result);
        } catch (error) {
            next(error);
        }
    });

    return router;
}
