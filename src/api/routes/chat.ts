import { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import { ChatRequest, createChatRequestSchema } from '../../models/chat';
import { CompletionGateway } from '../../services/completion';
import { RAGService } from '../../services/ragService';
import { ErrorHandler } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { validateWithJoi } from '../middleware/validation';
import { getCorrelationId } from '../requestContext';

export interface ChatRouteDependencies {
    ragService: RAGService;
    completionGateway: CompletionGateway;
}

export interface ChatRouteOptions {
    enableStreaming: boolean;
    maxTopK: number;
    rateLimiter?: RequestHandler;
}

export type StreamEvent = 'data' | 'fallback' | 'error' | 'done';

/**
 * Serializes one server-sent event. `data` events use the default event type;
 * multi-line payloads are split across `data:` lines.
 */
export function formatSseEvent(event: StreamEvent, data: string): string {
    const lines = data.split(/\r\n|\r|\n/).map(line => `data: ${line}`);
    const header = event === 'data' ? '' : `event: ${event}\n`;
    return `${header}${lines.join('\n')}\n\n`;
}

export function createChatRoutes(dependencies: ChatRouteDependencies, options: ChatRouteOptions): Router {
    const { ragService, completionGateway } = dependencies;
    const router = Router();
    const chatSchema = createChatRequestSchema(options.maxTopK);

    if (options.rateLimiter) {
        router.use(options.rateLimiter);
    }

    const answerInFull = async (request: ChatRequest, correlationId: string): Promise<string | null> => {
        try {
            const response = await ragService.answerQuestion(request);
            return response.answer;
        } catch (error) {
            logger.error('Fallback answer failed', {
                correlationId,
                error: ErrorHandler.toError(error).message
            });
            return null;
        }
    };

    /**
     * Non-streamed chat
     * POST /chat
     */
    router.post('/', validateWithJoi(chatSchema), async (req: Request, res: Response, next: NextFunction) => {
        try {
            const request: ChatRequest = req.body;
            const response = await ragService.answerQuestion(request);
            res.status(200).json(response);
        } catch (error) {
            next(error);
        }
    });

    /**
     * Streamed chat over server-sent events
     * POST /chat/stream
     */
    router.post('/stream', validateWithJoi(chatSchema), async (req: Request, res: Response) => {
        const correlationId = getCorrelationId(req);
        const request: ChatRequest = req.body;

        let clientClosed = false;
        res.on('close', () => {
            if (!res.writableEnded) {
                clientClosed = true;
                logger.info('Client disconnected from stream', { correlationId });
            }
        });

        res.status(200);
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no');
        res.flushHeaders();

        const send = (event: StreamEvent, data: string): void => {
            if (!clientClosed) {
                res.write(formatSseEvent(event, data));
            }
        };

        const sendFallback = async (): Promise<void> => {
            const answer = await answerInFull(request, correlationId);
            if (answer !== null) {
                send('fallback', answer);
            }
        };

        try {
            if (!options.enableStreaming) {
                const answer = await answerInFull(request, correlationId);
                if (answer !== null) {
                    send('data', answer);
                } else {
                    send('error', 'Unable to generate an answer');
                }
                return;
            }

            const context = await ragService.processQuery({
                query: request.message,
                topK: request.topK,
                generateAnswer: false
            });

            if (!context.hasSufficientContext) {
                send('data', context.answer);
                return;
            }

            const stream = completionGateway.chatCompletionStream(
                ragService.buildGenerationRequest(request.message, context.contextDocuments, {
                    temperature: request.temperature,
                    maxTokens: request.maxTokens
                })
            );

            let streamedChunks = 0;
            for await (const chunk of stream) {
                if (clientClosed) {
                    break;
                }
                streamedChunks++;
                send('data', chunk);
            }

            if (streamedChunks === 0 && !clientClosed) {
                logger.warn('Stream produced no content; sending fallback answer', { correlationId });
                await sendFallback();
            }
        } catch (error) {
            const message = ErrorHandler.toError(error).message;
            logger.error('Chat stream failed', { correlationId, error: message });
            send('error', message);
            if (!clientClosed) {
                await sendFallback();
            }
        } finally {
            send('done', '[DONE]');
            res.end();
        }
    });

    return router;
}
