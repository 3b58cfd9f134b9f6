import request from 'supertest';
import { ApiGateway } from '../../api/app';
import { defaultConfig } from '../../config';
import { SystemConfig } from '../../models/config';
import { createServices } from '../../services';
import { SearchUnavailableError } from '../../utils/errors';
import { chunk, createFakeCompletionGateway, createFakeSearchGateway, streamOf } from '../fakes';

const NORMALIZED_ANSWER = '**Answer**\n\nThe answer.\n\nSources: [Source: Handbook (Chunk 1)]';
const DONE_EVENT = 'event: done\ndata: [DONE]\n\n';

function buildConfig(
    server: Partial<SystemConfig['server']> = {},
    rag: Partial<SystemConfig['rag']> = {}
): SystemConfig {
    return {
        ...defaultConfig,
        server: { ...defaultConfig.server, ...server },
        rag: { ...defaultConfig.rag, ...rag },
        completion: { ...defaultConfig.completion, apiKey: 'test-key' }
    };
}

describe('ApiGateway', () => {
    let searchGateway: ReturnType<typeof createFakeSearchGateway>;
    let completionGateway: ReturnType<typeof createFakeCompletionGateway>;

    const buildApp = (server: Partial<SystemConfig['server']> = {}, rag: Partial<SystemConfig['rag']> = {}) => {
        const config = buildConfig(server, rag);
        return new ApiGateway(createServices(config, { searchGateway, completionGateway }), config).getApp();
    };

    beforeEach(() => {
        searchGateway = createFakeSearchGateway();
        completionGateway = createFakeCompletionGateway();
    });

    describe('GET /', () => {
        it('should describe the service', async () => {
            const response = await request(buildApp()).get('/');

            expect(response.status).toBe(200);
            expect(response.body.status).toBe('running');
            expect(response.body.endpoints.chatStream).toBe('/api/chat/stream');
        });
    });

    describe('unknown routes', () => {
        it('should return 404 with the error envelope', async () => {
            const response = await request(buildApp()).get('/api/nowhere');

            expect(response.status).toBe(404);
            expect(response.body.error.code).toBe('ROUTE_NOT_FOUND');
            expect(response.body.error.message).toBe('Route GET /api/nowhere not found');
        });
    });

    describe('correlation ids', () => {
        it('should echo a supplied correlation id', async () => {
            const response = await request(buildApp())
                .get('/api/nowhere')
                .set('X-Correlation-ID', 'test-correlation');

            expect(response.headers['x-correlation-id']).toBe('test-correlation');
            expect(response.body.error.correlationId).toBe('test-correlation');
        });

        it('should generate one when none is supplied', async () => {
            const response = await request(buildApp()).get('/');

            expect(response.headers['x-correlation-id']).toMatch(/^[0-9a-f-]{36}$/);
        });
    });

    describe('/api/health', () => {
        it('should return 200 when every component is healthy', async () => {
            const response = await request(buildApp()).get('/api/health');

            expect(response.status).toBe(200);
            expect(response.body.status).toBe('healthy');
            expect(response.body.services).toHaveLength(2);
        });

        it('should return 503 when a component is down', async () => {
            searchGateway.hybridSearch.mockRejectedValue(new Error('index offline'));

            const response = await request(buildApp()).get('/api/health');

            expect(response.status).toBe(503);
            expect(response.body.status).toBe('degraded');
        });

        it('should answer the liveness probe', async () => {
            const response = await request(buildApp()).get('/api/health/live');

            expect(response.status).toBe(200);
            expect(response.body.status).toBe('alive');
        });
    });

    describe('POST /api/chat', () => {
        it('should return a grounded answer', async () => {
            searchGateway.hybridSearch.mockResolvedValue([chunk('a', 0.9)]);

            const response = await request(buildApp())
                .post('/api/chat')
                .send({ message: 'How much leave do I get?' });

            expect(response.status).toBe(200);
            expect(response.body).toEqual({
                answer: NORMALIZED_ANSWER,
                sources: [{
                    id: 'a',
                    title: 'Handbook',
                    relevanceScore: 0.9,
                    excerpt: 'Content of a',
                    metadata: { chunk_index: 0 }
                }],
                hasSufficientContext: true,
                tokensUsed: 10,
                suggestedActions: null
            });
        });

        it('should pass the requested topK to search', async () => {
            await request(buildApp())
                .post('/api/chat')
                .send({ message: 'Leave?', topK: 3 });

            expect(searchGateway.hybridSearch).toHaveBeenCalledWith('Leave?', [0.1, 0.2, 0.3], 3);
        });

        it('should reject a missing message', async () => {
            const response = await request(buildApp()).post('/api/chat').send({});

            expect(response.status).toBe(400);
            expect(response.body.error.code).toBe('VALIDATION_ERROR');
            expect(response.body.error.message).toBe('Request body validation failed');
        });

        it('should reject topK above the configured maximum', async () => {
            const response = await request(buildApp())
                .post('/api/chat')
                .send({ message: 'Leave?', topK: 51 });

            expect(response.status).toBe(400);
        });

        it('should reject malformed JSON', async () => {
            const response = await request(buildApp())
                .post('/api/chat')
                .set('Content-Type', 'application/json')
                .send('{"message":');

            expect(response.status).toBe(400);
            expect(response.body.error.message).toBe('Malformed request body');
        });

        it('should map an unreachable index to 503', async () => {
            searchGateway.hybridSearch.mockRejectedValue(new SearchUnavailableError('index unreachable', 'hybridSearch'));

            const response = await request(buildApp()).post('/api/chat').send({ message: 'Leave?' });

            expect(response.status).toBe(503);
            expect(response.body.error.code).toBe('SEARCH_UNAVAILABLE');
            expect(response.body.error.retryable).toBe(true);
        });
    });

    describe('POST /api/chat/stream', () => {
        it('should stream content chunks and finish with done', async () => {
            searchGateway.hybridSearch.mockResolvedValue([chunk('a', 0.9)]);
            completionGateway.chatCompletionStream.mockImplementation(() => streamOf(['Hel', 'lo\nworld']));

            const response = await request(buildApp())
                .post('/api/chat/stream')
                .send({ message: 'Say hello' });

            expect(response.status).toBe(200);
            expect(response.headers['content-type']).toMatch(/^text\/event-stream/);
            expect(response.text).toBe(`data: Hel\n\ndata: lo\ndata: world\n\n${DONE_EVENT}`);
        });

        it('should stream with the configured defaults and without history', async () => {
            searchGateway.hybridSearch.mockResolvedValue([chunk('a', 0.9)]);
            completionGateway.chatCompletionStream.mockImplementation(() => streamOf(['Hi']));

            await request(buildApp({}, { defaultTemperature: 0.9, defaultMaxTokens: 100 }))
                .post('/api/chat/stream')
                .send({
                    message: 'Say hello',
                    history: [{ role: 'assistant', content: 'An earlier answer.' }]
                });

            expect(completionGateway.chatCompletionStream).toHaveBeenCalledWith({
                query: '',
                history: [],
                systemPrompt: expect.stringContaining('Question: Say hello'),
                temperature: 0.9,
                maxTokens: 100
            });
        });

        it('should send the canned answer when nothing relevant is found', async () => {
            const response = await request(buildApp())
                .post('/api/chat/stream')
                .send({ message: 'Unknown topic' });

            expect(response.text).toBe(
                "data: I don't have enough information in the knowledge base to answer this question. " +
                `Please upload relevant documents or rephrase your query.\n\n${DONE_EVENT}`
            );
            expect(completionGateway.chatCompletionStream).not.toHaveBeenCalled();
        });

        it('should send a fallback answer when the stream is empty', async () => {
            searchGateway.hybridSearch.mockResolvedValue([chunk('a', 0.9)]);

            const response = await request(buildApp())
                .post('/api/chat/stream')
                .send({ message: 'Say hello' });

            expect(response.text).toBe(
                'event: fallback\ndata: **Answer**\ndata: \ndata: The answer.\ndata: \n' +
                `data: Sources: [Source: Handbook (Chunk 1)]\n\n${DONE_EVENT}`
            );
        });

        it('should report a failed stream and then fall back', async () => {
            searchGateway.hybridSearch.mockResolvedValue([chunk('a', 0.9)]);
            completionGateway.chatCompletionStream.mockImplementation(() => streamOf(['Hel'], new Error('stream broke')));

            const response = await request(buildApp())
                .post('/api/chat/stream')
                .send({ message: 'Say hello' });

            expect(response.text).toBe(
                'data: Hel\n\nevent: error\ndata: stream broke\n\n' +
                'event: fallback\ndata: **Answer**\ndata: \ndata: The answer.\ndata: \n' +
                `data: Sources: [Source: Handbook (Chunk 1)]\n\n${DONE_EVENT}`
            );
        });

        it('should send the whole answer as one event when streaming is disabled', async () => {
            searchGateway.hybridSearch.mockResolvedValue([chunk('a', 0.9)]);

            const response = await request(buildApp({ enableStreaming: false }))
                .post('/api/chat/stream')
                .send({ message: 'Say hello' });

            expect(response.text).toBe(
                'data: **Answer**\ndata: \ndata: The answer.\ndata: \n' +
                `data: Sources: [Source: Handbook (Chunk 1)]\n\n${DONE_EVENT}`
            );
            expect(completionGateway.chatCompletionStream).not.toHaveBeenCalled();
        });

        it('should validate the request before opening the stream', async () => {
            const response = await request(buildApp()).post('/api/chat/stream').send({ message: '   ' });

            expect(response.status).toBe(400);
            expect(response.body.error.code).toBe('VALIDATION_ERROR');
        });
    });

    describe('/api/documents', () => {
        it('should upload a raw file body', async () => {
            const response = await request(buildApp())
                .post('/api/documents/upload?filename=notes.txt')
                .set('Content-Type', 'application/octet-stream')
                .send(Buffer.from('Employees receive twenty days of leave.'));

            expect(response.status).toBe(200);
            expect(response.body).toMatchObject({
                message: 'Document uploaded',
                documentCount: 1,
                fileCount: 1,
                filename: 'notes.txt'
            });
            expect(searchGateway.uploadDocuments).toHaveBeenCalledTimes(1);
        });

        it('should require a filename', async () => {
            const response = await request(buildApp())
                .post('/api/documents/upload')
                .set('Content-Type', 'application/octet-stream')
                .send(Buffer.from('text'));

            expect(response.status).toBe(400);
            expect(response.body.error.message).toBe('Request query validation failed');
        });

        it('should reject a body that is not raw file content', async () => {
            const response = await request(buildApp())
                .post('/api/documents/upload?filename=notes.txt')
                .send({ text: 'hello' });

            expect(response.status).toBe(400);
            expect(response.body.error.message).toBe(
                'Request body must contain the file content as application/octet-stream'
            );
        });

        it('should reject unsupported file types', async () => {
            const response = await request(buildApp())
                .post('/api/documents/upload?filename=tool.exe')
                .set('Content-Type', 'application/octet-stream')
                .send(Buffer.from('binary'));

            expect(response.status).toBe(400);
            expect(response.body.error.code).toBe('UNSUPPORTED_FILE_TYPE');
        });

        it('should reject bodies over the upload limit with 413', async () => {
            const response = await request(buildApp({ maxUploadBytes: 16 }))
                .post('/api/documents/upload?filename=notes.txt')
                .set('Content-Type', 'application/octet-stream')
                .send(Buffer.alloc(32, 'a'));

            expect(response.status).toBe(413);
            expect(response.body.error.code).toBe('PAYLOAD_TOO_LARGE');
            expect(response.body.error.message).toBe('Payload of 32 bytes exceeds the 16 byte limit');
        });

        it('should list documents grouped by upload', async () => {
            searchGateway.listAllDocuments.mockResolvedValue([
                chunk('c1', 1, { metadata: { parent_id: 'p1', filename: 'a.txt' } }),
                chunk('c2', 1, { metadata: { parent_id: 'p1', filename: 'a.txt' } })
            ]);
            searchGateway.getIndexStats.mockResolvedValue({ documentCount: 2 });

            const response = await request(buildApp()).get('/api/documents');

            expect(response.status).toBe(200);
            expect(response.body.count).toBe(1);
            expect(response.body.chunkCount).toBe(2);
            expect(response.body.documents[0]).toMatchObject({ id: 'p1', filename: 'a.txt', chunkCount: 2 });
        });

        it('should reject a non-numeric top', async () => {
            const response = await request(buildApp()).get('/api/documents?top=abc');

            expect(response.status).toBe(400);
        });

        it('should delete every chunk of a document', async () => {
            searchGateway.deleteByParentId.mockResolvedValue(3);

            const response = await request(buildApp()).delete('/api/documents/p1');

            expect(response.status).toBe(200);
            expect(response.body).toEqual({ message: 'Document deleted', documentId: 'p1', deletedCount: 3 });
            expect(searchGateway.deleteByParentId).toHaveBeenCalledWith('p1');
        });

        it('should return 404 for an unknown document', async () => {
            const response = await request(buildApp()).delete('/api/documents/not-a-uuid');

            expect(response.status).toBe(404);
            expect(response.body.error.code).toBe('DOCUMENT_NOT_FOUND');
            expect(response.body.error.message).toBe('Document "not-a-uuid" not found');
        });
    });
});
