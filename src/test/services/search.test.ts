import { SearchConfig } from '../../models/config';
import {
    extractKeywords,
    isConnectivityError,
    keywordCoverage,
    QdrantSearchService,
    toRetrievedChunk
} from '../../services/search';
import { IndexConfigurationError, SearchError, SearchUnavailableError } from '../../utils/errors';

const mockClient = {
    getCollections: jest.fn(),
    getCollection: jest.fn(),
    createCollection: jest.fn(),
    createPayloadIndex: jest.fn(),
    search: jest.fn(),
    scroll: jest.fn(),
    upsert: jest.fn(),
    delete: jest.fn(),
    count: jest.fn()
};

jest.mock('@qdrant/js-client-rest', () => ({
    QdrantClient: jest.fn().mockImplementation(() => mockClient)
}));

const config: SearchConfig = {
    url: 'http://localhost:6333',
    collectionName: 'documents',
    dimension: 3,
    autoCreateIndex: true,
    keywordWeight: 0.3
};

const vectorPoint = {
    id: 'v1',
    version: 1,
    score: 0.8,
    payload: { title: 'Handbook', content: 'annual leave is twenty days', metadata: { chunk_index: 0 } }
};
const keywordPoint = {
    id: 'k1',
    payload: { title: 'Policy', content: 'the leave policy applies to staff', metadata: {} }
};

describe('Search helpers', () => {
    it('should extract distinct keywords without stop words or short words', () => {
        expect(extractKeywords('What is the annual leave policy? Leave, leave!')).toEqual(['annual', 'leave', 'policy']);
        expect(extractKeywords('*')).toEqual([]);
    });

    it('should measure keyword coverage of content', () => {
        expect(keywordCoverage(['annual', 'leave'], 'Annual leave: twenty days.')).toBe(1);
        expect(keywordCoverage(['annual', 'leave'], 'sick days')).toBe(0);
        expect(keywordCoverage([], 'anything')).toBe(0);
    });

    it('should recognize connectivity failures, including wrapped causes', () => {
        const refused = Object.assign(new Error('connect failed'), { code: 'ECONNREFUSED' });

        expect(isConnectivityError(refused)).toBe(true);
        expect(isConnectivityError(new Error('fetch failed'))).toBe(true);
        expect(isConnectivityError(new Error('outer', { cause: refused }))).toBe(true);
        expect(isConnectivityError(new Error('Bad Request: wrong vector size'))).toBe(false);
        expect(isConnectivityError('ECONNREFUSED')).toBe(false);
    });

    it('should map payloads onto retrieved chunks', () => {
        const result = toRetrievedChunk(7, { text: 'body', source: 'file.txt', metadata: '{"chunk_index":2}' }, 0.5);

        expect(result).toEqual({
            id: '7',
            content: 'body',
            title: 'file.txt',
            score: 0.5,
            metadata: { chunk_index: 2 }
        });
        expect(toRetrievedChunk('x', { metadata: 'not json' }).metadata).toEqual({ raw_metadata: 'not json' });
        expect(toRetrievedChunk('x', null)).toEqual({ id: 'x', content: '', title: 'x', score: undefined, metadata: {} });
    });
});

describe('QdrantSearchService', () => {
    let service: QdrantSearchService;

    beforeEach(() => {
        Object.values(mockClient).forEach(fn => fn.mockReset());
        mockClient.getCollections.mockResolvedValue({ collections: [{ name: 'documents' }] });
        mockClient.getCollection.mockResolvedValue({ config: { params: { vectors: { size: 3, distance: 'Cosine' } } } });
        service = new QdrantSearchService(config);
    });

    describe('initialize', () => {
        it('should create the collection and text index when missing', async () => {
            mockClient.getCollections.mockResolvedValue({ collections: [] });

            await service.initialize();

            expect(mockClient.createCollection).toHaveBeenCalledWith('documents', {
                vectors: { size: 3, distance: 'Cosine' }
            });
            expect(mockClient.createPayloadIndex).toHaveBeenCalledWith('documents', expect.objectContaining({
                field_name: 'content'
            }));
            expect(mockClient.createPayloadIndex).toHaveBeenCalledWith('documents', {
                wait: true,
                field_name: 'metadata.parent_id',
                field_schema: 'keyword'
            });
        });

        it('should accept an existing collection with the right size', async () => {
            await service.initialize();

            expect(mockClient.createCollection).not.toHaveBeenCalled();
        });

        it('should reject an existing collection with a different vector size', async () => {
            mockClient.getCollection.mockResolvedValue({ config: { params: { vectors: { size: 768, distance: 'Cosine' } } } });

            await expect(service.initialize()).rejects.toThrow(IndexConfigurationError);
        });

        it('should not create the collection when automatic creation is disabled', async () => {
            mockClient.getCollections.mockResolvedValue({ collections: [] });
            const strict = new QdrantSearchService({ ...config, autoCreateIndex: false });

            await expect(strict.initialize()).rejects.toThrow(
                'Collection "documents" does not exist and automatic creation is disabled'
            );
            expect(mockClient.createCollection).not.toHaveBeenCalled();
        });

        it('should share one attempt between concurrent callers', async () => {
            await Promise.all([service.initialize(), service.initialize()]);

            expect(mockClient.getCollections).toHaveBeenCalledTimes(1);
        });

        it('should report an unreachable service and allow a retry', async () => {
            mockClient.getCollections.mockRejectedValueOnce(new Error('fetch failed'));

            await expect(service.initialize()).rejects.toThrow(SearchUnavailableError);
            await service.initialize();

            expect(mockClient.getCollections).toHaveBeenCalledTimes(2);
        });
    });

    describe('hybridSearch', () => {
        it('should blend vector scores with keyword coverage', async () => {
            mockClient.search.mockResolvedValue([vectorPoint]);
            mockClient.scroll.mockResolvedValue({ points: [vectorPoint, keywordPoint], next_page_offset: null });

            const results = await service.hybridSearch('annual leave policy', [0.1, 0.2, 0.3], 5);

            expect(results.map(result => result.id)).toEqual(['v1', 'k1']);
            expect(results[0]?.score).toBeCloseTo(1);
            expect(results[1]?.score).toBeCloseTo(0.2);
            expect(mockClient.search).toHaveBeenCalledWith('documents', {
                vector: [0.1, 0.2, 0.3],
                limit: 5,
                with_payload: true
            });
            expect(mockClient.scroll).toHaveBeenCalledWith('documents', expect.objectContaining({
                limit: 15,
                filter: {
                    should: [
                        { key: 'content', match: { text: 'annual' } },
                        { key: 'content', match: { text: 'leave' } },
                        { key: 'content', match: { text: 'policy' } }
                    ]
                }
            }));
        });

        it('should use keyword matches only when there is no embedding', async () => {
            mockClient.scroll.mockResolvedValue({ points: [keywordPoint], next_page_offset: null });

            const results = await service.hybridSearch('leave policy', null, 5);

            expect(mockClient.search).not.toHaveBeenCalled();
            expect(results).toHaveLength(1);
            expect(results[0]?.score).toBe(1);
        });

        it('should return arbitrary chunks for a match-all query', async () => {
            mockClient.scroll.mockResolvedValue({ points: [keywordPoint], next_page_offset: null });

            const results = await service.hybridSearch('*', null, 1);

            expect(mockClient.scroll).toHaveBeenCalledWith('documents', { limit: 1, with_payload: true, with_vector: false });
            expect(results.map(result => result.id)).toEqual(['k1']);
        });

        it('should fall back to keyword matches when vector search fails', async () => {
            mockClient.search.mockRejectedValue(new Error('Bad Request: wrong vector size'));
            mockClient.scroll.mockResolvedValue({ points: [keywordPoint], next_page_offset: null });

            const results = await service.hybridSearch('leave policy', [0.1, 0.2, 0.3], 5);

            expect(results.map(result => result.id)).toEqual(['k1']);
        });

        it('should raise SearchUnavailableError when the service cannot be reached', async () => {
            mockClient.search.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:6333'));
            mockClient.scroll.mockResolvedValue({ points: [], next_page_offset: null });

            await expect(service.hybridSearch('leave policy', [0.1, 0.2, 0.3], 5)).rejects.toThrow(SearchUnavailableError);
        });

        it('should wrap other failures in SearchError', async () => {
            mockClient.scroll.mockRejectedValue(new Error('Internal Server Error'));

            await expect(service.hybridSearch('leave', null, 5)).rejects.toThrow(SearchError);
        });
    });

    describe('document management', () => {
        it('should upsert documents with their payload', async () => {
            await service.uploadDocuments([{
                id: 'd1',
                title: 'notes.txt',
                content: 'text',
                metadata: { parent_id: 'p1' },
                embedding: [1, 0, 0]
            }]);

            expect(mockClient.upsert).toHaveBeenCalledWith('documents', {
                wait: true,
                points: [{
                    id: 'd1',
                    vector: [1, 0, 0],
                    payload: { title: 'notes.txt', content: 'text', metadata: { parent_id: 'p1' } }
                }]
            });
        });

        it('should skip empty uploads and deletions', async () => {
            await service.uploadDocuments([]);
            await service.deleteDocuments([]);

            expect(mockClient.getCollections).not.toHaveBeenCalled();
            expect(mockClient.upsert).not.toHaveBeenCalled();
            expect(mockClient.delete).not.toHaveBeenCalled();
        });

        it('should delete points by id', async () => {
            await service.deleteDocuments(['d1', 'd2']);

            expect(mockClient.delete).toHaveBeenCalledWith('documents', { wait: true, points: ['d1', 'd2'] });
        });

        it('should delete the chunks of a parent document with a payload filter', async () => {
            mockClient.count.mockResolvedValue({ count: 2 });
            const filter = { must: [{ key: 'metadata.parent_id', match: { value: 'p1' } }] };

            const deleted = await service.deleteByParentId('p1');

            expect(deleted).toBe(2);
            expect(mockClient.count).toHaveBeenCalledWith('documents', { filter, exact: true });
            expect(mockClient.delete).toHaveBeenCalledWith('documents', { wait: true, filter });
        });

        it('should not call delete when no chunk has the parent id', async () => {
            mockClient.count.mockResolvedValue({ count: 0 });

            expect(await service.deleteByParentId('not-a-uuid')).toBe(0);
            expect(mockClient.delete).not.toHaveBeenCalled();
            expect(mockClient.scroll).not.toHaveBeenCalled();
        });

        it('should page through the whole collection', async () => {
            mockClient.scroll
                .mockResolvedValueOnce({ points: [vectorPoint], next_page_offset: 'k1' })
                .mockResolvedValueOnce({ points: [keywordPoint], next_page_offset: null });

            const results = await service.listAllDocuments();

            expect(results.map(result => result.id)).toEqual(['v1', 'k1']);
            expect(mockClient.scroll).toHaveBeenLastCalledWith('documents', {
                limit: 1000,
                offset: 'k1',
                with_payload: true,
                with_vector: false
            });
        });

        it('should stop at the requested limit', async () => {
            mockClient.scroll.mockResolvedValue({ points: [vectorPoint], next_page_offset: 'next' });

            const results = await service.listAllDocuments(1);

            expect(results).toHaveLength(1);
            expect(mockClient.scroll).toHaveBeenCalledTimes(1);
        });

        it('should report the exact point count, or zero when unavailable', async () => {
            mockClient.count.mockResolvedValueOnce({ count: 12 }).mockRejectedValueOnce(new Error('down'));

            expect(await service.getIndexStats()).toEqual({ documentCount: 12 });
            expect(await service.getIndexStats()).toEqual({ documentCount: 0 });
        });
    });
});
