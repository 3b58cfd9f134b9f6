import { QdrantClient, Schemas } from '@qdrant/js-client-rest';
import { SearchConfig } from '../models/config';
import { ChunkMetadata, IndexDocument, IndexStats, RetrievedChunk } from '../models/document';
import { ErrorHandler, IndexConfigurationError, SearchError, SearchUnavailableError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface SearchGateway {
    initialize(): Promise<void>;
    hybridSearch(queryText: string, queryEmbedding: number[] | null, topK: number): Promise<RetrievedChunk[]>;
    uploadDocuments(documents: IndexDocument[]): Promise<void>;
    deleteDocuments(ids: string[]): Promise<void>;
    deleteByParentId(parentId: string): Promise<number>;
    listAllDocuments(limit?: number): Promise<RetrievedChunk[]>;
    getIndexStats(): Promise<IndexStats>;
}

const STOP_WORDS = new Set([
    'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for',
    'of', 'with', 'by', 'is', 'are', 'was', 'were', 'be', 'been', 'have',
    'has', 'had', 'do', 'does', 'did', 'will', 'would', 'could', 'should',
    'what', 'which', 'who', 'how', 'when', 'where', 'why', 'this', 'that'
]);

const CONNECTIVITY_CODES = ['ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', 'ECONNRESET', 'EAI_AGAIN', 'UND_ERR_CONNECT_TIMEOUT'];
const MAX_PAGE_SIZE = 1000;
const KEYWORD_CANDIDATE_FACTOR = 3;
const PARENT_ID_FIELD = 'metadata.parent_id';

type PointId = Schemas['ExtendedPointId'];
type Payload = Record<string, unknown> | null | undefined;

function tokenize(text: string): string[] {
    return text
        .toLowerCase()
        .replace(/[^\w\s]/g, ' ')
        .split(/\s+/)
        .filter(word => word.length > 0);
}

export function extractKeywords(query: string): string[] {
    const keywords = query
        .toLowerCase()
        .replace(/[^\w\s]/g, '')
        .split(/\s+/)
        .filter(word => word.length > 2)
        .filter(word => !STOP_WORDS.has(word));
    return Array.from(new Set(keywords));
}

/** Share of distinct keywords that occur as words in the content. */
export function keywordCoverage(keywords: string[], content: string): number {
    if (keywords.length === 0) {
        return 0;
    }
    const words = new Set(tokenize(content));
    const matched = keywords.filter(keyword => words.has(keyword)).length;
    return matched / keywords.length;
}

/**
 * True for failures to reach the search service at all, as opposed to
 * errors it returned.
 */
export function isConnectivityError(error: unknown, depth: number = 0): boolean {
    if (!(error instanceof Error) || depth > 3) {
        return false;
    }

    const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
    if (CONNECTIVITY_CODES.includes(code)) {
        return true;
    }

    const message = error.message;
    if (message.includes('fetch failed') || CONNECTIVITY_CODES.some(c => message.includes(c))) {
        return true;
    }

    return isConnectivityError(error.cause, depth + 1);
}

function parseMetadata(raw: unknown): ChunkMetadata {
    if (typeof raw === 'string') {
        try {
            const parsed: unknown = JSON.parse(raw);
            return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
                ? { ...parsed }
                : { raw_metadata: raw };
        } catch {
            return { raw_metadata: raw };
        }
    }
    if (typeof raw === 'object' && raw !== null && !Array.isArray(raw)) {
        return { ...raw };
    }
    return {};
}

function stringField(payload: Record<string, unknown>, ...keys: string[]): string | undefined {
    for (const key of keys) {
        const value = payload[key];
        if (typeof value === 'string' && value.length > 0) {
            return value;
        }
    }
    return undefined;
}

export function toRetrievedChunk(id: PointId, payload: Payload, score?: number): RetrievedChunk {
    const data = payload ?? {};
    const chunkId = String(id);
    const metadata = parseMetadata(data.metadata);

    return {
        id: chunkId,
        content: stringField(data, 'content', 'chunk', 'text') ?? '',
        title: stringField(data, 'title', 'source') ?? chunkId,
        score,
        metadata
    };
}

export class QdrantSearchService implements SearchGateway {
    private client: QdrantClient;
    private config: SearchConfig;
    private initialization: Promise<void> | null = null;

    constructor(config: SearchConfig, client?: QdrantClient) {
        this.config = config;
        this.client = client ?? new QdrantClient({
            url: config.url,
            apiKey: config.apiKey,
            checkCompatibility: false
        });

        logger.info('Search service created', {
            collection: config.collectionName,
            dimension: config.dimension
        });
    }

    /**
     * Ensures the collection exists with the expected vector size. Concurrent
     * callers share one attempt; a failed attempt can be retried.
     */
    public initialize(): Promise<void> {
        if (!this.initialization) {
            this.initialization = this.ensureCollection().catch((error: unknown) => {
                this.initialization = null;
                throw error;
            });
        }
        return this.initialization;
    }

    private async ensureCollection(): Promise<void> {
        const collection = this.config.collectionName;

        try {
            const { collections } = await this.client.getCollections();
            const exists = collections.some(item => item.name === collection);

            if (exists) {
                const info = await this.client.getCollection(collection);
                const vectors = info.config.params.vectors;
                const size = vectors && 'size' in vectors ? vectors.size : undefined;

                if (typeof size === 'number' && size !== this.config.dimension) {
                    throw new IndexConfigurationError(
                        `Collection "${collection}" has vector size ${size} but embeddings have ${this.config.dimension} dimensions. ` +
                        'Use a new collection name or recreate the existing collection.',
                        collection,
                        { existingSize: size, expectedSize: this.config.dimension }
                    );
                }
                logger.info('Search collection ready', { collection });
                return;
            }

            if (!this.config.autoCreateIndex) {
                throw new IndexConfigurationError(
                    `Collection "${collection}" does not exist and automatic creation is disabled`,
                    collection
                );
            }

            await this.client.createCollection(collection, {
                vectors: { size: this.config.dimension, distance: 'Cosine' }
            });
            await this.client.createPayloadIndex(collection, {
                wait: true,
                field_name: 'content',
                field_schema: { type: 'text', tokenizer: 'word', lowercase: true }
            });
            await this.client.createPayloadIndex(collection, {
                wait: true,
                field_name: PARENT_ID_FIELD,
                field_schema: 'keyword'
            });

            logger.info('Search collection created', { collection, dimension: this.config.dimension });
        } catch (error) {
            throw this.wrapError(error, 'initialize');
        }
    }

    public async hybridSearch(queryText: string, queryEmbedding: number[] | null, topK: number): Promise<RetrievedChunk[]> {
        await this.initialize();

        const keywords = extractKeywords(queryText);
        const startTime = Date.now();

        try {
            if (keywords.length === 0 && !queryEmbedding) {
                return await this.matchAll(topK);
            }

            const keywordHits = keywords.length > 0 ? await this.keywordSearch(keywords, topK) : [];

            if (!queryEmbedding || queryEmbedding.length === 0) {
                return keywordHits.slice(0, topK);
            }

            let vectorHits: RetrievedChunk[];
            try {
                vectorHits = await this.vectorSearch(queryEmbedding, topK);
            } catch (error) {
                if (isConnectivityError(error)) {
                    throw error;
                }
                logger.warn('Semantic search failed; falling back to keyword search', {
                    operation: 'hybridSearch',
                    error: ErrorHandler.toError(error).message
                });
                return keywordHits.slice(0, topK);
            }

            const results = this.combineResults(vectorHits, keywordHits, keywords).slice(0, topK);

            logger.info('Hybrid search completed', {
                operation: 'hybridSearch',
                resultCount: results.length,
                keywordCount: keywords.length,
                duration: Date.now() - startTime
            });

            return results;
        } catch (error) {
            throw this.wrapError(error, 'hybridSearch');
        }
    }

    public async vectorSearch(queryEmbedding: number[], topK: number): Promise<RetrievedChunk[]> {
        const points = await this.client.search(this.config.collectionName, {
            vector: queryEmbedding,
            limit: topK,
            with_payload: true
        });

        return points.map(point => toRetrievedChunk(point.id, point.payload, point.score));
    }

    private async keywordSearch(keywords: string[], topK: number): Promise<RetrievedChunk[]> {
        const filter: Schemas['Filter'] = {
            should: keywords.map(keyword => ({ key: 'content', match: { text: keyword } }))
        };

        const { points } = await this.client.scroll(this.config.collectionName, {
            filter,
            limit: Math.max(topK, topK * KEYWORD_CANDIDATE_FACTOR),
            with_payload: true,
            with_vector: false
        });

        return points
            .map(point => {
                const chunk = toRetrievedChunk(point.id, point.payload);
                return { ...chunk, score: keywordCoverage(keywords, chunk.content) };
            })
            .filter(chunk => (chunk.score ?? 0) > 0)
            .sort((a, b) => (b.score ?? 0) - (a.score ?? 0));
    }

    private async matchAll(topK: number): Promise<RetrievedChunk[]> {
        const { points } = await this.client.scroll(this.config.collectionName, {
            limit: topK,
            with_payload: true,
            with_vector: false
        });
        return points.map(point => toRetrievedChunk(point.id, point.payload));
    }

    private combineResults(vectorHits: RetrievedChunk[], keywordHits: RetrievedChunk[], keywords: string[]): RetrievedChunk[] {
        const weight = this.config.keywordWeight;
        const resultMap = new Map<string, RetrievedChunk>();

        for (const hit of vectorHits) {
            const keywordScore = keywordCoverage(keywords, hit.content);
            resultMap.set(hit.id, {
                ...hit,
                score: Math.min(1, (hit.score ?? 0) + keywordScore * weight)
            });
        }

        for (const hit of keywordHits) {
            if (!resultMap.has(hit.id)) {
                resultMap.set(hit.id, { ...hit, score: (hit.score ?? 0) * weight });
            }
        }

        return Array.from(resultMap.values()).sort((a, b) => (b.score ?? 0) - (a.score ?? 0));
    }

    public async uploadDocuments(documents: IndexDocument[]): Promise<void> {
        if (documents.length === 0) {
            logger.info('No documents provided for upload');
            return;
        }

        await this.initialize();

        try {
            await this.client.upsert(this.config.collectionName, {
                wait: true,
                points: documents.map(doc => ({
                    id: doc.id,
                    vector: doc.embedding,
                    payload: {
                        title: doc.title,
                        content: doc.content,
                        metadata: doc.metadata
                    }
                }))
            });
            logger.info('Uploaded documents', { documentCount: documents.length });
        } catch (error) {
            throw this.wrapError(error, 'uploadDocuments');
        }
    }

    public async deleteDocuments(ids: string[]): Promise<void> {
        if (ids.length === 0) {
            logger.info('No document IDs provided for deletion');
            return;
        }

        await this.initialize();

        try {
            await this.client.delete(this.config.collectionName, {
                wait: true,
                points: ids
            });
            logger.info('Deleted documents', { documentCount: ids.length });
        } catch (error) {
            throw this.wrapError(error, 'deleteDocuments');
        }
    }

    /**
     * Deletes every chunk uploaded under `parentId` and returns how many there
     * were. Nothing is sent to the delete endpoint when none match.
     */
    public async deleteByParentId(parentId: string): Promise<number> {
        await this.initialize();

        const filter: Schemas['Filter'] = {
            must: [{ key: PARENT_ID_FIELD, match: { value: parentId } }]
        };

        try {
            const { count } = await this.client.count(this.config.collectionName, { filter, exact: true });
            if (count === 0) {
                return 0;
            }

            await this.client.delete(this.config.collectionName, { wait: true, filter });
            logger.info('Deleted document chunks', { documentId: parentId, documentCount: count });
            return count;
        } catch (error) {
            throw this.wrapError(error, 'deleteByParentId');
        }
    }

    /**
     * Pages through the whole collection. `limit` caps the total returned.
     */
    public async listAllDocuments(limit?: number): Promise<RetrievedChunk[]> {
        await this.initialize();

        const collected: RetrievedChunk[] = [];
        const pageSize = Math.max(1, Math.min(limit ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE));
        let offset: PointId | undefined;

        try {
            for (;;) {
                const remaining = limit === undefined ? pageSize : Math.min(pageSize, limit - collected.length);
                if (remaining <= 0) {
                    break;
                }

                const page = await this.client.scroll(this.config.collectionName, {
                    limit: remaining,
                    offset,
                    with_payload: true,
                    with_vector: false
                });

                collected.push(...page.points.map(point => toRetrievedChunk(point.id, point.payload)));

                const next = page.next_page_offset;
                if (typeof next !== 'string' && typeof next !== 'number') {
                    break;
                }
                offset = next;
            }

            logger.info('Listed indexed documents', { resultCount: collected.length });
            return collected;
        } catch (error) {
            throw this.wrapError(error, 'listAllDocuments');
        }
    }

    public async getIndexStats(): Promise<IndexStats> {
        try {
            const { count } = await this.client.count(this.config.collectionName, { exact: true });
            return { documentCount: count };
        } catch (error) {
            logger.warn('Cannot fetch index statistics; using fallback stats', {
                operation: 'getIndexStats',
                error: ErrorHandler.toError(error).message
            });
            return { documentCount: 0 };
        }
    }

    private wrapError(error: unknown, operation: string): Error {
        if (error instanceof IndexConfigurationError || error instanceof SearchUnavailableError || error instanceof SearchError) {
            return error;
        }

        const message = ErrorHandler.toError(error).message;
        if (isConnectivityError(error)) {
            return new SearchUnavailableError(
                `Cannot reach the search service at ${this.config.url}: ${message}`,
                operation
            );
        }
        return new SearchError(`Search ${operation} failed: ${message}`, operation);
    }
}
