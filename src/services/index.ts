import { SystemConfig } from '../models/config';
import { CacheManager, createRedisClient } from './cache';
import { CompletionGateway, EmbeddingCacheStore, OpenAICompletionService } from './completion';
import { DocumentService } from './documentService';
import { HealthCheckService } from './healthCheck';
import { RAGService } from './ragService';
import { QdrantSearchService, SearchGateway } from './search';

export * from './answerNormalizer';
export * from './cache';
export * from './chunker';
export * from './completion';
export * from './documentService';
export * from './healthCheck';
export * from './ragService';
export * from './search';
export * from './textExtraction';

export interface ServiceContainer {
    searchGateway: SearchGateway;
    completionGateway: CompletionGateway;
    ragService: RAGService;
    documentService: DocumentService;
    healthCheckService: HealthCheckService;
    cache?: CacheManager;
}

export interface ServiceOverrides {
    searchGateway?: SearchGateway;
    completionGateway?: CompletionGateway;
    cache?: CacheManager;
}

/**
 * Wires the gateways and the services built on them. Gateways can be
 * overridden, which is how tests and the CLI swap in their own.
 */
export function createServices(config: SystemConfig, overrides: ServiceOverrides = {}): ServiceContainer {
    const cache = overrides.cache
        ?? (config.cache.enabled ? new CacheManager(createRedisClient(config.cache)) : undefined);
    const embeddingCache: EmbeddingCacheStore | undefined = cache;

    const searchGateway = overrides.searchGateway ?? new QdrantSearchService(config.search);
    const completionGateway = overrides.completionGateway ?? new OpenAICompletionService(config.completion, {
        cache: embeddingCache,
        cacheTtlSeconds: config.cache.ttl.embeddings
    });

    const ragService = new RAGService(searchGateway, completionGateway, {
        relevanceThreshold: config.rag.relevanceThreshold,
        defaultTopK: config.rag.defaultTopK,
        defaultTemperature: config.rag.defaultTemperature,
        defaultMaxTokens: config.rag.defaultMaxTokens
    });

    const documentService = new DocumentService(searchGateway, completionGateway, {
        chunkSize: config.rag.chunkSize,
        maxUploadBytes: config.server.maxUploadBytes
    });

    const healthCheckService = new HealthCheckService(searchGateway, completionGateway);

    return {
        searchGateway,
        completionGateway,
        ragService,
        documentService,
        healthCheckService,
        cache
    };
}
