import { defaultConfig } from './defaults';

type Env = Record<string, string | undefined>;

function int(value: string | undefined, fallback: number): number {
    return value === undefined || value === '' ? fallback : Number.parseInt(value, 10);
}

function float(value: string | undefined, fallback: number): number {
    return value === undefined || value === '' ? fallback : Number.parseFloat(value);
}

function bool(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === '') {
        return fallback;
    }
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function list(value: string | undefined, fallback: string[]): string[] {
    if (!value) {
        return fallback;
    }
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Builds the raw configuration tree from environment variables.
 * The result is unvalidated; pass it through validateConfig().
 */
export function loadFromEnv(env: Env = process.env): Record<string, unknown> {
    const d = defaultConfig;

    return {
        server: {
            port: int(env.PORT, d.server.port),
            host: env.HOST || d.server.host,
            cors: {
                enabled: bool(env.CORS_ENABLED, d.server.cors.enabled),
                origins: list(env.ALLOWED_ORIGINS, d.server.cors.origins)
            },
            rateLimit: {
                windowMs: int(env.RATE_LIMIT_WINDOW_MS, d.server.rateLimit.windowMs),
                maxRequests: int(env.RATE_LIMIT_MAX_REQUESTS, d.server.rateLimit.maxRequests)
            },
            timeout: int(env.SERVER_TIMEOUT, d.server.timeout),
            enableStreaming: bool(env.ENABLE_STREAMING, d.server.enableStreaming),
            maxUploadBytes: int(env.MAX_UPLOAD_BYTES, d.server.maxUploadBytes)
        },
        search: {
            url: env.QDRANT_URL || d.search.url,
            apiKey: env.QDRANT_API_KEY || undefined,
            collectionName: env.QDRANT_COLLECTION_NAME || d.search.collectionName,
            dimension: int(env.EMBEDDING_DIMENSIONS, d.search.dimension),
            autoCreateIndex: bool(env.SEARCH_AUTO_CREATE_INDEX, d.search.autoCreateIndex),
            keywordWeight: float(env.SEARCH_KEYWORD_WEIGHT, d.search.keywordWeight)
        },
        completion: {
            provider: env.COMPLETION_PROVIDER || d.completion.provider,
            apiKey: env.OPENAI_API_KEY || d.completion.apiKey,
            baseUrl: env.OPENAI_BASE_URL || undefined,
            azureEndpoint: env.AZURE_OPENAI_ENDPOINT || undefined,
            azureApiVersion: env.AZURE_OPENAI_API_VERSION || undefined,
            chatModel: env.CHAT_MODEL || d.completion.chatModel,
            embeddingModel: env.EMBEDDING_MODEL || d.completion.embeddingModel,
            embeddingDimension: int(env.EMBEDDING_DIMENSIONS, d.completion.embeddingDimension),
            timeout: int(env.COMPLETION_TIMEOUT, d.completion.timeout),
            maxAttempts: int(env.COMPLETION_MAX_ATTEMPTS, d.completion.maxAttempts)
        },
        rag: {
            relevanceThreshold: float(env.MINIMUM_RELEVANCE_SCORE, d.rag.relevanceThreshold),
            defaultTopK: int(env.DEFAULT_TOP_K, d.rag.defaultTopK),
            maxTopK: int(env.MAX_TOP_K, d.rag.maxTopK),
            defaultTemperature: float(env.DEFAULT_TEMPERATURE, d.rag.defaultTemperature),
            defaultMaxTokens: int(env.DEFAULT_MAX_TOKENS, d.rag.defaultMaxTokens),
            chunkSize: int(env.CHUNK_SIZE, d.rag.chunkSize)
        },
        cache: {
            enabled: bool(env.CACHE_ENABLED, d.cache.enabled),
            redisUrl: env.REDIS_URL || d.cache.redisUrl,
            ttl: {
                embeddings: int(env.CACHE_TTL_EMBEDDINGS, d.cache.ttl.embeddings)
            }
        },
        logging: {
            level: env.LOG_LEVEL || d.logging.level,
            file: env.LOG_FILE || undefined
        }
    };
}
