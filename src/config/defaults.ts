import { SystemConfig } from '../models/config';

export const defaultConfig: SystemConfig = {
    server: {
        port: 8000,
        host: '0.0.0.0',
        cors: {
            enabled: true,
            origins: ['*']
        },
        rateLimit: {
            windowMs: 15 * 60 * 1000, // 15 minutes
            maxRequests: 100
        },
        timeout: 60000,
        enableStreaming: true,
        maxUploadBytes: 50 * 1024 * 1024
    },
    search: {
        url: 'http://localhost:6333',
        collectionName: 'documents',
        dimension: 1536,
        autoCreateIndex: true,
        keywordWeight: 0.3
    },
    completion: {
        provider: 'openai',
        apiKey: '',
        chatModel: 'gpt-4o-mini',
        embeddingModel: 'text-embedding-3-small',
        embeddingDimension: 1536,
        timeout: 60000,
        maxAttempts: 5
    },
    rag: {
        relevanceThreshold: 0.7,
        defaultTopK: 5,
        maxTopK: 50,
        defaultTemperature: 0.2,
        defaultMaxTokens: 512,
        chunkSize: 500
    },
    cache: {
        enabled: false,
        redisUrl: 'redis://localhost:6379',
        ttl: {
            embeddings: 86400 // 24 hours
        }
    },
    logging: {
        level: 'info'
    }
};
