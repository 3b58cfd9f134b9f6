export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';
export type CompletionProvider = 'openai' | 'azure';

export interface SystemConfig {
    server: ServerConfig;
    search: SearchConfig;
    completion: CompletionConfig;
    rag: RagConfig;
    cache: CacheConfig;
    logging: LoggingConfig;
}

export interface ServerConfig {
    port: number;
    host: string;
    cors: {
        enabled: boolean;
        origins: string[];
    };
    rateLimit: {
        windowMs: number;
        maxRequests: number;
    };
    timeout: number;
    enableStreaming: boolean;
    maxUploadBytes: number;
}

export interface SearchConfig {
    url: string;
    apiKey?: string;
    collectionName: string;
    dimension: number;
    autoCreateIndex: boolean;
    keywordWeight: number;
}

export interface CompletionConfig {
    provider: CompletionProvider;
    apiKey: string;
    baseUrl?: string;
    azureEndpoint?: string;
    azureApiVersion?: string;
    chatModel: string;
    embeddingModel: string;
    embeddingDimension: number;
    timeout: number;
    maxAttempts: number;
}

export interface RagConfig {
    relevanceThreshold: number;
    defaultTopK: number;
    maxTopK: number;
    defaultTemperature: number;
    defaultMaxTokens: number;
    chunkSize: number;
}

export interface CacheConfig {
    enabled: boolean;
    redisUrl: string;
    ttl: {
        embeddings: number;
    };
}

export interface LoggingConfig {
    level: LogLevelName;
    file?: string;
}
