import Joi from 'joi';
import { SystemConfig } from '../models/config';
import { ValidationError } from '../utils/errors';

const configSchema = Joi.object<SystemConfig>({
    server: Joi.object({
        port: Joi.number().port().required(),
        host: Joi.string().required(),
        cors: Joi.object({
            enabled: Joi.boolean().required(),
            origins: Joi.array().items(Joi.string()).required()
        }).required(),
        rateLimit: Joi.object({
            windowMs: Joi.number().integer().min(1000).max(3600000).required(), // 1 second to 1 hour
            maxRequests: Joi.number().integer().min(1).max(100000).required()
        }).required(),
        timeout: Joi.number().integer().min(1000).max(600000).required(),
        enableStreaming: Joi.boolean().required(),
        maxUploadBytes: Joi.number().integer().positive().required()
    }).required(),

    search: Joi.object({
        url: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
        apiKey: Joi.string().optional(),
        collectionName: Joi.string().min(1).max(255).required(),
        dimension: Joi.number().integer().min(1).max(65536).required(),
        autoCreateIndex: Joi.boolean().required(),
        keywordWeight: Joi.number().min(0).max(1).required()
    }).required(),

    completion: Joi.object({
        provider: Joi.string().valid('openai', 'azure').required(),
        apiKey: Joi.string().allow('').required(),
        baseUrl: Joi.string().uri().optional(),
        azureEndpoint: Joi.string().uri().optional(),
        azureApiVersion: Joi.string().optional(),
        chatModel: Joi.string().required(),
        embeddingModel: Joi.string().required(),
        embeddingDimension: Joi.number().integer().min(1).max(65536).required(),
        timeout: Joi.number().integer().min(1000).max(600000).required(),
        maxAttempts: Joi.number().integer().min(1).max(10).required()
    }).required(),

    rag: Joi.object({
        relevanceThreshold: Joi.number().min(0).max(1).required(),
        defaultTopK: Joi.number().integer().min(1).required(),
        maxTopK: Joi.number().integer().min(1).max(1000).required(),
        defaultTemperature: Joi.number().min(0).max(2).required(),
        defaultMaxTokens: Joi.number().integer().min(1).required(),
        chunkSize: Joi.number().integer().min(1).required()
    }).required(),

    cache: Joi.object({
        enabled: Joi.boolean().required(),
        redisUrl: Joi.string().uri({ scheme: ['redis', 'rediss'] }).required(),
        ttl: Joi.object({
            embeddings: Joi.number().integer().min(60).max(2592000).required() // 1 minute to 30 days
        }).required()
    }).required(),

    logging: Joi.object({
        level: Joi.string().valid('debug', 'info', 'warn', 'error').required(),
        file: Joi.string().optional()
    }).required()
});

export function validateConfig(config: unknown): SystemConfig {
    const result = configSchema.validate(config, {
        abortEarly: false,
        allowUnknown: false,
        stripUnknown: true
    });

    if (result.error !== undefined) {
        throw new ValidationError(
            `Configuration validation failed: ${result.error.details.map(d => d.message).join(', ')}`,
            'config'
        );
    }

    validateCrossFieldConstraints(result.value);

    return result.value;
}

function validateCrossFieldConstraints(config: SystemConfig): void {
    if (config.completion.embeddingDimension !== config.search.dimension) {
        throw new ValidationError('Embedding dimension must match search index dimension', 'completion.embeddingDimension');
    }

    if (!config.completion.apiKey) {
        throw new ValidationError('API key is required for the completion provider', 'completion.apiKey');
    }

    if (config.completion.provider === 'azure' && (!config.completion.azureEndpoint || !config.completion.azureApiVersion)) {
        throw new ValidationError(
            'Azure OpenAI requires both an endpoint and an API version',
            'completion.azureEndpoint'
        );
    }

    if (config.rag.defaultTopK > config.rag.maxTopK) {
        throw new ValidationError('Default topK cannot exceed maxTopK', 'rag.defaultTopK');
    }
}
