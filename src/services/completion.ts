import { createHash } from 'crypto';
import OpenAI, { APIConnectionError, APIError, AzureOpenAI, RateLimitError } from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { CompletionRequest, CompletionResult } from '../models/chat';
import { CompletionConfig } from '../models/config';
import { RetrievedChunk } from '../models/document';
import { EmbeddingError, ErrorHandler, GenerationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { DEFAULT_SYSTEM_PROMPT } from '../utils/promptTemplates';
import { RetryOptions, withRetry } from '../utils/retry';

export interface CompletionGateway {
    generateEmbedding(text: string): Promise<number[]>;
    generateEmbeddingsBatch(texts: string[]): Promise<number[][]>;
    chatCompletion(request: CompletionRequest): Promise<CompletionResult>;
    chatCompletionStream(request: CompletionRequest): AsyncGenerator<string, void, undefined>;
}

/** The subset of a Redis client used for caching embeddings. */
export interface EmbeddingCacheStore {
    get(key: string): Promise<string | null>;
    setex(key: string, seconds: number, value: string): Promise<unknown>;
}

export interface CompletionServiceOptions {
    client?: OpenAI;
    cache?: EmbeddingCacheStore;
    cacheTtlSeconds?: number;
    retry?: Partial<RetryOptions>;
}

const DEFAULT_TEMPERATURE = 0.2;
const DEFAULT_MAX_TOKENS = 512;
const CHARS_PER_TOKEN = 4;

/**
 * Rate limits, timeouts, dropped connections and server-side failures are
 * retried. Client errors (4xx other than 429) are not.
 */
export function isRetryableProviderError(error: unknown): boolean {
    if (error instanceof RateLimitError || error instanceof APIConnectionError) {
        return true;
    }
    if (error instanceof APIError) {
        return error.status === undefined || error.status >= 500;
    }
    return false;
}

export function estimateTokens(text: string): number {
    return text ? Math.ceil(text.length / CHARS_PER_TOKEN) : 0;
}

export function formatContextMessage(documents: RetrievedChunk[]): string {
    const lines = ['Context:'];
    documents.forEach((doc, index) => {
        const idx = index + 1;
        const title = doc.title || doc.id || `Doc ${idx}`;
        lines.push(`[${idx}] ${title}\n${doc.content || ''}`);
    });
    return lines.join('\n\n');
}

export function buildMessages(request: CompletionRequest): ChatCompletionMessageParam[] {
    const messages: ChatCompletionMessageParam[] = [
        { role: 'system', content: request.systemPrompt || DEFAULT_SYSTEM_PROMPT }
    ];

    if (request.contextDocuments && request.contextDocuments.length > 0) {
        messages.push({ role: 'system', content: formatContextMessage(request.contextDocuments) });
    }

    for (const message of request.history ?? []) {
        messages.push({ role: message.role, content: message.content });
    }

    if (request.query) {
        messages.push({ role: 'user', content: request.query });
    }

    return messages;
}

function messageText(message: ChatCompletionMessageParam): string {
    return typeof message.content === 'string' ? message.content : '';
}

export function createOpenAIClient(config: CompletionConfig): OpenAI {
    if (config.provider === 'azure') {
        return new AzureOpenAI({
            apiKey: config.apiKey,
            endpoint: config.azureEndpoint,
            apiVersion: config.azureApiVersion,
            timeout: config.timeout,
            maxRetries: 0
        });
    }

    return new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        timeout: config.timeout,
        maxRetries: 0
    });
}

export class OpenAICompletionService implements CompletionGateway {
    private client: OpenAI;
    private config: CompletionConfig;
    private cache?: EmbeddingCacheStore;
    private cacheTtlSeconds: number;
    private retryOptions: Partial<RetryOptions>;

    constructor(config: CompletionConfig, options: CompletionServiceOptions = {}) {
        this.config = config;
        this.client = options.client ?? createOpenAIClient(config);
        this.cache = options.cache;
        this.cacheTtlSeconds = options.cacheTtlSeconds ?? 86400;
        this.retryOptions = {
            maxAttempts: config.maxAttempts,
            baseDelayMs: 1000,
            maxDelayMs: 30000,
            shouldRetry: isRetryableProviderError,
            ...options.retry
        };
    }

    private retry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        return withRetry(fn, { ...this.retryOptions, operation });
    }

    public async generateEmbedding(text: string): Promise<number[]> {
        if (!text) {
            return [];
        }

        const cacheKey = this.getCacheKey(text);
        const cached = await this.getCachedEmbedding(cacheKey);
        if (cached) {
            return cached;
        }

        try {
            const response = await this.retry('generateEmbedding', () =>
                this.client.embeddings.create({ model: this.config.embeddingModel, input: text })
            );

            const vector = response.data[0]?.embedding ?? [];
            this.warnOnDimensionMismatch(vector);

            if (vector.length > 0) {
                await this.cacheEmbedding(cacheKey, vector);
            }
            return vector;
        } catch (error) {
            throw new EmbeddingError(
                `Embedding generation failed: ${ErrorHandler.toError(error).message}`,
                this.config.embeddingModel,
                text.length
            );
        }
    }

    /**
     * One vector per input text, in input order. Entries the provider did not
     * return come back as empty vectors.
     */
    public async generateEmbeddingsBatch(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        try {
            const response = await this.retry('generateEmbeddingsBatch', () =>
                this.client.embeddings.create({ model: this.config.embeddingModel, input: texts })
            );

            const vectors: number[][] = texts.map(() => []);
            for (const item of response.data) {
                if (Number.isInteger(item.index) && item.index >= 0 && item.index < vectors.length) {
                    vectors[item.index] = item.embedding ?? [];
                }
            }

            vectors.forEach(vector => this.warnOnDimensionMismatch(vector));
            return vectors;
        } catch (error) {
            throw new EmbeddingError(
                `Batch embedding generation failed: ${ErrorHandler.toError(error).message}`,
                this.config.embeddingModel,
                texts.reduce((total, text) => total + text.length, 0),
                { batchSize: texts.length }
            );
        }
    }

    public async chatCompletion(request: CompletionRequest): Promise<CompletionResult> {
        const messages = buildMessages(request);
        const startTime = Date.now();

        try {
            const response = await this.retry('chatCompletion', () =>
                this.client.chat.completions.create({
                    model: this.config.chatModel,
                    messages,
                    temperature: request.temperature ?? DEFAULT_TEMPERATURE,
                    max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS
                })
            );

            const answer = response.choices[0]?.message.content ?? '';
            let tokensUsed = response.usage?.total_tokens ?? 0;
            if (tokensUsed === 0) {
                const promptTokens = messages.reduce((total, message) => total + estimateTokens(messageText(message)), 0);
                tokensUsed = promptTokens + estimateTokens(answer);
            }

            logger.info('Chat completion generated', {
                operation: 'chatCompletion',
                model: this.config.chatModel,
                tokensUsed,
                duration: Date.now() - startTime
            });

            return { answer, tokensUsed };
        } catch (error) {
            throw new GenerationError(
                `Chat completion failed: ${ErrorHandler.toError(error).message}`,
                this.config.chatModel
            );
        }
    }

    /**
     * Yields content deltas as they arrive. Only opening the stream is retried;
     * returning early from the consumer aborts the HTTP request.
     */
    public async *chatCompletionStream(request: CompletionRequest): AsyncGenerator<string, void, undefined> {
        const stream = await this.openStream(buildMessages(request), request);

        try {
            for await (const chunk of stream) {
                const content = chunk.choices[0]?.delta?.content;
                if (content) {
                    yield content;
                }
            }
        } catch (error) {
            throw new GenerationError(
                `Chat completion stream failed: ${ErrorHandler.toError(error).message}`,
                this.config.chatModel
            );
        } finally {
            stream.controller.abort();
        }
    }

    private async openStream(messages: ChatCompletionMessageParam[], request: CompletionRequest) {
        try {
            return await this.retry('chatCompletionStream', () =>
                this.client.chat.completions.create({
                    model: this.config.chatModel,
                    messages,
                    temperature: request.temperature ?? DEFAULT_TEMPERATURE,
                    max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
                    stream: true
                })
            );
        } catch (error) {
            throw new GenerationError(
                `Opening chat completion stream failed: ${ErrorHandler.toError(error).message}`,
                this.config.chatModel
            );
        }
    }

    private warnOnDimensionMismatch(vector: number[]): void {
        if (vector.length > 0 && vector.length !== this.config.embeddingDimension) {
            logger.warn('Embedding dimension mismatch', {
                expected: this.config.embeddingDimension,
                actual: vector.length
            });
        }
    }

    private getCacheKey(text: string): string {
        const hash = createHash('sha256').update(text).digest('hex');
        return `embedding:${this.config.embeddingModel}:${hash}`;
    }

    private async getCachedEmbedding(cacheKey: string): Promise<number[] | null> {
        if (!this.cache) {
            return null;
        }

        try {
            const cached = await this.cache.get(cacheKey);
            if (!cached) {
                return null;
            }
            const parsed: unknown = JSON.parse(cached);
            return Array.isArray(parsed) && parsed.every((value): value is number => typeof value === 'number') ? parsed : null;
        } catch (error) {
            logger.warn('Failed to read cached embedding', { error: ErrorHandler.toError(error).message });
            return null;
        }
    }

    private async cacheEmbedding(cacheKey: string, vector: number[]): Promise<void> {
        if (!this.cache) {
            return;
        }

        try {
            await this.cache.setex(cacheKey, this.cacheTtlSeconds, JSON.stringify(vector));
        } catch (error) {
            logger.warn('Failed to cache embedding', { error: ErrorHandler.toError(error).message });
        }
    }
}
