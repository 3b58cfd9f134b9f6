import {
    ChatOptions,
    ChatRequest,
    ChatResponse,
    CompletionRequest,
    PipelineResult,
    SourceCitation
} from '../models/chat';
import { RetrievedChunk } from '../models/document';
import { ErrorHandler } from '../utils/errors';
import { logger } from '../utils/logger';
import { renderTemplate, STRICT_GROUNDING_TEMPLATE } from '../utils/promptTemplates';
import { isNoInfoResponse, normalizeAnswer } from './answerNormalizer';
import { CompletionGateway } from './completion';
import { SearchGateway } from './search';

export const INSUFFICIENT_CONTEXT_ANSWER =
    "I don't have enough information in the knowledge base to answer this question. " +
    'Please upload relevant documents or rephrase your query.';

export const SUGGESTED_ACTIONS: readonly string[] = [
    'Upload relevant documents',
    'Try different keywords',
    'Check available documents'
];

const EXCERPT_LENGTH = 300;

export interface RAGServiceOptions {
    relevanceThreshold?: number;
    defaultTopK?: number;
    defaultTemperature?: number;
    defaultMaxTokens?: number;
}

function scoreOf(chunk: RetrievedChunk): number {
    return chunk.score || 0;
}

function metadataString(chunk: RetrievedChunk, key: string): string | undefined {
    const value = chunk.metadata?.[key];
    return typeof value === 'string' && value ? value : undefined;
}

export class RAGService {
    private searchGateway: SearchGateway;
    private completionGateway: CompletionGateway;
    private options: Required<RAGServiceOptions>;

    constructor(searchGateway: SearchGateway, completionGateway: CompletionGateway, options: RAGServiceOptions = {}) {
        this.searchGateway = searchGateway;
        this.completionGateway = completionGateway;
        this.options = {
            relevanceThreshold: 0.7,
            defaultTopK: 5,
            defaultTemperature: 0.2,
            defaultMaxTokens: 512,
            ...options
        };
    }

    public get relevanceThreshold(): number {
        return this.options.relevanceThreshold;
    }

    /**
     * Retrieves context for the query and, unless disabled, generates a grounded answer.
     */
    public async processQuery(chatOptions: ChatOptions): Promise<PipelineResult> {
        const {
            query,
            topK = this.options.defaultTopK,
            temperature = this.options.defaultTemperature,
            maxTokens = this.options.defaultMaxTokens,
            generateAnswer = true
        } = chatOptions;
        const startTime = Date.now();

        const reranked = await this.retrieve(query, topK);

        if (reranked.length === 0) {
            logger.info('No relevant context found', { operation: 'processQuery', topK });
            return this.insufficientContextResult(INSUFFICIENT_CONTEXT_ANSWER, 0);
        }

        const sources = this.extractSources(reranked);

        if (!generateAnswer) {
            return {
                answer: '',
                sources,
                hasSufficientContext: true,
                tokensUsed: 0,
                suggestedActions: null,
                contextDocuments: reranked
            };
        }

        const { answer, tokensUsed } = await this.completionGateway.chatCompletion(
            this.buildGenerationRequest(query, reranked, { temperature, maxTokens })
        );

        const noInfo = isNoInfoResponse(answer);

        logger.info('Query processed', {
            operation: 'processQuery',
            contextCount: reranked.length,
            hasSufficientContext: !noInfo,
            tokensUsed,
            duration: Date.now() - startTime
        });

        if (noInfo) {
            return this.insufficientContextResult(normalizeAnswer(answer, []), tokensUsed);
        }

        return {
            answer: normalizeAnswer(answer, sources),
            sources,
            hasSufficientContext: true,
            tokensUsed,
            suggestedActions: null,
            contextDocuments: reranked
        };
    }

    /**
     * Embeds the query (best effort), searches and returns the chunks that pass
     * the relevance threshold, best first.
     */
    public async retrieve(query: string, topK: number = this.options.defaultTopK): Promise<RetrievedChunk[]> {
        const embedding = await this.embedQuery(query);
        const rawResults = await this.searchGateway.hybridSearch(query, embedding, topK);
        return this.rerankResults(this.filterByRelevance(rawResults));
    }

    public async answerQuestion(request: ChatRequest): Promise<ChatResponse> {
        const result = await this.processQuery({
            query: request.message,
            topK: request.topK || this.options.defaultTopK,
            temperature: request.temperature ?? this.options.defaultTemperature,
            maxTokens: request.maxTokens || this.options.defaultMaxTokens
        });

        return {
            answer: result.answer,
            sources: result.sources,
            hasSufficientContext: result.hasSufficientContext,
            tokensUsed: result.tokensUsed,
            suggestedActions: result.suggestedActions
        };
    }

    /**
     * The one completion call of the pipeline: the grounding prompt as the only
     * message. Conversation history is never sent, so earlier answers cannot
     * stand in for retrieved context.
     */
    public buildGenerationRequest(
        query: string,
        chunks: RetrievedChunk[],
        overrides: Pick<ChatOptions, 'temperature' | 'maxTokens'> = {}
    ): CompletionRequest {
        return {
            query: '',
            history: [],
            systemPrompt: this.buildGroundingPrompt(query, chunks),
            temperature: overrides.temperature ?? this.options.defaultTemperature,
            maxTokens: overrides.maxTokens || this.options.defaultMaxTokens
        };
    }

    public buildGroundingPrompt(query: string, chunks: RetrievedChunk[]): string {
        return renderTemplate(STRICT_GROUNDING_TEMPLATE, {
            context: this.formatContext(chunks),
            question: query
        });
    }

    public formatContext(chunks: RetrievedChunk[]): string {
        return chunks
            .map((chunk, index) => {
                const idx = index + 1;
                const title = chunk.title || chunk.id || `Source ${idx}`;
                const docId = chunk.id || `doc-${idx}`;
                const metadataText = JSON.stringify(chunk.metadata ?? {});
                return `[${idx}] Document ID: ${docId}\nTitle: ${title}\nMetadata: ${metadataText}\n${chunk.content || ''}`;
            })
            .join('\n\n');
    }

    public extractSources(chunks: RetrievedChunk[]): SourceCitation[] {
        return chunks.map(chunk => ({
            id: chunk.id,
            title: chunk.title || metadataString(chunk, 'source') || chunk.id,
            relevanceScore: scoreOf(chunk),
            excerpt: (chunk.content || '').slice(0, EXCERPT_LENGTH),
            metadata: chunk.metadata ?? {}
        }));
    }

    /** Stable sort, highest score first; a missing score counts as 0. */
    public rerankResults(chunks: RetrievedChunk[]): RetrievedChunk[] {
        return [...chunks].sort((a, b) => scoreOf(b) - scoreOf(a));
    }

    public filterByRelevance(chunks: RetrievedChunk[]): RetrievedChunk[] {
        return chunks.filter(chunk => scoreOf(chunk) >= this.options.relevanceThreshold);
    }

    public insufficientContextResult(answer: string, tokensUsed: number): PipelineResult {
        return {
            answer,
            sources: [],
            hasSufficientContext: false,
            tokensUsed,
            suggestedActions: [...SUGGESTED_ACTIONS],
            contextDocuments: []
        };
    }

    private async embedQuery(query: string): Promise<number[] | null> {
        try {
            const embedding = await this.completionGateway.generateEmbedding(query);
            return embedding.length > 0 ? embedding : null;
        } catch (error) {
            logger.warn('Embedding generation failed; falling back to keyword search', {
                operation: 'embedQuery',
                error: ErrorHandler.toError(error).message
            });
            return null;
        }
    }
}
