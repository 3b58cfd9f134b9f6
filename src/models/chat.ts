import Joi from 'joi';
import { RetrievedChunk } from './document';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
    role: ChatRole;
    content: string;
}

export interface ChatOptions {
    query: string;
    topK?: number;
    temperature?: number;
    maxTokens?: number;
    generateAnswer?: boolean;
}

export interface SourceCitation {
    id: string;
    title: string;
    relevanceScore: number;
    excerpt: string;
    metadata: Record<string, unknown>;
}

export interface PipelineResult {
    answer: string;
    sources: SourceCitation[];
    hasSufficientContext: boolean;
    tokensUsed: number;
    suggestedActions: string[] | null;
    contextDocuments: RetrievedChunk[];
}

export interface CompletionRequest {
    query: string;
    history?: ChatMessage[];
    contextDocuments?: RetrievedChunk[];
    systemPrompt?: string;
    temperature?: number;
    maxTokens?: number;
}

export interface CompletionResult {
    answer: string;
    tokensUsed: number;
}

/**
 * Wire request for the chat endpoints. `history` is accepted from clients that
 * send the conversation so far but is not forwarded to the model.
 */
export interface ChatRequest {
    message: string;
    history?: ChatMessage[];
    topK?: number;
    temperature?: number;
    maxTokens?: number;
}

export interface ChatResponse {
    answer: string;
    sources: SourceCitation[];
    hasSufficientContext: boolean;
    tokensUsed: number;
    suggestedActions: string[] | null;
}

export const chatMessageSchema = Joi.object<ChatMessage>({
    role: Joi.string().valid('system', 'user', 'assistant').required(),
    content: Joi.string().allow('').max(20000).required()
});

export function createChatRequestSchema(maxTopK: number): Joi.ObjectSchema<ChatRequest> {
    return Joi.object<ChatRequest>({
        message: Joi.string().trim().min(1).max(4000).required(),
        history: Joi.array().items(chatMessageSchema).max(100).optional(),
        topK: Joi.number().integer().min(1).max(maxTopK).optional(),
        temperature: Joi.number().min(0).max(2).optional(),
        maxTokens: Joi.number().integer().min(1).max(32000).optional()
    });
}
