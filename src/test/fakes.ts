import { CompletionGateway } from '../services/completion';
import { SearchGateway } from '../services/search';
import { RetrievedChunk } from '../models/document';

export function createFakeSearchGateway(): jest.Mocked<SearchGateway> {
    return {
        initialize: jest.fn().mockResolvedValue(undefined),
        hybridSearch: jest.fn().mockResolvedValue([]),
        uploadDocuments: jest.fn().mockResolvedValue(undefined),
        deleteDocuments: jest.fn().mockResolvedValue(undefined),
        deleteByParentId: jest.fn().mockResolvedValue(0),
        listAllDocuments: jest.fn().mockResolvedValue([]),
        getIndexStats: jest.fn().mockResolvedValue({ documentCount: 0 })
    };
}

export function createFakeCompletionGateway(): jest.Mocked<CompletionGateway> {
    return {
        generateEmbedding: jest.fn().mockResolvedValue([0.1, 0.2, 0.3]),
        generateEmbeddingsBatch: jest.fn().mockImplementation(async (texts: string[]) => texts.map(() => [0.1, 0.2, 0.3])),
        chatCompletion: jest.fn().mockResolvedValue({ answer: 'The answer.', tokensUsed: 10 }),
        chatCompletionStream: jest.fn().mockImplementation(() => streamOf([]))
    };
}

export async function* streamOf(chunks: string[], failAfter?: Error): AsyncGenerator<string, void, undefined> {
    for (const chunk of chunks) {
        yield chunk;
    }
    if (failAfter) {
        throw failAfter;
    }
}

export function chunk(id: string, score: number, overrides: Partial<RetrievedChunk> = {}): RetrievedChunk {
    return {
        id,
        content: `Content of ${id}`,
        title: 'Handbook',
        score,
        metadata: { chunk_index: 0 },
        ...overrides
    };
}
