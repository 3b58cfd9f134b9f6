import { v4 as uuidv4 } from 'uuid';
import {
    ChunkMetadata,
    DeleteResult,
    DocumentListResult,
    DocumentSummary,
    IndexDocument,
    RetrievedChunk,
    UploadResult
} from '../models/document';
import { DocumentNotFoundError, EmbeddingError, PayloadTooLargeError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { chunkTextWithMetadata, DEFAULT_CHUNK_SIZE } from './chunker';
import { CompletionGateway } from './completion';
import { SearchGateway } from './search';
import { assertSupportedFile, extractText } from './textExtraction';

export const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

export interface DocumentServiceOptions {
    chunkSize?: number;
    maxUploadBytes?: number;
}

function metadataString(metadata: ChunkMetadata | undefined, key: string): string | undefined {
    const value = metadata?.[key];
    return typeof value === 'string' && value ? value : undefined;
}

/**
 * Ingestion, listing and deletion of uploaded files. A file is stored as many
 * chunks that share a `parent_id`.
 */
export class DocumentService {
    private searchGateway: SearchGateway;
    private completionGateway: CompletionGateway;
    private chunkSize: number;
    private maxUploadBytes: number;

    constructor(searchGateway: SearchGateway, completionGateway: CompletionGateway, options: DocumentServiceOptions = {}) {
        this.searchGateway = searchGateway;
        this.completionGateway = completionGateway;
        this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
        this.maxUploadBytes = options.maxUploadBytes ?? MAX_UPLOAD_BYTES;
    }

    public async uploadDocument(filename: string, content: Buffer): Promise<UploadResult> {
        assertSupportedFile(filename);

        if (content.length > this.maxUploadBytes) {
            throw new PayloadTooLargeError(content.length, this.maxUploadBytes, { filename });
        }

        const text = await extractText(filename, content);
        if (!text.trim()) {
            throw new ValidationError('No text extracted from file', 'file', filename);
        }

        const records = chunkTextWithMetadata(text, this.chunkSize);
        if (records.length === 0) {
            throw new ValidationError('No content to index', 'file', filename);
        }

        const embeddings = await this.completionGateway.generateEmbeddingsBatch(records.map(record => record.content));

        const parentId = uuidv4();
        const uploadedAt = Math.floor(Date.now() / 1000);

        const documents: IndexDocument[] = records.map((record, idx) => {
            const embedding = embeddings[idx] ?? [];
            if (embedding.length === 0) {
                throw new EmbeddingError(`No embedding returned for chunk ${idx} of ${filename}`, 'batch', record.content.length);
            }

            const metadata: ChunkMetadata = {
                parent_id: parentId,
                filename,
                source: filename,
                chunk_index: idx,
                uploaded_at: uploadedAt
            };
            const sectionName = (record.sectionName ?? '').trim();
            if (sectionName) {
                metadata.section_name = sectionName;
                metadata.section = sectionName;
            }

            return {
                id: uuidv4(),
                title: filename,
                content: record.content,
                metadata,
                embedding
            };
        });

        await this.searchGateway.uploadDocuments(documents);

        logger.info('Document ingested', {
            operation: 'uploadDocument',
            documentId: parentId,
            filename,
            chunkCount: documents.length
        });

        return {
            message: 'Document uploaded',
            documentCount: documents.length,
            chunkCount: documents.length,
            fileCount: 1,
            filename,
            parentId
        };
    }

    /**
     * Indexed chunks grouped back into files. With `top`, only that many chunks
     * are inspected.
     */
    public async listDocuments(top?: number): Promise<DocumentListResult> {
        const stats = await this.searchGateway.getIndexStats();
        const results = top === undefined
            ? await this.searchGateway.listAllDocuments()
            : await this.searchGateway.hybridSearch('*', null, top);

        const documents = this.groupByParent(results);

        return {
            documents,
            count: documents.length,
            fileCount: documents.length,
            chunkCount: stats.documentCount || results.length
        };
    }

    /**
     * Removes every chunk of an uploaded file. Fails with DocumentNotFoundError
     * when no chunk carries the id as its `parent_id`.
     */
    public async deleteDocument(documentId: string): Promise<DeleteResult> {
        const deletedCount = await this.searchGateway.deleteByParentId(documentId);
        if (deletedCount === 0) {
            throw new DocumentNotFoundError(documentId);
        }

        logger.info('Document deleted', {
            operation: 'deleteDocument',
            documentId,
            deletedCount
        });

        return {
            message: 'Document deleted',
            documentId,
            deletedCount
        };
    }

    private groupByParent(chunks: RetrievedChunk[]): DocumentSummary[] {
        const grouped = new Map<string, DocumentSummary>();

        for (const chunk of chunks) {
            const filename = metadataString(chunk.metadata, 'filename');
            const parentId = metadataString(chunk.metadata, 'parent_id') ?? filename ?? chunk.id;
            const existing = grouped.get(parentId);

            if (existing) {
                existing.chunkCount++;
                continue;
            }

            const uploadedAt = chunk.metadata?.uploaded_at;
            grouped.set(parentId, {
                id: parentId,
                title: filename || chunk.title || 'Document',
                filename,
                source: metadataString(chunk.metadata, 'source'),
                chunkCount: 1,
                uploadedAt: typeof uploadedAt === 'number' ? uploadedAt : undefined
            });
        }

        return Array.from(grouped.values());
    }
}
