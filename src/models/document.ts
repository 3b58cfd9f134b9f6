/**
 * Metadata stored alongside every indexed chunk. Keys are snake_case on the wire
 * and in the search index.
 */
export interface ChunkMetadata {
    parent_id?: string;
    filename?: string;
    source?: string;
    chunk_index?: number;
    section_name?: string;
    section?: string;
    page_number?: number | string;
    uploaded_at?: number;
    [key: string]: unknown;
}

export interface RetrievedChunk {
    id: string;
    content: string;
    title?: string;
    score?: number;
    metadata?: ChunkMetadata;
}

export interface ChunkRecord {
    content: string;
    sectionName: string | null;
}

export interface IndexDocument {
    id: string;
    title: string;
    content: string;
    metadata: ChunkMetadata;
    embedding: number[];
}

export interface IndexStats {
    documentCount: number;
}

export interface DocumentSummary {
    id: string;
    title: string;
    filename?: string;
    source?: string;
    chunkCount: number;
    uploadedAt?: number;
}

export interface UploadResult {
    message: string;
    documentCount: number;
    chunkCount: number;
    fileCount: number;
    filename: string;
    parentId: string;
}

export interface DocumentListResult {
    documents: DocumentSummary[];
    count: number;
    fileCount: number;
    chunkCount: number;
}

export interface DeleteResult {
    message: string;
    documentId: string;
    deletedCount: number;
}
