import * as path from 'path';
import * as mammoth from 'mammoth';
import { marked } from 'marked';
import { ErrorHandler, ParseError, UnsupportedFileTypeError } from '../utils/errors';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.txt', '.md', '.docx'] as const;

export type SupportedExtension = typeof SUPPORTED_EXTENSIONS[number];

const HTML_ENTITIES: Record<string, string> = {
    '&amp;': '&',
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&#39;': "'",
    '&nbsp;': ' '
};

function isSupportedExtension(ext: string): ext is SupportedExtension {
    return SUPPORTED_EXTENSIONS.some(supported => supported === ext);
}

export function getFileExtension(filename: string): string {
    return path.extname(filename).toLowerCase();
}

/**
 * Returns the lower-cased extension, or throws when the file type cannot be ingested.
 */
export function assertSupportedFile(filename: string): SupportedExtension {
    const ext = getFileExtension(filename);
    if (!isSupportedExtension(ext)) {
        throw new UnsupportedFileTypeError(ext, [...SUPPORTED_EXTENSIONS], { filename });
    }
    return ext;
}

/** Unifies line endings and collapses blank runs while keeping paragraph breaks. */
export function normalizeExtractedText(text: string): string {
    return text
        .replace(/\r\n?/g, '\n')
        .replace(/[\u200b\ufeff]/g, '')
        .replace(/[ \t]+\n/g, '\n')
        .replace(/\n[ \t]+\n/g, '\n\n')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

export function extractTextFromTxt(buffer: Buffer): string {
    return buffer.toString('utf-8').replace(/\ufffd/g, '');
}

export async function extractTextFromDocx(buffer: Buffer): Promise<string> {
    const result = await mammoth.extractRawText({ buffer });
    return result.value;
}

export async function extractTextFromMarkdown(buffer: Buffer): Promise<string> {
    const html = await marked.parse(extractTextFromTxt(buffer));
    return html
        .replace(/<[^>]*>/g, '')
        .replace(/&(?:amp|lt|gt|quot|#39|nbsp);/g, entity => HTML_ENTITIES[entity] ?? entity);
}

export async function extractTextFromPdf(buffer: Buffer): Promise<string> {
    const { default: pdfParse } = await import('pdf-parse');
    const data = await pdfParse(buffer);
    return data.text;
}

function extractRawText(ext: SupportedExtension, buffer: Buffer): Promise<string> {
    switch (ext) {
        case '.pdf':
            return extractTextFromPdf(buffer);
        case '.docx':
            return extractTextFromDocx(buffer);
        case '.md':
            return extractTextFromMarkdown(buffer);
        case '.txt':
            return Promise.resolve(extractTextFromTxt(buffer));
    }
}

/**
 * Extracts plain text from an uploaded file. Paragraph boundaries survive so
 * that the chunker can still see headings on their own lines.
 */
export async function extractText(filename: string, buffer: Buffer): Promise<string> {
    const ext = assertSupportedFile(filename);

    let text: string;
    try {
        text = await extractRawText(ext, buffer);
    } catch (error) {
        throw new ParseError(
            `Failed to extract text from ${filename}: ${ErrorHandler.toError(error).message}`,
            ext,
            { filename }
        );
    }

    return normalizeExtractedText(text);
}
