import { ChunkRecord } from '../models/document';
import { InvalidArgumentError } from '../utils/errors';

export const DEFAULT_CHUNK_SIZE = 500;

const LINE_BREAK = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;
const BULLET_PREFIXES = new Set(['-', '*', '•']);
const MAX_HEADING_LENGTH = 140;
const MAX_HEADING_WORDS = 14;
const MAX_UPPERCASE_HEADING_WORDS = 10;

export function normalizeLine(line: string): string {
    return line.replace(/\u00a0/g, ' ').split(/\s+/).filter(Boolean).join(' ');
}

function splitWords(line: string): string[] {
    return line.split(/\s+/).filter(Boolean);
}

function isUpperCase(text: string): boolean {
    return text !== text.toLowerCase() && text === text.toUpperCase();
}

/**
 * Returns the heading text when the line looks like a section heading, else null.
 */
export function detectHeading(line: string): string | null {
    const candidate = normalizeLine(line);
    if (!candidate) {
        return null;
    }

    if (BULLET_PREFIXES.has(candidate.charAt(0)) || candidate.length > MAX_HEADING_LENGTH) {
        return null;
    }

    const stripped = candidate.replace(/:+$/, '');
    const wordCount = splitWords(stripped).length;
    if (wordCount === 0 || wordCount > MAX_HEADING_WORDS) {
        return null;
    }

    if (/^(part|section|chapter)\s+\d+[a-z]?\s*:/.test(stripped.toLowerCase())) {
        return stripped;
    }

    if (/^\d+(?:\.\d+)*[.)]?\s+[A-Za-z].*$/.test(stripped)) {
        return stripped;
    }

    if (isUpperCase(stripped) && wordCount <= MAX_UPPERCASE_HEADING_WORDS) {
        return stripped;
    }

    return null;
}

/**
 * Splits text into chunks of at most `chunkSize` words. Each chunk carries the
 * section heading that was in effect when the chunk started filling.
 */
export function chunkTextWithMetadata(text: string, chunkSize: number = DEFAULT_CHUNK_SIZE): ChunkRecord[] {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new InvalidArgumentError('chunkSize must be a positive integer', 'chunkSize', { chunkSize });
    }

    const chunks: ChunkRecord[] = [];
    let chunkWords: string[] = [];
    let chunkSection: string | null = null;
    let currentSection: string | null = null;

    const flushChunk = (): void => {
        if (chunkWords.length === 0) {
            return;
        }
        chunks.push({ content: chunkWords.join(' ').trim(), sectionName: chunkSection });
        chunkWords = [];
        chunkSection = null;
    };

    for (const rawLine of text.split(LINE_BREAK)) {
        const line = normalizeLine(rawLine);
        if (!line) {
            continue;
        }

        const heading = detectHeading(line);
        if (heading) {
            currentSection = heading;
        }

        const words = splitWords(line);
        let idx = 0;
        while (idx < words.length) {
            if (chunkWords.length === 0) {
                chunkSection = currentSection;
            }

            const take = words.slice(idx, idx + chunkSize - chunkWords.length);
            chunkWords.push(...take);
            idx += take.length;

            if (chunkWords.length >= chunkSize) {
                flushChunk();
            }
        }
    }

    flushChunk();
    return chunks.filter(chunk => chunk.content.length > 0);
}

export function chunkText(text: string, chunkSize: number = DEFAULT_CHUNK_SIZE): string[] {
    return chunkTextWithMetadata(text, chunkSize).map(record => record.content);
}
