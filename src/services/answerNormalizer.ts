import { SourceCitation } from '../models/chat';

export const ANSWER_HEADING = '**Answer**';

const NO_INFO_MARKERS = [
    'i cannot find this information in the available documents',
    "i don't have enough information in the knowledge base",
    'not available in the provided context'
];

const SECTION_KEYS = ['section', 'section_name', 'relevant_section', 'heading', 'subheading'];

const SECTION_PATTERNS: RegExp[] = [
    /\b(part\s+\d+[a-z]?\s*:\s*[A-Za-z][A-Za-z0-9 ,&()\/'-]{3,90})/i,
    /\b(section\s+\d+[a-z]?\s*:\s*[A-Za-z][A-Za-z0-9 ,&()\/'-]{3,90})/i,
    /\b(\d+(?:\.\d+)*[.)]?\s+[A-Z][A-Za-z0-9&()\/'-]*(?:\s+[A-Za-z][A-Za-z0-9&()\/'-]*){0,8})/
];

function stripInvisible(text: string): string {
    return text.replace(/[\u200b\ufeff]/g, '');
}

function collapseWhitespace(text: string): string {
    return text.split(/\s+/).filter(Boolean).join(' ');
}

/** Ordering used for titles and section labels: lower-cased, by code point. */
function compareCaseInsensitive(a: string, b: string): number {
    const left = a.toLowerCase();
    const right = b.toLowerCase();
    if (left === right) {
        return 0;
    }
    return left < right ? -1 : 1;
}

export function isNoInfoResponse(answer: string): boolean {
    if (!answer) {
        return true;
    }
    const text = answer.toLowerCase();
    return NO_INFO_MARKERS.some(marker => text.includes(marker));
}

export function removeInlineCitations(text: string): string {
    return text.replace(/\[Source:.*?\]/gi, '');
}

/** Drops a trailing `Sources:` block through to the end of the text. */
export function removeSourcesBlock(text: string): string {
    return text.replace(/\n*\**\s*\bSources\s*:.*$/is, '');
}

export function removeHorizontalRules(text: string): string {
    return text.replace(/^---\s*$/gm, '');
}

/**
 * Fixes model output such as `|AnswerThe policy...` or `**Answer:** ...`.
 */
export function repairMalformedPrefix(text: string): string {
    let cleaned = text.replace(/^[|` \n]+/, '');
    cleaned = cleaned.replace(/^(?:\*{0,2}\s*)?answer\b\s*[:-]?\s*\*{0,2}\s*[:-]?\s*/i, '');
    cleaned = cleaned.replace(/^(?:answer|Answer|ANSWER)(?=[A-Z])/, '');
    return cleaned.trim();
}

export function normalizeMarkdownStructure(text: string): string {
    let normalized = text.replace(/(:)\s*(#{2,6}\s)/g, '$1\n\n$2');
    normalized = normalized.replace(/(?<![\n#])(#{2,6}\s)/g, '\n\n$1');
    normalized = normalized.replace(/([.!?])\s*-\s+/g, '$1\n- ');
    normalized = normalized.replace(/(#{2,6}[^\n]*)\s*-\s+/g, '$1\n- ');
    normalized = normalized.replace(/[ \t]+\n/g, '\n');
    normalized = normalized.replace(/\n{3,}/g, '\n\n');
    return normalized.trim();
}

/** Turns a single-line `a - b - c` answer into a bullet list. */
export function formatBulletsIfNeeded(text: string): string {
    if (text.includes('\n') || !text.includes(' - ')) {
        return text;
    }

    const parts = text.split(' - ').map(part => part.trim()).filter(part => part.length > 0);
    if (parts.length < 3) {
        return text;
    }

    return parts.map(part => `- ${part}`).join('\n');
}

export function compactBlankLines(text: string, maxBlankLines: number = 1): string {
    if (!text) {
        return text;
    }

    const compacted: string[] = [];
    let blankCount = 0;

    for (const rawLine of stripInvisible(text).split('\n')) {
        const line = rawLine.replace(/\u00a0/g, ' ').trimEnd();
        if (!line.trim()) {
            blankCount++;
            if (blankCount <= maxBlankLines) {
                compacted.push('');
            }
            continue;
        }

        blankCount = 0;
        compacted.push(line);
    }

    return compacted.join('\n').trim();
}

/**
 * Integer view of a page or chunk metadata value. Accepts finite numbers
 * (truncated) and integer strings; anything else is null.
 */
export function coerceInt(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? Math.trunc(value) : null;
    }
    if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
        return Number.parseInt(value, 10);
    }
    return null;
}

export function inferSectionFromText(text: string): string | null {
    if (!text) {
        return null;
    }

    const normalized = collapseWhitespace(stripInvisible(text).replace(/\u00a0/g, ' '));
    if (!normalized) {
        return null;
    }

    for (const pattern of SECTION_PATTERNS) {
        const captured = pattern.exec(normalized)?.[1];
        if (captured === undefined) {
            continue;
        }
        const label = captured.trim().replace(/[.,;:-]+$/, '');
        if (label.length >= 3 && label.length <= 110) {
            return label;
        }
    }
    return null;
}

export function extractSectionLabel(metadata: Record<string, unknown>, excerpt: string = ''): string | null {
    for (const key of SECTION_KEYS) {
        const value = metadata[key];
        if (typeof value !== 'string' && typeof value !== 'number') {
            continue;
        }
        const label = String(value).trim();
        if (label) {
            return label;
        }
    }
    return inferSectionFromText(excerpt);
}

interface SourceGroup {
    pages: Set<number>;
    chunks: Set<number>;
    sections: Set<string>;
}

function pluralLabel(singular: string, plural: string, values: Array<string | number>, separator: string): string {
    return values.length === 1
        ? `${singular}${separator}${String(values[0])}`
        : `${plural}${separator}${values.join(', ')}`;
}

/**
 * One `Sources:` line with a single entry per document title, listing the
 * sections and pages (or chunk numbers) that were cited.
 */
export function buildSourcesFooter(sources: SourceCitation[]): string {
    if (sources.length === 0) {
        return '';
    }

    const grouped = new Map<string, SourceGroup>();
    for (const source of sources) {
        const title = String(source.title || source.id || 'Document');
        const metadata = source.metadata ?? {};
        const pageNumber = coerceInt(metadata.page_number);
        const chunkIndex = coerceInt(metadata.chunk_index);
        const sectionLabel = extractSectionLabel(metadata, source.excerpt || '');

        let group = grouped.get(title);
        if (!group) {
            group = { pages: new Set(), chunks: new Set(), sections: new Set() };
            grouped.set(title, group);
        }

        if (pageNumber !== null) {
            group.pages.add(pageNumber);
        } else if (chunkIndex !== null) {
            group.chunks.add(chunkIndex + 1);
        }

        if (sectionLabel) {
            group.sections.add(sectionLabel);
        }
    }

    const titles = Array.from(grouped.keys()).sort(compareCaseInsensitive);
    const entries = titles.map(title => {
        const group = grouped.get(title) ?? { pages: new Set<number>(), chunks: new Set<number>(), sections: new Set<string>() };
        const pages = Array.from(group.pages).sort((a, b) => a - b);
        const chunks = Array.from(group.chunks).sort((a, b) => a - b);
        const sections = Array.from(group.sections).sort(compareCaseInsensitive);

        const labelParts: string[] = [];
        if (sections.length > 0) {
            labelParts.push(pluralLabel('Section', 'Sections', sections, ': '));
        }
        if (pages.length > 0) {
            labelParts.push(pluralLabel('Page', 'Pages', pages, ' '));
        } else if (chunks.length > 0 && sections.length === 0) {
            labelParts.push(pluralLabel('Chunk', 'Chunks', chunks, ' '));
        }

        return labelParts.length > 0
            ? `[Source: ${title} (${labelParts.join(', ')})]`
            : `[Source: ${title}]`;
    });

    return `Sources: ${entries.join(' ')}`;
}

/**
 * Cleans a model answer into markdown that starts with the answer heading,
 * with inline citations removed and, when sources are given, a single
 * footer appended.
 */
export function normalizeAnswer(answer: string, sources: SourceCitation[] = []): string {
    if (!answer) {
        return answer;
    }

    let cleaned = stripInvisible(answer.replace(/\r\n?/g, '\n'));
    cleaned = removeInlineCitations(cleaned);
    cleaned = removeSourcesBlock(cleaned);
    cleaned = removeHorizontalRules(cleaned);
    cleaned = repairMalformedPrefix(cleaned);
    cleaned = normalizeMarkdownStructure(cleaned);
    cleaned = formatBulletsIfNeeded(cleaned);
    cleaned = compactBlankLines(cleaned);

    if (!cleaned.startsWith(ANSWER_HEADING)) {
        cleaned = `${ANSWER_HEADING}\n\n${cleaned}`.trim();
    }

    cleaned = compactBlankLines(cleaned);

    const footer = buildSourcesFooter(sources);
    return footer ? `${cleaned}\n\n${footer}` : cleaned;
}
