// Document text rides along inside persisted assistant turns between these markers.
// The strings must never change: stored conversations depend on them.
export const HIST_TAG_START = '<!--HISTORICAL_DOC_TEXT-->';
export const HIST_TAG_END = '<!--END_HISTORICAL_DOC_TEXT-->';

export const MAX_DOC_CHARS = 20000;

export interface DecodedContent {
    visible: string;
    doc: string | null;
}

function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// [\s\S] instead of the dotAll flag so the span may cross lines either way
const WRAPPED_SPAN = new RegExp(`\\n?${escapeRegExp(HIST_TAG_START)}([\\s\\S]*?)${escapeRegExp(HIST_TAG_END)}`, 'g');

/**
 * Keeps the tail of `text` when it exceeds `maxChars`; signatures, parties and
 * totals tend to sit at the end of legal and financial documents.
 */
export function truncateDoc(text: string, maxChars = MAX_DOC_CHARS): string {
    if (!text) return '';
    if (text.length <= maxChars) return text;
    return text.slice(text.length - maxChars);
}

export function encodeDocMemory(answer: string, docText: string): string {
    return `${answer}\n${HIST_TAG_START}${docText}${HIST_TAG_END}`;
}

export function stripDocMemory(text: string): string {
    if (!text) return '';
    return text.replace(WRAPPED_SPAN, '');
}

/**
 * Splits a stored turn into what the user sees and the embedded document text.
 * `doc` is null when the turn carries no marker pair; with several pairs the last one wins.
 */
export function decodeDocMemory(content: string): DecodedContent {
    if (!content) return { visible: '', doc: null };
    let doc: string | null = null;
    for (const match of content.matchAll(WRAPPED_SPAN)) {
        doc = match[1];
    }
    return { visible: stripDocMemory(content), doc };
}

/** Last memory found across the history wins, even when it is empty. */
export function lastDocMemory(turns: ReadonlyArray<{ content: string }>): string {
    let memory = '';
    for (const turn of turns) {
        const { doc } = decodeDocMemory(turn.content);
        if (doc !== null) memory = doc;
    }
    return memory;
}
