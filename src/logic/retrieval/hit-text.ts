export const HIT_TEXT_FIELDS = [
    'content_text',
    'content',
    'text',
    'document_text',
    'body',
    'searchable_text',
] as const;

const MIN_FALLBACK_LENGTH = 30;

function asText(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return JSON.stringify(value) ?? '';
}

/**
 * Best-effort text payload of a search hit.
 * Tries `candidates` in order, then any string field longer than 30 chars,
 * then the serialized record. Never throws on missing fields.
 */
export function extractHitText(
    fields: Record<string, unknown> | null | undefined,
    candidates: readonly string[] = HIT_TEXT_FIELDS,
): string {
    if (!fields) return '';

    for (const key of candidates) {
        const value = fields[key];
        if (value) return asText(value);
    }

    for (const value of Object.values(fields)) {
        if (typeof value === 'string' && value.trim().length > MIN_FALLBACK_LENGTH) {
            return value;
        }
    }

    return Object.keys(fields).length > 0 ? asText(fields) : '';
}
